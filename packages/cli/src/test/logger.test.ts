import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { createLogger } from '../lib/logger.js';

beforeAll(() => {
  chalk.level = 0;
});

function capture(options: { verbose?: boolean; quiet?: boolean }) {
  const lines: string[] = [];
  const logger = createLogger({ ...options, output: (line) => lines.push(line) });
  return { logger, lines };
}

describe('createLogger', () => {
  it('hides debug output unless verbose', () => {
    const { logger, lines } = capture({});
    logger.debug('hidden');
    logger.info('shown', { extra: 1 });
    expect(lines).toEqual(['[info] shown']);
  });

  it('includes data on debug and info lines when verbose', () => {
    const { logger, lines } = capture({ verbose: true });
    logger.debug('fetching', { page: 2 });
    logger.info('done', { count: 3 });
    expect(lines).toEqual(['[debug] fetching {"page":2}', '[info] done {"count":3}']);
  });

  it('keeps only warnings and errors when quiet', () => {
    const { logger, lines } = capture({ verbose: true, quiet: true });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d', { status: 500 });
    expect(lines).toEqual(['[warn] c', '[error] d {"status":500}']);
  });
});
