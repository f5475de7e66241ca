/**
 * Per-invocation wiring: configuration, logger, transport and the CSV sink,
 * built from the program's global options and the injected process deps.
 */

import type { Command } from 'commander';
import { createOctokitTransport, type GitHubTransport, type Logger } from '@octoblock/core';
import { resolveConfig, type CliConfig, type Env } from './config.js';
import { createLogger } from './logger.js';
import { CsvSink, readAll, type Output } from './csv.js';

export interface CliDeps {
  env: Env;
  stdout: Output;
  /** Log line writer; defaults to stderr. */
  log?: (line: string) => void;
  readInput: () => Promise<string>;
  createTransport: (config: CliConfig) => GitHubTransport;
}

export interface CommandContext {
  config: CliConfig;
  logger: Logger;
  transport: GitHubTransport;
  stdout: Output;
  sink: CsvSink;
  readInput: () => Promise<string>;
}

export function defaultDeps(): CliDeps {
  return {
    env: process.env,
    stdout: process.stdout,
    readInput: () => readAll(process.stdin),
    createTransport: (config) =>
      createOctokitTransport({ token: config.token, baseUrl: config.baseUrl }),
  };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createCommandContext(command: Command, deps: CliDeps, extra: { batchSize?: string } = {}): CommandContext {
  const globals: Record<string, unknown> = command.optsWithGlobals();
  const config = resolveConfig(
    {
      token: stringOption(globals.token),
      verbose: globals.verbose === true,
      quiet: globals.quiet === true,
      batchSize: extra.batchSize,
    },
    deps.env,
  );
  const logger = createLogger({ verbose: config.verbose, quiet: config.quiet, output: deps.log });
  logger.debug('Resolved configuration', {
    baseUrl: config.baseUrl,
    authenticated: config.token !== undefined,
    pageSize: config.pageSize,
  });

  return {
    config,
    logger,
    transport: deps.createTransport(config),
    stdout: deps.stdout,
    sink: new CsvSink(deps.stdout),
    readInput: deps.readInput,
  };
}
