import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../lib/config.js';
import { CommandRuntimeError } from '../lib/command-runtime.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      token: undefined,
      baseUrl: 'https://api.github.com',
      pageSize: 100,
      userInfoBatchSize: 100,
      verbose: false,
      quiet: false,
    });
  });

  it('prefers the flag token over the environment', () => {
    const env = { GITHUB_TOKEN: 'env-token', GH_TOKEN: 'gh-token' };
    expect(resolveConfig({ token: 'flag-token' }, env).token).toBe('flag-token');
    expect(resolveConfig({}, env).token).toBe('env-token');
    expect(resolveConfig({}, { GH_TOKEN: 'gh-token' }).token).toBe('gh-token');
  });

  it('treats blank values as unset', () => {
    expect(resolveConfig({ token: '  ' }, { GITHUB_TOKEN: '', GH_TOKEN: 'gh-token' }).token).toBe('gh-token');
  });

  it('strips trailing slashes from the API URL', () => {
    expect(resolveConfig({}, { GITHUB_API_URL: 'https://ghe.example/api/v3//' }).baseUrl).toBe(
      'https://ghe.example/api/v3',
    );
  });

  it('reads sizes from the environment and the batch size flag', () => {
    const env = { OCTOBLOCK_PAGE_SIZE: '30', OCTOBLOCK_BATCH_SIZE: '50' };
    expect(resolveConfig({}, env)).toMatchObject({ pageSize: 30, userInfoBatchSize: 50 });
    expect(resolveConfig({ batchSize: '7' }, env).userInfoBatchSize).toBe(7);
  });

  it('rejects a page size above the API cap', () => {
    expect(() => resolveConfig({}, { OCTOBLOCK_PAGE_SIZE: '101' })).toThrow(
      'OCTOBLOCK_PAGE_SIZE must be an integer between 1 and 100, got "101"',
    );
  });

  it('rejects a non-numeric batch size with exit code 2', () => {
    let caught: unknown;
    try {
      resolveConfig({ batchSize: 'many' }, {});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CommandRuntimeError);
    expect(caught).toMatchObject({ message: 'batch size must be an integer, got "many"', exitCode: 2 });
  });

  it('passes verbosity flags through', () => {
    expect(resolveConfig({ verbose: true, quiet: true }, {})).toMatchObject({ verbose: true, quiet: true });
  });
});
