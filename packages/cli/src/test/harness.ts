/**
 * Runs the CLI program in-process against a routed fake transport,
 * capturing stdout and log lines.
 */

import { vi } from 'vitest';
import type { GitHubTransport, TransportResponse } from '@octoblock/core';
import { createProgram } from '../program.js';
import type { CliConfig, Env } from '../lib/config.js';
import type { CliDeps } from '../lib/context.js';

export type RouteHandler = () => TransportResponse | Promise<TransportResponse>;

export interface HarnessOptions {
  routes?: Record<string, RouteHandler>;
  put?: (route: string) => Promise<number>;
  graphql?: (query: string) => Promise<unknown>;
  input?: string;
  env?: Env;
}

export function ok(data: unknown, next?: string): RouteHandler {
  return () => ({ status: 200, data, next });
}

export function createHarness(options: HarnessOptions = {}) {
  const routes = options.routes ?? {};
  const transport = {
    get: vi.fn(async (route: string): Promise<TransportResponse> => {
      const handler = routes[route];
      if (!handler) throw new Error(`unexpected GET ${route}`);
      return handler();
    }),
    put: vi.fn(options.put ?? (async (route: string): Promise<number> => {
      throw new Error(`unexpected PUT ${route}`);
    })),
    graphql: vi.fn(options.graphql ?? (async (): Promise<unknown> => {
      throw new Error('unexpected graphql query');
    })),
  } satisfies GitHubTransport;

  const stdout: string[] = [];
  const logs: string[] = [];
  const createTransport = vi.fn((_config: CliConfig) => transport);

  const deps: CliDeps = {
    env: options.env ?? {},
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    log: (line) => logs.push(line),
    readInput: async () => options.input ?? '',
    createTransport,
  };

  return {
    transport,
    createTransport,
    logs,
    stdout: () => stdout.join(''),
    run: (args: string[]) => createProgram(deps).parseAsync(args, { from: 'user' }),
  };
}
