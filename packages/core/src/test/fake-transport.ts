/**
 * In-process GitHubTransport for tests. Each method is a vi.fn whose
 * default implementation fails loudly, so tests only stub what they use.
 */

import { vi } from 'vitest';
import type { GitHubTransport, QueryParams, TransportResponse } from '../client/transport.js';

export function fakeTransport(overrides: Partial<GitHubTransport> = {}) {
  return {
    get: vi.fn(
      overrides.get ??
        (async (route: string, _query?: QueryParams): Promise<TransportResponse> => {
          throw new Error(`unexpected GET ${route}`);
        }),
    ),
    put: vi.fn(
      overrides.put ??
        (async (route: string): Promise<number> => {
          throw new Error(`unexpected PUT ${route}`);
        }),
    ),
    graphql: vi.fn(
      overrides.graphql ??
        (async (_query: string): Promise<unknown> => {
          throw new Error('unexpected graphql query');
        }),
    ),
  } satisfies GitHubTransport;
}

/** Users `user1`..`userN` with ids 1..N, starting from `from`. */
export function makeUsers(count: number, from = 1): Array<{ login: string; id: number }> {
  return Array.from({ length: count }, (_, i) => ({ login: `user${from + i}`, id: from + i }));
}
