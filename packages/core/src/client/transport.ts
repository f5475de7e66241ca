/**
 * GitHub transport contract.
 *
 * Everything in core talks to GitHub through this interface so that tests
 * can swap in an in-process fake. `createOctokitTransport` is the real one.
 */

import type { z, ZodTypeAny } from 'zod';
import { MalformedResponseError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type QueryParams = Record<string, string | number>;

export interface TransportResponse {
  status: number;
  data: unknown;
  /** Absolute URL of the next page, from the `Link` header. */
  next?: string;
}

export interface GitHubTransport {
  /**
   * GET an API path (`/user/followers`) or an absolute continuation URL.
   * Throws GitHubApiError / TransportError on failure.
   */
  get(route: string, query?: QueryParams): Promise<TransportResponse>;
  /** PUT with an empty body; resolves to the success status code. */
  put(route: string): Promise<number>;
  /** POST a query to /graphql and return the raw body, partial `errors` included. */
  graphql(query: string): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const LINK_ENTRY = /<([^>]+)>\s*;\s*rel="([^"]+)"/g;

/**
 * Extract the `rel="next"` target from a `Link` header.
 * Returns undefined when the header is absent or carries no next link.
 */
export function parseNextLink(header: string | undefined): string | undefined {
  if (!header) return undefined;
  for (const match of header.matchAll(LINK_ENTRY)) {
    const rels = match[2].split(/\s+/);
    if (rels.includes('next')) return match[1];
  }
  return undefined;
}

/** Build a route from path segments, URL-encoding each one. */
export function route(...segments: string[]): string {
  return '/' + segments.map((s) => encodeURIComponent(s)).join('/');
}

export function parseResponse<S extends ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedResponseError(what, result.error);
  }
  return result.data;
}
