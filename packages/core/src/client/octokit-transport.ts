/**
 * GitHubTransport backed by @octokit/core.
 *
 * Octokit handles the bearer token, base URL and user agent. This module
 * only shapes its responses into TransportResponse and sorts its
 * RequestErrors into GitHubApiError (structured body) or TransportError.
 */

import { Octokit } from '@octokit/core';
import { RequestError } from '@octokit/request-error';
import { z } from 'zod';
import { GitHubApiError, TransportError } from './errors.js';
import { parseNextLink, type GitHubTransport, type QueryParams } from './transport.js';

export const DEFAULT_API_BASE_URL = 'https://api.github.com';

export interface OctokitTransportOptions {
  token?: string;
  baseUrl?: string;
  userAgent?: string;
  /** Replacement fetch, used by tests. */
  fetch?: typeof fetch;
}

const fieldErrorSchema = z.union([
  z.object({
    resource: z.string().optional(),
    field: z.string().optional(),
    code: z.string().optional(),
    message: z.string().optional(),
  }),
  z.string().transform((message) => ({ message })),
]);

const errorBodySchema = z.object({
  message: z.string(),
  errors: z.array(fieldErrorSchema).optional(),
  documentation_url: z.string().optional(),
});

/**
 * Translate whatever Octokit threw into one of our two error classes.
 */
function toTransportFailure(error: unknown): GitHubApiError | TransportError {
  if (error instanceof GitHubApiError || error instanceof TransportError) {
    return error;
  }

  if (error instanceof RequestError) {
    // No response at all means the request never completed (DNS, reset, ...)
    if (error.response === undefined) {
      return new TransportError(error.message, { cause: error });
    }

    const body = errorBodySchema.safeParse(error.response.data);
    if (!body.success) {
      return new TransportError(`HTTP ${error.status} without a structured error body`, {
        status: error.status,
        cause: error,
      });
    }

    return new GitHubApiError({
      status: error.status,
      message: body.data.message,
      errors: body.data.errors,
      documentationUrl: body.data.documentation_url,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, { cause: error });
}

/**
 * GraphQL lives beside the REST root: `https://api.github.com/graphql` on
 * github.com, `https://host/api/graphql` for an Enterprise `/api/v3` base.
 */
export function graphqlEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/api\/v3\/?$/, '/api').replace(/\/+$/, '')}/graphql`;
}

function withQuery(route: string, query: QueryParams | undefined): string {
  if (!query || Object.keys(query).length === 0) return route;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    search.set(key, String(value));
  }
  return `${route}${route.includes('?') ? '&' : '?'}${search.toString()}`;
}

export function createOctokitTransport(options: OctokitTransportOptions = {}): GitHubTransport {
  const baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
  const graphqlUrl = graphqlEndpoint(baseUrl);
  const octokit = new Octokit({
    auth: options.token,
    baseUrl,
    userAgent: options.userAgent ?? 'octoblock',
    request: options.fetch ? { fetch: options.fetch } : undefined,
  });

  return {
    async get(route: string, query?: QueryParams) {
      try {
        const response = await octokit.request(`GET ${withQuery(route, query)}`);
        return {
          status: response.status,
          data: response.data,
          next: parseNextLink(response.headers.link),
        };
      } catch (error) {
        throw toTransportFailure(error);
      }
    },

    async put(route: string) {
      try {
        const response = await octokit.request(`PUT ${route}`);
        return response.status;
      } catch (error) {
        throw toTransportFailure(error);
      }
    },

    async graphql(query: string) {
      try {
        const response = await octokit.request(`POST ${graphqlUrl}`, { query });
        return response.data;
      } catch (error) {
        throw toTransportFailure(error);
      }
    },
  };
}
