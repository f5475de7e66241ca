/**
 * Paginated GitHub listings: followers, following, blocks, pull requests.
 *
 * Each stream issues one initial request with `per_page` set, then walks
 * the `Link: rel="next"` chain through the Pager. Items are validated
 * page by page.
 */

import { z, type ZodType } from 'zod';
import { parseResponse, route, type GitHubTransport, type QueryParams } from '../client/transport.js';
import { streamPages, type Page } from '../pager/pager.js';
import { pullRequestSchema, userSchema, type PullRequest, type User } from '../models.js';

export const DEFAULT_PAGE_SIZE = 100;

export interface StreamOptions {
  /** Items requested per page (default 100, the API maximum). */
  pageSize?: number;
}

/**
 * Generic paginated listing. `what` names the resource in validation errors.
 */
export function listStream<T>(
  transport: GitHubTransport,
  path: string,
  itemSchema: ZodType<T>,
  what: string,
  query: QueryParams = {},
  options: StreamOptions = {},
): AsyncGenerator<T, void, undefined> {
  const pageSchema = z.array(itemSchema);

  const fetchPage = async (target: string, params?: QueryParams): Promise<Page<T>> => {
    const response = await transport.get(target, params);
    return {
      items: parseResponse(pageSchema, response.data, what),
      next: response.next,
    };
  };

  return streamPages(
    () => fetchPage(path, { ...query, per_page: options.pageSize ?? DEFAULT_PAGE_SIZE }),
    // Continuation URLs already carry every query parameter
    (next) => fetchPage(next),
  );
}

export function getFollowers(transport: GitHubTransport, options?: StreamOptions): AsyncGenerator<User, void, undefined> {
  return listStream(transport, '/user/followers', userSchema, 'follower list', {}, options);
}

export function getFollowing(transport: GitHubTransport, options?: StreamOptions): AsyncGenerator<User, void, undefined> {
  return listStream(transport, '/user/following', userSchema, 'following list', {}, options);
}

export function getBlocksForUser(transport: GitHubTransport, options?: StreamOptions): AsyncGenerator<User, void, undefined> {
  return listStream(transport, '/user/blocks', userSchema, 'block list', {}, options);
}

export function getBlocksForOrganization(
  transport: GitHubTransport,
  organization: string,
  options?: StreamOptions,
): AsyncGenerator<User, void, undefined> {
  return listStream(transport, route('orgs', organization, 'blocks'), userSchema, 'organization block list', {}, options);
}

/** Blocks of the organization when one is given, otherwise of the authenticated user. */
export function getBlocks(
  transport: GitHubTransport,
  organization?: string,
  options?: StreamOptions,
): AsyncGenerator<User, void, undefined> {
  return organization !== undefined
    ? getBlocksForOrganization(transport, organization, options)
    : getBlocksForUser(transport, options);
}

/** Every pull request of a repository, open, closed and merged. */
export function pullRequests(
  transport: GitHubTransport,
  owner: string,
  repo: string,
  options?: StreamOptions,
): AsyncGenerator<PullRequest, void, undefined> {
  return listStream(transport, route('repos', owner, repo, 'pulls'), pullRequestSchema, 'pull request list', { state: 'all' }, options);
}
