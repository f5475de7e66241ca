/**
 * Batched profile lookup over GraphQL.
 *
 * One query carries one aliased `user(login:)` selection per username, so a
 * chunk of N users costs a single round-trip. Logins that do not resolve
 * (bots, deleted or renamed accounts) come back as `null` and are simply
 * left out of the result.
 */

import { z } from 'zod';
import { parseResponse, type GitHubTransport } from '../client/transport.js';
import { userInfoSchema, type UserInfo } from '../models.js';

export const DEFAULT_USER_INFO_CHUNK_SIZE = 100;

const USER_FIELDS_FRAGMENT = 'fragment UserFields on User { login\ncreatedAt\nname\ntwitterUsername }';

const usersInfoResponseSchema = z.object({
  data: z.record(userInfoSchema.nullable()),
});

export function buildUsersInfoQuery(usernames: readonly string[]): string {
  const aliases = usernames
    .map((username, i) => `u${i}: user(login: ${JSON.stringify(username)}) { ...UserFields }`)
    .join('\n');

  return `query {${aliases}}\n${USER_FIELDS_FRAGMENT}`;
}

/**
 * Fetch profiles for `usernames` in one query. Results follow alias order,
 * one entry per distinct login.
 */
export async function getUsersInfo(transport: GitHubTransport, usernames: readonly string[]): Promise<UserInfo[]> {
  if (usernames.length === 0) return [];

  const body = await transport.graphql(buildUsersInfoQuery(usernames));
  const { data } = parseResponse(usersInfoResponseSchema, body, 'user info response');

  const found = new Map<string, UserInfo>();
  for (let i = 0; i < usernames.length; i++) {
    const info = data[`u${i}`];
    if (info && !found.has(info.login)) {
      found.set(info.login, info);
    }
  }
  return [...found.values()];
}

/**
 * Split `usernames` into chunks of `chunkSize` and query them one chunk at a
 * time, flattening the results.
 */
export async function* getUsersInfoChunked(
  transport: GitHubTransport,
  usernames: readonly string[],
  chunkSize: number = DEFAULT_USER_INFO_CHUNK_SIZE,
): AsyncGenerator<UserInfo, void, undefined> {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  for (let start = 0; start < usernames.length; start += chunkSize) {
    yield* await getUsersInfo(transport, usernames.slice(start, start + chunkSize));
  }
}
