/**
 * Block and follow-check outcome classification.
 *
 * GitHub reports "already blocked" and "no such user" as ordinary error
 * responses. Those are expected outcomes, so they come back as BlockStatus
 * values. Errors carrying a field-level `errors` list, and transport
 * failures, are still thrown.
 */

import { GitHubApiError } from '../client/errors.js';
import { route, type GitHubTransport } from '../client/transport.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BlockStatus =
  | { kind: 'newly-blocked' }
  | { kind: 'already-blocked' }
  | { kind: 'user-not-found' }
  | { kind: 'other-success'; status: number }
  | { kind: 'other-non-success'; message: string };

export interface BlockMessages {
  /** Substring identifying a repeat block. */
  alreadyBlocked: string;
  /** Exact message of a missing account. */
  notFound: string;
}

export const DEFAULT_BLOCK_MESSAGES: BlockMessages = {
  alreadyBlocked: 'Blocked user has already been blocked',
  notFound: 'Not Found',
};

const NO_CONTENT = 204;

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function blockStatusFromSuccess(status: number): BlockStatus {
  return status === NO_CONTENT ? { kind: 'newly-blocked' } : { kind: 'other-success', status };
}

/**
 * Map a failed block attempt onto a BlockStatus, or rethrow it when it is
 * a hard failure.
 */
export function blockStatusFromError(error: unknown, messages: BlockMessages = DEFAULT_BLOCK_MESSAGES): BlockStatus {
  if (!(error instanceof GitHubApiError) || error.hasFieldErrors) {
    throw error;
  }

  if (error.message.includes(messages.alreadyBlocked)) {
    return { kind: 'already-blocked' };
  }
  if (error.message === messages.notFound) {
    return { kind: 'user-not-found' };
  }
  return { kind: 'other-non-success', message: error.message };
}

export function assertNeverStatus(status: never): never {
  throw new Error(`Unhandled block status: ${JSON.stringify(status)}`);
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

async function putBlock(transport: GitHubTransport, path: string, messages?: BlockMessages): Promise<BlockStatus> {
  let status: number;
  try {
    status = await transport.put(path);
  } catch (error) {
    return blockStatusFromError(error, messages);
  }
  return blockStatusFromSuccess(status);
}

export function blockUserForUser(
  transport: GitHubTransport,
  username: string,
  messages?: BlockMessages,
): Promise<BlockStatus> {
  return putBlock(transport, route('user', 'blocks', username), messages);
}

export function blockUserForOrganization(
  transport: GitHubTransport,
  organization: string,
  username: string,
  messages?: BlockMessages,
): Promise<BlockStatus> {
  return putBlock(transport, route('orgs', organization, 'blocks', username), messages);
}

/** Block from the organization when one is given, otherwise from the authenticated user. */
export function blockUser(
  transport: GitHubTransport,
  username: string,
  organization?: string,
  messages?: BlockMessages,
): Promise<BlockStatus> {
  return organization !== undefined
    ? blockUserForOrganization(transport, organization, username, messages)
    : blockUserForUser(transport, username, messages);
}

/**
 * Does `follower` follow `target`? A plain error response (404) means no.
 */
export async function checkFollow(transport: GitHubTransport, follower: string, target: string): Promise<boolean> {
  try {
    const response = await transport.get(route('users', follower, 'following', target));
    return response.status === NO_CONTENT;
  } catch (error) {
    if (error instanceof GitHubApiError && !error.hasFieldErrors) {
      return false;
    }
    throw error;
  }
}
