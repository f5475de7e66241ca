import { GitHubApiError } from '../client/errors.js';
import { parseResponse, route, type GitHubTransport } from '../client/transport.js';
import { extendedUserSchema, userSchema, type ExtendedUser, type User } from '../models.js';

/** Extended profile (with account creation time) of any user. */
export async function getUser(transport: GitHubTransport, username: string): Promise<ExtendedUser> {
  const response = await transport.get(route('users', username));
  return parseResponse(extendedUserSchema, response.data, 'user');
}

/** The account the token belongs to. Fails when unauthenticated. */
export async function getCurrentUser(transport: GitHubTransport): Promise<User> {
  const response = await transport.get('/user');
  return parseResponse(userSchema, response.data, 'authenticated user');
}

/**
 * Returns the authenticated user, or null when the API refuses the
 * self-identity call (no token, bad token). Transport failures still throw.
 */
export async function probeAuthenticatedUser(transport: GitHubTransport): Promise<User | null> {
  try {
    return await getCurrentUser(transport);
  } catch (error) {
    if (error instanceof GitHubApiError) {
      return null;
    }
    throw error;
  }
}
