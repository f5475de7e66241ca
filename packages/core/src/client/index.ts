export {
  GitHubApiError,
  TransportError,
  MalformedResponseError,
  isGitHubApiError,
  isTransportError,
} from './errors.js';
export type { GitHubFieldError, GitHubApiErrorOptions } from './errors.js';
export { parseNextLink, route, parseResponse } from './transport.js';
export type { GitHubTransport, TransportResponse, QueryParams } from './transport.js';
export { createOctokitTransport, graphqlEndpoint, DEFAULT_API_BASE_URL } from './octokit-transport.js';
export type { OctokitTransportOptions } from './octokit-transport.js';
