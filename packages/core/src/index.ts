/**
 * @octoblock/core
 *
 * GitHub automation primitives for octoblock:
 *
 * - Transport contract and its Octokit implementation
 * - Lazy pagination (Pager) and the paginated resource streams
 * - Block / follow-check outcome classification
 * - Batched GraphQL profile lookup
 * - Contributor exclusions and pull-request aggregation
 */

export * from './client/index.js';
export * from './pager/index.js';
export * from './streams/index.js';
export * from './blocks/index.js';
export * from './users/index.js';
export * from './exclusions/index.js';
export * from './contributors/index.js';
export * from './models.js';
export type { Logger } from './services/index.js';
