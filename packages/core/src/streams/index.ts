export {
  DEFAULT_PAGE_SIZE,
  listStream,
  getFollowers,
  getFollowing,
  getBlocks,
  getBlocksForUser,
  getBlocksForOrganization,
  pullRequests,
} from './resource-streams.js';
export type { StreamOptions } from './resource-streams.js';
