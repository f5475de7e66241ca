export {
  DEFAULT_BLOCK_MESSAGES,
  blockStatusFromSuccess,
  blockStatusFromError,
  assertNeverStatus,
  blockUser,
  blockUserForUser,
  blockUserForOrganization,
  checkFollow,
} from './block-status.js';
export type { BlockStatus, BlockMessages } from './block-status.js';
