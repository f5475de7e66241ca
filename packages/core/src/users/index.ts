export {
  DEFAULT_USER_INFO_CHUNK_SIZE,
  buildUsersInfoQuery,
  getUsersInfo,
  getUsersInfoChunked,
} from './users-info.js';
export { getUser, getCurrentUser, probeAuthenticatedUser } from './current-user.js';
