export { pagerStream, streamPages, collect } from './pager.js';
export type { Page, FetchPage } from './pager.js';
