export { parseRepoPath, summarizeContributors, accountAgeInDays } from './contributors.js';
export type { RepoPath, ContributorSummary } from './contributors.js';
