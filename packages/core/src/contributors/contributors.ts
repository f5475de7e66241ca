/**
 * Pull-request contributor aggregation.
 */

import type { PullRequest } from '../models.js';

export interface RepoPath {
  owner: string;
  repo: string;
}

export interface ContributorSummary {
  login: string;
  id: number;
  prCount: number;
  /** Creation time of the contributor's earliest pull request. */
  firstPrAt: Date;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Parse `owner/repo`. Anything but exactly two non-empty parts is null. */
export function parseRepoPath(path: string): RepoPath | null {
  const parts = path.split('/');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') return null;
  return { owner: parts[0], repo: parts[1] };
}

/**
 * Group pull requests by author (login + id), sorted by login.
 */
export function summarizeContributors(prs: Iterable<PullRequest>): ContributorSummary[] {
  const byAuthor = new Map<string, ContributorSummary>();

  for (const pr of prs) {
    const key = `${pr.user.login}\u0000${pr.user.id}`;
    const createdAt = new Date(pr.created_at);
    const existing = byAuthor.get(key);

    if (existing) {
      existing.prCount += 1;
      if (createdAt < existing.firstPrAt) existing.firstPrAt = createdAt;
    } else {
      byAuthor.set(key, { login: pr.user.login, id: pr.user.id, prCount: 1, firstPrAt: createdAt });
    }
  }

  return [...byAuthor.values()].sort((a, b) => {
    if (a.login !== b.login) return a.login < b.login ? -1 : 1;
    return a.id - b.id;
  });
}

/** Whole days between account creation and `at`, truncated toward zero. */
export function accountAgeInDays(at: Date, accountCreatedAt: Date): number {
  return Math.trunc((at.getTime() - accountCreatedAt.getTime()) / MS_PER_DAY);
}
