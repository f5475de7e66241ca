/**
 * Contributor exclusions.
 *
 * A two-column CSV (repository path, username) without a header row lists
 * accounts to leave out of a repository's contributor report. Usernames
 * compare case-insensitively.
 */

import * as fs from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

/**
 * Accounts GitHub itself treats specially. Anything else belongs in the
 * exclusions file.
 */
export const ALWAYS_EXCLUDED = new Set(['ghost', 'dependabot[bot]']);

const rowsSchema = z.array(z.tuple([z.string(), z.string()]));

export class Exclusions {
  private readonly byRepo: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(byRepo: Map<string, Set<string>>) {
    this.byRepo = byRepo;
  }

  static empty(): Exclusions {
    return new Exclusions(new Map());
  }

  /** Build from CSV text. Malformed rows throw. */
  static load(content: string): Exclusions {
    const records: unknown = parse(content, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
    const parsed = rowsSchema.safeParse(records);
    if (!parsed.success) {
      const index = parsed.error.issues[0].path[0];
      const row = typeof index === 'number' ? String(index + 1) : '?';
      throw new Error(`Invalid exclusions file: row ${row}: expected "repository,username"`);
    }

    const byRepo = new Map<string, Set<string>>();
    for (const [repo, username] of parsed.data) {
      let usernames = byRepo.get(repo);
      if (!usernames) {
        usernames = new Set();
        byRepo.set(repo, usernames);
      }
      usernames.add(username.toLowerCase());
    }
    return new Exclusions(byRepo);
  }

  static fromFile(filePath: string): Exclusions {
    return Exclusions.load(fs.readFileSync(filePath, 'utf-8'));
  }

  isExcluded(repo: string, username: string): boolean {
    const normalized = username.toLowerCase();
    if (ALWAYS_EXCLUDED.has(normalized)) return true;
    return this.byRepo.get(repo)?.has(normalized) ?? false;
  }
}
