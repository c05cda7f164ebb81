import type { CommitRecord, ContributorRollup } from "@commitscope/core";
import { classifyCommitMessage } from "./commit-classifier.js";
import { sumLineCounts } from "./diff-statistics.js";
import type { CommitDiffs, GitCommitHeader } from "./mining-types.js";

type ContributorAccumulator = {
  email: string;
  commits: number;
  linesAdded: number;
  linesDeleted: number;
  filesChanged: number;
};

export const isMergeCommit = (header: GitCommitHeader): boolean => header.parents.length > 1;

export const createCommitRecord = (header: GitCommitHeader, diffs: CommitDiffs): CommitRecord => {
  const { linesAdded, linesDeleted } = sumLineCounts(Object.values(diffs));
  const message = header.message.trim();

  return {
    hash: header.hash,
    authorName: header.authorName,
    authorEmail: header.authorEmail,
    timestamp: header.committedAtUnix,
    message,
    diffs,
    linesAdded,
    linesDeleted,
    filesChanged: Object.keys(diffs).length,
    category: classifyCommitMessage(message),
  };
};

/**
 * Single-writer accumulator for per-author rollups. Authors keep the order in
 * which they were first seen.
 */
export class ContributorRollups {
  private readonly byAuthor = new Map<string, ContributorAccumulator>();

  record(commit: CommitRecord): void {
    const current = this.byAuthor.get(commit.authorName) ?? {
      email: commit.authorEmail,
      commits: 0,
      linesAdded: 0,
      linesDeleted: 0,
      filesChanged: 0,
    };

    current.commits += 1;
    current.linesAdded += commit.linesAdded;
    current.linesDeleted += commit.linesDeleted;
    current.filesChanged += commit.filesChanged;
    this.byAuthor.set(commit.authorName, current);
  }

  get size(): number {
    return this.byAuthor.size;
  }

  finalize(): Readonly<Record<string, ContributorRollup>> {
    return Object.fromEntries(
      [...this.byAuthor.entries()].map(([authorName, stats]): [string, ContributorRollup] => [
        authorName,
        { ...stats },
      ]),
    );
  }
}
