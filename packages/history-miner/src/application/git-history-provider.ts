import type { CommitDiffs, GitCommitHeader } from "../domain/mining-types.js";

export type CommitListQuery = {
  ref: string;
  /** Lower bound on committer time; null walks the whole history of `ref`. */
  sinceUnix: number | null;
};

export type CommitListing =
  | { status: "resolved"; commits: readonly GitCommitHeader[] }
  | { status: "unknown_ref" };

export type GitHistoryProgressEvent =
  | { stage: "git_log_received"; ref: string; bytes: number }
  | { stage: "git_log_parsed"; ref: string; commits: number }
  | { stage: "diff_failed"; commitId: string; message: string };

export interface GitHistoryProvider {
  isGitRepository(repositoryPath: string): boolean;
  getRepositoryRoot(repositoryPath: string): string;
  listCommits(
    repositoryPath: string,
    query: CommitListQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): CommitListing;
  /**
   * Per-file diff bodies of a commit against its first parent, or against the
   * empty tree for a root commit. Empty when the commit cannot be resolved.
   */
  getCommitDiffs(
    repositoryPath: string,
    commitId: string,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): CommitDiffs;
}
