import { basename } from "node:path";
import type { CommitRecord, ContributorFilter, MiningSummary } from "@commitscope/core";
import { ContributorRollups, createCommitRecord, isMergeCommit } from "../domain/mining-metrics.js";
import {
  DEFAULT_MINING_CONFIG,
  FULL_HISTORY_REF,
  SECONDS_PER_DAY,
  type CommitDiffs,
  type GitCommitHeader,
  type MiningConfig,
} from "../domain/mining-types.js";
import type { GitHistoryProgressEvent, GitHistoryProvider } from "./git-history-provider.js";
import type { RepositoryStructureReader } from "./repository-structure-reader.js";

export type MineRepositoryHistoryInput = {
  repositoryPath: string;
  /** Days of history to include; 0 or less means all time. */
  daysBack?: number;
  contributorFilter?: readonly string[];
  branch?: string;
  now?: Date;
  config?: Partial<MiningConfig>;
};

export type MiningSources = {
  history: GitHistoryProvider;
  structure: RepositoryStructureReader;
};

export type MiningProgressEvent =
  | { stage: "checking_git_repository" }
  | { stage: "not_git_repository" }
  | { stage: "resolving_commits"; ref: string; sinceUnix: number | null }
  | { stage: "ref_not_found"; ref: string; explicit: boolean }
  | { stage: "no_commits_in_range"; ref: string; explicit: boolean }
  | { stage: "commits_resolved"; ref: string; total: number; windowApplied: boolean }
  | { stage: "commit_processed"; processed: number; total: number; hash: string }
  | { stage: "diff_unavailable"; hash: string; message: string }
  | { stage: "structure_unreadable"; path: string; message: string }
  | { stage: "mining_completed"; commits: number; contributors: number }
  | { stage: "history"; event: GitHistoryProgressEvent };

type ResolvedRange = {
  ref: string;
  commits: readonly GitCommitHeader[];
  windowApplied: boolean;
};

const createEffectiveConfig = (overrides: Partial<MiningConfig> | undefined): MiningConfig => ({
  ...DEFAULT_MINING_CONFIG,
  ...overrides,
});

const describePeriod = (daysBack: number, windowApplied: boolean): string =>
  windowApplied ? `Last ${daysBack} days` : "All time";

const normalizeContributorFilter = (
  filter: readonly string[] | undefined,
): ReadonlySet<string> | null => {
  if (filter === undefined || filter.length === 0) {
    return null;
  }

  return new Set(filter);
};

const resolveCommitRange = (
  input: MineRepositoryHistoryInput,
  history: GitHistoryProvider,
  sinceUnix: number | null,
  fallbackBranches: readonly string[],
  onProgress?: (event: MiningProgressEvent) => void,
): ResolvedRange => {
  const list = (ref: string, since: number | null): readonly GitCommitHeader[] | null => {
    onProgress?.({ stage: "resolving_commits", ref, sinceUnix: since });
    const listing = history.listCommits(input.repositoryPath, { ref, sinceUnix: since }, (event) =>
      onProgress?.({ stage: "history", event }),
    );
    if (listing.status === "unknown_ref") {
      return null;
    }

    return since === null
      ? listing.commits
      : listing.commits.filter((commit) => commit.committedAtUnix >= since);
  };

  if (input.branch !== undefined) {
    const commits = list(input.branch, sinceUnix);
    if (commits === null) {
      onProgress?.({ stage: "ref_not_found", ref: input.branch, explicit: true });
    } else if (commits.length === 0) {
      onProgress?.({ stage: "no_commits_in_range", ref: input.branch, explicit: true });
    }

    return { ref: input.branch, commits: commits ?? [], windowApplied: sinceUnix !== null };
  }

  for (const ref of fallbackBranches) {
    const commits = list(ref, sinceUnix);
    if (commits === null) {
      onProgress?.({ stage: "ref_not_found", ref, explicit: false });
      continue;
    }

    if (commits.length > 0) {
      return { ref, commits, windowApplied: sinceUnix !== null };
    }

    onProgress?.({ stage: "no_commits_in_range", ref, explicit: false });
  }

  const commits = list(FULL_HISTORY_REF, null);
  if (commits === null) {
    onProgress?.({ stage: "ref_not_found", ref: FULL_HISTORY_REF, explicit: false });
  }

  return { ref: FULL_HISTORY_REF, commits: commits ?? [], windowApplied: false };
};

const extractDiffs = (
  repositoryPath: string,
  commit: GitCommitHeader,
  history: GitHistoryProvider,
  onProgress?: (event: MiningProgressEvent) => void,
): CommitDiffs => {
  try {
    return history.getCommitDiffs(repositoryPath, commit.hash, (event) =>
      onProgress?.({ stage: "history", event }),
    );
  } catch (error) {
    // the commit still counts, with no detectable diff
    onProgress?.({
      stage: "diff_unavailable",
      hash: commit.hash,
      message: error instanceof Error ? error.message : "Unknown diff extraction error",
    });
    return {};
  }
};

/**
 * Walks the resolved commit range once, building a record per non-merge
 * commit and the per-author rollups alongside it.
 */
export const mineRepositoryHistory = (
  input: MineRepositoryHistoryInput,
  sources: MiningSources,
  onProgress?: (event: MiningProgressEvent) => void,
): MiningSummary => {
  onProgress?.({ stage: "checking_git_repository" });
  if (!sources.history.isGitRepository(input.repositoryPath)) {
    onProgress?.({ stage: "not_git_repository" });
    return {
      targetPath: input.repositoryPath,
      available: false,
      reason: "not_git_repository",
    };
  }

  const config = createEffectiveConfig(input.config);
  const daysBack = input.daysBack ?? config.daysBack;
  const nowUnix = Math.floor((input.now ?? new Date()).getTime() / 1000);
  const sinceUnix = daysBack > 0 ? nowUnix - daysBack * SECONDS_PER_DAY : null;

  const range = resolveCommitRange(input, sources.history, sinceUnix, config.fallbackBranches, onProgress);
  onProgress?.({
    stage: "commits_resolved",
    ref: range.ref,
    total: range.commits.length,
    windowApplied: range.windowApplied,
  });

  const contributorFilter = normalizeContributorFilter(input.contributorFilter);
  const rollups = new ContributorRollups();
  const commits: CommitRecord[] = [];

  for (const [index, header] of range.commits.entries()) {
    if (isMergeCommit(header)) {
      continue;
    }

    if (contributorFilter !== null && !contributorFilter.has(header.authorName)) {
      continue;
    }

    const diffs = extractDiffs(input.repositoryPath, header, sources.history, onProgress);
    const record = createCommitRecord(header, diffs);
    rollups.record(record);
    commits.push(record);
    onProgress?.({
      stage: "commit_processed",
      processed: index + 1,
      total: range.commits.length,
      hash: record.hash,
    });
  }

  const repositoryRoot = sources.history.getRepositoryRoot(input.repositoryPath);
  const repositoryStructure = sources.structure.snapshot(
    repositoryRoot,
    { maxDepth: config.structureMaxDepth, maxEntries: config.structureMaxEntries },
    (path, message) => onProgress?.({ stage: "structure_unreadable", path, message }),
  );

  const filterApplied: ContributorFilter = contributorFilter === null ? "all" : [...contributorFilter];
  onProgress?.({ stage: "mining_completed", commits: commits.length, contributors: rollups.size });

  return {
    targetPath: input.repositoryPath,
    available: true,
    repoName: basename(repositoryRoot) || "Unknown",
    period: describePeriod(daysBack, range.windowApplied),
    ref: range.ref,
    contributorFilter: filterApplied,
    totalCommits: commits.length,
    commits,
    contributors: rollups.finalize(),
    repositoryStructure,
  };
};
