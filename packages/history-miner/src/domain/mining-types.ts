import type { FileDiffs } from "@commitscope/core";

export type GitCommitHeader = {
  hash: string;
  parents: readonly string[];
  authorName: string;
  authorEmail: string;
  committedAtUnix: number;
  message: string;
};

export type CommitDiffs = FileDiffs;

export type MiningConfig = {
  daysBack: number;
  fallbackBranches: readonly string[];
  structureMaxDepth: number;
  structureMaxEntries: number;
};

export const DEFAULT_MINING_CONFIG: MiningConfig = {
  daysBack: 30,
  fallbackBranches: ["main", "master"],
  structureMaxDepth: 2,
  structureMaxEntries: 10,
};

export const FULL_HISTORY_REF = "HEAD";

export const MISSING_DIFF_PLACEHOLDER = "No diff content available";

export const SECONDS_PER_DAY = 24 * 60 * 60;
