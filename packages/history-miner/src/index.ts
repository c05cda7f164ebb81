import type { MiningSummary } from "@commitscope/core";
import {
  mineRepositoryHistory,
  type MineRepositoryHistoryInput,
  type MiningProgressEvent,
} from "./application/mine-repository-history.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";
import { FsRepositoryStructureReader } from "./infrastructure/repository-structure.js";

export type {
  MineRepositoryHistoryInput,
  MiningProgressEvent,
  MiningSources,
} from "./application/mine-repository-history.js";
export type {
  CommitListQuery,
  CommitListing,
  GitHistoryProgressEvent,
  GitHistoryProvider,
} from "./application/git-history-provider.js";
export type {
  RepositoryStructureReader,
  StructureSnapshotOptions,
} from "./application/repository-structure-reader.js";
export type { LineCounts } from "./domain/diff-statistics.js";
export type { GitCommitHeader, MiningConfig } from "./domain/mining-types.js";
export type { FilePatch } from "./parsing/commit-patch-parser.js";

export { mineRepositoryHistory } from "./application/mine-repository-history.js";
export { classifyCommitMessage } from "./domain/commit-classifier.js";
export { computeActivityBreakdown } from "./domain/activity-breakdown.js";
export { countLines } from "./domain/diff-statistics.js";
export { DEFAULT_MINING_CONFIG, MISSING_DIFF_PLACEHOLDER } from "./domain/mining-types.js";
export { parseCommitPatch } from "./parsing/commit-patch-parser.js";
export { snapshotRepositoryStructure } from "./infrastructure/repository-structure.js";

export const mineRepositoryHistoryFromGit = (
  input: MineRepositoryHistoryInput,
  onProgress?: (event: MiningProgressEvent) => void,
): MiningSummary => {
  const history = new GitCliHistoryProvider(new ExecGitCommandClient());
  return mineRepositoryHistory(
    input,
    { history, structure: new FsRepositoryStructureReader() },
    onProgress,
  );
};
