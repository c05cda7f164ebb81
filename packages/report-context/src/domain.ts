import type { ContributorFilter } from "@commitscope/core";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/**
 * Text-generation collaborator: takes a role-tagged message sequence and
 * resolves to a single completion.
 */
export type TextGenerator = (messages: readonly ChatMessage[]) => Promise<string>;

export type CommitJson = {
  hash: string;
  author: string;
  email: string;
  date: string;
  category: string;
  message: string;
  diffs: Readonly<Record<string, string>>;
  lines_added: number;
  lines_deleted: number;
  files_changed: number;
};

export type ContributorJson = {
  email: string;
  commits: number;
  lines_added: number;
  lines_deleted: number;
  files_changed: number;
};

export type StructureEntryJson = {
  relative_path: string;
  file_count: number;
};

export type MiningResultJson = {
  repo_name: string;
  period: string;
  ref: string;
  contributor_filter: ContributorFilter;
  total_commits: number;
  commits: readonly CommitJson[];
  contributors: Readonly<Record<string, ContributorJson>>;
  repository_structure: readonly StructureEntryJson[];
};

export const DEFAULT_REPORT_COMMIT_LIMIT = 20;
export const DEFAULT_CONTRIBUTOR_COMMIT_LIMIT = 15;
export const SHORT_HASH_LENGTH = 8;

/** `YYYY-MM-DD HH:MM:SS`, UTC. */
export const formatCommitDate = (timestampUnix: number): string =>
  new Date(timestampUnix * 1000).toISOString().slice(0, 19).replace("T", " ");

export const describeContributorFilter = (filter: ContributorFilter): string =>
  filter === "all" ? "All contributors" : filter.join(", ");
