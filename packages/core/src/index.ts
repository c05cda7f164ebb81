import { resolve } from "node:path";

export type CommitCategory = "fix" | "feature" | "refactor" | "docs" | "other";

export const COMMIT_CATEGORIES: readonly CommitCategory[] = [
  "fix",
  "feature",
  "refactor",
  "docs",
  "other",
];

export type FileDiffs = Readonly<Record<string, string>>;

export type CommitRecord = {
  readonly hash: string;
  readonly authorName: string;
  readonly authorEmail: string;
  /** Committer time, unix seconds. */
  readonly timestamp: number;
  readonly message: string;
  readonly diffs: FileDiffs;
  readonly linesAdded: number;
  readonly linesDeleted: number;
  readonly filesChanged: number;
  readonly category: CommitCategory;
};

export type ContributorRollup = {
  readonly email: string;
  readonly commits: number;
  readonly linesAdded: number;
  readonly linesDeleted: number;
  readonly filesChanged: number;
};

export type StructureEntry = {
  relativePath: string;
  fileCount: number;
};

export type ContributorFilter = readonly string[] | "all";

export type MiningResult = {
  targetPath: string;
  available: true;
  repoName: string;
  period: string;
  ref: string;
  contributorFilter: ContributorFilter;
  totalCommits: number;
  commits: readonly CommitRecord[];
  contributors: Readonly<Record<string, ContributorRollup>>;
  repositoryStructure: readonly StructureEntry[];
};

export type MiningUnavailable = {
  targetPath: string;
  available: false;
  reason: "not_git_repository";
};

export type MiningSummary = MiningResult | MiningUnavailable;

export type ActivityBreakdown = {
  commitTypes: Readonly<Record<CommitCategory, number>>;
  dayActivity: Readonly<Record<string, number>>;
  fileTypes: Readonly<Record<string, number>>;
  fileChanges: Readonly<Record<string, number>>;
  linesAdded: number;
  linesDeleted: number;
  filesChanged: number;
};

export type TargetPath = {
  inputPath: string | undefined;
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  inputPath,
  absolutePath: resolve(cwd, inputPath ?? "."),
});
