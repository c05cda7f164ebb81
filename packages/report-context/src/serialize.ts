import type { CommitRecord, ContributorRollup, MiningResult } from "@commitscope/core";
import { formatCommitDate, type CommitJson, type ContributorJson, type MiningResultJson } from "./domain.js";

const serializeCommit = (commit: CommitRecord): CommitJson => ({
  hash: commit.hash,
  author: commit.authorName,
  email: commit.authorEmail,
  date: formatCommitDate(commit.timestamp),
  category: commit.category,
  message: commit.message,
  diffs: commit.diffs,
  lines_added: commit.linesAdded,
  lines_deleted: commit.linesDeleted,
  files_changed: commit.filesChanged,
});

const serializeContributor = (rollup: ContributorRollup): ContributorJson => ({
  email: rollup.email,
  commits: rollup.commits,
  lines_added: rollup.linesAdded,
  lines_deleted: rollup.linesDeleted,
  files_changed: rollup.filesChanged,
});

export const serializeMiningResult = (result: MiningResult): MiningResultJson => ({
  repo_name: result.repoName,
  period: result.period,
  ref: result.ref,
  contributor_filter: result.contributorFilter,
  total_commits: result.totalCommits,
  commits: result.commits.map(serializeCommit),
  contributors: Object.fromEntries(
    Object.entries(result.contributors).map(([author, rollup]) => [author, serializeContributor(rollup)]),
  ),
  repository_structure: result.repositoryStructure.map((entry) => ({
    relative_path: entry.relativePath,
    file_count: entry.fileCount,
  })),
});
