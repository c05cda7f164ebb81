import type { CommitRecord, MiningResult } from "@commitscope/core";
import { computeActivityBreakdown } from "@commitscope/history-miner";
import {
  DEFAULT_CONTRIBUTOR_COMMIT_LIMIT,
  DEFAULT_REPORT_COMMIT_LIMIT,
  SHORT_HASH_LENGTH,
  describeContributorFilter,
  formatCommitDate,
} from "./domain.js";

export type ContextOptions = {
  maxCommits?: number;
};

const indentMessage = (message: string): string[] =>
  message.split("\n").map((line) => `  ${line}`.trimEnd());

const commitStatsLine = (commit: CommitRecord): string =>
  `  +${commit.linesAdded} -${commit.linesDeleted} lines, ${commit.filesChanged} files`;

const shortHash = (hash: string): string => hash.slice(0, SHORT_HASH_LENGTH);

/**
 * Plain-text context for a repository progress report: totals, per-contributor
 * statistics and the most recent commits.
 */
export const buildProgressReportContext = (result: MiningResult, options: ContextOptions = {}): string => {
  const maxCommits = options.maxCommits ?? DEFAULT_REPORT_COMMIT_LIMIT;
  const breakdown = computeActivityBreakdown(result.commits);
  const contributors = Object.entries(result.contributors);

  const lines: string[] = [];
  lines.push(`Repository: ${result.repoName}`);
  lines.push(`Analysis Period: ${result.period}`);
  lines.push(`Branch: ${result.ref}`);
  lines.push(`Filter: ${describeContributorFilter(result.contributorFilter)}`);
  lines.push(`Total Commits: ${result.totalCommits}`);
  lines.push(
    `Commit Types: ${Object.entries(breakdown.commitTypes)
      .map(([category, count]) => `${category}=${count}`)
      .join(", ")}`,
  );

  lines.push("");
  lines.push(`Contributors (${contributors.length}):`);
  for (const [author, stats] of contributors) {
    lines.push(`- ${author} <${stats.email}>`);
    lines.push(`  Commits: ${stats.commits}`);
    lines.push(`  Lines Added: ${stats.linesAdded}`);
    lines.push(`  Lines Deleted: ${stats.linesDeleted}`);
    lines.push(`  Files Changed: ${stats.filesChanged}`);
    lines.push(`  Net Lines: ${stats.linesAdded - stats.linesDeleted}`);
  }

  lines.push("");
  lines.push("Recent Commits:");
  for (const commit of result.commits.slice(0, maxCommits)) {
    lines.push(`- ${formatCommitDate(commit.timestamp)} - ${commit.authorName} (${shortHash(commit.hash)})`);
    lines.push(...indentMessage(commit.message));
    lines.push(commitStatsLine(commit));
  }

  return lines.join("\n");
};

/** Returns null when the contributor has no commits in the result. */
export const buildContributorContext = (
  result: MiningResult,
  contributorName: string,
  options: ContextOptions = {},
): string | null => {
  if (!Object.hasOwn(result.contributors, contributorName)) {
    return null;
  }

  const stats = result.contributors[contributorName];
  if (stats === undefined) {
    return null;
  }

  const maxCommits = options.maxCommits ?? DEFAULT_CONTRIBUTOR_COMMIT_LIMIT;
  const commits = result.commits.filter((commit) => commit.authorName === contributorName);

  const lines: string[] = [];
  lines.push(`Contributor Analysis: ${contributorName}`);
  lines.push(`Email: ${stats.email}`);
  lines.push(`Period: ${result.period}`);
  lines.push("");
  lines.push("Summary Statistics:");
  lines.push(`- Total Commits: ${stats.commits}`);
  lines.push(`- Lines Added: ${stats.linesAdded}`);
  lines.push(`- Lines Deleted: ${stats.linesDeleted}`);
  lines.push(`- Files Changed: ${stats.filesChanged}`);
  lines.push(`- Net Lines: ${stats.linesAdded - stats.linesDeleted}`);
  lines.push("");
  lines.push("Recent Commit Messages:");
  for (const commit of commits.slice(0, maxCommits)) {
    lines.push(`- ${formatCommitDate(commit.timestamp)} (${shortHash(commit.hash)})`);
    lines.push(...indentMessage(commit.message));
    lines.push(commitStatsLine(commit));
  }

  return lines.join("\n");
};
