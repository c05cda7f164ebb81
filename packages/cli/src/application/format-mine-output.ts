import type { MiningResult, MiningSummary } from "@commitscope/core";
import { computeActivityBreakdown } from "@commitscope/history-miner";
import { formatCommitDate, serializeMiningResult } from "@commitscope/report-context";

export type MineOutputMode = "summary" | "json";

const TOP_FILE_TYPES = 5;
const RECENT_COMMITS = 5;

type SummaryShape =
  | {
      targetPath: string;
      available: false;
      reason: "not_git_repository";
    }
  | {
      targetPath: string;
      available: true;
      repoName: string;
      period: string;
      ref: string;
      contributorFilter: MiningResult["contributorFilter"];
      totalCommits: number;
      contributors: ReadonlyArray<{
        name: string;
        email: string;
        commits: number;
        linesAdded: number;
        linesDeleted: number;
        filesChanged: number;
      }>;
      activity: {
        commitTypes: Readonly<Record<string, number>>;
        dayActivity: Readonly<Record<string, number>>;
        fileTypesTop: ReadonlyArray<{ extension: string; changes: number }>;
      };
      repositoryStructure: MiningResult["repositoryStructure"];
      recentCommits: ReadonlyArray<{
        hash: string;
        author: string;
        date: string;
        category: string;
        subject: string;
      }>;
    };

const subjectOf = (message: string): string => message.split("\n", 1)[0] ?? "";

const createSummaryShape = (summary: MiningSummary): SummaryShape => {
  if (!summary.available) {
    return { targetPath: summary.targetPath, available: false, reason: summary.reason };
  }

  const breakdown = computeActivityBreakdown(summary.commits);

  return {
    targetPath: summary.targetPath,
    available: true,
    repoName: summary.repoName,
    period: summary.period,
    ref: summary.ref,
    contributorFilter: summary.contributorFilter,
    totalCommits: summary.totalCommits,
    contributors: Object.entries(summary.contributors).map(([name, stats]) => ({ name, ...stats })),
    activity: {
      commitTypes: breakdown.commitTypes,
      dayActivity: breakdown.dayActivity,
      fileTypesTop: Object.entries(breakdown.fileTypes)
        .slice(0, TOP_FILE_TYPES)
        .map(([extension, changes]) => ({ extension, changes })),
    },
    repositoryStructure: summary.repositoryStructure,
    recentCommits: summary.commits.slice(0, RECENT_COMMITS).map((commit) => ({
      hash: commit.hash,
      author: commit.authorName,
      date: formatCommitDate(commit.timestamp),
      category: commit.category,
      subject: subjectOf(commit.message),
    })),
  };
};

export const formatMineOutput = (summary: MiningSummary, mode: MineOutputMode): string => {
  if (mode === "summary") {
    return JSON.stringify(createSummaryShape(summary), null, 2);
  }

  return summary.available
    ? JSON.stringify(serializeMiningResult(summary), null, 2)
    : JSON.stringify(summary, null, 2);
};
