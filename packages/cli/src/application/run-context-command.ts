import type { MiningSummary } from "@commitscope/core";
import {
  buildContributorContext,
  buildProgressReportContext,
  createContributorSummaryMessages,
  createProgressReportMessages,
} from "@commitscope/report-context";

export type ContextCommandOptions = {
  contributorSummary?: string;
  messages: boolean;
  maxCommits?: number;
};

export type ContextCommandResult =
  | { status: "ok"; output: string }
  | { status: "not_git_repository"; targetPath: string }
  | { status: "unknown_contributor"; contributor: string };

/** Renders mined history as prompt context, or as role-tagged messages when asked. */
export const renderContextOutput = (
  summary: MiningSummary,
  options: ContextCommandOptions,
): ContextCommandResult => {
  if (!summary.available) {
    return { status: "not_git_repository", targetPath: summary.targetPath };
  }

  const contextOptions = options.maxCommits === undefined ? {} : { maxCommits: options.maxCommits };

  if (options.contributorSummary !== undefined) {
    const context = buildContributorContext(summary, options.contributorSummary, contextOptions);
    if (context === null) {
      return { status: "unknown_contributor", contributor: options.contributorSummary };
    }

    return {
      status: "ok",
      output: options.messages
        ? JSON.stringify(createContributorSummaryMessages(context), null, 2)
        : context,
    };
  }

  const context = buildProgressReportContext(summary, contextOptions);
  return {
    status: "ok",
    output: options.messages ? JSON.stringify(createProgressReportMessages(context), null, 2) : context,
  };
};
