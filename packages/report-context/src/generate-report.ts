import type { MiningResult } from "@commitscope/core";
import { buildContributorContext, buildProgressReportContext } from "./context.js";
import type { TextGenerator } from "./domain.js";
import { createContributorSummaryMessages, createProgressReportMessages } from "./prompts.js";

export type GenerateProgressReportOptions = {
  includeContributorSummaries?: boolean;
  maxCommits?: number;
};

const SECTION_RULE = "=".repeat(50);
const ENTRY_RULE = "-".repeat(50);

export const generateProgressReport = async (
  result: MiningResult,
  generator: TextGenerator,
  options: GenerateProgressReportOptions = {},
): Promise<string> => {
  const context = buildProgressReportContext(
    result,
    options.maxCommits === undefined ? {} : { maxCommits: options.maxCommits },
  );
  const mainReport = await generator(createProgressReportMessages(context));

  const contributorNames = Object.keys(result.contributors);
  if (options.includeContributorSummaries !== true || contributorNames.length === 0) {
    return mainReport;
  }

  const sections = [mainReport, "", SECTION_RULE, "DETAILED CONTRIBUTOR SUMMARIES", SECTION_RULE];
  // one request at a time, in contributor order
  for (const name of contributorNames) {
    const contributorContext = buildContributorContext(result, name);
    if (contributorContext === null) {
      continue;
    }

    const summary = await generator(createContributorSummaryMessages(contributorContext));
    sections.push("", summary, ENTRY_RULE);
  }

  return sections.join("\n");
};
