export {
  DEFAULT_CONTRIBUTOR_COMMIT_LIMIT,
  DEFAULT_REPORT_COMMIT_LIMIT,
  describeContributorFilter,
  formatCommitDate,
  type ChatMessage,
  type ChatRole,
  type CommitJson,
  type ContributorJson,
  type MiningResultJson,
  type StructureEntryJson,
  type TextGenerator,
} from "./domain.js";
export { buildContributorContext, buildProgressReportContext, type ContextOptions } from "./context.js";
export { createContributorSummaryMessages, createProgressReportMessages } from "./prompts.js";
export { generateProgressReport, type GenerateProgressReportOptions } from "./generate-report.js";
export { serializeMiningResult } from "./serialize.js";
