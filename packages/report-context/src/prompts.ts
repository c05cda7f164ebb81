import type { ChatMessage } from "./domain.js";

const PROGRESS_REPORT_SYSTEM_PROMPT = [
  "You write progress reports for software repositories from git activity data.",
  "Summarize what was accomplished in the period, group related work into themes,",
  "call out notable changes and contributor highlights, and keep the tone factual.",
].join(" ");

const CONTRIBUTOR_SUMMARY_SYSTEM_PROMPT = [
  "You analyze the work of a single developer from their commit history.",
  "Describe their overall contribution, focus areas, development patterns",
  "and notable changes in clear, professional language.",
].join(" ");

export const createProgressReportMessages = (context: string): ChatMessage[] => [
  { role: "system", content: PROGRESS_REPORT_SYSTEM_PROMPT },
  {
    role: "user",
    content: `Create a progress report for this repository activity:\n\n${context}`,
  },
];

export const createContributorSummaryMessages = (context: string): ChatMessage[] => [
  { role: "system", content: CONTRIBUTOR_SUMMARY_SYSTEM_PROMPT },
  {
    role: "user",
    content: `Analyze this contributor's work and create a detailed summary:\n\n${context}`,
  },
];
