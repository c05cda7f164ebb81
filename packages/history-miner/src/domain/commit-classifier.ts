import type { CommitCategory } from "@commitscope/core";

type CategoryRule = {
  category: Exclude<CommitCategory, "other">;
  keywords: readonly string[];
};

// Evaluated in order; the first rule with a matching keyword wins.
const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: "fix", keywords: ["fix", "bug", "issue", "error"] },
  { category: "feature", keywords: ["feat", "add", "implement", "new"] },
  { category: "refactor", keywords: ["refactor", "clean", "restructure"] },
  { category: "docs", keywords: ["doc", "readme", "comment"] },
];

export const classifyCommitMessage = (message: string): CommitCategory => {
  const lower = message.toLowerCase();

  for (const rule of CATEGORY_RULES) {
    if (rule.keywords.some((keyword) => lower.includes(keyword))) {
      return rule.category;
    }
  }

  return "other";
};
