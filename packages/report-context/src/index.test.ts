import type { MiningResult } from "@commitscope/core";
import { describe, expect, it, vi } from "vitest";
import {
  buildContributorContext,
  buildProgressReportContext,
  createProgressReportMessages,
  formatCommitDate,
  generateProgressReport,
  serializeMiningResult,
  type TextGenerator,
} from "./index.js";

const result: MiningResult = {
  targetPath: "/work/sample-repo",
  available: true,
  repoName: "sample-repo",
  period: "Last 30 days",
  ref: "main",
  contributorFilter: "all",
  totalCommits: 2,
  commits: [
    {
      hash: "abcdef1234567890",
      authorName: "alice",
      authorEmail: "alice@example.com",
      timestamp: 1_700_000_000,
      message: "Fix login bug\n\nDetails here",
      diffs: { "src/login.ts": "@@ -1 +1 @@\n-a\n+b\n" },
      linesAdded: 1,
      linesDeleted: 1,
      filesChanged: 1,
      category: "fix",
    },
    {
      hash: "1234567890abcdef",
      authorName: "bob",
      authorEmail: "bob@example.com",
      timestamp: 1_699_913_600,
      message: "Add docs page",
      diffs: { "docs/page.md": "No diff content available" },
      linesAdded: 0,
      linesDeleted: 0,
      filesChanged: 1,
      category: "feature",
    },
  ],
  contributors: {
    alice: { email: "alice@example.com", commits: 1, linesAdded: 1, linesDeleted: 1, filesChanged: 1 },
    bob: { email: "bob@example.com", commits: 1, linesAdded: 0, linesDeleted: 0, filesChanged: 1 },
  },
  repositoryStructure: [
    { relativePath: ".", fileCount: 2 },
    { relativePath: "src", fileCount: 1 },
  ],
};

describe("formatCommitDate", () => {
  it("formats unix seconds as a UTC timestamp", () => {
    expect(formatCommitDate(1_700_000_000)).toBe("2023-11-14 22:13:20");
  });
});

describe("serializeMiningResult", () => {
  it("uses the interchange field names", () => {
    const json = serializeMiningResult(result);

    expect(Object.keys(json)).toEqual([
      "repo_name",
      "period",
      "ref",
      "contributor_filter",
      "total_commits",
      "commits",
      "contributors",
      "repository_structure",
    ]);
    expect(json.commits[0]).toEqual({
      hash: "abcdef1234567890",
      author: "alice",
      email: "alice@example.com",
      date: "2023-11-14 22:13:20",
      category: "fix",
      message: "Fix login bug\n\nDetails here",
      diffs: { "src/login.ts": "@@ -1 +1 @@\n-a\n+b\n" },
      lines_added: 1,
      lines_deleted: 1,
      files_changed: 1,
    });
    expect(json.contributors["bob"]).toEqual({
      email: "bob@example.com",
      commits: 1,
      lines_added: 0,
      lines_deleted: 0,
      files_changed: 1,
    });
    expect(json.repository_structure).toEqual([
      { relative_path: ".", file_count: 2 },
      { relative_path: "src", file_count: 1 },
    ]);
    expect(json.contributor_filter).toBe("all");
  });
});

describe("buildProgressReportContext", () => {
  it("lists totals, contributors and recent commits", () => {
    expect(buildProgressReportContext(result)).toBe(
      [
        "Repository: sample-repo",
        "Analysis Period: Last 30 days",
        "Branch: main",
        "Filter: All contributors",
        "Total Commits: 2",
        "Commit Types: fix=1, feature=1, refactor=0, docs=0, other=0",
        "",
        "Contributors (2):",
        "- alice <alice@example.com>",
        "  Commits: 1",
        "  Lines Added: 1",
        "  Lines Deleted: 1",
        "  Files Changed: 1",
        "  Net Lines: 0",
        "- bob <bob@example.com>",
        "  Commits: 1",
        "  Lines Added: 0",
        "  Lines Deleted: 0",
        "  Files Changed: 1",
        "  Net Lines: 0",
        "",
        "Recent Commits:",
        "- 2023-11-14 22:13:20 - alice (abcdef12)",
        "  Fix login bug",
        "",
        "  Details here",
        "  +1 -1 lines, 1 files",
        "- 2023-11-13 22:13:20 - bob (12345678)",
        "  Add docs page",
        "  +0 -0 lines, 1 files",
      ].join("\n"),
    );
  });

  it("limits the number of recent commits and names filtered contributors", () => {
    const context = buildProgressReportContext(
      { ...result, contributorFilter: ["alice", "bob"] },
      { maxCommits: 1 },
    );

    expect(context).toContain("Filter: alice, bob");
    expect(context).toContain("- 2023-11-14 22:13:20 - alice (abcdef12)");
    expect(context).not.toContain("(12345678)");
  });
});

describe("buildContributorContext", () => {
  it("summarizes a single contributor", () => {
    expect(buildContributorContext(result, "bob")).toBe(
      [
        "Contributor Analysis: bob",
        "Email: bob@example.com",
        "Period: Last 30 days",
        "",
        "Summary Statistics:",
        "- Total Commits: 1",
        "- Lines Added: 0",
        "- Lines Deleted: 0",
        "- Files Changed: 1",
        "- Net Lines: 0",
        "",
        "Recent Commit Messages:",
        "- 2023-11-13 22:13:20 (12345678)",
        "  Add docs page",
        "  +0 -0 lines, 1 files",
      ].join("\n"),
    );
  });

  it("returns null for unknown contributors", () => {
    expect(buildContributorContext(result, "carol")).toBeNull();
    expect(buildContributorContext(result, "toString")).toBeNull();
  });
});

describe("generateProgressReport", () => {
  it("asks the generator for the main report only by default", async () => {
    const generator = vi.fn<TextGenerator>().mockResolvedValue("MAIN");

    await expect(generateProgressReport(result, generator)).resolves.toBe("MAIN");
    expect(generator).toHaveBeenCalledTimes(1);
    expect(generator).toHaveBeenCalledWith(createProgressReportMessages(buildProgressReportContext(result)));
  });

  it("appends one summary per contributor when asked", async () => {
    const generator = vi
      .fn<TextGenerator>()
      .mockResolvedValueOnce("MAIN")
      .mockResolvedValueOnce("ALICE")
      .mockResolvedValueOnce("BOB");

    const report = await generateProgressReport(result, generator, { includeContributorSummaries: true });

    expect(report).toBe(
      [
        "MAIN",
        "",
        "=".repeat(50),
        "DETAILED CONTRIBUTOR SUMMARIES",
        "=".repeat(50),
        "",
        "ALICE",
        "-".repeat(50),
        "",
        "BOB",
        "-".repeat(50),
      ].join("\n"),
    );
    expect(generator).toHaveBeenCalledTimes(3);
    const aliceMessages = generator.mock.calls[1]?.[0];
    expect(aliceMessages?.[0]?.role).toBe("system");
    expect(aliceMessages?.[1]?.content).toContain("Contributor Analysis: alice");
  });
});
