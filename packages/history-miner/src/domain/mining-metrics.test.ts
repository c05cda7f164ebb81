import { describe, expect, it } from "vitest";
import { ContributorRollups, createCommitRecord, isMergeCommit } from "./mining-metrics.js";
import type { GitCommitHeader } from "./mining-types.js";

const header = (overrides: Partial<GitCommitHeader>): GitCommitHeader => ({
  hash: "c1",
  parents: ["p1"],
  authorName: "alice",
  authorEmail: "alice@example.com",
  committedAtUnix: 1_700_000_000,
  message: "Update parser\n",
  ...overrides,
});

describe("createCommitRecord", () => {
  it("derives line counts, file count and category from the diffs and message", () => {
    const record = createCommitRecord(header({ message: "  Refactor the parser\n\n" }), {
      "src/parser.ts": "@@ -1,2 +1,3 @@\n-old\n+new\n+extra\n context\n",
      "docs/logo.png": "No diff content available",
    });

    expect(record).toEqual({
      hash: "c1",
      authorName: "alice",
      authorEmail: "alice@example.com",
      timestamp: 1_700_000_000,
      message: "Refactor the parser",
      diffs: {
        "src/parser.ts": "@@ -1,2 +1,3 @@\n-old\n+new\n+extra\n context\n",
        "docs/logo.png": "No diff content available",
      },
      linesAdded: 2,
      linesDeleted: 1,
      filesChanged: 2,
      category: "refactor",
    });
  });

  it("keeps commits without detectable diffs", () => {
    const record = createCommitRecord(header({ message: "Bump version" }), {});

    expect(record.linesAdded).toBe(0);
    expect(record.linesDeleted).toBe(0);
    expect(record.filesChanged).toBe(0);
    expect(record.category).toBe("other");
  });
});

describe("isMergeCommit", () => {
  it("flags commits with more than one parent", () => {
    expect(isMergeCommit(header({ parents: [] }))).toBe(false);
    expect(isMergeCommit(header({ parents: ["p1"] }))).toBe(false);
    expect(isMergeCommit(header({ parents: ["p1", "p2"] }))).toBe(true);
  });
});

describe("ContributorRollups", () => {
  it("sums per author and keeps the first seen email", () => {
    const rollups = new ContributorRollups();
    rollups.record(
      createCommitRecord(header({ hash: "c1" }), { "a.ts": "@@ -1 +1 @@\n-a\n+b\n" }),
    );
    rollups.record(
      createCommitRecord(header({ hash: "c2", authorName: "bob", authorEmail: "bob@example.com" }), {
        "b.ts": "@@ -0,0 +1 @@\n+b\n",
      }),
    );
    rollups.record(
      createCommitRecord(header({ hash: "c3", authorEmail: "alice@work.example" }), {
        "a.ts": "@@ -1 +1,2 @@\n+c\n+d\n",
        "c.ts": "@@ -1 +0,0 @@\n-e\n",
      }),
    );

    expect(rollups.size).toBe(2);
    expect(rollups.finalize()).toEqual({
      alice: { email: "alice@example.com", commits: 2, linesAdded: 3, linesDeleted: 2, filesChanged: 3 },
      bob: { email: "bob@example.com", commits: 1, linesAdded: 1, linesDeleted: 0, filesChanged: 1 },
    });
    expect(Object.keys(rollups.finalize())).toEqual(["alice", "bob"]);
  });
});
