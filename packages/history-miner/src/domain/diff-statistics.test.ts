import { describe, expect, it } from "vitest";
import { countLines, sumLineCounts } from "./diff-statistics.js";

describe("countLines", () => {
  it("returns zero counts for empty or missing diff text", () => {
    expect(countLines("")).toEqual({ linesAdded: 0, linesDeleted: 0 });
    expect(countLines(null)).toEqual({ linesAdded: 0, linesDeleted: 0 });
    expect(countLines(undefined)).toEqual({ linesAdded: 0, linesDeleted: 0 });
  });

  it("excludes file header lines", () => {
    expect(countLines("+++ b/file.py\n--- a/file.py\n")).toEqual({ linesAdded: 0, linesDeleted: 0 });
  });

  it("counts prefixed lines", () => {
    expect(countLines("+line one\n-line two\n")).toEqual({ linesAdded: 1, linesDeleted: 1 });
  });

  it("ignores hunk headers, context and metadata lines", () => {
    const diff = [
      "@@ -1,4 +1,5 @@",
      " import os",
      "-old = 1",
      "+new = 1",
      "+extra = 2",
      " print(new)",
      "\\ No newline at end of file",
    ].join("\n");

    expect(countLines(diff)).toEqual({ linesAdded: 2, linesDeleted: 1 });
  });

  it("is stable across repeated calls", () => {
    const diff = "@@ -1 +1 @@\n-a\n+b\n";
    expect(countLines(diff)).toEqual(countLines(diff));
  });
});

describe("sumLineCounts", () => {
  it("sums counts over every diff body", () => {
    expect(sumLineCounts(["+a\n+b\n", "-c\n", "No diff content available"])).toEqual({
      linesAdded: 2,
      linesDeleted: 1,
    });
  });
});
