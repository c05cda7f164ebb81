import { describe, expect, it } from "vitest";
import { classifyCommitMessage } from "./commit-classifier.js";

describe("classifyCommitMessage", () => {
  it("prefers the fix category over feature keywords", () => {
    expect(classifyCommitMessage("fix and add new feature")).toBe("fix");
  });

  it("classifies documentation changes", () => {
    expect(classifyCommitMessage("update docs")).toBe("docs");
  });

  it("classifies cleanups as refactors", () => {
    expect(classifyCommitMessage("general cleanup")).toBe("refactor");
  });

  it("matches keywords case-insensitively", () => {
    expect(classifyCommitMessage("Implement login flow")).toBe("feature");
    expect(classifyCommitMessage("BUG: crash on start")).toBe("fix");
  });

  it("falls back to other when nothing matches", () => {
    expect(classifyCommitMessage("bump version")).toBe("other");
  });
});
