import { GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import { MISSING_DIFF_PLACEHOLDER, type CommitDiffs } from "../domain/mining-types.js";
import type {
  CommitListQuery,
  CommitListing,
  GitHistoryProgressEvent,
  GitHistoryProvider,
} from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { parseCommitPatch } from "../parsing/commit-patch-parser.js";
import { parseGitLog } from "../parsing/git-log-parser.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory", "cannot change to"];

const DIFF_ARGS = ["-c", "core.quotepath=false", "diff-tree", "-p", "-r", "-M", "--no-color", "--no-ext-diff"];

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return NON_GIT_CODES.some((code) => lower.includes(code));
};

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  isGitRepository(repositoryPath: string): boolean {
    try {
      const output = this.gitClient.run(repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  getRepositoryRoot(repositoryPath: string): string {
    return this.gitClient.run(repositoryPath, ["rev-parse", "--show-toplevel"]).trim();
  }

  listCommits(
    repositoryPath: string,
    query: CommitListQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): CommitListing {
    if (!this.refExists(repositoryPath, query.ref)) {
      return { status: "unknown_ref" };
    }

    const output = this.gitClient.run(repositoryPath, [
      "-c",
      "core.quotepath=false",
      "log",
      `--pretty=format:${GIT_LOG_FORMAT}`,
      ...(query.sinceUnix === null ? [] : [`--since=@${query.sinceUnix} +0000`]),
      query.ref,
      "--",
    ]);
    onProgress?.({ stage: "git_log_received", ref: query.ref, bytes: Buffer.byteLength(output, "utf8") });
    const commits = parseGitLog(output);
    onProgress?.({ stage: "git_log_parsed", ref: query.ref, commits: commits.length });
    return { status: "resolved", commits };
  }

  getCommitDiffs(
    repositoryPath: string,
    commitId: string,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): CommitDiffs {
    let rawPatch: string;
    try {
      const [, firstParent] = this.gitClient
        .run(repositoryPath, ["rev-list", "--parents", "-n", "1", commitId, "--"])
        .trim()
        .split(" ");

      rawPatch =
        firstParent === undefined
          ? this.gitClient.run(repositoryPath, [...DIFF_ARGS, "--root", "--no-commit-id", commitId])
          : this.gitClient.run(repositoryPath, [...DIFF_ARGS, firstParent, commitId]);
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }

      onProgress?.({ stage: "diff_failed", commitId, message: error.message });
      return {};
    }

    const entries: [string, string][] = [];
    for (const patch of parseCommitPatch(rawPatch)) {
      const filePath = patch.newPath ?? patch.oldPath;
      if (filePath === null) {
        continue;
      }

      entries.push([filePath, patch.body ?? MISSING_DIFF_PLACEHOLDER]);
    }

    return Object.fromEntries(entries);
  }

  private refExists(repositoryPath: string, ref: string): boolean {
    try {
      this.gitClient.run(repositoryPath, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
      return true;
    } catch (error) {
      if (error instanceof GitCommandError) {
        return false;
      }

      throw error;
    }
  }
}
