import { COMMIT_FIELD_SEPARATOR, COMMIT_RECORD_SEPARATOR } from "../domain/git-log-format.js";
import type { GitCommitHeader } from "../domain/mining-types.js";

const HEADER_FIELD_COUNT = 6;

const parseInteger = (value: string): number | null => {
  if (value.length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return parsed;
};

const parseRecord = (record: string): GitCommitHeader | null => {
  const fields = record.split(COMMIT_FIELD_SEPARATOR);
  if (fields.length < HEADER_FIELD_COUNT) {
    return null;
  }

  const [hashRaw, parentsRaw, committedAtRaw, authorName, authorEmail] = fields;
  if (
    hashRaw === undefined ||
    parentsRaw === undefined ||
    committedAtRaw === undefined ||
    authorName === undefined ||
    authorEmail === undefined
  ) {
    return null;
  }

  const hash = hashRaw.trim();
  const committedAtUnix = parseInteger(committedAtRaw.trim());
  if (hash.length === 0 || committedAtUnix === null) {
    return null;
  }

  // the body is last, so a stray separator inside it must not split it
  const message = fields.slice(HEADER_FIELD_COUNT - 1).join(COMMIT_FIELD_SEPARATOR).trim();

  return {
    hash,
    parents: parentsRaw.split(" ").filter((parent) => parent.length > 0),
    authorName,
    authorEmail,
    committedAtUnix,
    message,
  };
};

/**
 * Parses `git log` output written with GIT_LOG_FORMAT. Commit order is kept as
 * git emitted it.
 */
export const parseGitLog = (rawLog: string): readonly GitCommitHeader[] => {
  const commits: GitCommitHeader[] = [];

  for (const record of rawLog.split(COMMIT_RECORD_SEPARATOR)) {
    if (record.trim().length === 0) {
      continue;
    }

    const parsed = parseRecord(record);
    if (parsed !== null) {
      commits.push(parsed);
    }
  }

  return commits;
};
