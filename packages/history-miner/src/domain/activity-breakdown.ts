import type { ActivityBreakdown, CommitCategory, CommitRecord } from "@commitscope/core";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

const increment = (counts: Map<string, number>, key: string): void => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

const fileExtension = (filePath: string): string | null => {
  const baseName = filePath.slice(filePath.lastIndexOf("/") + 1);
  const dotIndex = baseName.lastIndexOf(".");
  if (dotIndex <= 0) {
    return null;
  }

  return baseName.slice(dotIndex);
};

const sortedRecord = (counts: ReadonlyMap<string, number>): Readonly<Record<string, number>> =>
  Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])));

/**
 * Derived views over mined commits: category, weekday (UTC) and file type
 * distributions plus per-file change counts.
 */
export const computeActivityBreakdown = (commits: readonly CommitRecord[]): ActivityBreakdown => {
  const commitTypes: Record<CommitCategory, number> = {
    fix: 0,
    feature: 0,
    refactor: 0,
    docs: 0,
    other: 0,
  };
  const dayActivity = new Map<string, number>();
  const fileTypes = new Map<string, number>();
  const fileChanges = new Map<string, number>();

  let linesAdded = 0;
  let linesDeleted = 0;
  let filesChanged = 0;

  for (const commit of commits) {
    commitTypes[commit.category] += 1;

    const weekday = WEEKDAYS[new Date(commit.timestamp * 1000).getUTCDay()];
    if (weekday !== undefined) {
      increment(dayActivity, weekday);
    }

    for (const filePath of Object.keys(commit.diffs)) {
      increment(fileChanges, filePath);
      const extension = fileExtension(filePath);
      if (extension !== null) {
        increment(fileTypes, extension);
      }
    }

    linesAdded += commit.linesAdded;
    linesDeleted += commit.linesDeleted;
    filesChanged += commit.filesChanged;
  }

  return {
    commitTypes,
    dayActivity: sortedRecord(dayActivity),
    fileTypes: sortedRecord(fileTypes),
    fileChanges: sortedRecord(fileChanges),
    linesAdded,
    linesDeleted,
    filesChanged,
  };
};
