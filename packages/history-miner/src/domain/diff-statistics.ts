export type LineCounts = {
  linesAdded: number;
  linesDeleted: number;
};

/**
 * Counts added and deleted lines of a unified diff body by line prefix.
 * File header lines (`+++`, `---`) are not counted.
 */
export const countLines = (diffText: string | null | undefined): LineCounts => {
  let linesAdded = 0;
  let linesDeleted = 0;

  if (diffText === null || diffText === undefined || diffText.length === 0) {
    return { linesAdded, linesDeleted };
  }

  for (const line of diffText.split("\n")) {
    if (line.startsWith("+") && !line.startsWith("+++")) {
      linesAdded += 1;
    } else if (line.startsWith("-") && !line.startsWith("---")) {
      linesDeleted += 1;
    }
  }

  return { linesAdded, linesDeleted };
};

export const sumLineCounts = (diffBodies: Iterable<string>): LineCounts => {
  let linesAdded = 0;
  let linesDeleted = 0;

  for (const body of diffBodies) {
    const counts = countLines(body);
    linesAdded += counts.linesAdded;
    linesDeleted += counts.linesDeleted;
  }

  return { linesAdded, linesDeleted };
};
