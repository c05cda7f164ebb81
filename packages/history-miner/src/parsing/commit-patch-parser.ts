export type FilePatch = {
  oldPath: string | null;
  newPath: string | null;
  /** Patch text from the first hunk header on; null when git printed no hunks. */
  body: string | null;
};

type PatchSection = {
  oldPath: string | null;
  newPath: string | null;
  created: boolean;
  deleted: boolean;
  hunkLines: string[];
};

const DIFF_HEADER_PREFIX = "diff --git ";
const NULL_DEVICE = "/dev/null";

const C_ESCAPES: Readonly<Record<string, number>> = {
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
  '"': 0x22,
  "\\": 0x5c,
};

/**
 * Reads one C-quoted token starting at `start` (which must be a double quote).
 * Octal escapes are raw bytes, so the result is decoded as UTF-8.
 */
const readQuoted = (value: string, start: number): { text: string; end: number } | null => {
  const bytes: number[] = [];
  let index = start + 1;

  while (index < value.length) {
    const char = value[index];
    if (char === undefined) {
      break;
    }

    if (char === '"') {
      return { text: Buffer.from(bytes).toString("utf8"), end: index + 1 };
    }

    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      index += 1;
      continue;
    }

    const escaped = value[index + 1];
    if (escaped === undefined) {
      return null;
    }

    const octal = value.slice(index + 1, index + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(Number.parseInt(octal, 8));
      index += 4;
      continue;
    }

    const code = C_ESCAPES[escaped];
    if (code === undefined) {
      return null;
    }

    bytes.push(code);
    index += 2;
  }

  return null;
};

const unquotePath = (value: string): string => {
  if (!value.startsWith('"')) {
    return value;
  }

  const quoted = readQuoted(value, 0);
  return quoted?.text ?? value;
};

const stripSidePrefix = (path: string, prefix: "a/" | "b/"): string =>
  path.startsWith(prefix) ? path.slice(prefix.length) : path;

// `--- a/name with spaces\t`: git appends a tab after names containing spaces
const parseFileMarker = (value: string, prefix: "a/" | "b/"): string | null => {
  const raw = value.endsWith("\t") ? value.slice(0, -1) : value;
  if (raw === NULL_DEVICE) {
    return null;
  }

  return stripSidePrefix(unquotePath(raw), prefix);
};

/**
 * Recovers both paths from `diff --git a/<old> b/<new>`. Unquoted names may
 * contain spaces, so they are only trusted when both sides name the same file.
 */
const parseDiffHeader = (header: string): { oldPath: string | null; newPath: string | null } => {
  const rest = header.slice(DIFF_HEADER_PREFIX.length);

  if (rest.startsWith('"')) {
    const first = readQuoted(rest, 0);
    if (first === null) {
      return { oldPath: null, newPath: null };
    }

    const remainder = rest.slice(first.end).trimStart();
    const second = remainder.startsWith('"') ? readQuoted(remainder, 0)?.text ?? null : remainder;
    return {
      oldPath: stripSidePrefix(first.text, "a/"),
      newPath: second === null ? null : stripSidePrefix(second, "b/"),
    };
  }

  if ((rest.length - 5) % 2 === 0 && rest.startsWith("a/")) {
    const nameLength = (rest.length - 5) / 2;
    const name = rest.slice(2, 2 + nameLength);
    if (rest.slice(2 + nameLength) === ` b/${name}`) {
      return { oldPath: name, newPath: name };
    }
  }

  return { oldPath: null, newPath: null };
};

const openSection = (header: string): PatchSection => ({
  ...parseDiffHeader(header),
  created: false,
  deleted: false,
  hunkLines: [],
});

const applyHeaderLine = (section: PatchSection, line: string): void => {
  if (line.startsWith("--- ")) {
    section.oldPath = parseFileMarker(line.slice(4), "a/");
  } else if (line.startsWith("+++ ")) {
    section.newPath = parseFileMarker(line.slice(4), "b/");
  } else if (line.startsWith("rename from ") || line.startsWith("copy from ")) {
    section.oldPath = unquotePath(line.slice(line.indexOf(" from ") + 6));
  } else if (line.startsWith("rename to ") || line.startsWith("copy to ")) {
    section.newPath = unquotePath(line.slice(line.indexOf(" to ") + 4));
  } else if (line.startsWith("new file mode ")) {
    section.created = true;
  } else if (line.startsWith("deleted file mode ")) {
    section.deleted = true;
  }
};

const closeSection = (section: PatchSection): FilePatch => {
  const hunkLines = [...section.hunkLines];
  while (hunkLines.length > 0 && hunkLines[hunkLines.length - 1] === "") {
    hunkLines.pop();
  }

  return {
    oldPath: section.created ? null : section.oldPath,
    newPath: section.deleted ? null : section.newPath,
    body: hunkLines.length === 0 ? null : `${hunkLines.join("\n")}\n`,
  };
};

/**
 * Splits the output of `git diff-tree -p` into one entry per changed file.
 */
export const parseCommitPatch = (rawPatch: string): readonly FilePatch[] => {
  const patches: FilePatch[] = [];
  let current: PatchSection | null = null;

  for (const line of rawPatch.split("\n")) {
    if (line.startsWith(DIFF_HEADER_PREFIX)) {
      if (current !== null) {
        patches.push(closeSection(current));
      }
      current = openSection(line);
      continue;
    }

    if (current === null) {
      continue;
    }

    if (current.hunkLines.length > 0 || line.startsWith("@@")) {
      current.hunkLines.push(line);
      continue;
    }

    applyHeaderLine(current, line);
  }

  if (current !== null) {
    patches.push(closeSection(current));
  }

  return patches;
};
