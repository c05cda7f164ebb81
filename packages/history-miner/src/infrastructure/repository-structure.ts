import { readdirSync, type Dirent } from "node:fs";
import { join } from "node:path";
import type { StructureEntry } from "@commitscope/core";
import type {
  RepositoryStructureReader,
  StructureSnapshotOptions,
} from "../application/repository-structure-reader.js";

const VCS_METADATA_ENTRY = ".git";

const readEntries = (
  absolutePath: string,
  onWarning: ((path: string, message: string) => void) | undefined,
): Dirent[] | null => {
  try {
    return readdirSync(absolutePath, { withFileTypes: true });
  } catch (error) {
    onWarning?.(absolutePath, error instanceof Error ? error.message : "Unknown read error");
    return null;
  }
};

/**
 * Depth-first, name-ordered overview of directories and their direct file
 * counts. The root is reported as ".".
 */
export const snapshotRepositoryStructure = (
  rootPath: string,
  options: StructureSnapshotOptions,
  onWarning?: (path: string, message: string) => void,
): readonly StructureEntry[] => {
  const structure: StructureEntry[] = [];

  const visit = (absolutePath: string, relativePath: string, depth: number): void => {
    if (structure.length >= options.maxEntries) {
      return;
    }

    const entries = readEntries(absolutePath, onWarning);
    if (entries === null) {
      return;
    }

    const visible = entries
      .filter((entry) => entry.name !== VCS_METADATA_ENTRY)
      .sort((a, b) => a.name.localeCompare(b.name));

    structure.push({
      relativePath,
      fileCount: visible.filter((entry) => entry.isFile()).length,
    });

    if (depth >= options.maxDepth) {
      return;
    }

    for (const entry of visible) {
      if (!entry.isDirectory()) {
        continue;
      }

      visit(
        join(absolutePath, entry.name),
        relativePath === "." ? entry.name : `${relativePath}/${entry.name}`,
        depth + 1,
      );
    }
  };

  visit(rootPath, ".", 0);
  return structure;
};

export class FsRepositoryStructureReader implements RepositoryStructureReader {
  snapshot(
    rootPath: string,
    options: StructureSnapshotOptions,
    onWarning?: (path: string, message: string) => void,
  ): readonly StructureEntry[] {
    return snapshotRepositoryStructure(rootPath, options, onWarning);
  }
}
