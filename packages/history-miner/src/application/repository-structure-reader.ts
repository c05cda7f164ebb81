import type { StructureEntry } from "@commitscope/core";

export type StructureSnapshotOptions = {
  maxDepth: number;
  maxEntries: number;
};

export interface RepositoryStructureReader {
  snapshot(
    rootPath: string,
    options: StructureSnapshotOptions,
    onWarning?: (path: string, message: string) => void,
  ): readonly StructureEntry[];
}
