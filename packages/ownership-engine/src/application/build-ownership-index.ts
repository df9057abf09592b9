import { NotTrackedError, type BlameSource, type OwnershipSet } from "@blameweight/core";
import { aggregateOwnership } from "../domain/directory-aggregator.js";
import { scoreFile } from "../domain/file-scorer.js";
import { OwnershipIndex } from "../domain/ownership-index.js";
import {
  DEFAULT_OWNERSHIP_CONFIG,
  type OwnershipComputationConfig,
  type OwnershipIndexEntry,
} from "../domain/ownership-types.js";
import {
  buildPathTree,
  collectTreeFiles,
  normalizeTreePath,
  type PathTreeNode,
} from "../domain/path-tree.js";
import { mapWithConcurrency } from "./map-with-concurrency.js";

export type BuildOwnershipIndexInput = {
  rootPath: string;
  config?: Partial<OwnershipComputationConfig>;
};

export type OwnershipIndexAvailable = {
  rootPath: string;
  available: true;
  index: OwnershipIndex;
  untrackedFiles: readonly string[];
};

export type OwnershipIndexUnavailable = {
  rootPath: string;
  available: false;
  reason: "not_tracked";
};

export type OwnershipIndexBuildResult = OwnershipIndexAvailable | OwnershipIndexUnavailable;

export type OwnershipBuildProgressEvent =
  | { stage: "listing_tracked_files" }
  | { stage: "root_not_tracked" }
  | { stage: "files_listed"; totalFiles: number }
  | { stage: "file_scored"; filePath: string; completed: number; total: number }
  | { stage: "file_not_tracked"; filePath: string; completed: number; total: number }
  | { stage: "directories_aggregated"; directories: number }
  | { stage: "build_completed"; entries: number };

type AggregatedNode = {
  ownership: OwnershipSet;
  entries: readonly OwnershipIndexEntry[];
};

const createEffectiveConfig = (
  overrides: Partial<OwnershipComputationConfig> | undefined,
): OwnershipComputationConfig => ({
  ...DEFAULT_OWNERSHIP_CONFIG,
  ...overrides,
});

const listRootFiles = async (
  rootPath: string,
  source: BlameSource,
): Promise<readonly string[] | null> => {
  try {
    return await source.listTrackedFiles(rootPath);
  } catch (error) {
    if (error instanceof NotTrackedError) {
      return null;
    }

    throw error;
  }
};

// Post-order: children first, then one aggregation per directory. Subtrees without
// any scored file produce no entry and contribute nothing to their parent.
const aggregateNode = (
  node: PathTreeNode,
  depth: number,
  fileSets: ReadonlyMap<string, OwnershipSet>,
): AggregatedNode | null => {
  if (node.kind === "file") {
    const ownership = fileSets.get(node.path);
    if (ownership === undefined) {
      return null;
    }

    return { ownership, entries: [{ path: node.path, kind: "file", depth, ownership }] };
  }

  const children: AggregatedNode[] = [];
  for (const child of node.children) {
    const aggregated = aggregateNode(child, depth + 1, fileSets);
    if (aggregated !== null) {
      children.push(aggregated);
    }
  }

  if (children.length === 0) {
    return null;
  }

  const ownership = aggregateOwnership(
    node.path,
    children.map((child) => child.ownership),
  );

  return {
    ownership,
    entries: [
      { path: node.path, kind: "directory", depth, ownership },
      ...children.flatMap((child) => child.entries),
    ],
  };
};

export const buildOwnershipIndex = async (
  input: BuildOwnershipIndexInput,
  source: BlameSource,
  onProgress?: (event: OwnershipBuildProgressEvent) => void,
): Promise<OwnershipIndexBuildResult> => {
  const rootPath = normalizeTreePath(input.rootPath);
  const config = createEffectiveConfig(input.config);
  const notTracked: OwnershipIndexUnavailable = { rootPath, available: false, reason: "not_tracked" };

  onProgress?.({ stage: "listing_tracked_files" });
  const listedFiles = await listRootFiles(rootPath, source);
  if (listedFiles === null || listedFiles.length === 0) {
    onProgress?.({ stage: "root_not_tracked" });
    return notTracked;
  }

  const tree = buildPathTree(rootPath, listedFiles);
  const filePaths = collectTreeFiles(tree);
  onProgress?.({ stage: "files_listed", totalFiles: filePaths.length });

  let completed = 0;
  const scored = await mapWithConcurrency(filePaths, config.concurrency, async (filePath) => {
    try {
      const ownership = await scoreFile(filePath, source);
      completed += 1;
      onProgress?.({ stage: "file_scored", filePath, completed, total: filePaths.length });
      return ownership;
    } catch (error) {
      if (!(error instanceof NotTrackedError)) {
        throw error;
      }

      completed += 1;
      onProgress?.({ stage: "file_not_tracked", filePath, completed, total: filePaths.length });
      return null;
    }
  });

  const fileSets = new Map<string, OwnershipSet>();
  const untrackedFiles: string[] = [];
  scored.forEach((ownership, position) => {
    const filePath = filePaths[position];
    if (filePath === undefined) {
      return;
    }

    if (ownership === null) {
      untrackedFiles.push(filePath);
    } else {
      fileSets.set(filePath, ownership);
    }
  });

  const aggregated = aggregateNode(tree, 0, fileSets);
  if (aggregated === null) {
    onProgress?.({ stage: "root_not_tracked" });
    return notTracked;
  }

  onProgress?.({
    stage: "directories_aggregated",
    directories: aggregated.entries.filter((entry) => entry.kind === "directory").length,
  });

  const index = new OwnershipIndex(rootPath, aggregated.entries);
  onProgress?.({ stage: "build_completed", entries: index.size });

  return {
    rootPath,
    available: true,
    index,
    untrackedFiles,
  };
};
