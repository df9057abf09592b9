import {
  InvalidArgumentError,
  type OwnershipReport,
  type OwnershipReportEntry,
  type OwnerSelection,
} from "@blameweight/core";
import { selectTopOwners } from "../domain/ownership-query.js";
import { scoreFraction } from "../domain/score.js";
import type { OwnershipIndexBuildResult } from "./build-ownership-index.js";

export type OwnershipReportOptions = {
  selection?: OwnerSelection;
  maxDepth?: number;
};

/**
 * Flattens a build result into the renderer contract. Owner selection applies per
 * entry; `maxDepth` only hides deeper entries, their lines stay in every ancestor.
 */
export const createOwnershipReport = (
  result: OwnershipIndexBuildResult,
  options: OwnershipReportOptions = {},
): OwnershipReport => {
  if (!result.available) {
    return {
      rootPath: result.rootPath,
      available: false,
      reason: result.reason,
    };
  }

  const { maxDepth } = options;
  if (maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
    throw new InvalidArgumentError(`max depth must be a non-negative integer (got ${maxDepth})`);
  }

  const entries: OwnershipReportEntry[] = result.index
    .entries()
    .filter((entry) => maxDepth === undefined || entry.depth <= maxDepth)
    .map((entry) => ({
      path: entry.path,
      kind: entry.kind,
      depth: entry.depth,
      totalLines: entry.ownership.totalLines,
      owners: selectTopOwners(entry.ownership, options.selection).map((owner) => ({
        name: owner.name,
        numerator: owner.score.numerator,
        denominator: owner.score.denominator,
        fraction: scoreFraction(owner.score),
      })),
    }));

  return {
    rootPath: result.rootPath,
    available: true,
    entries,
  };
};
