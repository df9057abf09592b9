import type { OwnershipSet } from "@blameweight/core";
import { createOwnershipSet } from "./ownership-set.js";

/**
 * Combines the sets of a directory's direct children (files, and subdirectories that
 * were already aggregated) into the directory's set. Numerators and line totals are
 * summed per owner, so the result is the same for any grouping of the same files.
 */
export const aggregateOwnership = (path: string, children: readonly OwnershipSet[]): OwnershipSet => {
  const lineCountsByOwner = new Map<string, number>();
  let totalLines = 0;

  for (const child of children) {
    totalLines += child.totalLines;
    for (const owner of child.owners) {
      lineCountsByOwner.set(owner.name, (lineCountsByOwner.get(owner.name) ?? 0) + owner.score.numerator);
    }
  }

  return createOwnershipSet(path, lineCountsByOwner, totalLines);
};
