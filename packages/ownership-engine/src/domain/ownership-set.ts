import { InvalidArgumentError, type Ownership, type OwnershipSet } from "@blameweight/core";
import { compareOwnership, createScore } from "./score.js";

export const createOwnershipSet = (
  path: string,
  lineCountsByOwner: ReadonlyMap<string, number>,
  totalLines: number,
): OwnershipSet => {
  if (!Number.isInteger(totalLines) || totalLines < 0) {
    throw new InvalidArgumentError(`line total must be a non-negative integer (got ${totalLines})`);
  }

  let attributedLines = 0;
  const owners: Ownership[] = [];
  for (const [name, lines] of lineCountsByOwner) {
    if (lines === 0) {
      continue;
    }

    attributedLines += lines;
    owners.push(Object.freeze({ name, score: createScore(lines, totalLines, path) }));
  }

  if (attributedLines !== totalLines) {
    throw new InvalidArgumentError(
      `owners of ${path} account for ${attributedLines} lines, expected ${totalLines}`,
    );
  }

  owners.sort(compareOwnership);

  return Object.freeze({
    path,
    totalLines,
    owners: Object.freeze(owners),
  });
};

export const createEmptyOwnershipSet = (path: string): OwnershipSet =>
  createOwnershipSet(path, new Map(), 0);
