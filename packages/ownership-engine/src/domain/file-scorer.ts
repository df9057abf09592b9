import type { BlameSource, OwnershipSet } from "@blameweight/core";
import { createOwnershipSet } from "./ownership-set.js";

export const scoreFileLines = (filePath: string, authors: readonly string[]): OwnershipSet => {
  const lineCountsByAuthor = new Map<string, number>();
  for (const author of authors) {
    lineCountsByAuthor.set(author, (lineCountsByAuthor.get(author) ?? 0) + 1);
  }

  return createOwnershipSet(filePath, lineCountsByAuthor, authors.length);
};

/**
 * Scores one file from its blame. Rejects with the source's `NotTrackedError` for
 * untracked files; any other source failure is passed through as is.
 */
export const scoreFile = async (filePath: string, source: BlameSource): Promise<OwnershipSet> => {
  const authors = await source.blameLines(filePath);
  return scoreFileLines(filePath, authors);
};
