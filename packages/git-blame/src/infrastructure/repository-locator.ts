import type { Stats } from "node:fs";
import { realpath, stat } from "node:fs/promises";
import { dirname, isAbsolute, relative, sep } from "node:path";
import { InvalidPathError, NotTrackedError } from "@blameweight/core";
import type { GitCommandClient } from "./git-command-client.js";
import { toBlameSourceError } from "./git-blame-source.js";

export type RepositoryLocation = {
  repositoryRoot: string;
  rootPath: string;
};

const statTarget = async (targetPath: string): Promise<Stats> => {
  try {
    return await stat(targetPath);
  } catch (error) {
    throw new InvalidPathError(
      targetPath,
      `path does not exist or cannot be read: ${targetPath} (${error instanceof Error ? error.message : String(error)})`,
    );
  }
};

/**
 * Finds the repository enclosing `targetPath` and expresses the target relative to
 * it. Returns null when the target is not inside a git work tree.
 */
export const locateRepository = async (
  targetPath: string,
  gitClient: GitCommandClient,
): Promise<RepositoryLocation | null> => {
  const stats = await statTarget(targetPath);
  if (!stats.isFile() && !stats.isDirectory()) {
    throw new InvalidPathError(targetPath);
  }

  const resolvedTarget = await realpath(targetPath);
  const workingDirectory = stats.isDirectory() ? resolvedTarget : dirname(resolvedTarget);

  let topLevel: string;
  try {
    topLevel = (await gitClient.run(workingDirectory, ["rev-parse", "--show-toplevel"])).trim();
  } catch (error) {
    const sourceError = toBlameSourceError(targetPath, error);
    if (sourceError instanceof NotTrackedError) {
      return null;
    }

    throw sourceError;
  }

  const repositoryRoot = await realpath(topLevel);
  const relativePath = relative(repositoryRoot, resolvedTarget);
  if (relativePath === ".." || relativePath.startsWith(`..${sep}`) || isAbsolute(relativePath)) {
    return null;
  }

  return {
    repositoryRoot,
    rootPath: relativePath.length === 0 ? "." : relativePath.split(sep).join("/"),
  };
};
