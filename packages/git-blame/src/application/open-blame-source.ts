import type { BlameSource } from "@blameweight/core";
import type { BlameSourceConfig } from "../domain/blame-types.js";
import type { GitCommandClient } from "../infrastructure/git-command-client.js";
import { GitCliBlameSource } from "../infrastructure/git-blame-source.js";
import { locateRepository } from "../infrastructure/repository-locator.js";

export type OpenBlameSourceInput = {
  targetPath: string;
  config?: Partial<BlameSourceConfig>;
};

export type BlameSourceProgressEvent =
  | { stage: "locating_repository"; targetPath: string }
  | { stage: "repository_located"; repositoryRoot: string; rootPath: string }
  | { stage: "not_git_repository"; targetPath: string };

export type OpenedBlameSource = {
  available: true;
  source: BlameSource;
  repositoryRoot: string;
  rootPath: string;
};

export type UnavailableBlameSource = {
  available: false;
  targetPath: string;
  reason: "not_tracked";
};

export type OpenBlameSourceResult = OpenedBlameSource | UnavailableBlameSource;

export const openBlameSource = async (
  input: OpenBlameSourceInput,
  gitClient: GitCommandClient,
  onProgress?: (event: BlameSourceProgressEvent) => void,
): Promise<OpenBlameSourceResult> => {
  onProgress?.({ stage: "locating_repository", targetPath: input.targetPath });
  const location = await locateRepository(input.targetPath, gitClient);
  if (location === null) {
    onProgress?.({ stage: "not_git_repository", targetPath: input.targetPath });
    return {
      available: false,
      targetPath: input.targetPath,
      reason: "not_tracked",
    };
  }

  onProgress?.({ stage: "repository_located", ...location });
  return {
    available: true,
    source: new GitCliBlameSource(gitClient, location.repositoryRoot, input.config),
    repositoryRoot: location.repositoryRoot,
    rootPath: location.rootPath,
  };
};
