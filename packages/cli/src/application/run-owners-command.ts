import { resolveTargetPath, type OwnershipReport, type OwnerSelection } from "@blameweight/core";
import {
  openGitBlameSource,
  type AuthorIdentityMode,
  type BlameSourceProgressEvent,
  type OpenBlameSourceInput,
  type OpenBlameSourceResult,
} from "@blameweight/git-blame";
import {
  buildOwnershipIndex,
  createOwnershipReport,
  type OwnershipBuildProgressEvent,
} from "@blameweight/ownership-engine";
import { createSilentLogger, type Logger } from "./logger.js";

export type OwnersCommandOptions = {
  selection: OwnerSelection;
  maxDepth?: number;
  concurrency: number;
  authorIdentity: AuthorIdentityMode;
};

export type OpenSource = (
  input: OpenBlameSourceInput,
  onProgress?: (event: BlameSourceProgressEvent) => void,
) => Promise<OpenBlameSourceResult>;

const FILE_PROGRESS_STEP = 50;

const createSourceProgressReporter =
  (logger: Logger): ((event: BlameSourceProgressEvent) => void) =>
  (event) => {
    switch (event.stage) {
      case "locating_repository":
        logger.debug(`locating repository for ${event.targetPath}`);
        break;
      case "repository_located":
        logger.info(`repository: ${event.repositoryRoot} (root: ${event.rootPath})`);
        break;
      case "not_git_repository":
        logger.warn(`target path is not inside a git repository: ${event.targetPath}`);
        break;
    }
  };

const createBuildProgressReporter = (
  logger: Logger,
): ((event: OwnershipBuildProgressEvent) => void) => {
  let lastLogged = 0;

  return (event) => {
    switch (event.stage) {
      case "listing_tracked_files":
        logger.debug("listing tracked files");
        break;
      case "root_not_tracked":
        logger.warn("no tracked files under the target path");
        break;
      case "files_listed":
        logger.info(`blaming ${event.totalFiles} tracked files`);
        break;
      case "file_not_tracked":
        logger.debug(`skipping untracked file ${event.filePath}`);
        break;
      case "file_scored":
        if (
          event.completed === event.total ||
          event.completed === 1 ||
          event.completed - lastLogged >= FILE_PROGRESS_STEP
        ) {
          lastLogged = event.completed;
          const percent = event.total === 0 ? 100 : Math.floor((event.completed / event.total) * 100);
          logger.info(`blame progress ${event.completed}/${event.total} (${percent}%)`);
          logger.debug(`last file blamed ${event.filePath}`);
        }
        break;
      case "directories_aggregated":
        logger.debug(`aggregated ${event.directories} directories`);
        break;
      case "build_completed":
        logger.info(`ownership index built (${event.entries} paths)`);
        break;
    }
  };
};

export const runOwnersCommand = async (
  inputPath: string | undefined,
  options: OwnersCommandOptions,
  logger: Logger = createSilentLogger(),
  openSource: OpenSource = openGitBlameSource,
): Promise<OwnershipReport> => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const { absolutePath } = resolveTargetPath(inputPath, invocationCwd);
  logger.info(`computing ownership for ${absolutePath} (author identity: ${options.authorIdentity})`);

  const opened = await openSource(
    { targetPath: absolutePath, config: { authorIdentity: options.authorIdentity } },
    createSourceProgressReporter(logger),
  );
  if (!opened.available) {
    return {
      rootPath: absolutePath,
      available: false,
      reason: opened.reason,
    };
  }

  const result = await buildOwnershipIndex(
    { rootPath: opened.rootPath, config: { concurrency: options.concurrency } },
    opened.source,
    createBuildProgressReporter(logger),
  );
  if (result.available && result.untrackedFiles.length > 0) {
    logger.warn(`${result.untrackedFiles.length} listed files had no blame and were skipped`);
  }

  return createOwnershipReport(result, {
    selection: options.selection,
    ...(options.maxDepth === undefined ? {} : { maxDepth: options.maxDepth }),
  });
};
