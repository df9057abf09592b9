import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { BlameUnavailableError, NotTrackedError, type BlameSource } from "@blameweight/core";
import {
  DEFAULT_BLAME_SOURCE_CONFIG,
  UNCOMMITTED_AUTHOR_EMAIL,
  UNCOMMITTED_AUTHOR_NAME,
  UNCOMMITTED_COMMIT_HASH,
  type BlameLineRecord,
  type BlameSourceConfig,
} from "../domain/blame-types.js";
import { BlameParseError, parseBlamePorcelain } from "../parsing/git-blame-parser.js";
import { parseLsFilesStage } from "../parsing/git-ls-files-parser.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const NOT_TRACKED_CODES = [
  "no such path",
  "not a git repository",
  "not in a git directory",
  "is outside repository",
  // listed in the index but removed from the working tree
  "cannot lstat",
];

const MISSING_HEAD_CODE = "no such ref: head";

export const isNotTrackedError = (error: GitCommandError): boolean => {
  const lower = error.stderr.toLowerCase();
  return NOT_TRACKED_CODES.some((code) => lower.includes(code));
};

export const isMissingHeadError = (error: GitCommandError): boolean =>
  error.stderr.toLowerCase().includes(MISSING_HEAD_CODE);

const countWorkingTreeLines = (contents: string): number => {
  if (contents.length === 0) {
    return 0;
  }

  const lineCount = contents.split("\n").length;
  return contents.endsWith("\n") ? lineCount - 1 : lineCount;
};

export const toBlameSourceError = (path: string, error: unknown): Error => {
  if (error instanceof GitCommandError) {
    if (isNotTrackedError(error)) {
      return new NotTrackedError(path);
    }

    const detail = error.stderr.trim().length > 0 ? error.stderr : error.message;
    const reason = error.code === "ENOENT" ? "git executable not found" : detail.trim();
    return new BlameUnavailableError(path, `git ${error.args.join(" ")} failed for ${path}: ${reason}`);
  }

  if (error instanceof BlameParseError) {
    return new BlameUnavailableError(path, `malformed blame output for ${path}: ${error.message}`);
  }

  return error instanceof Error ? error : new BlameUnavailableError(path, String(error));
};

export class GitCliBlameSource implements BlameSource {
  private readonly config: BlameSourceConfig;

  constructor(
    private readonly gitClient: GitCommandClient,
    readonly repositoryRoot: string,
    config: Partial<BlameSourceConfig> = {},
  ) {
    this.config = { ...DEFAULT_BLAME_SOURCE_CONFIG, ...config };
  }

  async listTrackedFiles(path: string): Promise<readonly string[]> {
    try {
      const staged = await this.gitClient.run(this.repositoryRoot, [
        "-c",
        "core.quotepath=false",
        "ls-files",
        "-s",
        "-z",
        "--",
        path,
      ]);
      const deleted = await this.gitClient.run(this.repositoryRoot, [
        "-c",
        "core.quotepath=false",
        "ls-files",
        "--deleted",
        "-z",
        "--",
        path,
      ]);
      const deletedPaths = new Set(deleted.split("\u0000").filter((entry) => entry.length > 0));
      return parseLsFilesStage(staged).filter((filePath) => !deletedPaths.has(filePath));
    } catch (error) {
      throw toBlameSourceError(path, error);
    }
  }

  async blameRecords(filePath: string): Promise<readonly BlameLineRecord[]> {
    try {
      const output = await this.gitClient.run(this.repositoryRoot, [
        "-c",
        "core.quotepath=false",
        "blame",
        "--line-porcelain",
        "--",
        filePath,
      ]);
      return parseBlamePorcelain(output);
    } catch (error) {
      if (error instanceof GitCommandError && isMissingHeadError(error)) {
        return this.uncommittedRecords(filePath);
      }
      throw toBlameSourceError(filePath, error);
    }
  }

  /** Attributes every working-tree line to git's uncommitted author, for repositories without commits. */
  private async uncommittedRecords(filePath: string): Promise<readonly BlameLineRecord[]> {
    let contents: string;
    try {
      contents = await readFile(join(this.repositoryRoot, filePath), "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BlameUnavailableError(filePath, `unable to read ${filePath}: ${reason}`);
    }

    return Array.from({ length: countWorkingTreeLines(contents) }, (_, index) => ({
      lineNumber: index + 1,
      commitHash: UNCOMMITTED_COMMIT_HASH,
      authorName: UNCOMMITTED_AUTHOR_NAME,
      authorEmail: UNCOMMITTED_AUTHOR_EMAIL,
    }));
  }

  async blameLines(filePath: string): Promise<readonly string[]> {
    const records = await this.blameRecords(filePath);
    return this.config.authorIdentity === "email"
      ? records.map((record) => record.authorEmail)
      : records.map((record) => record.authorName);
  }
}
