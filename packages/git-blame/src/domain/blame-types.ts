export type BlameLineRecord = {
  lineNumber: number;
  commitHash: string;
  authorName: string;
  authorEmail: string;
};

export type AuthorIdentityMode = "name" | "email";

export type BlameSourceConfig = {
  authorIdentity: AuthorIdentityMode;
};

export const DEFAULT_BLAME_SOURCE_CONFIG: BlameSourceConfig = {
  authorIdentity: "name",
};

export const GIT_SUBMODULE_MODE = "160000";

// git's own attribution for lines with no commit behind them
export const UNCOMMITTED_COMMIT_HASH = "0".repeat(40);
export const UNCOMMITTED_AUTHOR_NAME = "Not Committed Yet";
export const UNCOMMITTED_AUTHOR_EMAIL = "not.committed.yet";
