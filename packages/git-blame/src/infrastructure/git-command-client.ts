import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly code: string | number | null;
  readonly stderr: string;

  constructor(
    message: string,
    args: readonly string[],
    code: string | number | null = null,
    stderr = "",
  ) {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
    this.code = code;
    this.stderr = stderr;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): Promise<string>;
}

const readErrorCode = (error: unknown): string | number | null => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return null;
  }

  const { code } = error;
  return typeof code === "string" || typeof code === "number" ? code : null;
};

const readErrorStderr = (error: unknown): string => {
  if (typeof error !== "object" || error === null || !("stderr" in error)) {
    return "";
  }

  const { stderr } = error;
  return typeof stderr === "string" ? stderr : "";
};

export class ExecGitCommandClient implements GitCommandClient {
  async run(repositoryPath: string, args: readonly string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: 1024 * 1024 * 64,
      });
      return stdout;
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown git execution error";
      throw new GitCommandError(message, args, readErrorCode(error), readErrorStderr(error));
    }
  }
}
