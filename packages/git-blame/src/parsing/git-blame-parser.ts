import type { BlameLineRecord } from "../domain/blame-types.js";

export class BlameParseError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (output line ${line})`);
    this.name = "BlameParseError";
    this.line = line;
  }
}

const HEADER_PATTERN = /^([0-9a-f]{40}|[0-9a-f]{64}) (\d+) (\d+)(?: \d+)?$/;

type PendingRecord = {
  commitHash: string;
  lineNumber: number;
  authorName: string | null;
  authorEmail: string;
};

const stripMailBrackets = (value: string): string =>
  value.startsWith("<") && value.endsWith(">") ? value.slice(1, -1) : value;

/**
 * Parses `git blame --line-porcelain` output in one pass. Every blamed line carries
 * its own header block, so each record is complete once its tab-prefixed content
 * line is reached.
 */
export const parseBlamePorcelain = (rawBlame: string): readonly BlameLineRecord[] => {
  const records: BlameLineRecord[] = [];
  const lines = rawBlame.split("\n");
  let pending: PendingRecord | null = null;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    const outputLine = index + 1;

    if (pending === null) {
      if (line.length === 0 && index === lines.length - 1) {
        continue;
      }

      const header = HEADER_PATTERN.exec(line);
      if (header === null) {
        throw new BlameParseError("expected a blame header", outputLine);
      }

      const [, commitHash, , finalLine] = header;
      if (commitHash === undefined || finalLine === undefined) {
        throw new BlameParseError("incomplete blame header", outputLine);
      }

      pending = {
        commitHash,
        lineNumber: Number.parseInt(finalLine, 10),
        authorName: null,
        authorEmail: "",
      };
      continue;
    }

    if (line.startsWith("\t")) {
      if (pending.authorName === null) {
        throw new BlameParseError(`missing author for line ${pending.lineNumber}`, outputLine);
      }

      records.push({
        lineNumber: pending.lineNumber,
        commitHash: pending.commitHash,
        authorName: pending.authorName,
        authorEmail: pending.authorEmail,
      });
      pending = null;
      continue;
    }

    if (line.startsWith("author-mail ")) {
      pending.authorEmail = stripMailBrackets(line.slice("author-mail ".length));
    } else if (line.startsWith("author ")) {
      pending.authorName = line.slice("author ".length);
    }
  }

  if (pending !== null) {
    throw new BlameParseError("blame output ended inside a record", lines.length);
  }

  return records;
};
