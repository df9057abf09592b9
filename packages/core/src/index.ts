import { resolve } from "node:path";

export {
  BlameUnavailableError,
  InvalidArgumentError,
  InvalidPathError,
  NotTrackedError,
} from "./errors.js";

/**
 * Share of a path's lines attributed to one author. `path` only records where the
 * score was computed; it carries no ownership meaning of its own.
 */
export type Score = {
  readonly numerator: number;
  readonly denominator: number;
  readonly path: string;
};

export type Ownership = {
  readonly name: string;
  readonly score: Score;
};

/**
 * Owners of a file or directory, sorted by fraction descending and then by name.
 * `totalLines` is the shared denominator of every owner score, and may be 0 for an
 * empty file (in which case `owners` is empty).
 */
export type OwnershipSet = {
  readonly path: string;
  readonly totalLines: number;
  readonly owners: readonly Ownership[];
};

export type OwnerSelection = {
  count?: number;
  percentage?: number;
};

/**
 * Per-line authorship lookups. Paths are repository-relative and use `/`.
 * Both operations reject with `NotTrackedError` for paths outside version control.
 */
export interface BlameSource {
  listTrackedFiles(path: string): Promise<readonly string[]>;
  blameLines(filePath: string): Promise<readonly string[]>;
}

export type OwnershipEntryKind = "file" | "directory";

export type OwnershipReportOwner = {
  name: string;
  numerator: number;
  denominator: number;
  fraction: number;
};

export type OwnershipReportEntry = {
  path: string;
  kind: OwnershipEntryKind;
  depth: number;
  totalLines: number;
  owners: readonly OwnershipReportOwner[];
};

export type OwnershipReportAvailable = {
  rootPath: string;
  available: true;
  entries: readonly OwnershipReportEntry[];
};

export type OwnershipReportUnavailable = {
  rootPath: string;
  available: false;
  reason: "not_tracked";
};

export type OwnershipReport = OwnershipReportAvailable | OwnershipReportUnavailable;

export type TargetPath = {
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  absolutePath: resolve(cwd, inputPath ?? "."),
});
