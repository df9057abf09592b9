import {
  InvalidArgumentError,
  type Ownership,
  type OwnershipSet,
  type OwnerSelection,
} from "@blameweight/core";
import { selectTopOwners } from "./ownership-query.js";
import type { OwnershipIndexEntry } from "./ownership-types.js";

/**
 * Ownership of every visited file and directory under one root. Built once by
 * `buildOwnershipIndex`; read-only afterwards.
 */
export class OwnershipIndex {
  readonly rootPath: string;
  private readonly orderedEntries: readonly OwnershipIndexEntry[];
  private readonly entriesByPath: ReadonlyMap<string, OwnershipIndexEntry>;

  constructor(rootPath: string, entries: readonly OwnershipIndexEntry[]) {
    this.rootPath = rootPath;
    this.orderedEntries = Object.freeze([...entries]);
    this.entriesByPath = new Map(entries.map((entry) => [entry.path, entry]));
  }

  get size(): number {
    return this.orderedEntries.length;
  }

  has(path: string): boolean {
    return this.entriesByPath.has(path);
  }

  get(path: string): OwnershipSet | undefined {
    return this.entriesByPath.get(path)?.ownership;
  }

  /** Entries in traversal order: the root first, then each child subtree by name. */
  entries(): readonly OwnershipIndexEntry[] {
    return this.orderedEntries;
  }

  summarize(path: string = this.rootPath): OwnershipSet {
    const entry = this.entriesByPath.get(path);
    if (entry === undefined) {
      throw new InvalidArgumentError(`path is not part of the ownership index: ${path}`);
    }

    return entry.ownership;
  }

  top(path: string, selection: OwnerSelection = {}): readonly Ownership[] {
    return selectTopOwners(this.summarize(path), selection);
  }
}
