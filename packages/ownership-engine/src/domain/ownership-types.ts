import type { OwnershipEntryKind, OwnershipSet } from "@blameweight/core";

export type OwnershipIndexEntry = {
  path: string;
  kind: OwnershipEntryKind;
  depth: number;
  ownership: OwnershipSet;
};

export type OwnershipComputationConfig = {
  concurrency: number;
};

export const DEFAULT_OWNERSHIP_CONFIG: OwnershipComputationConfig = {
  concurrency: 8,
};
