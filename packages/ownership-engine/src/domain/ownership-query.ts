import {
  InvalidArgumentError,
  type Ownership,
  type OwnershipSet,
  type OwnerSelection,
} from "@blameweight/core";

// Tolerates float error in `percentage * totalLines`, e.g. 0.7 * 10.
const CUMULATIVE_EPSILON = 1e-9;

export const assertValidSelection = (selection: OwnerSelection): void => {
  if (selection.count !== undefined && selection.percentage !== undefined) {
    throw new InvalidArgumentError("owner selection accepts either a count or a percentage, not both");
  }

  if (selection.count !== undefined && (!Number.isInteger(selection.count) || selection.count < 0)) {
    throw new InvalidArgumentError(`owner count must be a non-negative integer (got ${selection.count})`);
  }

  if (
    selection.percentage !== undefined &&
    (Number.isNaN(selection.percentage) || selection.percentage < 0 || selection.percentage > 1)
  ) {
    throw new InvalidArgumentError(`owner percentage must be within [0, 1] (got ${selection.percentage})`);
  }
};

const selectByPercentage = (set: OwnershipSet, percentage: number): readonly Ownership[] => {
  if (set.totalLines === 0) {
    return [];
  }

  const requiredLines = percentage * set.totalLines - CUMULATIVE_EPSILON;
  let cumulativeLines = 0;
  for (let index = 0; index < set.owners.length; index += 1) {
    if (cumulativeLines >= requiredLines) {
      return set.owners.slice(0, index);
    }

    cumulativeLines += set.owners[index]?.score.numerator ?? 0;
  }

  return set.owners;
};

/**
 * Top owners of a set: the first `count` owners, or the shortest prefix whose
 * cumulative fraction reaches `percentage`. Without either option, all owners.
 */
export const selectTopOwners = (
  set: OwnershipSet,
  selection: OwnerSelection = {},
): readonly Ownership[] => {
  assertValidSelection(selection);

  if (selection.count !== undefined) {
    return set.owners.slice(0, selection.count);
  }

  if (selection.percentage !== undefined) {
    return selectByPercentage(set, selection.percentage);
  }

  return set.owners;
};
