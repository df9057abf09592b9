import { InvalidArgumentError, type Ownership, type Score } from "@blameweight/core";

export const createScore = (numerator: number, denominator: number, path: string): Score => {
  if (!Number.isInteger(numerator) || numerator < 0) {
    throw new InvalidArgumentError(`score numerator must be a non-negative integer (got ${numerator})`);
  }

  if (!Number.isInteger(denominator) || denominator <= 0) {
    throw new InvalidArgumentError(`score denominator must be a positive integer (got ${denominator})`);
  }

  if (numerator > denominator) {
    throw new InvalidArgumentError(
      `score numerator ${numerator} exceeds denominator ${denominator} for ${path}`,
    );
  }

  return Object.freeze({ numerator, denominator, path });
};

export const scoreFraction = (score: Score): number => score.numerator / score.denominator;

// Code-unit order keeps ties reproducible regardless of the runtime locale.
const compareNames = (left: string, right: string): number => {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
};

export const compareOwnership = (left: Ownership, right: Ownership): number => {
  const byFraction =
    right.score.numerator * left.score.denominator - left.score.numerator * right.score.denominator;
  if (byFraction !== 0) {
    return byFraction;
  }

  return compareNames(left.name, right.name);
};
