import { InvalidArgumentError, type OwnerSelection } from "@blameweight/core";
import { assertValidSelection } from "@blameweight/ownership-engine";

const INTEGER_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

export const parseNonNegativeInteger = (value: string, optionName: string): number => {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError(`${optionName} expects a non-negative integer (got "${value}")`);
  }

  return Number.parseInt(trimmed, 10);
};

export const parsePositiveInteger = (value: string, optionName: string): number => {
  const parsed = parseNonNegativeInteger(value, optionName);
  if (parsed === 0) {
    throw new InvalidArgumentError(`${optionName} expects a positive integer (got "${value}")`);
  }

  return parsed;
};

// Accepts "0.8" as well as "80%".
export const parsePercentage = (value: string, optionName: string): number => {
  const trimmed = value.trim();
  const isPercent = trimmed.endsWith("%");
  const numeric = isPercent ? trimmed.slice(0, -1).trim() : trimmed;
  if (!DECIMAL_PATTERN.test(numeric)) {
    throw new InvalidArgumentError(`${optionName} expects a number between 0 and 1 (got "${value}")`);
  }

  const parsed = Number.parseFloat(numeric);
  return isPercent ? parsed / 100 : parsed;
};

export const parseOwnerSelection = (options: { top?: string; percentage?: string }): OwnerSelection => {
  const selection: OwnerSelection = {
    ...(options.top === undefined ? {} : { count: parseNonNegativeInteger(options.top, "--top") }),
    ...(options.percentage === undefined
      ? {}
      : { percentage: parsePercentage(options.percentage, "--percentage") }),
  };

  assertValidSelection(selection);
  return selection;
};
