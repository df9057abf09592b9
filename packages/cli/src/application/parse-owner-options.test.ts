import { InvalidArgumentError } from "@blameweight/core";
import { describe, expect, it } from "vitest";
import {
  parseNonNegativeInteger,
  parseOwnerSelection,
  parsePercentage,
  parsePositiveInteger,
} from "./parse-owner-options.js";

describe("parseOwnerSelection", () => {
  it("returns an empty selection when no option is given", () => {
    expect(parseOwnerSelection({})).toEqual({});
  });

  it("parses a count or a percentage", () => {
    expect(parseOwnerSelection({ top: "3" })).toEqual({ count: 3 });
    expect(parseOwnerSelection({ percentage: "0.8" })).toEqual({ percentage: 0.8 });
    expect(parseOwnerSelection({ percentage: "75%" })).toEqual({ percentage: 0.75 });
  });

  it("rejects both options together", () => {
    expect(() => parseOwnerSelection({ top: "3", percentage: "0.5" })).toThrow(InvalidArgumentError);
  });

  it("rejects a percentage above one", () => {
    expect(() => parseOwnerSelection({ percentage: "1.5" })).toThrow(
      "owner percentage must be within [0, 1] (got 1.5)",
    );
  });
});

describe("numeric option parsing", () => {
  it("rejects values that are not plain numbers", () => {
    expect(() => parseNonNegativeInteger("-1", "--top")).toThrow(
      '--top expects a non-negative integer (got "-1")',
    );
    expect(() => parseNonNegativeInteger("2.5", "--top")).toThrow(InvalidArgumentError);
    expect(() => parsePercentage("half", "--percentage")).toThrow(InvalidArgumentError);
  });

  it("requires positive values where zero makes no sense", () => {
    expect(parsePositiveInteger("4", "--concurrency")).toBe(4);
    expect(() => parsePositiveInteger("0", "--concurrency")).toThrow(
      '--concurrency expects a positive integer (got "0")',
    );
  });

  it("accepts surrounding whitespace and leading-dot decimals", () => {
    expect(parseNonNegativeInteger(" 7 ", "--max-depth")).toBe(7);
    expect(parsePercentage(".25", "--percentage")).toBe(0.25);
  });
});
