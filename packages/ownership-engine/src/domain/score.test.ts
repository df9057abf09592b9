import { InvalidArgumentError } from "@blameweight/core";
import { describe, expect, it } from "vitest";
import { compareOwnership, createScore, scoreFraction } from "./score.js";

describe("createScore", () => {
  it("builds a frozen score and exposes its fraction", () => {
    const score = createScore(2, 3, "src/a.ts");

    expect(score).toEqual({ numerator: 2, denominator: 3, path: "src/a.ts" });
    expect(Object.isFrozen(score)).toBe(true);
    expect(scoreFraction(score)).toBeCloseTo(2 / 3, 10);
  });

  it("rejects negative or fractional numerators", () => {
    expect(() => createScore(-1, 3, "a")).toThrow(InvalidArgumentError);
    expect(() => createScore(1.5, 3, "a")).toThrow(InvalidArgumentError);
  });

  it("rejects a zero denominator and numerators above the denominator", () => {
    expect(() => createScore(0, 0, "a")).toThrow(InvalidArgumentError);
    expect(() => createScore(4, 3, "a")).toThrow("score numerator 4 exceeds denominator 3 for a");
  });
});

describe("compareOwnership", () => {
  it("orders by fraction descending, then by name ascending", () => {
    const owners = [
      { name: "carol", score: createScore(1, 4, "x") },
      { name: "bob", score: createScore(1, 2, "x") },
      { name: "alice", score: createScore(1, 4, "x") },
      { name: "Zed", score: createScore(1, 4, "x") },
    ];

    expect([...owners].sort(compareOwnership).map((owner) => owner.name)).toEqual([
      "bob",
      "Zed",
      "alice",
      "carol",
    ]);
  });

  it("compares fractions across different denominators exactly", () => {
    const left = { name: "a", score: createScore(1, 3, "x") };
    const right = { name: "b", score: createScore(2, 6, "y") };

    expect(compareOwnership(left, right)).toBeLessThan(0);
  });
});
