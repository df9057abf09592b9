import { describe, expect, it } from "vitest";
import { NotTrackedError, resolveTargetPath } from "./index.js";

describe("resolveTargetPath", () => {
  it("resolves provided path against cwd", () => {
    const target = resolveTargetPath("src", "/repo");
    expect(target.absolutePath).toBe("/repo/src");
  });

  it("defaults to current directory when no input path is given", () => {
    const target = resolveTargetPath(undefined, "/repo");
    expect(target.absolutePath).toBe("/repo");
  });
});

describe("NotTrackedError", () => {
  it("keeps the offending path and a default message", () => {
    const error = new NotTrackedError("docs/draft.md");

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("NotTrackedError");
    expect(error.path).toBe("docs/draft.md");
    expect(error.message).toBe("path is not tracked by version control: docs/draft.md");
  });
});
