import { BlameUnavailableError, type BlameSource } from "@blameweight/core";
import type { OpenBlameSourceInput } from "@blameweight/git-blame";
import { createBufferedSink } from "@blameweight/reporter";
import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";
import { runOwnersCommand, type OpenSource, type OwnersCommandOptions } from "./run-owners-command.js";

const options: OwnersCommandOptions = {
  selection: {},
  concurrency: 2,
  authorIdentity: "name",
};

const source: BlameSource = {
  listTrackedFiles: async () => ["pkg/a.ts", "pkg/b.ts"],
  blameLines: async (filePath) => (filePath === "pkg/a.ts" ? ["alice", "bob"] : ["bob"]),
};

const openedAt =
  (rootPath: string, blameSource: BlameSource = source): OpenSource =>
  async () => ({ available: true, source: blameSource, repositoryRoot: "/repo", rootPath });

describe("runOwnersCommand", () => {
  it("builds a report for the located root", async () => {
    const report = await runOwnersCommand(
      "/repo/pkg",
      { ...options, selection: { count: 1 } },
      undefined,
      openedAt("pkg"),
    );

    expect(report).toEqual({
      rootPath: "pkg",
      available: true,
      entries: [
        {
          path: "pkg",
          kind: "directory",
          depth: 0,
          totalLines: 3,
          owners: [{ name: "bob", numerator: 2, denominator: 3, fraction: 2 / 3 }],
        },
        {
          path: "pkg/a.ts",
          kind: "file",
          depth: 1,
          totalLines: 2,
          owners: [{ name: "alice", numerator: 1, denominator: 2, fraction: 0.5 }],
        },
        {
          path: "pkg/b.ts",
          kind: "file",
          depth: 1,
          totalLines: 1,
          owners: [{ name: "bob", numerator: 1, denominator: 1, fraction: 1 }],
        },
      ],
    });
  });

  it("passes the target and author identity to the source opener", async () => {
    const inputs: OpenBlameSourceInput[] = [];
    const openSource: OpenSource = async (input) => {
      inputs.push(input);
      return { available: false, targetPath: input.targetPath, reason: "not_tracked" };
    };

    const report = await runOwnersCommand(
      "/tmp/scratch",
      { ...options, authorIdentity: "email" },
      undefined,
      openSource,
    );

    expect(inputs).toEqual([{ targetPath: "/tmp/scratch", config: { authorIdentity: "email" } }]);
    expect(report).toEqual({ rootPath: "/tmp/scratch", available: false, reason: "not_tracked" });
  });

  it("limits reported entries by depth", async () => {
    const report = await runOwnersCommand(
      "/repo/pkg",
      { ...options, maxDepth: 0 },
      undefined,
      openedAt("pkg"),
    );

    expect(report.available && report.entries.map((entry) => entry.path)).toEqual(["pkg"]);
  });

  it("logs progress through the given logger", async () => {
    const sink = createBufferedSink();

    await runOwnersCommand("/repo/pkg", options, createLogger("info", sink), openedAt("pkg"));

    expect(sink.contents().split("\n")).toEqual([
      "[blameweight] INFO computing ownership for /repo/pkg (author identity: name)",
      "[blameweight] INFO blaming 2 tracked files",
      "[blameweight] INFO blame progress 1/2 (50%)",
      "[blameweight] INFO blame progress 2/2 (100%)",
      "[blameweight] INFO ownership index built (3 paths)",
      "",
    ]);
  });

  it("propagates fatal blame failures", async () => {
    const failure = new BlameUnavailableError("pkg/b.ts", "git blame failed");
    const failing: BlameSource = {
      listTrackedFiles: source.listTrackedFiles,
      blameLines: async (filePath) => {
        if (filePath === "pkg/b.ts") {
          throw failure;
        }

        return ["alice"];
      },
    };

    await expect(runOwnersCommand("/repo/pkg", options, undefined, openedAt("pkg", failing))).rejects.toBe(
      failure,
    );
  });
});
