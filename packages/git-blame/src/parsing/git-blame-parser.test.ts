import { describe, expect, it } from "vitest";
import { BlameParseError, parseBlamePorcelain } from "./git-blame-parser.js";

const HASH_A = "a".repeat(40);
const HASH_B = "b".repeat(40);

const block = (hash: string, finalLine: number, author: string, email: string, content: string): string[] => [
  `${hash} ${finalLine} ${finalLine} 1`,
  `author ${author}`,
  `author-mail <${email}>`,
  "author-time 1700000000",
  "author-tz +0000",
  `committer ${author}`,
  `committer-mail <${email}>`,
  "committer-time 1700000000",
  "committer-tz +0000",
  "summary initial import",
  "filename src/a.ts",
  `\t${content}`,
];

describe("parseBlamePorcelain", () => {
  it("reads one record per blamed line", () => {
    const raw = [
      ...block(HASH_A, 1, "Alice Doe", "alice@example.com", "const a = 1;"),
      ...block(HASH_B, 2, "Bob", "bob@example.com", ""),
      ...block(HASH_A, 3, "Alice Doe", "alice@example.com", "author fake content"),
      "",
    ].join("\n");

    expect(parseBlamePorcelain(raw)).toEqual([
      { lineNumber: 1, commitHash: HASH_A, authorName: "Alice Doe", authorEmail: "alice@example.com" },
      { lineNumber: 2, commitHash: HASH_B, authorName: "Bob", authorEmail: "bob@example.com" },
      { lineNumber: 3, commitHash: HASH_A, authorName: "Alice Doe", authorEmail: "alice@example.com" },
    ]);
  });

  it("accepts headers without a group count and optional metadata lines", () => {
    const raw = [
      `${HASH_B} 4 7`,
      "author Not Committed Yet",
      "author-mail <not.committed.yet>",
      "previous " + HASH_A + " src/a.ts",
      "boundary",
      "filename src/a.ts",
      "\treturn;",
    ].join("\n");

    expect(parseBlamePorcelain(raw)).toEqual([
      {
        lineNumber: 7,
        commitHash: HASH_B,
        authorName: "Not Committed Yet",
        authorEmail: "not.committed.yet",
      },
    ]);
  });

  it("returns no records for an empty file", () => {
    expect(parseBlamePorcelain("")).toEqual([]);
  });

  it("rejects output that does not start with a header", () => {
    expect(() => parseBlamePorcelain("fatal: something odd\n")).toThrow(BlameParseError);
  });

  it("rejects a record without an author", () => {
    const raw = [`${HASH_A} 1 1 1`, "filename a.ts", "\tx", ""].join("\n");

    expect(() => parseBlamePorcelain(raw)).toThrow("missing author for line 1 (output line 3)");
  });

  it("rejects truncated output", () => {
    const raw = [`${HASH_A} 1 1 1`, "author Alice"].join("\n");

    expect(() => parseBlamePorcelain(raw)).toThrow("blame output ended inside a record (output line 2)");
  });
});
