import { expect, test } from "vitest";
import { JsdiffService } from "../../../adapters/services/jsdiff-service.ts";
import type { DiffChange, DiffService } from "../../ports/diff-service.ts";
import { FormatDiffUseCase, NO_CHANGES, splitLines } from "./format-diff.ts";

class ScriptedDiff implements DiffService {
  constructor(private readonly changes: readonly DiffChange[]) {}
  diffLines(): readonly DiffChange[] {
    return this.changes;
  }
}

test("splitLines - final line break adds no empty line", () => {
  expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
  expect(splitLines("a\r\nb\rc")).toEqual(["a", "b", "c"]);
  expect(splitLines("")).toEqual([]);
  expect(splitLines("a\n\n")).toEqual(["a", ""]);
});

test("FormatDiff - identical texts", () => {
  const formatDiff = new FormatDiffUseCase(new JsdiffService());
  expect(formatDiff.execute("a\nb", "a\nb\n")).toBe(NO_CHANGES);
});

test("FormatDiff - shows only changed lines", () => {
  const formatDiff = new FormatDiffUseCase(new JsdiffService());
  expect(formatDiff.execute("a\nb\nc", "a\nx\nc")).toBe("− b\n+ x");
});

test("FormatDiff - removals come before insertions within a region", () => {
  const formatDiff = new FormatDiffUseCase(
    new ScriptedDiff([
      { kind: "equal", lines: ["keep"] },
      { kind: "added", lines: ["new 1"] },
      { kind: "removed", lines: ["old 1"] },
      { kind: "added", lines: ["new 2"] },
      { kind: "equal", lines: ["keep too"] },
      { kind: "removed", lines: ["old 2"] },
    ]),
  );
  expect(formatDiff.execute("x", "y")).toBe(
    ["− old 1", "+ new 1", "+ new 2", "− old 2"].join("\n"),
  );
});

test("FormatDiff - pure insertion into an empty text", () => {
  const formatDiff = new FormatDiffUseCase(new JsdiffService());
  expect(formatDiff.execute("", "one\ntwo")).toBe("+ one\n+ two");
});
