/**
 * Use Case: FormatDiff
 *
 * Human-readable line diff between two texts. Only changed lines are shown:
 * "− " for removed lines and "+ " for inserted ones. Within a changed region
 * all removals come before all insertions.
 *
 * Dependencies: DiffService.
 */

import type { DiffService } from "../../ports/diff-service.ts";

export const NO_CHANGES = "(no changes)";

/**
 * Split text into lines on \n, \r\n or \r. A final line break does not
 * produce an extra empty line, so "a\n" and "a" split the same.
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export class FormatDiffUseCase {
  constructor(private readonly diffService: DiffService) {}

  execute(oldText: string, newText: string): string {
    const oldLines = splitLines(oldText);
    const newLines = splitLines(newText);

    if (
      oldLines.length === newLines.length &&
      oldLines.every((line, i) => line === newLines[i])
    ) {
      return NO_CHANGES;
    }

    const output: string[] = [];
    let removed: string[] = [];
    let added: string[] = [];
    const flush = () => {
      output.push(...removed.map((line) => `− ${line}`));
      output.push(...added.map((line) => `+ ${line}`));
      removed = [];
      added = [];
    };

    for (const change of this.diffService.diffLines(oldLines, newLines)) {
      if (change.kind === "equal") {
        flush();
      } else if (change.kind === "removed") {
        removed.push(...change.lines);
      } else {
        added.push(...change.lines);
      }
    }
    flush();

    return output.length > 0 ? output.join("\n") : NO_CHANGES;
  }
}
