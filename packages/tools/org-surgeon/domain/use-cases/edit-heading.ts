/**
 * Use Case: EditHeading
 *
 * Line-range surgery on an OrgDocument. Each operation returns the updated
 * lines; everything outside the touched range is copied as-is.
 *
 * Dependencies: ReadSectionUseCase for subtree boundaries.
 */

import type {
  MutationResult,
  OrgDocument,
  OrgHeading,
} from "../entities/document.ts";
import { parseHeadline } from "./parse-document.ts";
import { ReadSectionUseCase } from "./read-section.ts";

export interface EditHeadingOutput {
  readonly result: MutationResult;
  readonly updatedLines: readonly string[];
}

export class EditHeadingUseCase {
  private readonly readSection: ReadSectionUseCase;

  constructor() {
    this.readSection = new ReadSectionUseCase();
  }

  /**
   * Replace a heading subtree in place. Trailing blank lines of the old
   * subtree stay where they are.
   */
  replace(doc: OrgDocument, heading: OrgHeading, text: string): EditHeadingOutput {
    const end = this.readSection.contentEnd(doc, heading);
    const newLines = text.split("\n");

    const updatedLines = [
      ...doc.lines.slice(0, heading.line),
      ...newLines,
      ...doc.lines.slice(end),
    ];

    return {
      result: {
        action: "replaced",
        title: heading.title,
        lineStart: heading.line,
        linesAdded: newLines.length,
        linesRemoved: end - heading.line,
      },
      updatedLines,
    };
  }

  /**
   * Remove a heading subtree, including its trailing blank lines. The last
   * child before a higher-level heading takes the blank lines in front of
   * it instead, so the separator before that heading stays.
   */
  remove(doc: OrgDocument, heading: OrgHeading): EditHeadingOutput {
    let start = heading.line;
    let end = heading.end;
    const next = doc.lines[heading.end];
    const nextHeadline = next === undefined ? null : parseHeadline(next);
    if (nextHeadline && nextHeadline.level < heading.level) {
      end = this.readSection.contentEnd(doc, heading);
      while (start > 0 && doc.lines[start - 1].trim() === "") start--;
    }

    const updatedLines = [
      ...doc.lines.slice(0, start),
      ...doc.lines.slice(end),
    ];

    return {
      result: {
        action: "removed",
        title: heading.title,
        lineStart: start,
        linesAdded: 0,
        linesRemoved: end - start,
      },
      updatedLines,
    };
  }

  /**
   * Append a subtree as the last child of `parent`.
   * A blank separator line is added when the existing children are
   * separated by blank lines, or when the parent has no children yet.
   */
  appendChild(
    doc: OrgDocument,
    parent: OrgHeading,
    text: string,
  ): EditHeadingOutput {
    const insertAt = this.readSection.contentEnd(doc, parent);
    const lastChild = parent.children[parent.children.length - 1];
    const separated = lastChild === undefined ||
      doc.lines[lastChild.line - 1]?.trim() === "";

    const newLines = text.split("\n");
    if (separated && doc.lines[insertAt - 1]?.trim() !== "") {
      newLines.unshift("");
    }
    const next = doc.lines[insertAt];
    if (separated && next !== undefined && next.trim() !== "") {
      newLines.push("");
    }

    const updatedLines = [
      ...doc.lines.slice(0, insertAt),
      ...newLines,
      ...doc.lines.slice(insertAt),
    ];

    return {
      result: {
        action: "appended",
        title: parent.title,
        lineStart: insertAt,
        linesAdded: newLines.length,
        linesRemoved: 0,
      },
      updatedLines,
    };
  }

  /**
   * Replace the headline and the body lines (between the headline and the
   * first child) of a heading. Children are left untouched.
   */
  rewriteHead(
    doc: OrgDocument,
    heading: OrgHeading,
    headline: string,
    bodyLines: readonly string[],
  ): EditHeadingOutput {
    const updatedLines = [
      ...doc.lines.slice(0, heading.line),
      headline,
      ...bodyLines,
      ...doc.lines.slice(heading.bodyEnd),
    ];

    return {
      result: {
        action: "replaced",
        title: heading.title,
        lineStart: heading.line,
        linesAdded: bodyLines.length + 1,
        linesRemoved: heading.bodyEnd - heading.line,
      },
      updatedLines,
    };
  }
}
