/**
 * Use Case: ChecklistMirror
 *
 * Keeps the free-text checklist section of the task ledger in step with
 * task creation and completion. Lines look like `- [ ] text` / `- [X] text`
 * and are keyed by the exact task description. Every operation is a no-op
 * when the section or the line is missing.
 *
 * When the section headline carries a statistics cookie ("[1/3]", "[33%]")
 * it is recomputed after each change.
 *
 * Dependencies: org-surgeon.
 */

import {
  EditHeadingUseCase,
  formatHeadline,
  type OrgHeading,
  parseDocument,
  ReadSectionUseCase,
  type TodoKeywords,
} from "../../../../org-surgeon/mod.ts";

const CHECKBOX_REGEX = /^(\s*[-+] )\[( |X|x|-)\] (.*)$/;

export class ChecklistMirror {
  private readonly readSection = new ReadSectionUseCase();
  private readonly editHeading = new EditHeadingUseCase();

  constructor(
    private readonly sectionName: string,
    private readonly keywords: TodoKeywords,
  ) {}

  /** Append an unchecked item after the last non-blank line of the section body */
  add(lines: readonly string[], description: string): readonly string[] {
    return this.rewrite(lines, (body) => {
      let insertAt = body.length;
      while (insertAt > 0 && body[insertAt - 1].trim() === "") {
        insertAt--;
      }
      return [
        ...body.slice(0, insertAt),
        `- [ ] ${description}`,
        ...body.slice(insertAt),
      ];
    });
  }

  /** Check or uncheck the first item whose text equals `description` */
  setCompleted(
    lines: readonly string[],
    description: string,
    completed: boolean,
  ): readonly string[] {
    return this.rewrite(lines, (body) => {
      const index = body.findIndex((line) =>
        line.match(CHECKBOX_REGEX)?.[3] === description
      );
      if (index === -1) return null;
      const match = body[index].match(CHECKBOX_REGEX);
      const bullet = match?.[1] ?? "- ";
      const updated = [...body];
      updated[index] = `${bullet}[${completed ? "X" : " "}] ${description}`;
      return updated;
    });
  }

  /**
   * Apply `change` to the body lines of the checklist section (headline
   * excluded, first sub-heading excluded). `change` returns null to leave
   * the document as it is.
   */
  private rewrite(
    lines: readonly string[],
    change: (body: readonly string[]) => readonly string[] | null,
  ): readonly string[] {
    const doc = parseDocument(lines.join("\n"), this.keywords);
    const section = this.readSection.findSection(doc, this.sectionName);
    if (!section) return lines;

    const body = change(doc.lines.slice(section.line + 1, section.bodyEnd));
    if (body === null) return lines;

    const headline = section.cookie === null
      ? doc.lines[section.line]
      : formatHeadline({ ...section, cookie: recount(section, body) });

    return this.editHeading.rewriteHead(doc, section, headline, body)
      .updatedLines;
  }
}

/** Statistics cookie for the checkboxes in `body`, in the style of the old cookie */
function recount(section: OrgHeading, body: readonly string[]): string {
  let total = 0;
  let done = 0;
  for (const line of body) {
    const match = line.match(CHECKBOX_REGEX);
    if (!match) continue;
    total++;
    if (match[2] === "X" || match[2] === "x") done++;
  }
  if (section.cookie?.endsWith("%]")) {
    return `[${total === 0 ? 0 : Math.floor((done * 100) / total)}%]`;
  }
  return `[${done}/${total}]`;
}
