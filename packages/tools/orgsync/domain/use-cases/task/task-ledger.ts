/**
 * Shared lookups over the task ledger: reading task records out of a
 * section and resolving an identifier to a record.
 *
 * Dependencies: org-surgeon.
 */

import {
  type OrgDocument,
  type OrgHeading,
  ReadSectionUseCase,
  type TodoKeywords,
} from "../../../../org-surgeon/mod.ts";
import { type Task, ticketIdOf } from "../../entities/task.ts";
import type { TaskDocumentRepository } from "../../ports/task-document-repository.ts";

/** Names of the ledger sections the synchronizer works with */
export type LedgerSections = {
  readonly active: string;
  readonly completed: string;
  readonly highLevel: string;
};

/** Dependencies shared by the task use cases */
export type TaskLedgerDeps = {
  readonly repository: TaskDocumentRepository;
  readonly keywords: TodoKeywords;
  readonly sections: LedgerSections;
};

export type LocatedTask = {
  readonly task: Task;
  readonly heading: OrgHeading;
  readonly section: OrgHeading;
};

const readSection = new ReadSectionUseCase();

/** Task view of a record heading */
export function toTask(heading: OrgHeading, sectionName: string): Task {
  const props = heading.properties;
  return {
    customId: props.get("CUSTOM_ID") ?? null,
    id: props.get("ID") ?? null,
    status: heading.todo ?? "",
    section: sectionName,
    headline: heading.title,
    ticketId: ticketIdOf(heading.title),
    content: readSection.headingToText(heading),
    created: props.get("CREATED") ?? null,
    modified: props.get("MODIFIED") ?? null,
    closed: props.get("CLOSED") ?? null,
  };
}

/**
 * Record headings of a section: level-2 children whose todo keyword is in
 * the vocabulary (the parser leaves `todo` null otherwise).
 */
export function recordHeadings(section: OrgHeading): OrgHeading[] {
  return section.children.filter((h) => h.level === 2 && h.todo !== null);
}

/** All tasks of a section in file order; empty when the section is missing */
export function tasksInSection(doc: OrgDocument, sectionName: string): Task[] {
  const section = readSection.findSection(doc, sectionName);
  if (!section) return [];
  return recordHeadings(section).map((h) => toTask(h, sectionName));
}

type Matcher = (task: Task) => boolean;

/**
 * Resolve `identifier` in the given sections. Three passes, first hit wins:
 * exact CUSTOM_ID, then CUSTOM_ID equal to "task-" + the lower-cased
 * identifier, then a case-insensitive headline substring. Each pass scans
 * the sections in order.
 */
export function locateTask(
  doc: OrgDocument,
  identifier: string,
  sectionNames: readonly string[],
): LocatedTask | null {
  const needle = identifier.trim().toLowerCase();
  const matchers: Matcher[] = [
    (t) => t.customId === identifier,
    (t) => t.customId === `task-${needle}`,
    (t) => t.headline.toLowerCase().includes(needle),
  ];

  for (const matches of matchers) {
    for (const name of sectionNames) {
      const section = readSection.findSection(doc, name);
      if (!section) continue;
      for (const heading of recordHeadings(section)) {
        const task = toTask(heading, name);
        if (matches(task)) {
          return { task, heading, section };
        }
      }
    }
  }
  return null;
}
