// Task entity - a record under a section of the task ledger

import type { TodoKeywords } from "../../../org-surgeon/mod.ts";

/** Drawer keys the synchronizer reads; other keys pass through untouched */
export const TASK_PROPERTIES = [
  "CUSTOM_ID",
  "ID",
  "CREATED",
  "MODIFIED",
  "CLOSED",
] as const;

export type TaskProperty = typeof TASK_PROPERTIES[number];

export type Task = {
  readonly customId: string | null; // :CUSTOM_ID:, e.g. "task-gh-28"
  readonly id: string | null; // :ID:, upper-cased UUID
  readonly status: string; // todo keyword, e.g. "TODO" or "DONE"
  readonly section: string;
  readonly headline: string;
  readonly ticketId: string | null;
  readonly content: string; // canonical org text, subsections included
  readonly created: string | null; // active timestamp
  readonly modified: string | null; // inactive timestamp
  readonly closed: string | null; // active timestamp
};

const TICKET_REGEX = /\b([A-Z]+-\d+)\b/;
const TICKET_PREFIX_REGEX = /^[A-Z]+-\d+\s+/;

/** First ticket token (GH-28, JIRA-1234) in a headline */
export function ticketIdOf(headline: string): string | null {
  return headline.match(TICKET_REGEX)?.[1] ?? null;
}

export function isDoneState(status: string, keywords: TodoKeywords): boolean {
  return keywords.done.includes(status);
}

export function isKnownState(status: string, keywords: TodoKeywords): boolean {
  return keywords.todo.includes(status) || keywords.done.includes(status);
}

/**
 * Checklist description of a task: the headline without a leading status
 * keyword and without a leading ticket token.
 *
 * "TODO GH-178 Add multi-provider support" -> "Add multi-provider support"
 */
export function extractTaskDescription(
  headline: string,
  keywords: TodoKeywords,
): string {
  let text = headline;
  for (const state of [...keywords.todo, ...keywords.done]) {
    if (text.startsWith(`${state} `)) {
      text = text.slice(state.length + 1);
      break;
    }
  }
  return text.replace(TICKET_PREFIX_REGEX, "").trim();
}
