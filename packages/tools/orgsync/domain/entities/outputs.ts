// Command output types - immutable result types for orgsync operations

import type { JournalEntry } from "./journal-entry.ts";
import type { Task } from "./task.ts";

export type TaskCreateOutput = {
  readonly section: string;
  readonly content: string;
};

export type TaskUpdateOutput = {
  readonly oldTask: Task;
  readonly newContent: string;
  readonly moved: boolean;
  readonly oldSection: string;
  readonly newSection: string;
  readonly diff: string;
};

export type TaskPreviewOutput = {
  readonly oldTask: Task;
  readonly newContent: string;
  readonly oldSection: string;
  readonly newSection: string;
  readonly diff: string;
};

export type TaskMoveOutput = {
  readonly headline: string;
  readonly fromSection: string;
  readonly toSection: string;
};

export type TaskListOutput = {
  readonly section: string;
  readonly tasks: readonly Task[];
};

export type JournalCreateOutput = {
  readonly date: string; // YYYY-MM-DD
  readonly path: string;
  readonly entry: JournalEntry;
};

export type JournalUpdateOutput = {
  readonly date: string; // YYYY-MM-DD
  readonly path: string;
  readonly oldEntry: JournalEntry;
  readonly newEntry: JournalEntry;
  readonly diff: string;
};

export type JournalPreviewOutput = {
  readonly oldEntry: JournalEntry;
  readonly newEntry: JournalEntry;
  readonly diff: string;
};

export type JournalListOutput = {
  readonly date: string; // YYYY-MM-DD
  readonly entries: readonly JournalEntry[];
};

export type ApprovalState =
  | "disabled"
  | "pending"
  | "approved"
  | "rejected"
  | "auto-fallback";

export type ApprovalDecision = {
  readonly approved: boolean;
  readonly content: string;
  readonly state: ApprovalState;
};
