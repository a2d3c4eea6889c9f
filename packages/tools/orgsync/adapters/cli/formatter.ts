/**
 * CLI output formatters for orgsync.
 *
 * Text and JSON formatting for all command outputs.
 * These are pure functions with no side effects.
 */

import {
  type JournalEntry,
  serializeEntry,
} from "../../domain/entities/journal-entry.ts";
import type {
  JournalCreateOutput,
  JournalListOutput,
  JournalPreviewOutput,
  JournalUpdateOutput,
  TaskCreateOutput,
  TaskListOutput,
  TaskMoveOutput,
  TaskPreviewOutput,
  TaskUpdateOutput,
} from "../../domain/entities/outputs.ts";
import type { Task } from "../../domain/entities/task.ts";

// ============================================================================
// Text formatters: tasks
// ============================================================================

function ticketPrefix(task: Task): string {
  return task.ticketId ? `[${task.ticketId}] ` : "";
}

function tagSuffix(tags: readonly string[]): string {
  return tags.length > 0 ? ` :${tags.join(":")}:` : "";
}

export function formatTaskCreate(output: TaskCreateOutput): string {
  return [`✓ Task Created in ${output.section}`, "", output.content].join("\n");
}

export function formatTaskUpdate(output: TaskUpdateOutput): string {
  const status = output.moved
    ? `✓ Task Updated and Moved: ${output.oldSection} → ${output.newSection}`
    : `✓ Task Updated in ${output.newSection}`;
  return [
    status,
    "",
    "Changes:",
    output.diff,
    "",
    "Final:",
    output.newContent,
  ].join("\n");
}

export function formatTaskPreview(output: TaskPreviewOutput): string {
  const status = output.oldSection !== output.newSection
    ? `Preview: Task will move ${output.oldSection} → ${output.newSection}`
    : `Preview: Task in ${output.newSection}`;
  return [status, "", "Proposed changes:", output.diff].join("\n");
}

export function formatTaskList(output: TaskListOutput): string {
  if (output.tasks.length === 0) return `No tasks in ${output.section}`;
  const lines = [output.section, "=".repeat(output.section.length), ""];
  for (const task of output.tasks) {
    const name = task.customId ? ` (#${task.customId})` : "";
    lines.push(`  ${task.status}  ${ticketPrefix(task)}${task.headline}${name}`);
  }
  return lines.join("\n");
}

export function formatTaskDetail(task: Task): string {
  const lines = [
    `${task.status}  ${ticketPrefix(task)}${task.headline}`,
    `Section: ${task.section}`,
  ];
  if (task.customId) lines.push(`Custom ID: ${task.customId}`);
  lines.push("", task.content);
  return lines.join("\n");
}

export function formatTaskMove(output: TaskMoveOutput): string {
  return `✓ Task Moved: ${output.fromSection} → ${output.toSection}\n  ${output.headline}`;
}

function plural(count: number, one: string, many = `${one}s`): string {
  return `${count} ${count === 1 ? one : many}`;
}

export function formatTaskSearch(tasks: readonly Task[]): string {
  const lines = [`Found ${plural(tasks.length, "task")}`, ""];
  for (const task of tasks) {
    lines.push(`  ${task.status}  ${ticketPrefix(task)}${task.headline}`);
  }
  return lines.join("\n");
}

// ============================================================================
// Text formatters: journal
// ============================================================================

export function formatJournalCreate(output: JournalCreateOutput): string {
  return [
    `✓ Journal Entry Created for ${output.date}`,
    "",
    serializeEntry(output.entry),
  ].join("\n");
}

export function formatJournalUpdate(output: JournalUpdateOutput): string {
  return [
    `✓ Journal Entry Updated for ${output.date}`,
    "",
    "Changes:",
    output.diff,
    "",
    "Final:",
    serializeEntry(output.newEntry),
  ].join("\n");
}

export function formatJournalPreview(output: JournalPreviewOutput): string {
  const { oldEntry } = output;
  return [
    `Preview: Journal entry at ${oldEntry.time} on ${oldEntry.fileDate}`,
    "",
    "Proposed changes:",
    output.diff,
  ].join("\n");
}

export function formatJournalList(output: JournalListOutput): string {
  if (output.entries.length === 0) {
    return `No journal entries for ${output.date}`;
  }
  const header = `Journal Entries for ${output.date}`;
  const lines = [header, "=".repeat(header.length), ""];
  for (const entry of output.entries) {
    lines.push(
      `  ${entry.time}  ${entry.headline}${tagSuffix(entry.tags)} (L${entry.lineNumber})`,
    );
    const body = entry.content.trim();
    if (body !== "") {
      for (const line of body.split("\n").slice(0, 2)) {
        lines.push(`         ${line}`);
      }
    }
  }
  return lines.join("\n");
}

export function formatJournalDetail(entry: JournalEntry): string {
  return [
    `${entry.time}  ${entry.headline}${tagSuffix(entry.tags)}`,
    `Date: ${entry.fileDate}  Line: ${entry.lineNumber}  Revision: ${entry.revision}`,
    "",
    serializeEntry(entry),
  ].join("\n");
}

export function formatJournalSearch(entries: readonly JournalEntry[]): string {
  const count = plural(entries.length, "journal entry", "journal entries");
  const lines = [`Found ${count}`, ""];
  for (const entry of entries) {
    lines.push(
      `  ${entry.time}  ${entry.headline}${tagSuffix(entry.tags)} (${entry.fileDate})`,
    );
  }
  return lines.join("\n");
}

// ============================================================================
// JSON formatters
// ============================================================================

export function jsonOutput(value: unknown): string {
  return JSON.stringify(value);
}
