/**
 * Use Case: ListJournalEntries
 *
 * Entries of one day file in file order, and single-entry lookup by time
 * or headline fragment.
 */

import type { JournalEntry } from "../../entities/journal-entry.ts";
import { isoDate } from "../../entities/org-time.ts";
import type { JournalListOutput } from "../../entities/outputs.ts";
import { fail, ok, type Result } from "../../entities/result.ts";
import { type JournalDeps, parseEntries, readDayFile } from "./parse-journal.ts";

export interface ListJournalEntriesInput {
  readonly date?: Date; // defaults to today
}

export interface GetJournalEntryInput {
  readonly date: Date;
  readonly identifier: string; // HH:MM or headline fragment
}

export class ListJournalEntriesUseCase {
  constructor(private readonly deps: JournalDeps) {}

  async execute(input: ListJournalEntriesInput): Promise<JournalListOutput> {
    const date = input.date ?? this.deps.now();
    return { date: isoDate(date), entries: await this.entriesOf(date) };
  }

  /** First entry whose time equals the identifier or whose headline contains it */
  async get(input: GetJournalEntryInput): Promise<Result<JournalEntry>> {
    const needle = input.identifier.toLowerCase();
    const entry = (await this.entriesOf(input.date)).find((e) =>
      e.time === input.identifier || e.headline.toLowerCase().includes(needle)
    );
    if (!entry) {
      return fail(
        "entry_not_found",
        `No journal entry matching '${input.identifier}' on ${
          isoDate(input.date)
        }`,
      );
    }
    return ok(entry);
  }

  private async entriesOf(date: Date): Promise<JournalEntry[]> {
    const path = await this.deps.repository.resolvePath(date);
    const file = await readDayFile(this.deps, path);
    if (!file) return [];
    return parseEntries(
      file.content,
      file.fileDate,
      file.revision,
      this.deps.logger,
    );
  }
}
