/**
 * Use Case: CreateJournalEntry
 *
 * Appends an entry to the day file of `date`. A new file starts with a
 * `* YYYY-MM-DD` heading; an existing one gets a blank line and the entry
 * after its trimmed content. The previous file is backed up by the
 * repository before the write.
 *
 * Dependencies: JournalRepository, HashService.
 */

import { OrgSyncError } from "../../entities/errors.ts";
import {
  type JournalEntryDraft,
  serializeEntry,
  TIME_REGEX,
} from "../../entities/journal-entry.ts";
import { clockTime, isoDate } from "../../entities/org-time.ts";
import type { JournalCreateOutput } from "../../entities/outputs.ts";
import { type JournalDeps, parseEntryAt } from "./parse-journal.ts";

export interface CreateJournalEntryInput {
  readonly date?: Date; // defaults to today
  readonly time?: string; // HH:MM, defaults to now
  readonly headline: string;
  readonly content: string;
  readonly tags?: readonly string[];
}

/** Reject drafts that would not read back as an entry heading */
export function assertValidDraft(draft: JournalEntryDraft): void {
  if (!TIME_REGEX.test(draft.time)) {
    throw new OrgSyncError(
      "invalid_args",
      `Invalid time '${draft.time}', expected HH:MM`,
    );
  }
  if (draft.headline.trim() === "" || draft.headline.includes("\n")) {
    throw new OrgSyncError(
      "invalid_args",
      "Headline must be a single non-empty line",
    );
  }
  for (const tag of draft.tags) {
    if (!/^[^:\s]+$/.test(tag)) {
      throw new OrgSyncError("invalid_args", `Invalid tag '${tag}'`);
    }
  }
}

export class CreateJournalEntryUseCase {
  constructor(private readonly deps: JournalDeps) {}

  async execute(input: CreateJournalEntryInput): Promise<JournalCreateOutput> {
    const { repository, hashService } = this.deps;
    const now = this.deps.now();
    const date = input.date ?? now;
    const draft: JournalEntryDraft = {
      time: input.time ?? clockTime(now),
      headline: input.headline,
      tags: input.tags ?? [],
      content: input.content,
    };
    assertValidDraft(draft);

    const path = await repository.resolvePath(date);
    const existing = await repository.read(path);
    const prefix = existing !== null
      ? `${existing.trimEnd()}\n\n`
      : `* ${isoDate(date)}\n\n`;
    const written = `${prefix}${serializeEntry(draft)}\n`;

    await repository.write(path, written);

    const lineNumber = prefix.split("\n").length - 1;
    const parsed = parseEntryAt(
      written.split("\n"),
      lineNumber,
      repository.fileDateOf(path),
      await hashService.hash(written),
    );
    if (!parsed) {
      throw new OrgSyncError(
        "parse_error",
        `Entry written to ${path} could not be read back`,
      );
    }

    return { date: isoDate(date), path, entry: parsed.entry };
  }
}
