/**
 * Use Case: SearchJournal
 *
 * Case-insensitive search over `headline + " " + content` of the entries
 * of the last `daysBack` days, today first, entries in file order.
 * Missing or unreadable day files are skipped.
 */

import type { JournalEntry } from "../../entities/journal-entry.ts";
import { OrgSyncError } from "../../entities/errors.ts";
import { addDays } from "../../entities/org-time.ts";
import { type JournalDeps, parseEntries, readDayFile } from "./parse-journal.ts";

export const DEFAULT_DAYS_BACK = 30;

export interface SearchJournalInput {
  readonly query: string;
  readonly daysBack?: number;
}

export class SearchJournalUseCase {
  constructor(private readonly deps: JournalDeps) {}

  async execute(input: SearchJournalInput): Promise<JournalEntry[]> {
    const { repository, logger } = this.deps;
    const daysBack = input.daysBack ?? DEFAULT_DAYS_BACK;
    if (!Number.isInteger(daysBack) || daysBack < 0) {
      throw new OrgSyncError(
        "invalid_args",
        `daysBack must be a non-negative integer, got ${daysBack}`,
      );
    }

    const query = input.query.toLowerCase();
    const today = this.deps.now();
    const matches: JournalEntry[] = [];

    for (let i = 0; i < daysBack; i++) {
      const path = await repository.resolvePath(addDays(today, -i));
      let entries: JournalEntry[];
      try {
        const file = await readDayFile(this.deps, path);
        if (!file) continue;
        entries = parseEntries(file.content, file.fileDate, file.revision, logger);
      } catch (e) {
        logger.debug(
          `Skipping ${path}: ${e instanceof Error ? e.message : String(e)}`,
        );
        continue;
      }

      for (const entry of entries) {
        if (`${entry.headline} ${entry.content}`.toLowerCase().includes(query)) {
          matches.push(entry);
        }
      }
    }
    return matches;
  }
}
