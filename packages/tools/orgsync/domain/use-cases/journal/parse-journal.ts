/**
 * Line-addressed parsing of journal day files.
 *
 * An entry starts at a `** HH:MM headline :tags:` line and its body runs to
 * the next line starting with "* " or "** ", or to the end of the file.
 * Parsing a whole file is best effort: `** ` lines that are not entry
 * headings are skipped.
 */

import { normalizeNewlines } from "../../../../org-surgeon/mod.ts";
import {
  isHeadingLine,
  JOURNAL_ENTRY_REGEX,
  type JournalEntry,
} from "../../entities/journal-entry.ts";
import type { HashService } from "../../ports/hash-service.ts";
import type { JournalRepository } from "../../ports/journal-repository.ts";
import type { Logger } from "../../ports/logger.ts";

/** Dependencies shared by the journal use cases */
export type JournalDeps = {
  readonly repository: JournalRepository;
  readonly hashService: HashService;
  readonly logger: Logger;
  readonly now: () => Date;
};

/** A day file as read from disk */
export type DayFile = {
  readonly path: string;
  readonly fileDate: string; // YYYYMMDD
  readonly content: string;
  readonly revision: string;
};

export type ParsedEntry = {
  readonly entry: JournalEntry;
  readonly end: number; // exclusive: next heading line or EOF
};

/** Parse the entry whose heading is `lines[index]`; null if it is not one */
export function parseEntryAt(
  lines: readonly string[],
  index: number,
  fileDate: string,
  revision: string,
): ParsedEntry | null {
  const line = lines[index];
  if (line === undefined) return null;
  const match = line.match(JOURNAL_ENTRY_REGEX);
  if (!match) return null;

  let end = index + 1;
  while (end < lines.length && !isHeadingLine(lines[end])) {
    end++;
  }

  return {
    entry: {
      time: match[1],
      headline: match[2].trim(),
      tags: match[3] ? match[3].split(":") : [],
      content: lines.slice(index + 1, end).join("\n"),
      lineNumber: index,
      fileDate,
      revision,
    },
    end,
  };
}

/** All entries of a day file, in file order */
export function parseEntries(
  content: string,
  fileDate: string,
  revision: string,
  logger?: Logger,
): JournalEntry[] {
  const lines = normalizeNewlines(content).split("\n");
  const entries: JournalEntry[] = [];

  let i = 0;
  while (i < lines.length) {
    if (!lines[i].startsWith("** ")) {
      i++;
      continue;
    }
    const parsed = parseEntryAt(lines, i, fileDate, revision);
    if (parsed) {
      entries.push(parsed.entry);
      i = parsed.end;
    } else {
      logger?.debug(`Skipping malformed journal heading at ${fileDate}:${i}`);
      i++;
    }
  }
  return entries;
}

/** Read a day file with its revision; null when it does not exist */
export async function readDayFile(
  deps: JournalDeps,
  path: string,
): Promise<DayFile | null> {
  const content = await deps.repository.read(path);
  if (content === null) return null;
  return {
    path,
    fileDate: deps.repository.fileDateOf(path),
    content,
    revision: await deps.hashService.hash(content),
  };
}

/** "20250115" -> "2025-01-15" */
export function isoFromFileDate(fileDate: string): string {
  return `${fileDate.slice(0, 4)}-${fileDate.slice(4, 6)}-${fileDate.slice(6, 8)}`;
}
