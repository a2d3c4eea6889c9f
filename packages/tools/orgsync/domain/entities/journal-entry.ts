// Journal entry entity - one time-stamped note in a day file

export type JournalEntry = {
  readonly time: string; // HH:MM
  readonly headline: string;
  readonly tags: readonly string[];
  readonly content: string; // body lines, possibly empty
  readonly lineNumber: number; // 0-based line of the heading
  readonly fileDate: string; // YYYYMMDD
  readonly revision: string; // hash of the file content the entry was read from
};

/** Fields a caller supplies to create or rewrite an entry */
export type JournalEntryDraft = Pick<
  JournalEntry,
  "time" | "headline" | "tags" | "content"
>;

export const JOURNAL_ENTRY_REGEX =
  /^\*\*\s+(\d{2}:\d{2})\s+(.+?)(?:\s+:([^:]+(?::[^:]+)*):)?$/;

export const TIME_REGEX = /^\d{2}:\d{2}$/;

/** True for lines that end an entry body */
export function isHeadingLine(line: string): boolean {
  return line.startsWith("* ") || line.startsWith("** ");
}

/** Org text of an entry: `** HH:MM headline :tags:` then the body */
export function serializeEntry(entry: JournalEntryDraft): string {
  const tags = entry.tags.length > 0 ? ` :${entry.tags.join(":")}:` : "";
  const lines = [`** ${entry.time} ${entry.headline}${tags}`];
  if (entry.content.trim() !== "") {
    lines.push(entry.content.trimEnd());
  }
  return lines.join("\n");
}
