/**
 * Use Case: UpdateJournalEntry
 *
 * Rewrites the entry whose heading is at `lineNumber` in a day file. The
 * old entry's range runs to the next heading; it is replaced by the new
 * entry, followed by the blank lines that closed the old range. Every other
 * line of the file is written back as it was.
 *
 * Line numbers shift when an entry changes length, so callers may pass the
 * `revision` they read the entry with: the update is refused when the file
 * has changed since.
 *
 * Dependencies: JournalRepository, HashService, FormatDiff,
 * ApprovalGate (optional).
 */

import { OrgSyncError } from "../../entities/errors.ts";
import {
  JOURNAL_ENTRY_REGEX,
  type JournalEntry,
  type JournalEntryDraft,
  serializeEntry,
} from "../../entities/journal-entry.ts";
import type {
  JournalPreviewOutput,
  JournalUpdateOutput,
} from "../../entities/outputs.ts";
import { fail, ok, type Result } from "../../entities/result.ts";
import type { ApprovalGate } from "../approval/approval-gate.ts";
import type { FormatDiffUseCase } from "../preview/format-diff.ts";
import { assertValidDraft } from "./create-entry.ts";
import {
  type DayFile,
  isoFromFileDate,
  type JournalDeps,
  parseEntryAt,
  readDayFile,
} from "./parse-journal.ts";

export interface UpdateJournalEntryInput {
  readonly path: string;
  readonly lineNumber: number;
  readonly time: string;
  readonly headline: string;
  readonly content: string;
  readonly tags?: readonly string[];
  readonly revision?: string;
}

export interface UpdateJournalEntryDeps extends JournalDeps {
  readonly formatDiff: FormatDiffUseCase;
  readonly approvalGate?: ApprovalGate;
}

/** The splice an update would perform */
export type JournalUpdatePlan = {
  readonly file: DayFile;
  readonly oldEntry: JournalEntry;
  readonly before: readonly string[];
  readonly after: readonly string[]; // closing blank lines and the rest of the file
  readonly entryText: string;
};

export async function planEntryUpdate(
  deps: JournalDeps,
  input: UpdateJournalEntryInput,
): Promise<Result<JournalUpdatePlan>> {
  const draft: JournalEntryDraft = {
    time: input.time,
    headline: input.headline,
    tags: input.tags ?? [],
    content: input.content,
  };
  assertValidDraft(draft);

  const file = await readDayFile(deps, input.path);
  if (!file) {
    throw new OrgSyncError("io_error", `File not found: ${input.path}`);
  }
  if (input.revision !== undefined && input.revision !== file.revision) {
    return fail(
      "stale_revision",
      `${input.path} changed since revision ${input.revision} (now ${file.revision}); re-read the entry`,
    );
  }

  const lines = file.content.split("\n");
  const parsed = parseEntryAt(
    lines,
    input.lineNumber,
    file.fileDate,
    file.revision,
  );
  if (!parsed) {
    return fail(
      "entry_not_found",
      `No journal entry at line ${input.lineNumber} of ${input.path}`,
    );
  }

  let bodyEnd = parsed.end;
  while (
    bodyEnd > input.lineNumber + 1 && lines[bodyEnd - 1].trim() === ""
  ) {
    bodyEnd--;
  }

  return ok({
    file,
    oldEntry: parsed.entry,
    before: lines.slice(0, input.lineNumber),
    after: lines.slice(bodyEnd),
    entryText: serializeEntry(draft),
  });
}

/** File content with the planned entry text spliced in */
function splice(plan: JournalUpdatePlan, entryText: string): string {
  return [...plan.before, ...entryText.split("\n"), ...plan.after].join("\n");
}

/** Entry as it reads from `content`, or a parse error */
function readBack(
  content: string,
  plan: JournalUpdatePlan,
  revision: string,
): JournalEntry {
  const parsed = parseEntryAt(
    content.split("\n"),
    plan.oldEntry.lineNumber,
    plan.file.fileDate,
    revision,
  );
  if (!parsed) {
    throw new OrgSyncError(
      "parse_error",
      `Updated entry in ${plan.file.path} is not a journal entry heading`,
    );
  }
  return parsed.entry;
}

export class UpdateJournalEntryUseCase {
  constructor(private readonly deps: UpdateJournalEntryDeps) {}

  async execute(
    input: UpdateJournalEntryInput,
  ): Promise<Result<JournalUpdateOutput>> {
    const planned = await planEntryUpdate(this.deps, input);
    if (!planned.ok) return planned;
    const plan = planned.value;

    let entryText = plan.entryText;
    if (this.deps.approvalGate) {
      const decision = await this.deps.approvalGate.requestApproval(
        serializeEntry(plan.oldEntry),
        entryText,
        `journal-${plan.file.fileDate}-${plan.oldEntry.lineNumber}`,
      );
      if (!decision.approved) {
        return fail(
          "approval_rejected",
          `Update of journal entry '${plan.oldEntry.headline}' was rejected`,
        );
      }
      entryText = decision.content.trimEnd();
      if (!JOURNAL_ENTRY_REGEX.test(entryText.split("\n")[0])) {
        throw new OrgSyncError(
          "parse_error",
          "Reviewed entry does not start with a journal entry heading",
        );
      }
    }

    const written = splice(plan, entryText);
    await this.deps.repository.write(plan.file.path, written);

    const stored = written.endsWith("\n") ? written : written + "\n";
    const newEntry = readBack(
      stored,
      plan,
      await this.deps.hashService.hash(stored),
    );

    return ok({
      date: isoFromFileDate(plan.file.fileDate),
      path: plan.file.path,
      oldEntry: plan.oldEntry,
      newEntry,
      diff: this.deps.formatDiff.execute(
        serializeEntry(plan.oldEntry),
        serializeEntry(newEntry),
      ),
    });
  }
}

/**
 * Use Case: PreviewJournalEntryUpdate
 *
 * Old entry, the entry an update would produce, and their diff.
 * Nothing is written.
 */
export class PreviewJournalEntryUpdateUseCase {
  constructor(
    private readonly deps: JournalDeps & {
      readonly formatDiff: FormatDiffUseCase;
    },
  ) {}

  async execute(
    input: UpdateJournalEntryInput,
  ): Promise<Result<JournalPreviewOutput>> {
    const planned = await planEntryUpdate(this.deps, input);
    if (!planned.ok) return planned;
    const plan = planned.value;

    const newEntry = readBack(
      splice(plan, plan.entryText),
      plan,
      plan.file.revision,
    );
    return ok({
      oldEntry: plan.oldEntry,
      newEntry,
      diff: this.deps.formatDiff.execute(
        serializeEntry(plan.oldEntry),
        serializeEntry(newEntry),
      ),
    });
  }
}
