/**
 * Use Case: PreviewTaskUpdate
 *
 * Shows what UpdateTask would write (content, target section, diff)
 * without touching the ledger. Timestamps in the preview are the ones an
 * update at the same instant would stamp.
 */

import type { TaskPreviewOutput } from "../../entities/outputs.ts";
import { ok, type Result } from "../../entities/result.ts";
import type { FormatDiffUseCase } from "../preview/format-diff.ts";
import type { TaskLedgerDeps } from "./task-ledger.ts";
import { planTaskUpdate, type UpdateTaskInput } from "./update-task.ts";

export interface PreviewTaskUpdateDeps extends TaskLedgerDeps {
  readonly now: () => Date;
  readonly formatDiff: FormatDiffUseCase;
}

export class PreviewTaskUpdateUseCase {
  constructor(private readonly deps: PreviewTaskUpdateDeps) {}

  async execute(input: UpdateTaskInput): Promise<Result<TaskPreviewOutput>> {
    const doc = await this.deps.repository.load();
    const planned = planTaskUpdate(doc, input, this.deps);
    if (!planned.ok) return planned;

    const { located, newContent, targetSection } = planned.value;
    return ok({
      oldTask: located.task,
      newContent,
      oldSection: located.task.section,
      newSection: targetSection,
      diff: this.deps.formatDiff.execute(located.task.content, newContent),
    });
  }
}
