/**
 * Use Case: MoveTask
 *
 * Moves a record to the end of another section. The record's lines are
 * carried over exactly as they are: status, timestamps and checklist are
 * left alone.
 *
 * Dependencies: TaskDocumentRepository, org-surgeon.
 */

import {
  EditHeadingUseCase,
  parseDocument,
  ReadSectionUseCase,
} from "../../../../org-surgeon/mod.ts";
import type { TaskMoveOutput } from "../../entities/outputs.ts";
import { fail, ok, type Result } from "../../entities/result.ts";
import { locateTask, type TaskLedgerDeps } from "./task-ledger.ts";

export interface MoveTaskInput {
  readonly identifier: string;
  readonly fromSection: string;
  readonly toSection: string;
}

export class MoveTaskUseCase {
  private readonly readSection = new ReadSectionUseCase();
  private readonly editHeading = new EditHeadingUseCase();

  constructor(private readonly deps: Omit<TaskLedgerDeps, "sections">) {}

  async execute(input: MoveTaskInput): Promise<Result<TaskMoveOutput>> {
    const { repository, keywords } = this.deps;
    const doc = await repository.load();

    const located = locateTask(doc, input.identifier, [input.fromSection]);
    if (!located) {
      return fail(
        "task_not_found",
        `Could not find task '${input.identifier}' in section '${input.fromSection}'`,
      );
    }
    if (!this.readSection.findSection(doc, input.toSection)) {
      return fail(
        "section_not_found",
        `Target section not found: ${input.toSection}`,
      );
    }

    const raw = this.readSection.rawText(doc, located.heading);
    const removed = this.editHeading.remove(doc, located.heading);
    const next = parseDocument(removed.updatedLines.join("\n"), keywords);
    const target = this.readSection.findSection(next, input.toSection);
    if (!target) {
      return fail(
        "section_not_found",
        `Target section not found: ${input.toSection}`,
      );
    }

    await repository.save(
      this.editHeading.appendChild(next, target, raw).updatedLines,
    );
    return ok({
      headline: located.task.headline,
      fromSection: input.fromSection,
      toSection: input.toSection,
    });
  }
}
