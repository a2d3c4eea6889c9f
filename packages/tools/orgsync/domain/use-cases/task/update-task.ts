/**
 * Use Case: UpdateTask
 *
 * Replaces a record with new content and keeps the lifecycle invariants:
 *
 *   - :MODIFIED: is stamped (inactive) on every update
 *   - :CREATED: and :CLOSED: carry over when the new entry omits them
 *   - TODO -> DONE sets :CLOSED: (active); DONE -> TODO removes it
 *   - the status decides the section (done states -> Completed, else Active)
 *   - a record that stays in its section keeps its position; one that
 *     changes section is appended to the new one and its checklist item
 *     is toggled
 *
 * With an approval gate, the proposed content is reviewed before anything
 * is written; the reviewer may edit it.
 *
 * Dependencies: TaskDocumentRepository, ChecklistMirror, FormatDiff,
 * ApprovalGate (optional), org-surgeon.
 */

import {
  EditHeadingUseCase,
  type OrgDocument,
  type OrgHeading,
  parseDocument,
  ParseDocumentUseCase,
  ReadSectionUseCase,
  withProperty,
} from "../../../../org-surgeon/mod.ts";
import { formatOrgTimestamp } from "../../entities/org-time.ts";
import type { TaskUpdateOutput } from "../../entities/outputs.ts";
import { fail, ok, type Result } from "../../entities/result.ts";
import { extractTaskDescription, isDoneState } from "../../entities/task.ts";
import type { ApprovalGate } from "../approval/approval-gate.ts";
import { ChecklistMirror } from "../checklist/checklist-mirror.ts";
import type { FormatDiffUseCase } from "../preview/format-diff.ts";
import {
  locateTask,
  type LocatedTask,
  type TaskLedgerDeps,
} from "./task-ledger.ts";

export interface UpdateTaskInput {
  readonly identifier: string;
  readonly entry: string; // complete org text of the new record
}

export interface UpdateTaskDeps extends TaskLedgerDeps {
  readonly now: () => Date;
  readonly formatDiff: FormatDiffUseCase;
  readonly approvalGate?: ApprovalGate;
}

/** Everything an update would write, computed without writing */
export type TaskUpdatePlan = {
  readonly located: LocatedTask;
  readonly record: OrgHeading;
  readonly newContent: string;
  readonly targetSection: string;
};

const parser = new ParseDocumentUseCase();
const readSection = new ReadSectionUseCase();

export function planTaskUpdate(
  doc: OrgDocument,
  input: UpdateTaskInput,
  deps: TaskLedgerDeps & { readonly now: () => Date },
): Result<TaskUpdatePlan> {
  const { keywords, sections } = deps;

  const located = locateTask(doc, input.identifier, [
    sections.active,
    sections.completed,
  ]);
  if (!located) {
    return fail(
      "task_not_found",
      `Could not find task '${input.identifier}'`,
    );
  }
  const old = located.task;

  let record = parser.parseFragment({
    content: input.entry,
    keywords,
    level: 2,
  });
  const now = deps.now();

  record = withProperty(record, "MODIFIED", formatOrgTimestamp(now, false));
  if (old.created !== null && !record.properties.has("CREATED")) {
    record = withProperty(record, "CREATED", old.created);
  }
  if (old.closed !== null && !record.properties.has("CLOSED")) {
    record = withProperty(record, "CLOSED", old.closed);
  }

  const wasDone = isDoneState(old.status, keywords);
  const isDone = record.todo !== null && isDoneState(record.todo, keywords);
  const isTodo = record.todo !== null && keywords.todo.includes(record.todo);
  if (!wasDone && isDone) {
    record = withProperty(record, "CLOSED", formatOrgTimestamp(now, true));
  } else if (wasDone && isTodo) {
    record = withProperty(record, "CLOSED", undefined);
  }

  const targetSection = isDone ? sections.completed : sections.active;
  if (!readSection.findSection(doc, targetSection)) {
    return fail(
      "section_not_found",
      `Target section not found for status ${record.todo ?? "(none)"}: ${targetSection}`,
    );
  }

  return ok({
    located,
    record,
    newContent: readSection.headingToText(record),
    targetSection,
  });
}

export class UpdateTaskUseCase {
  private readonly editHeading = new EditHeadingUseCase();
  private readonly checklist: ChecklistMirror;

  constructor(private readonly deps: UpdateTaskDeps) {
    this.checklist = new ChecklistMirror(deps.sections.highLevel, deps.keywords);
  }

  async execute(input: UpdateTaskInput): Promise<Result<TaskUpdateOutput>> {
    const doc = await this.deps.repository.load();

    let planned = planTaskUpdate(doc, input, this.deps);
    if (!planned.ok) return planned;

    if (this.deps.approvalGate) {
      const { located, newContent } = planned.value;
      const decision = await this.deps.approvalGate.requestApproval(
        located.task.content,
        newContent,
        located.task.customId ?? located.task.id ?? "task-update",
      );
      if (!decision.approved) {
        return fail(
          "approval_rejected",
          `Update of '${located.task.headline}' was rejected`,
        );
      }
      if (decision.content !== newContent) {
        planned = planTaskUpdate(
          doc,
          { identifier: input.identifier, entry: decision.content },
          this.deps,
        );
        if (!planned.ok) return planned;
      }
    }

    const plan = planned.value;
    const applied = this.apply(doc, plan);
    if (!applied.ok) return applied;
    await this.deps.repository.save(applied.value);

    const old = plan.located.task;
    return ok({
      oldTask: old,
      newContent: plan.newContent,
      moved: old.section !== plan.targetSection,
      oldSection: old.section,
      newSection: plan.targetSection,
      diff: this.deps.formatDiff.execute(old.content, plan.newContent),
    });
  }

  private apply(
    doc: OrgDocument,
    plan: TaskUpdatePlan,
  ): Result<readonly string[]> {
    const { located, record, newContent, targetSection } = plan;

    if (targetSection === located.task.section) {
      return ok(
        this.editHeading.replace(doc, located.heading, newContent)
          .updatedLines,
      );
    }

    const removed = this.editHeading.remove(doc, located.heading);
    const next = parseDocument(
      removed.updatedLines.join("\n"),
      this.deps.keywords,
    );
    const target = readSection.findSection(next, targetSection);
    if (!target) {
      return fail("section_not_found", `Section not found: ${targetSection}`);
    }
    const lines = this.editHeading.appendChild(next, target, newContent)
      .updatedLines;

    return ok(
      this.checklist.setCompleted(
        lines,
        extractTaskDescription(record.title, this.deps.keywords),
        targetSection === this.deps.sections.completed,
      ),
    );
  }
}
