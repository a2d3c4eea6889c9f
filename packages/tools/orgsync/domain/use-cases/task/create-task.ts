/**
 * Use Case: CreateTask
 *
 * Appends a new record to a section. The record gets an upper-cased UUID
 * in :ID: and an active :CREATED: timestamp unless the entry already has
 * them. Records created in the Active section are also added to the
 * checklist.
 *
 * Dependencies: TaskDocumentRepository, ChecklistMirror, org-surgeon.
 */

import {
  EditHeadingUseCase,
  ParseDocumentUseCase,
  ReadSectionUseCase,
  withProperty,
} from "../../../../org-surgeon/mod.ts";
import { formatOrgTimestamp } from "../../entities/org-time.ts";
import type { TaskCreateOutput } from "../../entities/outputs.ts";
import { fail, ok, type Result } from "../../entities/result.ts";
import { extractTaskDescription } from "../../entities/task.ts";
import { ChecklistMirror } from "../checklist/checklist-mirror.ts";
import type { TaskLedgerDeps } from "./task-ledger.ts";

export interface CreateTaskInput {
  readonly section: string;
  readonly entry: string; // org text of one level-2 record
}

export interface CreateTaskDeps extends TaskLedgerDeps {
  readonly now: () => Date;
  readonly generateUuid: () => string;
}

export class CreateTaskUseCase {
  private readonly parse = new ParseDocumentUseCase();
  private readonly readSection = new ReadSectionUseCase();
  private readonly editHeading = new EditHeadingUseCase();
  private readonly checklist: ChecklistMirror;

  constructor(private readonly deps: CreateTaskDeps) {
    this.checklist = new ChecklistMirror(deps.sections.highLevel, deps.keywords);
  }

  async execute(input: CreateTaskInput): Promise<Result<TaskCreateOutput>> {
    const { repository, keywords, sections } = this.deps;
    const doc = await repository.load();

    let record = this.parse.parseFragment({
      content: input.entry,
      keywords,
      level: 2,
    });

    const target = this.readSection.findSection(doc, input.section);
    if (!target) {
      return fail("section_not_found", `Section not found: ${input.section}`);
    }

    if (!record.properties.has("ID")) {
      record = withProperty(
        record,
        "ID",
        this.deps.generateUuid().toUpperCase(),
      );
    }
    if (!record.properties.has("CREATED")) {
      record = withProperty(
        record,
        "CREATED",
        formatOrgTimestamp(this.deps.now(), true),
      );
    }

    const content = this.readSection.headingToText(record);
    let lines = this.editHeading.appendChild(doc, target, content).updatedLines;

    if (input.section === sections.active) {
      lines = this.checklist.add(
        lines,
        extractTaskDescription(record.title, keywords),
      );
    }

    await repository.save(lines);
    return ok({ section: input.section, content });
  }
}
