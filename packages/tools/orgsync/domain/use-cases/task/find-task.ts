/**
 * Use Case: FindTask
 *
 * Resolves an identifier (CUSTOM_ID, ticket id or headline fragment) to a
 * task. Without a section, Active is searched before Completed.
 */

import { fail, ok, type Result } from "../../entities/result.ts";
import type { Task } from "../../entities/task.ts";
import { locateTask, type TaskLedgerDeps } from "./task-ledger.ts";

export interface FindTaskInput {
  readonly identifier: string;
  readonly section?: string;
}

export class FindTaskUseCase {
  constructor(private readonly deps: TaskLedgerDeps) {}

  async execute(input: FindTaskInput): Promise<Result<Task>> {
    const { repository, sections } = this.deps;
    const doc = await repository.load();
    const sectionNames = input.section
      ? [input.section]
      : [sections.active, sections.completed];

    const located = locateTask(doc, input.identifier, sectionNames);
    if (!located) {
      return fail(
        "task_not_found",
        input.section
          ? `Could not find task '${input.identifier}' in section '${input.section}'`
          : `Could not find task '${input.identifier}'`,
      );
    }
    return ok(located.task);
  }
}
