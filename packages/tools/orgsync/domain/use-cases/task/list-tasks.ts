/**
 * Use Case: ListTasks
 *
 * All task records of one section, in file order.
 */

import type { TaskListOutput } from "../../entities/outputs.ts";
import type { TaskDocumentRepository } from "../../ports/task-document-repository.ts";
import { tasksInSection } from "./task-ledger.ts";

export interface ListTasksInput {
  readonly section: string;
}

export class ListTasksUseCase {
  constructor(private readonly repository: TaskDocumentRepository) {}

  async execute(input: ListTasksInput): Promise<TaskListOutput> {
    const doc = await this.repository.load();
    return {
      section: input.section,
      tasks: tasksInSection(doc, input.section),
    };
  }
}
