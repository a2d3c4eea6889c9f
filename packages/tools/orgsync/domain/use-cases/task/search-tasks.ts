/**
 * Use Case: SearchTasks
 *
 * Case-insensitive substring search over headline and content,
 * Active section first, then Completed.
 */

import type { Task } from "../../entities/task.ts";
import { tasksInSection, type TaskLedgerDeps } from "./task-ledger.ts";

export interface SearchTasksInput {
  readonly query: string;
}

export class SearchTasksUseCase {
  constructor(private readonly deps: Omit<TaskLedgerDeps, "keywords">) {}

  async execute(input: SearchTasksInput): Promise<Task[]> {
    const { repository, sections } = this.deps;
    const doc = await repository.load();
    const query = input.query.toLowerCase();

    return [
      ...tasksInSection(doc, sections.active),
      ...tasksInSection(doc, sections.completed),
    ].filter((task) =>
      task.headline.toLowerCase().includes(query) ||
      task.content.toLowerCase().includes(query)
    );
  }
}
