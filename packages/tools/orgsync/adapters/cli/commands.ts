/**
 * CLI commands for orgsync.
 *
 * Wires commander commands to use cases, adapters, and formatters.
 * Each command: load config -> build use case -> run -> format output.
 * Configuration flags live on the root program and apply to every command.
 */

import { Command } from "commander";
import { OrgError } from "../../../org-surgeon/mod.ts";
import { type ConfigFlags, type Env, loadConfig } from "../../config.ts";
import { OrgSyncError } from "../../domain/entities/errors.ts";
import { parseDay } from "../../domain/entities/org-time.ts";
import type { Failure, Result } from "../../domain/entities/result.ts";
import type { DiffService } from "../../domain/ports/diff-service.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { HashService } from "../../domain/ports/hash-service.ts";
import type { Logger } from "../../domain/ports/logger.ts";
import type { ProcessRunner } from "../../domain/ports/process-runner.ts";
import { ApprovalGate } from "../../domain/use-cases/approval/approval-gate.ts";
import { CreateJournalEntryUseCase } from "../../domain/use-cases/journal/create-entry.ts";
import { ListJournalEntriesUseCase } from "../../domain/use-cases/journal/list-entries.ts";
import type { JournalDeps } from "../../domain/use-cases/journal/parse-journal.ts";
import { SearchJournalUseCase } from "../../domain/use-cases/journal/search-journal.ts";
import {
  PreviewJournalEntryUpdateUseCase,
  type UpdateJournalEntryInput,
  UpdateJournalEntryUseCase,
} from "../../domain/use-cases/journal/update-entry.ts";
import { FormatDiffUseCase } from "../../domain/use-cases/preview/format-diff.ts";
import { CreateTaskUseCase } from "../../domain/use-cases/task/create-task.ts";
import { FindTaskUseCase } from "../../domain/use-cases/task/find-task.ts";
import { ListTasksUseCase } from "../../domain/use-cases/task/list-tasks.ts";
import { MoveTaskUseCase } from "../../domain/use-cases/task/move-task.ts";
import { PreviewTaskUpdateUseCase } from "../../domain/use-cases/task/preview-task-update.ts";
import { SearchTasksUseCase } from "../../domain/use-cases/task/search-tasks.ts";
import type { TaskLedgerDeps } from "../../domain/use-cases/task/task-ledger.ts";
import { UpdateTaskUseCase } from "../../domain/use-cases/task/update-task.ts";
import { JournalDirectoryRepository } from "../repositories/journal-dir-repo.ts";
import { OrgTaskDocumentRepository } from "../repositories/org-task-repo.ts";
import {
  formatJournalCreate,
  formatJournalDetail,
  formatJournalList,
  formatJournalPreview,
  formatJournalSearch,
  formatJournalUpdate,
  formatTaskCreate,
  formatTaskDetail,
  formatTaskList,
  formatTaskMove,
  formatTaskPreview,
  formatTaskSearch,
  formatTaskUpdate,
  jsonOutput,
} from "./formatter.ts";

/** Everything the commands need from the outside world */
export type CliDeps = {
  readonly fs: FileSystem;
  readonly processRunner: ProcessRunner;
  readonly hashService: HashService;
  readonly diffService: DiffService;
  readonly env: Env;
  readonly homeDir: string;
  readonly supportFile: string;
  readonly now: () => Date;
  readonly generateUuid: () => string;
  readonly readStdin: () => Promise<string>;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly createLogger: (verbose: boolean) => Logger;
};

/** Mutable outcome of a CLI run */
export type CliState = {
  exitCode: number;
};

type JsonOption = { readonly json?: boolean };

// ============================================================================
// Helpers
// ============================================================================

class CommandFailure extends Error {
  constructor(readonly failure: Failure) {
    super(failure.message);
    this.name = "CommandFailure";
  }
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new CommandFailure(result.failure);
  return result.value;
}

function errorParts(e: unknown): { code: string; message: string } | null {
  if (e instanceof CommandFailure) return e.failure;
  if (e instanceof OrgSyncError) return { code: e.code, message: e.message };
  if (e instanceof OrgError) return { code: e.code, message: e.message };
  return null;
}

function parseDate(value: string): Date {
  const date = parseDay(value);
  if (!date) {
    throw new OrgSyncError(
      "invalid_args",
      `Invalid date '${value}', expected YYYY-MM-DD or YYYYMMDD`,
    );
  }
  return date;
}

function parseLineNumber(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new OrgSyncError(
      "invalid_args",
      `Invalid line number '${value}'`,
    );
  }
  return Number(value);
}

function parseDays(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new OrgSyncError("invalid_args", `Invalid day count '${value}'`);
  }
  return Number(value);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// ============================================================================
// Service wiring
// ============================================================================

function buildServices(deps: CliDeps, flags: ConfigFlags) {
  const config = loadConfig(flags, deps.env, deps.homeDir);
  const logger = deps.createLogger(config.verbose);

  const ledger: TaskLedgerDeps = {
    repository: new OrgTaskDocumentRepository(
      deps.fs,
      config.tasksFile,
      config.keywords,
      logger,
      deps.now,
    ),
    keywords: config.keywords,
    sections: config.sections,
  };
  const journalRepository = new JournalDirectoryRepository(
    deps.fs,
    config.journalDir,
    logger,
    deps.now,
  );
  const journal: JournalDeps = {
    repository: journalRepository,
    hashService: deps.hashService,
    logger,
    now: deps.now,
  };
  const approvalGate = new ApprovalGate(
    {
      enabled: config.approvalEnabled,
      reviewerPath: config.reviewerPath,
      timeoutSeconds: config.approvalTimeoutSeconds,
      supportFile: deps.supportFile,
    },
    { fs: deps.fs, processRunner: deps.processRunner, logger },
  );

  return {
    ledger,
    journal,
    journalRepository,
    approvalGate,
    formatDiff: new FormatDiffUseCase(deps.diffService),
  };
}

// ============================================================================
// Commands
// ============================================================================

export function createProgram(deps: CliDeps, state: CliState): Command {
  const program = new Command()
    .name("orgsync")
    .description("Synchronize an org-mode task ledger and journal")
    .option("--org-dir <dir>", "Directory holding tasks.org")
    .option("--journal-dir <dir>", "Directory of journal day files")
    .option("--emacsclient-path <path>", "Reviewer executable")
    .option("--ediff-approval", "Review updates in ediff before writing")
    .option("--ediff-timeout <seconds>", "Review timeout in seconds")
    .option("--active-section <name>", "Section of open tasks")
    .option("--completed-section <name>", "Section of done tasks")
    .option("--high-level-section <name>", "Checklist section")
    .option("--todo-states <states>", "Open keywords, comma separated")
    .option("--done-states <states>", "Done keywords, comma separated")
    .option("--verbose", "Debug logging on stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text.replace(/\n$/, "")),
      writeErr: (text) => deps.stderr(text.replace(/\n$/, "")),
    });

  const services = () => buildServices(deps, program.opts<ConfigFlags>());

  async function run(
    options: JsonOption,
    action: (json: boolean) => Promise<string>,
  ): Promise<void> {
    const json = options.json ?? false;
    try {
      deps.stdout(await action(json));
    } catch (e) {
      const parts = errorParts(e);
      if (!parts) throw e;
      state.exitCode = 1;
      if (json) {
        deps.stdout(jsonOutput({ error: parts.code, message: parts.message }));
      } else {
        deps.stderr(`error: ${parts.code}\n${parts.message}`);
      }
    }
  }

  // --------------------------------------------------------------------------
  // task
  // --------------------------------------------------------------------------

  const task = program.command("task").description("Task ledger operations");

  task.command("list")
    .description("List tasks of a section")
    .argument("<section>")
    .option("--json", "Output as JSON")
    .action((section: string, options: JsonOption) =>
      run(options, async (json) => {
        const output = await new ListTasksUseCase(services().ledger.repository)
          .execute({ section });
        return json ? jsonOutput(output) : formatTaskList(output);
      })
    );

  task.command("get")
    .description("Show one task by custom id, ticket or headline fragment")
    .argument("<identifier>")
    .option("--section <name>", "Only look in this section")
    .option("--json", "Output as JSON")
    .action((
      identifier: string,
      options: JsonOption & { readonly section?: string },
    ) =>
      run(options, async (json) => {
        const found = unwrap(
          await new FindTaskUseCase(services().ledger).execute({
            identifier,
            section: options.section,
          }),
        );
        return json ? jsonOutput(found) : formatTaskDetail(found);
      })
    );

  task.command("create")
    .description("Append a task to a section (entry from stdin if omitted)")
    .argument("<section>")
    .argument("[entry]")
    .option("--json", "Output as JSON")
    .action((section: string, entry: string | undefined, options: JsonOption) =>
      run(options, async (json) => {
        const { ledger } = services();
        const output = unwrap(
          await new CreateTaskUseCase({
            ...ledger,
            now: deps.now,
            generateUuid: deps.generateUuid,
          }).execute({ section, entry: entry ?? await deps.readStdin() }),
        );
        return json ? jsonOutput(output) : formatTaskCreate(output);
      })
    );

  task.command("update")
    .description("Replace a task (entry from stdin if omitted)")
    .argument("<identifier>")
    .argument("[entry]")
    .option("--json", "Output as JSON")
    .action((
      identifier: string,
      entry: string | undefined,
      options: JsonOption,
    ) =>
      run(options, async (json) => {
        const { ledger, formatDiff, approvalGate } = services();
        const output = unwrap(
          await new UpdateTaskUseCase({
            ...ledger,
            now: deps.now,
            formatDiff,
            approvalGate,
          }).execute({ identifier, entry: entry ?? await deps.readStdin() }),
        );
        return json ? jsonOutput(output) : formatTaskUpdate(output);
      })
    );

  task.command("preview")
    .description("Show what an update would change, without writing")
    .argument("<identifier>")
    .argument("[entry]")
    .option("--json", "Output as JSON")
    .action((
      identifier: string,
      entry: string | undefined,
      options: JsonOption,
    ) =>
      run(options, async (json) => {
        const { ledger, formatDiff } = services();
        const output = unwrap(
          await new PreviewTaskUpdateUseCase({
            ...ledger,
            now: deps.now,
            formatDiff,
          }).execute({ identifier, entry: entry ?? await deps.readStdin() }),
        );
        return json ? jsonOutput(output) : formatTaskPreview(output);
      })
    );

  task.command("move")
    .description("Move a task between sections without changing its status")
    .argument("<identifier>")
    .argument("<from>")
    .argument("<to>")
    .option("--json", "Output as JSON")
    .action((
      identifier: string,
      fromSection: string,
      toSection: string,
      options: JsonOption,
    ) =>
      run(options, async (json) => {
        const output = unwrap(
          await new MoveTaskUseCase(services().ledger).execute({
            identifier,
            fromSection,
            toSection,
          }),
        );
        return json ? jsonOutput(output) : formatTaskMove(output);
      })
    );

  task.command("search")
    .description("Search task headlines and content")
    .argument("<query>")
    .option("--json", "Output as JSON")
    .action((query: string, options: JsonOption) =>
      run(options, async (json) => {
        const tasks = await new SearchTasksUseCase(services().ledger)
          .execute({ query });
        return json ? jsonOutput(tasks) : formatTaskSearch(tasks);
      })
    );

  // --------------------------------------------------------------------------
  // journal
  // --------------------------------------------------------------------------

  const journal = program.command("journal").description(
    "Journal operations",
  );

  journal.command("list")
    .description("List the entries of a day")
    .option("--date <date>", "Day to list (default: today)")
    .option("--json", "Output as JSON")
    .action((options: JsonOption & { readonly date?: string }) =>
      run(options, async (json) => {
        const output = await new ListJournalEntriesUseCase(services().journal)
          .execute({
            date: options.date !== undefined
              ? parseDate(options.date)
              : undefined,
          });
        return json ? jsonOutput(output) : formatJournalList(output);
      })
    );

  journal.command("get")
    .description("Show one entry by time or headline fragment")
    .argument("<date>")
    .argument("<identifier>")
    .option("--json", "Output as JSON")
    .action((date: string, identifier: string, options: JsonOption) =>
      run(options, async (json) => {
        const entry = unwrap(
          await new ListJournalEntriesUseCase(services().journal).get({
            date: parseDate(date),
            identifier,
          }),
        );
        return json ? jsonOutput(entry) : formatJournalDetail(entry);
      })
    );

  journal.command("create")
    .description("Append an entry (content from stdin if omitted)")
    .argument("<headline>")
    .argument("[content]")
    .option("--date <date>", "Day file (default: today)")
    .option("--time <time>", "Entry time HH:MM (default: now)")
    .option("--tag <tag>", "Tag (repeatable)", collect, [])
    .option("--json", "Output as JSON")
    .action((
      headline: string,
      content: string | undefined,
      options: JsonOption & {
        readonly date?: string;
        readonly time?: string;
        readonly tag: string[];
      },
    ) =>
      run(options, async (json) => {
        const output = await new CreateJournalEntryUseCase(services().journal)
          .execute({
            date: options.date !== undefined
              ? parseDate(options.date)
              : undefined,
            time: options.time,
            headline,
            content: content ?? await deps.readStdin(),
            tags: options.tag,
          });
        return json ? jsonOutput(output) : formatJournalCreate(output);
      })
    );

  type EntryUpdateOptions = JsonOption & {
    readonly tag: string[];
    readonly revision?: string;
  };

  async function entryUpdateInput(
    journalRepository: JournalDirectoryRepository,
    args: readonly [string, string, string, string, string | undefined],
    options: EntryUpdateOptions,
  ): Promise<UpdateJournalEntryInput> {
    const [date, line, time, headline, content] = args;
    return {
      path: await journalRepository.resolvePath(parseDate(date)),
      lineNumber: parseLineNumber(line),
      time,
      headline,
      content: content ?? await deps.readStdin(),
      tags: options.tag,
      revision: options.revision,
    };
  }

  journal.command("update")
    .description("Rewrite the entry at a line (content from stdin if omitted)")
    .argument("<date>")
    .argument("<line>", "0-based line of the entry heading")
    .argument("<time>")
    .argument("<headline>")
    .argument("[content]")
    .option("--tag <tag>", "Tag (repeatable)", collect, [])
    .option("--revision <token>", "Refuse if the file changed since")
    .option("--json", "Output as JSON")
    .action((
      date: string,
      line: string,
      time: string,
      headline: string,
      content: string | undefined,
      options: EntryUpdateOptions,
    ) =>
      run(options, async (json) => {
        const { journal, journalRepository, formatDiff, approvalGate } =
          services();
        const input = await entryUpdateInput(
          journalRepository,
          [date, line, time, headline, content],
          options,
        );
        const output = unwrap(
          await new UpdateJournalEntryUseCase({
            ...journal,
            formatDiff,
            approvalGate,
          }).execute(input),
        );
        return json ? jsonOutput(output) : formatJournalUpdate(output);
      })
    );

  journal.command("preview")
    .description("Show what an entry update would change, without writing")
    .argument("<date>")
    .argument("<line>", "0-based line of the entry heading")
    .argument("<time>")
    .argument("<headline>")
    .argument("[content]")
    .option("--tag <tag>", "Tag (repeatable)", collect, [])
    .option("--revision <token>", "Refuse if the file changed since")
    .option("--json", "Output as JSON")
    .action((
      date: string,
      line: string,
      time: string,
      headline: string,
      content: string | undefined,
      options: EntryUpdateOptions,
    ) =>
      run(options, async (json) => {
        const { journal, journalRepository, formatDiff } = services();
        const input = await entryUpdateInput(
          journalRepository,
          [date, line, time, headline, content],
          options,
        );
        const output = unwrap(
          await new PreviewJournalEntryUpdateUseCase({ ...journal, formatDiff })
            .execute(input),
        );
        return json ? jsonOutput(output) : formatJournalPreview(output);
      })
    );

  journal.command("search")
    .description("Search entries of the last days")
    .argument("<query>")
    .option("--days <n>", "Days to look back", "30")
    .option("--json", "Output as JSON")
    .action((query: string, options: JsonOption & { readonly days: string }) =>
      run(options, async (json) => {
        const entries = await new SearchJournalUseCase(services().journal)
          .execute({ query, daysBack: parseDays(options.days) });
        return json ? jsonOutput(entries) : formatJournalSearch(entries);
      })
    );

  return program;
}
