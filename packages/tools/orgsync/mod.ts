// Main module exports for orgsync

// ============================================================================
// Domain entities
// ============================================================================

export type { Task, TaskProperty } from "./domain/entities/task.ts";
export {
  extractTaskDescription,
  isDoneState,
  TASK_PROPERTIES,
  ticketIdOf,
} from "./domain/entities/task.ts";
export type {
  JournalEntry,
  JournalEntryDraft,
} from "./domain/entities/journal-entry.ts";
export { serializeEntry } from "./domain/entities/journal-entry.ts";
export type * from "./domain/entities/outputs.ts";
export type { Failure, FailureCode, Result } from "./domain/entities/result.ts";
export { OrgSyncError, type OrgSyncErrorCode } from "./domain/entities/errors.ts";
export { formatOrgTimestamp, parseDay } from "./domain/entities/org-time.ts";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { DiffChange, DiffService } from "./domain/ports/diff-service.ts";
export type { FileSystem } from "./domain/ports/filesystem.ts";
export type { HashService } from "./domain/ports/hash-service.ts";
export type { JournalRepository } from "./domain/ports/journal-repository.ts";
export type { Logger, LogLevel } from "./domain/ports/logger.ts";
export type {
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
} from "./domain/ports/process-runner.ts";
export type { TaskDocumentRepository } from "./domain/ports/task-document-repository.ts";

// ============================================================================
// Use cases
// ============================================================================

export {
  type LedgerSections,
  type TaskLedgerDeps,
} from "./domain/use-cases/task/task-ledger.ts";
export { FindTaskUseCase } from "./domain/use-cases/task/find-task.ts";
export { ListTasksUseCase } from "./domain/use-cases/task/list-tasks.ts";
export { SearchTasksUseCase } from "./domain/use-cases/task/search-tasks.ts";
export { CreateTaskUseCase } from "./domain/use-cases/task/create-task.ts";
export { UpdateTaskUseCase } from "./domain/use-cases/task/update-task.ts";
export { PreviewTaskUpdateUseCase } from "./domain/use-cases/task/preview-task-update.ts";
export { MoveTaskUseCase } from "./domain/use-cases/task/move-task.ts";
export { ChecklistMirror } from "./domain/use-cases/checklist/checklist-mirror.ts";
export { type JournalDeps } from "./domain/use-cases/journal/parse-journal.ts";
export { CreateJournalEntryUseCase } from "./domain/use-cases/journal/create-entry.ts";
export {
  PreviewJournalEntryUpdateUseCase,
  UpdateJournalEntryUseCase,
} from "./domain/use-cases/journal/update-entry.ts";
export { ListJournalEntriesUseCase } from "./domain/use-cases/journal/list-entries.ts";
export { SearchJournalUseCase } from "./domain/use-cases/journal/search-journal.ts";
export {
  FormatDiffUseCase,
  NO_CHANGES,
} from "./domain/use-cases/preview/format-diff.ts";
export {
  ApprovalGate,
  type ApprovalGateConfig,
} from "./domain/use-cases/approval/approval-gate.ts";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { NodeProcessRunner } from "./adapters/process/node-process-runner.ts";
export { JsdiffService } from "./adapters/services/jsdiff-service.ts";
export { Sha256HashService } from "./adapters/services/sha256-hash.ts";
export { ConsoleLogger, silentLogger } from "./adapters/logging/console-logger.ts";
export { OrgTaskDocumentRepository } from "./adapters/repositories/org-task-repo.ts";
export { JournalDirectoryRepository } from "./adapters/repositories/journal-dir-repo.ts";

// ============================================================================
// Configuration and CLI
// ============================================================================

export { loadConfig, type OrgSyncConfig } from "./config.ts";
export { main } from "./cli.ts";
