/**
 * Adapter: OrgTaskDocumentRepository
 *
 * TaskDocumentRepository backed by a single org file (`tasks.org`).
 * Parsing is delegated to org-surgeon; every save takes a backup first.
 *
 * Dependencies: domain ports, org-surgeon.
 */

import {
  type OrgDocument,
  parseDocument,
  serializeDocument,
  type TodoKeywords,
} from "../../../org-surgeon/mod.ts";
import { OrgSyncError } from "../../domain/entities/errors.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { Logger } from "../../domain/ports/logger.ts";
import type { TaskDocumentRepository } from "../../domain/ports/task-document-repository.ts";
import { backupFile, withTrailingNewline } from "./backup.ts";

export class OrgTaskDocumentRepository implements TaskDocumentRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly path: string,
    private readonly keywords: TodoKeywords,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async load(): Promise<OrgDocument> {
    if (!(await this.fs.exists(this.path))) {
      throw new OrgSyncError("io_error", `Tasks file not found: ${this.path}`);
    }
    const content = await this.fs.readFile(this.path);
    return parseDocument(content, this.keywords);
  }

  async save(lines: readonly string[]): Promise<void> {
    await backupFile(this.fs, this.path, this.now(), this.logger);
    await this.fs.writeFile(
      this.path,
      withTrailingNewline(serializeDocument(lines)),
    );
  }
}
