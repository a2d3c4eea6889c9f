/**
 * Adapter: JournalDirectoryRepository
 *
 * JournalRepository backed by a directory of day files named `YYYYMMDD`
 * or `YYYYMMDD.org`. Files are read with LF line endings.
 *
 * Dependencies: domain ports, node:path.
 */

import { basename, dirname, join } from "node:path";
import { normalizeNewlines } from "../../../org-surgeon/mod.ts";
import { compactDate } from "../../domain/entities/org-time.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { JournalRepository } from "../../domain/ports/journal-repository.ts";
import type { Logger } from "../../domain/ports/logger.ts";
import { backupFile, withTrailingNewline } from "./backup.ts";

const ORG_DAY_FILE = /^\d{8}\.org$/;
const BARE_DAY_FILE = /^\d{8}$/;

export class JournalDirectoryRepository implements JournalRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly dir: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async resolvePath(date: Date): Promise<string> {
    const base = join(this.dir, compactDate(date));
    const orgPath = `${base}.org`;
    if (await this.fs.exists(orgPath)) return orgPath;
    if (await this.fs.exists(base)) return base;
    return base + (await this.detectExtension());
  }

  async read(path: string): Promise<string | null> {
    if (!(await this.fs.exists(path))) return null;
    return normalizeNewlines(await this.fs.readFile(path));
  }

  async write(path: string, content: string): Promise<void> {
    await this.fs.ensureDir(dirname(path));
    await backupFile(this.fs, path, this.now(), this.logger);
    await this.fs.writeFile(path, withTrailingNewline(content));
  }

  fileDateOf(path: string): string {
    const name = basename(path);
    return name.endsWith(".org") ? name.slice(0, -".org".length) : name;
  }

  /**
   * Extension for new day files: ".org" when most existing day files use
   * it, "" on a tie or an empty directory.
   */
  private async detectExtension(): Promise<string> {
    if (!(await this.fs.exists(this.dir))) return "";
    let withOrg = 0;
    let bare = 0;
    for await (const name of this.fs.readDir(this.dir)) {
      if (ORG_DAY_FILE.test(name)) withOrg++;
      else if (BARE_DAY_FILE.test(name)) bare++;
    }
    this.logger.debug(
      `Journal naming in ${this.dir}: ${withOrg} .org, ${bare} bare`,
    );
    return withOrg > bare ? ".org" : "";
  }
}
