/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Read and write failures surface as OrgSyncError(io_error).
 *
 * Dependencies: node:fs/promises, node:os, node:path.
 */

import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { OrgSyncError } from "../../domain/entities/errors.ts";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new OrgSyncError("io_error", `File not found: ${path}`);
      }
      throw new OrgSyncError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf-8");
    } catch {
      throw new OrgSyncError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw e;
    }
  }

  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async *readDir(path: string): AsyncIterable<string> {
    for (const name of await readdir(path)) {
      yield name;
    }
  }

  async remove(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }

  async makeTempDir(prefix: string): Promise<string> {
    return await mkdtemp(join(tmpdir(), prefix));
  }
}
