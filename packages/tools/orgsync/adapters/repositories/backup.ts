/**
 * Timestamped backups taken before a file is rewritten.
 *
 * `tasks.org` -> `tasks.20251226_014500.bak`
 * `20251226`  -> `20251226.20251226_014500.bak`
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { Logger } from "../../domain/ports/logger.ts";
import { backupStamp } from "../../domain/entities/org-time.ts";

export function backupPathFor(path: string, now: Date): string {
  const base = path.endsWith(".org") ? path.slice(0, -".org".length) : path;
  return `${base}.${backupStamp(now)}.bak`;
}

/**
 * Copy `path` to its backup location. Best effort: a failed backup is
 * logged and the write goes ahead. Returns the backup path, or null when
 * nothing was copied.
 */
export async function backupFile(
  fs: FileSystem,
  path: string,
  now: Date,
  logger: Logger,
): Promise<string | null> {
  if (!(await fs.exists(path))) {
    return null;
  }
  const target = backupPathFor(path, now);
  try {
    await fs.writeFile(target, await fs.readFile(path));
    return target;
  } catch (e) {
    logger.warn(
      `Backup of ${path} failed: ${e instanceof Error ? e.message : String(e)}`,
    );
    return null;
  }
}

/** Text files always end with a newline */
export function withTrailingNewline(content: string): string {
  return content.endsWith("\n") ? content : content + "\n";
}
