/**
 * Adapter: NodeProcessRunner
 *
 * Concrete ProcessRunner implementation using child_process.execFile.
 * Output is captured; a timeout kills the child and is reported as
 * `timedOut` rather than as a failure.
 *
 * Dependencies: node:child_process, which.
 */

import { execFile } from "node:child_process";
import which from "which";
import type {
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
} from "../../domain/ports/process-runner.ts";
import { OrgSyncError } from "../../domain/entities/errors.ts";

export class NodeProcessRunner implements ProcessRunner {
  run(
    cmd: readonly string[],
    options?: ProcessOptions,
  ): Promise<ProcessResult> {
    const [executable, ...args] = cmd;
    if (executable === undefined) {
      return Promise.reject(
        new OrgSyncError("invalid_args", "Empty command"),
      );
    }
    const timeoutMs = options?.timeoutMs ?? 0;

    return new Promise((resolve, reject) => {
      execFile(
        executable,
        args,
        { cwd: options?.cwd, timeout: timeoutMs, encoding: "utf8" },
        (error, stdout, stderr) => {
          if (error === null) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          } else if (timeoutMs > 0 && error.killed === true) {
            resolve({ exitCode: -1, stdout, stderr, timedOut: true });
          } else if (typeof error.code === "number") {
            resolve({ exitCode: error.code, stdout, stderr, timedOut: false });
          } else {
            reject(
              new OrgSyncError(
                "io_error",
                `Failed to run ${executable}: ${error.message}`,
              ),
            );
          }
        },
      );
    });
  }

  async resolveExecutable(name: string): Promise<string | null> {
    return await which(name, { nothrow: true });
  }
}
