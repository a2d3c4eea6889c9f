/**
 * Use Case: ApprovalGate
 *
 * Optional interactive review of a proposed replacement. Old and new
 * content are written to `old-{context}.org` / `new-{context}.org` in a
 * fresh temp directory and handed to the reviewer (emacsclient running an
 * ediff session). The reviewer prints a JSON string on stdout:
 *
 *   "approved"  -> (true, content of the new file, possibly hand-edited)
 *   "rejected"  -> (false, proposed content)
 *
 * Outcomes without a verdict:
 *
 *   - gate disabled                        -> approved, state "disabled"
 *   - reviewer not found                   -> approved, state "auto-fallback"
 *   - timeout                              -> rejected
 *   - failed to run, non-zero exit, or
 *     unreadable stdout                    -> approved, state "auto-fallback"
 *
 * The reviewer-side support file is loaded once per gate instance.
 *
 * Dependencies: FileSystem, ProcessRunner, Logger.
 */

import { normalizeNewlines } from "../../../../org-surgeon/mod.ts";
import type {
  ApprovalDecision,
  ApprovalState,
} from "../../entities/outputs.ts";
import type { FileSystem } from "../../ports/filesystem.ts";
import type { Logger } from "../../ports/logger.ts";
import type {
  ProcessResult,
  ProcessRunner,
} from "../../ports/process-runner.ts";

export const TEMP_DIR_PREFIX = "orgsync-ediff-";
const REVIEWER_NAME = "emacsclient";
const LOAD_TIMEOUT_MS = 10_000;

export type ApprovalGateConfig = {
  readonly enabled: boolean;
  readonly reviewerPath: string;
  readonly timeoutSeconds: number;
  readonly supportFile: string; // elisp loaded into the reviewer
};

export type ApprovalGateDeps = {
  readonly fs: FileSystem;
  readonly processRunner: ProcessRunner;
  readonly logger: Logger;
};

/** Escape a string for an elisp string literal */
function elispString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function safeContext(context: string): string {
  return context.replace(/[^A-Za-z0-9_.-]/g, "_");
}

function parseVerdict(stdout: string): "approved" | "rejected" | null {
  let value: unknown;
  try {
    value = JSON.parse(stdout.trim());
  } catch {
    return null;
  }
  return value === "approved" || value === "rejected" ? value : null;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class ApprovalGate {
  private loaded = false;
  private current: ApprovalState | null = null;

  constructor(
    private readonly config: ApprovalGateConfig,
    private readonly deps: ApprovalGateDeps,
  ) {}

  /** State of the last (or running) review; null before the first one */
  get state(): ApprovalState | null {
    return this.current;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /** Configured reviewer when it exists, else emacsclient on PATH, else null */
  async resolveReviewer(): Promise<string | null> {
    if (await this.deps.fs.exists(this.config.reviewerPath)) {
      return this.config.reviewerPath;
    }
    return await this.deps.processRunner.resolveExecutable(REVIEWER_NAME);
  }

  /**
   * Load the support file into the reviewer. Idempotent unless
   * `forceReload`. Returns whether the support code is loaded.
   */
  async ensureLoaded(forceReload = false): Promise<boolean> {
    if (this.loaded && !forceReload) return true;

    const reviewer = await this.resolveReviewer();
    if (!reviewer) {
      this.deps.logger.warn("Reviewer not found; support file not loaded");
      return false;
    }

    try {
      const result = await this.deps.processRunner.run(
        [reviewer, "--eval", `(load ${elispString(this.config.supportFile)})`],
        { timeoutMs: LOAD_TIMEOUT_MS },
      );
      if (result.timedOut || result.exitCode !== 0) {
        this.deps.logger.warn(
          `Loading ${this.config.supportFile} failed (exit ${result.exitCode})`,
        );
        return false;
      }
    } catch (e) {
      this.deps.logger.warn(
        `Loading ${this.config.supportFile} failed: ${errorMessage(e)}`,
      );
      return false;
    }

    this.loaded = true;
    this.deps.logger.debug(`Loaded ${this.config.supportFile}`);
    return true;
  }

  async requestApproval(
    oldContent: string,
    newContent: string,
    context: string,
  ): Promise<ApprovalDecision> {
    if (!this.config.enabled) {
      return this.decide(true, newContent, "disabled");
    }

    const reviewer = await this.resolveReviewer();
    if (!reviewer) {
      this.deps.logger.warn("Reviewer not found; approving without review");
      return this.decide(true, newContent, "auto-fallback");
    }

    await this.ensureLoaded();

    const { fs, processRunner, logger } = this.deps;
    const dir = await fs.makeTempDir(TEMP_DIR_PREFIX);
    try {
      const name = safeContext(context);
      const oldPath = `${dir}/old-${name}.org`;
      const newPath = `${dir}/new-${name}.org`;
      await fs.writeFile(oldPath, oldContent);
      await fs.writeFile(newPath, newContent);

      this.current = "pending";
      let result: ProcessResult;
      try {
        result = await processRunner.run(
          [
            reviewer,
            "--eval",
            `(orgsync-ediff-approve ${elispString(oldPath)} ${
              elispString(newPath)
            })`,
          ],
          { timeoutMs: this.config.timeoutSeconds * 1000 },
        );
      } catch (e) {
        logger.warn(`Reviewer failed: ${errorMessage(e)}; approving`);
        return this.decide(true, newContent, "auto-fallback");
      }

      if (result.timedOut) {
        logger.warn(
          `Review timed out after ${this.config.timeoutSeconds}s; rejecting`,
        );
        return this.decide(false, newContent, "rejected");
      }
      if (result.exitCode !== 0) {
        logger.warn(`Reviewer exited with ${result.exitCode}; approving`);
        return this.decide(true, newContent, "auto-fallback");
      }

      const verdict = parseVerdict(result.stdout);
      if (verdict === "approved") {
        return this.decide(
          true,
          normalizeNewlines(await fs.readFile(newPath)),
          "approved",
        );
      }
      if (verdict === "rejected") {
        return this.decide(false, newContent, "rejected");
      }
      logger.warn(`Unexpected reviewer output: ${result.stdout.trim()}`);
      return this.decide(true, newContent, "auto-fallback");
    } finally {
      await fs.remove(dir);
    }
  }

  private decide(
    approved: boolean,
    content: string,
    state: ApprovalState,
  ): ApprovalDecision {
    this.current = state;
    return { approved, content, state };
  }
}
