// Process runner port - interface for spawning external processes

/**
 * Options for running an external process.
 */
export type ProcessOptions = {
  readonly timeoutMs?: number;
  readonly cwd?: string;
};

/**
 * Result of running an external process.
 * `timedOut` is true when the process was killed by the timeout.
 */
export type ProcessResult = {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
};

/**
 * Service for running external processes (used by the approval gate).
 */
export interface ProcessRunner {
  /** Run a command and capture its output. Rejects if it cannot be started. */
  run(cmd: readonly string[], options?: ProcessOptions): Promise<ProcessResult>;

  /** Look an executable up on PATH. Null when not found. */
  resolveExecutable(name: string): Promise<string | null>;
}
