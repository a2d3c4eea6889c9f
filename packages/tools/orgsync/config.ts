// Configuration for orgsync: CLI flag > environment > default

import { z } from "zod/mini";
import type { TodoKeywords } from "../org-surgeon/mod.ts";
import { OrgSyncError } from "./domain/entities/errors.ts";
import type { LedgerSections } from "./domain/use-cases/task/task-ledger.ts";

export type ConfigFlags = {
  readonly orgDir?: string;
  readonly journalDir?: string;
  readonly emacsclientPath?: string;
  readonly ediffApproval?: boolean;
  readonly ediffTimeout?: string;
  readonly activeSection?: string;
  readonly completedSection?: string;
  readonly highLevelSection?: string;
  readonly todoStates?: string;
  readonly doneStates?: string;
  readonly verbose?: boolean;
};

export type Env = Readonly<Record<string, string | undefined>>;

export type OrgSyncConfig = {
  readonly orgDir: string;
  readonly journalDir: string;
  readonly tasksFile: string;
  readonly reviewerPath: string;
  readonly approvalEnabled: boolean;
  readonly approvalTimeoutSeconds: number;
  readonly sections: LedgerSections;
  readonly keywords: TodoKeywords;
  readonly verbose: boolean;
};

export const DEFAULT_REVIEWER_PATH = "/usr/local/bin/emacsclient";
export const DEFAULT_APPROVAL_TIMEOUT_SECONDS = 300;
export const DEFAULT_SECTIONS: LedgerSections = {
  active: "Tasks",
  completed: "Completed Tasks",
  highLevel: "High Level Tasks (in order)",
};

const nonEmpty = () => z.string().check(z.minLength(1));

const ConfigSchema = z.object({
  orgDir: nonEmpty(),
  journalDir: nonEmpty(),
  reviewerPath: nonEmpty(),
  approvalEnabled: z.boolean(),
  approvalTimeoutSeconds: z.int().check(z.positive()),
  activeSection: nonEmpty(),
  completedSection: nonEmpty(),
  highLevelSection: nonEmpty(),
  todoStates: z.array(nonEmpty()).check(z.minLength(1)),
  doneStates: z.array(nonEmpty()).check(z.minLength(1)),
  verbose: z.boolean(),
});

export function isTruthy(value: string): boolean {
  return /^(true|1|yes)$/i.test(value.trim());
}

export function splitStates(value: string): string[] {
  return value.split(/[\s,]+/).filter((s) => s !== "");
}

export function expandHome(path: string, homeDir: string): string {
  if (path === "~") return homeDir;
  if (path.startsWith("~/")) return `${homeDir}${path.slice(1)}`;
  return path;
}

function pick(flag: string | undefined, env: string | undefined): string | undefined {
  if (flag !== undefined) return flag;
  return env !== undefined && env !== "" ? env : undefined;
}

function flagOrEnv(flag: boolean | undefined, env: string | undefined): boolean {
  if (flag !== undefined) return flag;
  return env !== undefined && isTruthy(env);
}

export function loadConfig(
  flags: ConfigFlags,
  env: Env,
  homeDir: string,
): OrgSyncConfig {
  const orgDir = expandHome(pick(flags.orgDir, env.ORG_DIR) ?? "~/org", homeDir);
  const journalDir = expandHome(
    pick(flags.journalDir, env.JOURNAL_DIR) ?? `${orgDir}/journal`,
    homeDir,
  );
  const timeout = pick(flags.ediffTimeout, env.EMACS_EDIFF_TIMEOUT);

  const parsed = ConfigSchema.safeParse({
    orgDir,
    journalDir,
    reviewerPath: pick(flags.emacsclientPath, env.EMACSCLIENT_PATH) ??
      DEFAULT_REVIEWER_PATH,
    approvalEnabled: flagOrEnv(flags.ediffApproval, env.EMACS_EDIFF_APPROVAL),
    approvalTimeoutSeconds: timeout !== undefined
      ? Number(timeout)
      : DEFAULT_APPROVAL_TIMEOUT_SECONDS,
    activeSection: pick(flags.activeSection, env.ACTIVE_SECTION) ??
      DEFAULT_SECTIONS.active,
    completedSection: pick(flags.completedSection, env.COMPLETED_SECTION) ??
      DEFAULT_SECTIONS.completed,
    highLevelSection: pick(flags.highLevelSection, env.HIGH_LEVEL_SECTION) ??
      DEFAULT_SECTIONS.highLevel,
    todoStates: splitStates(pick(flags.todoStates, env.ORG_TODO_STATES) ?? "TODO"),
    doneStates: splitStates(pick(flags.doneStates, env.ORG_DONE_STATES) ?? "DONE"),
    verbose: flagOrEnv(flags.verbose, env.ORGSYNC_DEBUG),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new OrgSyncError("invalid_args", `Invalid configuration: ${details}`);
  }

  const c = parsed.data;
  return {
    orgDir: c.orgDir,
    journalDir: c.journalDir,
    tasksFile: `${c.orgDir.replace(/\/+$/, "")}/tasks.org`,
    reviewerPath: c.reviewerPath,
    approvalEnabled: c.approvalEnabled,
    approvalTimeoutSeconds: c.approvalTimeoutSeconds,
    sections: {
      active: c.activeSection,
      completed: c.completedSection,
      highLevel: c.highLevelSection,
    },
    keywords: { todo: c.todoStates, done: c.doneStates },
    verbose: c.verbose,
  };
}
