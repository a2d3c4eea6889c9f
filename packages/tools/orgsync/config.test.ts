import { expect, test } from "vitest";
import { loadConfig } from "./config.ts";
import { OrgSyncError } from "./domain/entities/errors.ts";

const HOME = "/home/test";

test("loadConfig - defaults", () => {
  expect(loadConfig({}, {}, HOME)).toEqual({
    orgDir: "/home/test/org",
    journalDir: "/home/test/org/journal",
    tasksFile: "/home/test/org/tasks.org",
    reviewerPath: "/usr/local/bin/emacsclient",
    approvalEnabled: false,
    approvalTimeoutSeconds: 300,
    sections: {
      active: "Tasks",
      completed: "Completed Tasks",
      highLevel: "High Level Tasks (in order)",
    },
    keywords: { todo: ["TODO"], done: ["DONE"] },
    verbose: false,
  });
});

test("loadConfig - environment", () => {
  const config = loadConfig(
    {},
    {
      ORG_DIR: "/data/org/",
      JOURNAL_DIR: "~/notes/journal",
      EMACS_EDIFF_APPROVAL: "YES",
      EMACS_EDIFF_TIMEOUT: "60",
      ORG_TODO_STATES: "TODO, NEXT WAITING",
      ORG_DONE_STATES: "DONE,CANCELLED",
      ORGSYNC_DEBUG: "1",
    },
    HOME,
  );
  expect(config.tasksFile).toBe("/data/org/tasks.org");
  expect(config.journalDir).toBe("/home/test/notes/journal");
  expect(config.approvalEnabled).toBe(true);
  expect(config.approvalTimeoutSeconds).toBe(60);
  expect(config.keywords).toEqual({
    todo: ["TODO", "NEXT", "WAITING"],
    done: ["DONE", "CANCELLED"],
  });
  expect(config.verbose).toBe(true);
});

test("loadConfig - flags win over environment", () => {
  const config = loadConfig(
    { orgDir: "/flag/org", ediffApproval: false, activeSection: "Now" },
    { ORG_DIR: "/env/org", EMACS_EDIFF_APPROVAL: "true", ACTIVE_SECTION: "Env" },
    HOME,
  );
  expect(config.orgDir).toBe("/flag/org");
  expect(config.journalDir).toBe("/flag/org/journal");
  expect(config.approvalEnabled).toBe(false);
  expect(config.sections.active).toBe("Now");
});

test("loadConfig - only true, 1 and yes enable a switch", () => {
  for (const value of ["no", "0", "on", ""]) {
    expect(loadConfig({}, { EMACS_EDIFF_APPROVAL: value }, HOME).approvalEnabled)
      .toBe(false);
  }
  expect(loadConfig({}, { EMACS_EDIFF_APPROVAL: "True" }, HOME).approvalEnabled)
    .toBe(true);
});

test("loadConfig - invalid values", () => {
  for (const env of [
    { EMACS_EDIFF_TIMEOUT: "soon" },
    { EMACS_EDIFF_TIMEOUT: "0" },
    { ORG_DONE_STATES: " , " },
  ]) {
    expect(() => loadConfig({}, env, HOME)).toThrow(OrgSyncError);
  }
  expect(() => loadConfig({ ediffTimeout: "1.5" }, {}, HOME)).toThrow(
    /^Invalid configuration: approvalTimeoutSeconds: /,
  );
});
