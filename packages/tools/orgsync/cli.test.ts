import { expect, test } from "vitest";
import type { CliDeps } from "./adapters/cli/commands.ts";
import { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
import { silentLogger } from "./adapters/logging/console-logger.ts";
import { JsdiffService } from "./adapters/services/jsdiff-service.ts";
import { Sha256HashService } from "./adapters/services/sha256-hash.ts";
import { main } from "./cli.ts";

// ============================================================================
// Helpers
// ============================================================================

const TASKS_ORG = [
  "* High Level Tasks (in order)",
  "- [ ] Fix bug",
  "",
  "* Tasks",
  "** TODO GH-1 Fix bug",
  ":PROPERTIES:",
  ":CUSTOM_ID: task-gh-1",
  ":END:",
  "",
  "* Completed Tasks",
  "",
].join("\n");

const GLOBAL = ["--org-dir", "/org", "--journal-dir", "/org/journal"];

function setup(stdin = "") {
  const fs = new InMemoryFileSystem();
  fs.setFile("/org/tasks.org", TASKS_ORG);
  const out: string[] = [];
  const err: string[] = [];
  const deps: CliDeps = {
    fs,
    processRunner: {
      run: () => Promise.reject(new Error("no subprocess in tests")),
      resolveExecutable: () => Promise.resolve(null),
    },
    hashService: new Sha256HashService(),
    diffService: new JsdiffService(),
    env: {},
    homeDir: "/home/test",
    supportFile: "/opt/orgsync-ediff.el",
    now: () => new Date(2025, 0, 15, 14, 30, 0),
    generateUuid: () => "uuid-1",
    readStdin: () => Promise.resolve(stdin),
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    createLogger: () => silentLogger,
  };
  const run = (...args: string[]) => main([...GLOBAL, ...args], deps);
  return { fs, out, err, run };
}

// ============================================================================
// task
// ============================================================================

test("cli - task list", async () => {
  const { out, run } = setup();
  expect(await run("task", "list", "Tasks")).toBe(0);
  expect(out).toEqual([
    "Tasks\n=====\n\n  TODO  [GH-1] GH-1 Fix bug (#task-gh-1)",
  ]);
});

test("cli - task list of an empty section", async () => {
  const { out, run } = setup();
  await run("task", "list", "Completed Tasks");
  expect(out).toEqual(["No tasks in Completed Tasks"]);
});

test("cli - task get as JSON", async () => {
  const { out, run } = setup();
  expect(await run("task", "get", "GH-1", "--json")).toBe(0);
  expect(JSON.parse(out[0])).toEqual({
    customId: "task-gh-1",
    id: null,
    status: "TODO",
    section: "Tasks",
    headline: "GH-1 Fix bug",
    ticketId: "GH-1",
    content: "** TODO GH-1 Fix bug\n:PROPERTIES:\n:CUSTOM_ID: task-gh-1\n:END:",
    created: null,
    modified: null,
    closed: null,
  });
});

test("cli - task get of an unknown task", async () => {
  const { out, err, run } = setup();
  expect(await run("task", "get", "nope")).toBe(1);
  expect(out).toEqual([]);
  expect(err).toEqual(["error: task_not_found\nCould not find task 'nope'"]);
});

test("cli - failures under --json go to stdout", async () => {
  const { out, run } = setup();
  expect(await run("task", "get", "nope", "--json")).toBe(1);
  expect(JSON.parse(out[0])).toEqual({
    error: "task_not_found",
    message: "Could not find task 'nope'",
  });
});

test("cli - task create reads the entry from stdin", async () => {
  const { fs, out, run } = setup("** TODO Write docs\n");
  expect(await run("task", "create", "Tasks")).toBe(0);
  expect(out).toEqual([
    [
      "✓ Task Created in Tasks",
      "",
      "** TODO Write docs",
      ":PROPERTIES:",
      ":ID: UUID-1",
      ":CREATED: <2025-01-15 Wed 14:30>",
      ":END:",
    ].join("\n"),
  ]);
  expect(fs.getAll().get("/org/tasks.org")?.split("\n").slice(0, 3)).toEqual([
    "* High Level Tasks (in order)",
    "- [ ] Fix bug",
    "- [ ] Write docs",
  ]);
});

test("cli - task update moves a finished task", async () => {
  const { out, run } = setup();
  const code = await run(
    "task",
    "update",
    "GH-1",
    "** DONE GH-1 Fix bug\n:PROPERTIES:\n:CUSTOM_ID: task-gh-1\n:END:",
  );
  expect(code).toBe(0);
  expect(out[0].split("\n")[0]).toBe(
    "✓ Task Updated and Moved: Tasks → Completed Tasks",
  );
});

test("cli - task move", async () => {
  const { out, run } = setup();
  await run("task", "move", "task-gh-1", "Tasks", "Completed Tasks");
  expect(out).toEqual(["✓ Task Moved: Tasks → Completed Tasks\n  GH-1 Fix bug"]);
});

test("cli - missing tasks file", async () => {
  const { fs, err, run } = setup();
  await fs.remove("/org/tasks.org");
  expect(await run("task", "search", "bug")).toBe(1);
  expect(err).toEqual(["error: io_error\nTasks file not found: /org/tasks.org"]);
});

test("cli - malformed entry reports a parse error", async () => {
  const { err, run } = setup();
  expect(await run("task", "create", "Tasks", "no heading here")).toBe(1);
  expect(err[0].split("\n")[0]).toBe("error: parse_error");
});

// ============================================================================
// journal
// ============================================================================

test("cli - journal create and list", async () => {
  const { out, run } = setup();
  expect(
    await run(
      "journal",
      "create",
      "Standup",
      "Talked",
      "--time",
      "09:15",
      "--tag",
      "work",
      "--tag",
      "team",
    ),
  ).toBe(0);
  expect(out[0]).toBe(
    "✓ Journal Entry Created for 2025-01-15\n\n** 09:15 Standup :work:team:\nTalked",
  );

  await run("journal", "list");
  expect(out[1]).toBe(
    [
      "Journal Entries for 2025-01-15",
      "==============================",
      "",
      "  09:15  Standup :work:team: (L2)",
      "         Talked",
    ].join("\n"),
  );
});

test("cli - journal update by date and line", async () => {
  const { fs, out, run } = setup();
  fs.setFile("/org/journal/20250110", "* 2025-01-10\n\n** 09:00 Old\nbody\n");
  expect(
    await run("journal", "update", "2025-01-10", "2", "09:00", "Old", "new body"),
  ).toBe(0);
  expect(fs.getAll().get("/org/journal/20250110")).toBe(
    "* 2025-01-10\n\n** 09:00 Old\nnew body\n",
  );
  expect(out[0]).toBe(
    [
      "✓ Journal Entry Updated for 2025-01-10",
      "",
      "Changes:",
      "− body",
      "+ new body",
      "",
      "Final:",
      "** 09:00 Old",
      "new body",
    ].join("\n"),
  );
});

test("cli - journal get with an invalid date", async () => {
  const { err, run } = setup();
  expect(await run("journal", "get", "2025-13-01", "09:00")).toBe(1);
  expect(err).toEqual([
    "error: invalid_args\nInvalid date '2025-13-01', expected YYYY-MM-DD or YYYYMMDD",
  ]);
});

test("cli - journal search with nothing found", async () => {
  const { out, run } = setup();
  await run("journal", "search", "anything", "--days", "3");
  expect(out).toEqual(["Found 0 journal entries\n"]);
});

test("cli - unknown command exits non-zero", async () => {
  const { run } = setup();
  expect(await run("calendar")).toBe(1);
});
