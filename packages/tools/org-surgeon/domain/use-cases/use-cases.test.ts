/**
 * Unit tests for org-surgeon use cases.
 */

import { expect, test } from "vitest";
import { OrgError } from "../entities/document.ts";
import { ParseDocumentUseCase, parseHeadline } from "./parse-document.ts";
import {
  formatHeadline,
  ReadSectionUseCase,
  withProperty,
} from "./read-section.ts";
import { EditHeadingUseCase } from "./edit-heading.ts";

const DOC = [
  "#+TITLE: Tasks",
  "",
  "* High Level Tasks (in order) [1/2]",
  "- [X] Ship it",
  "- [ ] Fix bug",
  "",
  "* Tasks",
  "",
  "** TODO GH-1 Fix bug :work:urgent:",
  ":PROPERTIES:",
  ":CUSTOM_ID: task-gh-1",
  ":ID:       ABC",
  ":END:",
  "*** Description",
  "Some text",
  "",
  "** TODO Write docs",
  "",
  "* Completed Tasks",
  "",
].join("\n");

const parser = new ParseDocumentUseCase();
const reader = new ReadSectionUseCase();
const editor = new EditHeadingUseCase();

// ============================================================================
// parseHeadline
// ============================================================================

test("parseHeadline - splits keyword, title and tags", () => {
  expect(parseHeadline("** TODO GH-1 Fix bug :a:b:")).toEqual({
    level: 2,
    todo: "TODO",
    title: "GH-1 Fix bug",
    cookie: null,
    tags: ["a", "b"],
  });
});

test("parseHeadline - extracts a statistics cookie from the title", () => {
  const parsed = parseHeadline("* High Level Tasks (in order) [0/0]");
  expect(parsed?.title).toBe("High Level Tasks (in order)");
  expect(parsed?.cookie).toBe("[0/0]");
});

test("parseHeadline - rejects bold text at the start of a line", () => {
  expect(parseHeadline("**bold** text")).toBeNull();
});

test("parseHeadline - honours a custom keyword vocabulary", () => {
  const keywords = { todo: ["NEXT"], done: ["CANCELLED"] };
  expect(parseHeadline("** NEXT thing", keywords)?.todo).toBe("NEXT");
  const plain = parseHeadline("** TODO thing", keywords);
  expect(plain?.todo).toBeNull();
  expect(plain?.title).toBe("TODO thing");
});

test("parseHeadline - keeps a time-like colon inside the title", () => {
  const parsed = parseHeadline("** TODO Meeting at 10:30");
  expect(parsed?.title).toBe("Meeting at 10:30");
  expect(parsed?.tags).toEqual([]);
});

// ============================================================================
// ParseDocumentUseCase
// ============================================================================

test("ParseDocumentUseCase - builds the top-level sections", () => {
  const doc = parser.execute({ content: DOC });
  expect(doc.headings.map((h) => h.title)).toEqual([
    "High Level Tasks (in order)",
    "Tasks",
    "Completed Tasks",
  ]);
  expect(doc.headings[0].cookie).toBe("[1/2]");
  expect(doc.headings[1].end).toBe(18);
});

test("ParseDocumentUseCase - attaches properties, body and children to a record", () => {
  const doc = parser.execute({ content: DOC });
  const task = doc.headings[1].children[0];

  expect(task.line).toBe(8);
  expect(task.bodyEnd).toBe(13);
  expect(task.end).toBe(16);
  expect(task.properties.get("CUSTOM_ID")).toBe("task-gh-1");
  expect(task.properties.get("ID")).toBe("ABC");
  expect(task.properties.get("CREATED")).toBeUndefined();
  expect(task.body).toBe("");
  expect(task.children[0].title).toBe("Description");
  expect(task.children[0].body).toBe("Some text\n");
});

test("ParseDocumentUseCase - distinguishes an empty property from a missing one", () => {
  const doc = parser.execute({
    content: "* S\n** TODO A\n:PROPERTIES:\n:CLOSED:\n:END:",
  });
  const props = doc.headings[0].children[0].properties;
  expect(props.get("CLOSED")).toBe("");
  expect(props.has("MODIFIED")).toBe(false);
});

test("ParseDocumentUseCase - keeps planning lines apart from the drawer", () => {
  const doc = parser.execute({
    content:
      "* S\n** DONE A\nCLOSED: [2025-01-02 Thu 10:00]\n:PROPERTIES:\n:ID: X\n:END:\nbody",
  });
  const heading = doc.headings[0].children[0];
  expect(heading.planning).toEqual(["CLOSED: [2025-01-02 Thu 10:00]"]);
  expect(heading.properties.get("ID")).toBe("X");
  expect(heading.body).toBe("body");
});

test("ParseDocumentUseCase - ignores star lines inside blocks", () => {
  const doc = parser.execute({
    content: "* S\n#+BEGIN_SRC org\n* not a heading\n#+END_SRC\n* T",
  });
  expect(doc.headings.map((h) => h.title)).toEqual(["S", "T"]);
});

test("ParseDocumentUseCase - reads CRLF line endings", () => {
  const doc = parser.execute({
    content: "* Tasks\r\n** TODO a\r\n:PROPERTIES:\r\n:ID: X\r\n:END:\r\n",
  });
  expect(doc.lines).toEqual(["* Tasks", "** TODO a", ":PROPERTIES:", ":ID: X", ":END:", ""]);
  const task = doc.headings[0].children[0];
  expect(task.todo).toBe("TODO");
  expect(task.title).toBe("a");
  expect(task.properties.get("ID")).toBe("X");
});

test("ParseDocumentUseCase - throws parse_error on an unterminated drawer", () => {
  expect(() =>
    parser.execute({ content: "* S\n** TODO A\n:PROPERTIES:\n:ID: X" })
  ).toThrow(OrgError);
});

test("ParseDocumentUseCase - parseFragment returns the first heading at the requested level", () => {
  const heading = parser.parseFragment({
    content: "** TODO New task\n:PROPERTIES:\n:ID: 1\n:END:",
    level: 2,
  });
  expect(heading.title).toBe("New task");
  expect(heading.properties.get("ID")).toBe("1");
});

test("ParseDocumentUseCase - parseFragment throws parse_error without a matching heading", () => {
  try {
    parser.parseFragment({ content: "just text", level: 2 });
    expect.unreachable();
  } catch (e) {
    if (!(e instanceof OrgError)) throw e;
    expect(e.code).toBe("parse_error");
  }
});

// ============================================================================
// ReadSectionUseCase
// ============================================================================

test("ReadSectionUseCase - findSection matches exact titles only", () => {
  const doc = parser.execute({ content: DOC });
  expect(reader.findSection(doc, "Tasks")?.line).toBe(6);
  expect(reader.findSection(doc, "High Level Tasks (in order)")?.line).toBe(
    2,
  );
  expect(reader.findSection(doc, "tasks")).toBeNull();
});

test("ReadSectionUseCase - headingToText renders the canonical subtree", () => {
  const doc = parser.execute({ content: DOC });
  const task = doc.headings[1].children[0];
  expect(reader.headingToText(task)).toBe(
    [
      "** TODO GH-1 Fix bug :work:urgent:",
      ":PROPERTIES:",
      ":CUSTOM_ID: task-gh-1",
      ":ID: ABC",
      ":END:",
      "*** Description",
      "Some text",
    ].join("\n"),
  );
});

test("ReadSectionUseCase - rawText keeps the source bytes without trailing blanks", () => {
  const doc = parser.execute({ content: DOC });
  const task = doc.headings[1].children[0];
  expect(reader.contentEnd(doc, task)).toBe(15);
  expect(reader.rawText(doc, task)).toBe(
    DOC.split("\n").slice(8, 15).join("\n"),
  );
});

test("ReadSectionUseCase - formatHeadline and withProperty", () => {
  const doc = parser.execute({ content: DOC });
  const task = doc.headings[1].children[0];
  const updated = withProperty(withProperty(task, "ID", undefined), "X", "1");
  expect([...updated.properties.keys()]).toEqual(["CUSTOM_ID", "X"]);
  expect([...task.properties.keys()]).toEqual(["CUSTOM_ID", "ID"]);
  expect(formatHeadline({ ...task, todo: "DONE", tags: [] })).toBe(
    "** DONE GH-1 Fix bug",
  );
});

// ============================================================================
// EditHeadingUseCase
// ============================================================================

test("EditHeadingUseCase - replace keeps the surrounding lines", () => {
  const doc = parser.execute({ content: DOC });
  const task = doc.headings[1].children[0];
  const { updatedLines, result } = editor.replace(
    doc,
    task,
    "** DONE GH-1 Fix bug",
  );

  expect(updatedLines).toEqual([
    ...DOC.split("\n").slice(0, 8),
    "** DONE GH-1 Fix bug",
    ...DOC.split("\n").slice(15),
  ]);
  expect(result.linesRemoved).toBe(7);
  expect(result.linesAdded).toBe(1);
});

test("EditHeadingUseCase - remove drops the subtree with its trailing blank", () => {
  const doc = parser.execute({ content: DOC });
  const first = doc.headings[1].children[0];
  const { updatedLines, result } = editor.remove(doc, first);
  expect(updatedLines).toEqual([
    ...DOC.split("\n").slice(0, 8),
    ...DOC.split("\n").slice(16),
  ]);
  expect(result.linesRemoved).toBe(8);
});

test("EditHeadingUseCase - remove of a last child keeps the separator before the next section", () => {
  const doc = parser.execute({ content: DOC });
  const second = doc.headings[1].children[1];
  const { updatedLines } = editor.remove(doc, second);
  expect(updatedLines).toEqual([
    ...DOC.split("\n").slice(0, 15),
    "",
    "* Completed Tasks",
    "",
  ]);

  const only = parser.execute({
    content: "* Tasks\n** TODO GH-1 Fix bug\n\n* Completed Tasks",
  });
  expect(editor.remove(only, only.headings[0].children[0]).updatedLines)
    .toEqual(["* Tasks", "", "* Completed Tasks"]);

  const siblings = parser.execute({
    content: "* Tasks\n** TODO A\n\n** TODO B\n\n* Done",
  });
  expect(editor.remove(siblings, siblings.headings[0].children[1]).updatedLines)
    .toEqual(["* Tasks", "** TODO A", "", "* Done"]);
});

test("EditHeadingUseCase - appendChild to an empty section adds a separator", () => {
  const doc = parser.execute({ content: DOC });
  const completed = doc.headings[2];
  const { updatedLines } = editor.appendChild(doc, completed, "** DONE New");
  expect(updatedLines.slice(18)).toEqual([
    "* Completed Tasks",
    "",
    "** DONE New",
    "",
  ]);
});

test("EditHeadingUseCase - appendChild follows blank-line separated siblings", () => {
  const doc = parser.execute({ content: DOC });
  const tasks = doc.headings[1];
  const { updatedLines } = editor.appendChild(doc, tasks, "** TODO Third");
  expect(updatedLines.slice(16, 21)).toEqual([
    "** TODO Write docs",
    "",
    "** TODO Third",
    "",
    "* Completed Tasks",
  ]);
});

test("EditHeadingUseCase - rewriteHead replaces headline and body only", () => {
  const doc = parser.execute({ content: DOC });
  const high = doc.headings[0];
  const { updatedLines } = editor.rewriteHead(
    doc,
    high,
    "* High Level Tasks (in order) [2/2]",
    ["- [X] Ship it", "- [X] Fix bug", ""],
  );
  expect(updatedLines.slice(2, 7)).toEqual([
    "* High Level Tasks (in order) [2/2]",
    "- [X] Ship it",
    "- [X] Fix bug",
    "",
    "* Tasks",
  ]);
});
