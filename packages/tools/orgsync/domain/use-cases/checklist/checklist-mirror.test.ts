import { expect, test } from "vitest";
import { DEFAULT_TODO_KEYWORDS } from "../../../../org-surgeon/mod.ts";
import { ChecklistMirror } from "./checklist-mirror.ts";

const mirror = new ChecklistMirror("Goals", DEFAULT_TODO_KEYWORDS);

test("ChecklistMirror - add appends after the last item", () => {
  const lines = ["* Goals", "- [ ] One", "", "* Tasks"];
  expect(mirror.add(lines, "Two")).toEqual([
    "* Goals",
    "- [ ] One",
    "- [ ] Two",
    "",
    "* Tasks",
  ]);
});

test("ChecklistMirror - add recounts a fraction cookie", () => {
  const lines = ["* Goals [1/2]", "- [X] One", "- [ ] Two", "* Tasks"];
  expect(mirror.add(lines, "Three")).toEqual([
    "* Goals [1/3]",
    "- [X] One",
    "- [ ] Two",
    "- [ ] Three",
    "* Tasks",
  ]);
});

test("ChecklistMirror - setCompleted recounts a percent cookie", () => {
  const lines = ["* Goals [50%]", "- [X] One", "- [ ] Two"];
  expect(mirror.setCompleted(lines, "Two", true)).toEqual([
    "* Goals [100%]",
    "- [X] One",
    "- [X] Two",
  ]);
});

test("ChecklistMirror - setCompleted unchecks and keeps the bullet", () => {
  const lines = ["* Goals", "  + [x] One", "- [ ] Two"];
  expect(mirror.setCompleted(lines, "One", false)).toEqual([
    "* Goals",
    "  + [ ] One",
    "- [ ] Two",
  ]);
});

test("ChecklistMirror - items under sub-headings are not touched", () => {
  const lines = ["* Goals", "- [ ] One", "** Notes", "- [ ] Two"];
  expect(mirror.setCompleted(lines, "Two", true)).toEqual(lines);
});

test("ChecklistMirror - unknown item is a no-op", () => {
  const lines = ["* Goals [0/1]", "- [ ] One"];
  expect(mirror.setCompleted(lines, "Renamed one", true)).toEqual(lines);
});

test("ChecklistMirror - missing section is a no-op", () => {
  const lines = ["* Tasks", "** TODO Something"];
  expect(mirror.add(lines, "Something")).toEqual(lines);
});
