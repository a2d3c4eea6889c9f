import { expect, test } from "vitest";
import { DEFAULT_TODO_KEYWORDS } from "../../../org-surgeon/mod.ts";
import { serializeEntry } from "./journal-entry.ts";
import {
  addDays,
  backupStamp,
  formatOrgTimestamp,
  isoDate,
  parseDay,
} from "./org-time.ts";
import { OrgSyncError } from "./errors.ts";
import { extractTaskDescription, isDoneState, ticketIdOf } from "./task.ts";

// ============================================================================
// org-time
// ============================================================================

test("formatOrgTimestamp - active and inactive styles", () => {
  const date = new Date(2025, 11, 26, 1, 45, 0);
  expect(formatOrgTimestamp(date, true)).toBe("<2025-12-26 Fri 01:45>");
  expect(formatOrgTimestamp(date, false)).toBe("[2025-12-26 Fri 01:45]");
});

test("backupStamp - date and time to the second", () => {
  expect(backupStamp(new Date(2025, 11, 26, 1, 45, 7))).toBe("20251226_014507");
});

test("parseDay - accepts both day formats", () => {
  expect(parseDay("2025-01-15")?.getTime()).toBe(new Date(2025, 0, 15).getTime());
  expect(parseDay("20250115")?.getTime()).toBe(new Date(2025, 0, 15).getTime());
});

test("parseDay - rejects impossible dates and other text", () => {
  expect(parseDay("2025-02-30")).toBeNull();
  expect(parseDay("2025-1-5")).toBeNull();
  expect(parseDay("yesterday")).toBeNull();
});

test("addDays - crosses month and year boundaries", () => {
  expect(isoDate(addDays(new Date(2025, 0, 2), -3))).toBe("2024-12-30");
});

// ============================================================================
// task
// ============================================================================

test("ticketIdOf - first ticket token of a headline", () => {
  expect(ticketIdOf("GH-28 Add support for JIRA-4")).toBe("GH-28");
  expect(ticketIdOf("Write docs")).toBeNull();
});

test("extractTaskDescription - drops status keyword and ticket prefix", () => {
  expect(
    extractTaskDescription(
      "TODO GH-178 Add multi-provider support",
      DEFAULT_TODO_KEYWORDS,
    ),
  ).toBe("Add multi-provider support");
  expect(extractTaskDescription("Write docs", DEFAULT_TODO_KEYWORDS)).toBe(
    "Write docs",
  );
});

test("isDoneState - follows the configured vocabulary", () => {
  const keywords = { todo: ["TODO", "NEXT"], done: ["DONE", "CANCELLED"] };
  expect(isDoneState("CANCELLED", keywords)).toBe(true);
  expect(isDoneState("NEXT", keywords)).toBe(false);
});

// ============================================================================
// journal entry
// ============================================================================

test("serializeEntry - heading with tags and trimmed body", () => {
  expect(
    serializeEntry({
      time: "09:15",
      headline: "Standup",
      tags: ["work", "team"],
      content: "Talked about GH-1\n\n",
    }),
  ).toBe("** 09:15 Standup :work:team:\nTalked about GH-1");
});

test("serializeEntry - empty body gives the heading alone", () => {
  expect(
    serializeEntry({ time: "18:00", headline: "Done", tags: [], content: "  \n" }),
  ).toBe("** 18:00 Done");
});

// ============================================================================
// errors
// ============================================================================

test("OrgSyncError - JSON form carries code and message", () => {
  const error = new OrgSyncError("io_error", "Tasks file not found: /x");
  expect(error.name).toBe("OrgSyncError");
  expect(error.toJSON()).toEqual({
    error: "io_error",
    code: "io_error",
    message: "Tasks file not found: /x",
  });
});
