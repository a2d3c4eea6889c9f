/**
 * Domain entities for org-surgeon.
 *
 * All types are immutable (readonly properties).
 * This module has ZERO external dependencies.
 */

/**
 * Property drawer of a heading, in file order.
 * A key that is not in the drawer reads as `undefined`; a key that is
 * present with no value reads as `""`.
 */
export type Properties = ReadonlyMap<string, string>;

/** Todo keyword vocabulary recognised at the start of a headline */
export interface TodoKeywords {
  readonly todo: readonly string[];
  readonly done: readonly string[];
}

export const DEFAULT_TODO_KEYWORDS: TodoKeywords = {
  todo: ["TODO"],
  done: ["DONE"],
};

/** A heading with everything below it, down to the next heading of the same or a higher level */
export interface OrgHeading {
  readonly level: number;
  readonly todo: string | null;
  readonly title: string;
  readonly cookie: string | null; // statistics cookie, e.g. "[1/3]" or "[50%]"
  readonly tags: readonly string[];
  readonly planning: readonly string[]; // CLOSED:/SCHEDULED:/DEADLINE: lines
  readonly properties: Properties;
  readonly body: string; // raw text after the drawer, up to the first child
  readonly children: readonly OrgHeading[];
  readonly line: number; // 0-indexed line of the headline
  readonly bodyEnd: number; // 0-indexed, exclusive: next heading of any level or EOF
  readonly end: number; // 0-indexed, exclusive: end of the subtree
}

/** Parsed org document: raw lines plus the heading forest */
export interface OrgDocument {
  readonly lines: readonly string[];
  readonly headings: readonly OrgHeading[];
}

/** Result of a replace/remove/append operation */
export interface MutationResult {
  readonly action: "replaced" | "removed" | "appended";
  readonly title: string;
  readonly lineStart: number;
  readonly linesAdded: number;
  readonly linesRemoved: number;
}

/** Error codes for structured error handling */
export type ErrorCode = "parse_error" | "section_not_found";

/** Structured error with code and message */
export class OrgError extends Error {
  readonly code: ErrorCode;
  readonly line?: number;

  constructor(code: ErrorCode, message: string, line?: number) {
    super(message);
    this.name = "OrgError";
    this.code = code;
    this.line = line;
  }

  format(): string {
    return `error: ${this.code}\n${this.message}`;
  }
}
