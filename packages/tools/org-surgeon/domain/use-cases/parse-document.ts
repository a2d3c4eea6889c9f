/**
 * Use Case: ParseDocument
 *
 * Parses raw org text into an OrgDocument: the raw lines plus a forest of
 * headings. Every heading records the line range it was read from, so the
 * edit use cases can splice a document without touching unrelated lines.
 *
 * Dependencies: none.
 */

import type {
  OrgDocument,
  OrgHeading,
  Properties,
  TodoKeywords,
} from "../entities/document.ts";
import { DEFAULT_TODO_KEYWORDS, OrgError } from "../entities/document.ts";

const HEADLINE_REGEX = /^(\*+)(?:[ \t]+(.*))?$/;
const TAGS_REGEX = /^(.*?)(?:[ \t]+:((?:[\w@#%]+:)+))?[ \t]*$/;
const COOKIE_REGEX = /^(.*?)[ \t]*(\[\d*\/\d*\]|\[\d*%\])$/;
const PLANNING_REGEX = /^\s*(?:CLOSED|SCHEDULED|DEADLINE):/;
const PROPERTY_REGEX = /^\s*:([^:\s]+):(?:[ \t]+(.*?))?[ \t]*$/;
const BLOCK_BEGIN_REGEX = /^\s*#\+begin_/i;
const BLOCK_END_REGEX = /^\s*#\+end_/i;

export interface ParseDocumentInput {
  readonly content: string;
  readonly keywords?: TodoKeywords;
}

export interface ParseFragmentInput extends ParseDocumentInput {
  readonly level: number;
}

/** Headline fields, before the body is attached */
export interface ParsedHeadline {
  readonly level: number;
  readonly todo: string | null;
  readonly title: string;
  readonly cookie: string | null;
  readonly tags: readonly string[];
}

interface FlatHeading extends ParsedHeadline {
  readonly line: number;
}

/** CRLF and lone CR line endings to LF */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/** Parse a single headline. Returns null when the line is not a headline. */
export function parseHeadline(
  text: string,
  keywords: TodoKeywords = DEFAULT_TODO_KEYWORDS,
): ParsedHeadline | null {
  const match = text.match(HEADLINE_REGEX);
  if (!match) return null;

  const level = match[1].length;
  const tagsMatch = (match[2] ?? "").match(TAGS_REGEX);
  let rest = tagsMatch?.[1] ?? "";
  const tags = tagsMatch?.[2] ? tagsMatch[2].split(":").filter(Boolean) : [];

  let todo: string | null = null;
  const wordMatch = rest.match(/^(\S+)(?:[ \t]+(.*))?$/);
  if (
    wordMatch &&
    (keywords.todo.includes(wordMatch[1]) ||
      keywords.done.includes(wordMatch[1]))
  ) {
    todo = wordMatch[1];
    rest = wordMatch[2] ?? "";
  }

  let cookie: string | null = null;
  const cookieMatch = rest.match(COOKIE_REGEX);
  if (cookieMatch) {
    rest = cookieMatch[1];
    cookie = cookieMatch[2];
  }

  return { level, todo, title: rest.trim(), cookie, tags };
}

export class ParseDocumentUseCase {
  execute(input: ParseDocumentInput): OrgDocument {
    const keywords = input.keywords ?? DEFAULT_TODO_KEYWORDS;
    const lines = normalizeNewlines(input.content).split("\n");
    const flat: FlatHeading[] = [];

    // Collect headlines (skip content inside #+begin_/#+end_ blocks)
    let inBlock = false;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (inBlock) {
        if (BLOCK_END_REGEX.test(line)) inBlock = false;
        continue;
      }
      if (BLOCK_BEGIN_REGEX.test(line)) {
        inBlock = true;
        continue;
      }
      const headline = parseHeadline(line, keywords);
      if (headline) {
        flat.push({ ...headline, line: i });
      }
    }

    const headings = buildForest(lines, flat, 0, flat.length);
    return { lines, headings };
  }

  /**
   * Parse a standalone record and return its first heading of `level`.
   * Throws parse_error when the fragment holds no such heading.
   */
  parseFragment(input: ParseFragmentInput): OrgHeading {
    const doc = this.execute(input);
    const found = findFirstAtLevel(doc.headings, input.level);
    if (!found) {
      throw new OrgError(
        "parse_error",
        `Entry must contain a level-${input.level} heading (${
          "*".repeat(input.level)
        } TODO ...)`,
      );
    }
    return found;
  }
}

function findFirstAtLevel(
  headings: readonly OrgHeading[],
  level: number,
): OrgHeading | null {
  for (const heading of headings) {
    if (heading.level === level) return heading;
    const nested = findFirstAtLevel(heading.children, level);
    if (nested) return nested;
  }
  return null;
}

function buildForest(
  lines: readonly string[],
  flat: readonly FlatHeading[],
  start: number,
  stop: number,
): OrgHeading[] {
  const result: OrgHeading[] = [];
  let k = start;
  while (k < stop) {
    const node = flat[k];
    let childStop = k + 1;
    while (childStop < stop && flat[childStop].level > node.level) {
      childStop++;
    }
    const bodyEnd = k + 1 < flat.length ? flat[k + 1].line : lines.length;
    const end = childStop < flat.length ? flat[childStop].line : lines.length;
    const { planning, properties, body } = parseBody(
      lines,
      node.line + 1,
      bodyEnd,
    );

    result.push({
      level: node.level,
      todo: node.todo,
      title: node.title,
      cookie: node.cookie,
      tags: node.tags,
      planning,
      properties,
      body,
      children: buildForest(lines, flat, k + 1, childStop),
      line: node.line,
      bodyEnd,
      end,
    });
    k = childStop;
  }
  return result;
}

function parseBody(
  lines: readonly string[],
  start: number,
  stop: number,
): { planning: string[]; properties: Properties; body: string } {
  let i = start;
  const planning: string[] = [];
  while (i < stop && PLANNING_REGEX.test(lines[i])) {
    planning.push(lines[i]);
    i++;
  }

  const properties = new Map<string, string>();
  if (i < stop && lines[i].trim().toUpperCase() === ":PROPERTIES:") {
    const drawerStart = i;
    i++;
    let closed = false;
    while (i < stop) {
      const line = lines[i];
      i++;
      if (line.trim().toUpperCase() === ":END:") {
        closed = true;
        break;
      }
      const match = line.match(PROPERTY_REGEX);
      if (!match) {
        throw new OrgError(
          "parse_error",
          `Invalid property line at line ${i - 1}: ${line}`,
          i - 1,
        );
      }
      properties.set(match[1], match[2] ?? "");
    }
    if (!closed) {
      throw new OrgError(
        "parse_error",
        `Unterminated property drawer at line ${drawerStart}`,
        drawerStart,
      );
    }
  }

  return { planning, properties, body: lines.slice(i, stop).join("\n") };
}
