/**
 * Use Case: ReadSection
 *
 * Read-only queries over a parsed OrgDocument: section lookup, canonical
 * serialization of a heading subtree, and line-range helpers used by the
 * edit use cases.
 *
 * Dependencies: entities only.
 */

import type {
  OrgDocument,
  OrgHeading,
  Properties,
} from "../entities/document.ts";

export class ReadSectionUseCase {
  /** Find a top-level (level 1) heading whose title is exactly `name` */
  findSection(doc: OrgDocument, name: string): OrgHeading | null {
    return doc.headings.find((h) => h.level === 1 && h.title === name) ??
      null;
  }

  /** Property drawer of a heading; missing keys read as undefined */
  properties(heading: OrgHeading): Properties {
    return heading.properties;
  }

  /**
   * Canonical text of a heading and its subtree:
   * headline, planning, property drawer, trimmed body, then children.
   */
  headingToText(heading: OrgHeading): string {
    const lines: string[] = [formatHeadline(heading)];

    lines.push(...heading.planning);

    if (heading.properties.size > 0) {
      lines.push(":PROPERTIES:");
      for (const [key, value] of heading.properties) {
        lines.push(value === "" ? `:${key}:` : `:${key}: ${value}`);
      }
      lines.push(":END:");
    }

    const body = heading.body.trimEnd();
    if (body !== "") {
      lines.push(body);
    }

    for (const child of heading.children) {
      lines.push(this.headingToText(child));
    }

    return lines.join("\n");
  }

  /** Raw source text of a heading subtree, without its trailing blank lines */
  rawText(doc: OrgDocument, heading: OrgHeading): string {
    return doc.lines.slice(heading.line, this.contentEnd(doc, heading)).join(
      "\n",
    );
  }

  /**
   * End of a subtree (exclusive) once trailing blank lines are dropped.
   * Never earlier than the line after the headline.
   */
  contentEnd(doc: OrgDocument, heading: OrgHeading): number {
    let end = heading.end;
    while (end > heading.line + 1 && doc.lines[end - 1].trim() === "") {
      end--;
    }
    return end;
  }
}

/** Format a headline: stars, todo keyword, title, cookie, tags */
export function formatHeadline(
  heading: Pick<OrgHeading, "level" | "todo" | "title" | "cookie" | "tags">,
): string {
  const parts = ["*".repeat(heading.level)];
  if (heading.todo) parts.push(heading.todo);
  if (heading.title) parts.push(heading.title);
  if (heading.cookie) parts.push(heading.cookie);
  const tags = heading.tags.length > 0 ? ` :${heading.tags.join(":")}:` : "";
  return parts.join(" ") + tags;
}

/** Copy of a heading with one property set, or removed when value is undefined */
export function withProperty(
  heading: OrgHeading,
  key: string,
  value: string | undefined,
): OrgHeading {
  const properties = new Map(heading.properties);
  if (value === undefined) {
    properties.delete(key);
  } else {
    properties.set(key, value);
  }
  return { ...heading, properties };
}
