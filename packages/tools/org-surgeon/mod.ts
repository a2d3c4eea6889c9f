// Main module exports for org-surgeon

// ============================================================================
// Domain entities
// ============================================================================

export type {
  ErrorCode,
  MutationResult,
  OrgDocument,
  OrgHeading,
  Properties,
  TodoKeywords,
} from "./domain/entities/document.ts";
export { DEFAULT_TODO_KEYWORDS, OrgError } from "./domain/entities/document.ts";

// ============================================================================
// Use cases
// ============================================================================

export {
  normalizeNewlines,
  type ParsedHeadline,
  ParseDocumentUseCase,
  parseHeadline,
} from "./domain/use-cases/parse-document.ts";
export {
  formatHeadline,
  ReadSectionUseCase,
  withProperty,
} from "./domain/use-cases/read-section.ts";
export {
  type EditHeadingOutput,
  EditHeadingUseCase,
} from "./domain/use-cases/edit-heading.ts";

// ============================================================================
// Functional API wrapping use cases
// ============================================================================

import type {
  OrgDocument,
  OrgHeading,
  Properties,
  TodoKeywords,
} from "./domain/entities/document.ts";
import { ParseDocumentUseCase } from "./domain/use-cases/parse-document.ts";
import { ReadSectionUseCase } from "./domain/use-cases/read-section.ts";

const _parseUseCase = new ParseDocumentUseCase();
const _readUseCase = new ReadSectionUseCase();

/** Parse org text into an OrgDocument */
export function parseDocument(
  content: string,
  keywords?: TodoKeywords,
): OrgDocument {
  return _parseUseCase.execute({ content, keywords });
}

/** Find a top-level section by exact title */
export function findSection(
  doc: OrgDocument,
  name: string,
): OrgHeading | null {
  return _readUseCase.findSection(doc, name);
}

/** Canonical text of a heading subtree */
export function headingToText(heading: OrgHeading): string {
  return _readUseCase.headingToText(heading);
}

/** Property drawer of a heading; absent keys read as undefined */
export function properties(heading: OrgHeading): Properties {
  return _readUseCase.properties(heading);
}

/** Serialize a document back to text */
export function serializeDocument(lines: readonly string[]): string {
  return lines.join("\n");
}
