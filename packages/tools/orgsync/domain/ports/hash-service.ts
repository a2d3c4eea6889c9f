/**
 * Port: HashService
 *
 * Abstracts revision hashing so the domain does not depend
 * on a specific crypto implementation.
 */

/** Hashing service for journal file revisions */
export interface HashService {
  /** Short deterministic hex digest of `content` */
  hash(content: string): Promise<string>;
}
