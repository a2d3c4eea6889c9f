/**
 * Adapter: Sha256HashService
 *
 * HashService implementation using the Web Crypto API (SHA-256).
 * Returns the first 12 hex characters of the digest.
 *
 * Dependencies: Web Crypto API (node:crypto webcrypto).
 */

import { webcrypto } from "node:crypto";
import type { HashService } from "../../domain/ports/hash-service.ts";

export class Sha256HashService implements HashService {
  async hash(content: string): Promise<string> {
    const encoder = new TextEncoder();
    const data = encoder.encode(content);
    const hashBuffer = await webcrypto.subtle.digest("SHA-256", data);
    const hashArray = new Uint8Array(hashBuffer);
    const hashHex = Array.from(hashArray)
      .map((b) => b.toString(16).padStart(2, "0"))
      .join("");
    return hashHex.slice(0, 12);
  }
}
