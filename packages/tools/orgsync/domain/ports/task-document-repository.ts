// Task document repository port - load and store the task ledger

import type { OrgDocument } from "../../../org-surgeon/mod.ts";

export interface TaskDocumentRepository {
  /** Parse the ledger. Throws OrgSyncError(io_error) when the file is missing. */
  load(): Promise<OrgDocument>;

  /** Back up the current file, then rewrite it with `lines`. */
  save(lines: readonly string[]): Promise<void>;
}
