// Error types for orgsync domain

export type OrgSyncErrorCode =
  | "io_error"
  | "parse_error"
  | "invalid_args"
  | "not_configured";

export class OrgSyncError extends Error {
  constructor(
    public readonly code: OrgSyncErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "OrgSyncError";
  }

  toJSON(): { error: string; code: OrgSyncErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
