// Result type for lookups and gated writes

export type FailureCode =
  | "task_not_found"
  | "section_not_found"
  | "entry_not_found"
  | "stale_revision"
  | "approval_rejected";

export type Failure = {
  readonly code: FailureCode;
  readonly message: string;
};

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(code: FailureCode, message: string): Result<T> {
  return { ok: false, failure: { code, message } };
}
