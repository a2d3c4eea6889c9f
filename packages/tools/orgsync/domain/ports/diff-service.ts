// Diff service port - line sequence comparison

export type DiffChange = {
  readonly kind: "equal" | "removed" | "added";
  readonly lines: readonly string[];
};

export interface DiffService {
  /** Compare two line sequences and return the changes in order. */
  diffLines(
    oldLines: readonly string[],
    newLines: readonly string[],
  ): readonly DiffChange[];
}
