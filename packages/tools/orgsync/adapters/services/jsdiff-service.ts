/**
 * Adapter: JsdiffService
 *
 * DiffService implementation backed by jsdiff's array diff.
 *
 * Dependencies: diff.
 */

import { diffArrays } from "diff";
import type {
  DiffChange,
  DiffService,
} from "../../domain/ports/diff-service.ts";

export class JsdiffService implements DiffService {
  diffLines(
    oldLines: readonly string[],
    newLines: readonly string[],
  ): readonly DiffChange[] {
    return diffArrays([...oldLines], [...newLines]).map((change): DiffChange => ({
      kind: change.added ? "added" : change.removed ? "removed" : "equal",
      lines: change.value,
    }));
  }
}
