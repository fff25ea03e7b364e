import type { NotebookDocument } from "@nbkit/format";

import { MergeOrderError, type IdPair } from "./errors.js";

/** Position of the first occurrence of every non-null id. */
function firstPositions(document: NotebookDocument): Map<string, number> {
  const positions = new Map<string, number>();
  for (const cell of document.cells) {
    if (cell.id !== null && !positions.has(cell.id)) positions.set(cell.id, cell.index);
  }
  return positions;
}

/** Most conflicting pairs a `MergeOrderError` carries. */
export const MAX_REPORTED_CONFLICTS = 10;

/**
 * Pairs of shared ids whose relative order differs, in `first` order. Stops
 * once `limit` pairs are found.
 */
export function findOrderConflicts(
  first: NotebookDocument,
  second: NotebookDocument,
  limit: number = Number.POSITIVE_INFINITY
): IdPair[] {
  const ours = firstPositions(first);
  const theirs = firstPositions(second);

  const shared: Array<{ id: string; pos: number }> = [];
  for (const [id] of ours) {
    const pos = theirs.get(id);
    if (pos !== undefined) shared.push({ id, pos });
  }

  const conflicts: IdPair[] = [];
  for (let a = 0; a < shared.length; a++) {
    for (let b = a + 1; b < shared.length; b++) {
      const earlier = shared[a];
      const later = shared[b];
      if (earlier && later && earlier.pos > later.pos) {
        conflicts.push([earlier.id, later.id]);
        if (conflicts.length >= limit) return conflicts;
      }
    }
  }
  return conflicts;
}

/**
 * Throw `MergeOrderError` unless every id present in both notebooks appears in
 * the same relative order in each. Notebooks with no ids in common pass.
 */
export function check(first: NotebookDocument, second: NotebookDocument): void {
  const conflicts = findOrderConflicts(first, second, MAX_REPORTED_CONFLICTS + 1);
  if (conflicts.length === 0) return;
  throw new MergeOrderError(conflicts.slice(0, MAX_REPORTED_CONFLICTS), {
    truncated: conflicts.length > MAX_REPORTED_CONFLICTS,
  });
}
