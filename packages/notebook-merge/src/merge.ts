import { withCells, type NotebookCell, type NotebookDocument } from "@nbkit/format";

/**
 * Merge `second` into `first`, using cell ids as alignment checkpoints.
 *
 * Walks `first` once. When a cell's id also occurs in `second` at or after the
 * read position, every cell of `second` from the read position up to and
 * including that match is emitted (the second notebook's version wins), and the
 * read position moves past it. Cells only `first` has are emitted where they
 * stand. Whatever remains of `second` is appended at the end.
 *
 * The result keeps `first`'s notebook metadata and is re-indexed. `merge` does
 * not validate ordering; call `check` first when that matters.
 */
export function merge(first: NotebookDocument, second: NotebookDocument): NotebookDocument {
  const output: NotebookCell[] = [];
  const emitted = new Set<number>();
  const theirs = second.cells;
  let j = 0;

  const emitThrough = (k: number) => {
    for (let pos = j; pos <= k; pos++) {
      if (emitted.has(pos)) continue;
      const cell = theirs[pos];
      if (!cell) continue;
      emitted.add(pos);
      output.push(cell);
    }
    j = k + 1;
  };

  for (const cell of first.cells) {
    const k = cell.id === null ? -1 : findFrom(theirs, cell.id, j, emitted);
    if (k >= 0) {
      emitThrough(k);
    } else {
      output.push(cell);
    }
  }

  emitThrough(theirs.length - 1);
  return withCells(first, output);
}

function findFrom(cells: readonly NotebookCell[], id: string, start: number, emitted: ReadonlySet<number>): number {
  for (let pos = start; pos < cells.length; pos++) {
    if (!emitted.has(pos) && cells[pos]?.id === id) return pos;
  }
  return -1;
}
