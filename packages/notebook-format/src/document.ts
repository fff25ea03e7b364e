import type { CellInit, DocumentInit, NotebookCell, NotebookDocument } from "./types.js";
import { DEFAULT_NBFORMAT, DEFAULT_NBFORMAT_MINOR } from "./schema.js";

export function normalizeSource(source: string | readonly string[]): string {
  return typeof source === "string" ? source : source.join("");
}

export function createCell(init: CellInit, index: number): NotebookCell {
  return Object.freeze({
    id: init.id ?? null,
    cellType: init.cellType,
    source: normalizeSource(init.source),
    index,
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
    extra: Object.freeze({ ...(init.extra ?? {}) }),
  });
}

export function createDocument(init: DocumentInit): NotebookDocument {
  return Object.freeze({
    cells: Object.freeze(init.cells.map((cell, index) => createCell(cell, index))),
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
    nbformat: init.nbformat ?? DEFAULT_NBFORMAT,
    nbformatMinor: init.nbformatMinor ?? DEFAULT_NBFORMAT_MINOR,
    extra: Object.freeze({ ...(init.extra ?? {}) }),
  });
}

/**
 * Rebuild `document` around a new cell sequence, keeping its notebook-level
 * fields. Cells are re-indexed so that `index` stays dense.
 */
export function withCells(document: NotebookDocument, cells: readonly NotebookCell[]): NotebookDocument {
  return Object.freeze({
    cells: Object.freeze(
      cells.map((cell, index) => (cell.index === index ? cell : Object.freeze({ ...cell, index }))),
    ),
    metadata: document.metadata,
    nbformat: document.nbformat,
    nbformatMinor: document.nbformatMinor,
    extra: document.extra,
  });
}

export function codeCells(document: NotebookDocument): NotebookCell[] {
  return document.cells.filter((cell) => cell.cellType === "code");
}

function readString(value: unknown, key: string): string | null {
  if (!value || typeof value !== "object") return null;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" && field.trim().length > 0 ? field.trim().toLowerCase() : null;
}

/**
 * Language of the notebook's code cells, as recorded by the kernel that wrote
 * it (`kernelspec.language`, then `language_info.name`). Lower-cased.
 */
export function notebookLanguage(document: NotebookDocument): string | null {
  return (
    readString(document.metadata.kernelspec, "language") ?? readString(document.metadata.language_info, "name")
  );
}
