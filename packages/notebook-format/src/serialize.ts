import { writeFile } from "node:fs/promises";

import type { NotebookCell, NotebookDocument } from "./types.js";

/** Split into lines the way Jupyter stores them: every line but the last keeps its `\n`. */
export function splitSourceLines(source: string): string[] {
  if (source.length === 0) return [];
  const lines = source.split("\n");
  const last = lines.pop() ?? "";
  const out = lines.map((line) => `${line}\n`);
  if (last.length > 0) out.push(last);
  return out;
}

function cellToJson(cell: NotebookCell): Record<string, unknown> {
  const json: Record<string, unknown> = { cell_type: cell.cellType };
  if (cell.id !== null) json.id = cell.id;
  json.metadata = cell.metadata;
  Object.assign(json, cell.extra);
  json.source = splitSourceLines(cell.source);
  return json;
}

export function notebookToJson(document: NotebookDocument): Record<string, unknown> {
  return {
    cells: document.cells.map(cellToJson),
    metadata: document.metadata,
    nbformat: document.nbformat,
    nbformat_minor: document.nbformatMinor,
    ...document.extra,
  };
}

/** nbformat JSON, indented by one space with a trailing newline (Jupyter's on-disk layout). */
export function serializeNotebook(document: NotebookDocument): string {
  return `${JSON.stringify(notebookToJson(document), null, 1)}\n`;
}

export async function writeNotebook(path: string, document: NotebookDocument): Promise<void> {
  await writeFile(path, serializeNotebook(document), "utf8");
}
