export type { CellInit, CellType, DocumentInit, JsonObject, NotebookCell, NotebookDocument } from "./types.js";
export { FormatError, type FormatIssue } from "./errors.js";
export {
  CellTypeSchema,
  DEFAULT_NBFORMAT,
  DEFAULT_NBFORMAT_MINOR,
  RawCellSchema,
  RawNotebookSchema,
  SourceSchema,
  type RawCell,
  type RawNotebook,
} from "./schema.js";
export { codeCells, createCell, createDocument, normalizeSource, notebookLanguage, withCells } from "./document.js";
export { parseNotebook, readNotebook, readNotebookSync, type ParseNotebookOptions } from "./parse.js";
export { notebookToJson, serializeNotebook, splitSourceLines, writeNotebook } from "./serialize.js";
