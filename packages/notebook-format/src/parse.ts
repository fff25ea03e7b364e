import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { ZodIssue } from "zod";

import { createDocument } from "./document.js";
import { FormatError, type FormatIssue } from "./errors.js";
import { RawNotebookSchema, type RawCell } from "./schema.js";
import type { CellInit, NotebookDocument } from "./types.js";

export interface ParseNotebookOptions {
  /** File the text came from; only used in error messages. */
  path?: string;
}

function toIssue(issue: ZodIssue): FormatIssue {
  return { path: issue.path.join("."), message: issue.message };
}

function describeTarget(path: string | undefined): string {
  return path ? `notebook ${path}` : "notebook";
}

function toCellInit(cell: RawCell): CellInit {
  const { cell_type, source, id, metadata, ...extra } = cell;
  return { id: id ?? null, cellType: cell_type, source, metadata, extra };
}

export function parseNotebook(text: string, options: ParseNotebookOptions = {}): NotebookDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FormatError(`Invalid ${describeTarget(options.path)}: not valid JSON (${reason})`, {
      path: options.path,
      cause: err,
    });
  }

  const parsed = RawNotebookSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(toIssue);
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");
    throw new FormatError(`Invalid ${describeTarget(options.path)}: ${summary}`, {
      path: options.path,
      issues,
      cause: parsed.error,
    });
  }

  const { cells, metadata, nbformat, nbformat_minor, ...extra } = parsed.data;
  return createDocument({
    cells: cells.map(toCellInit),
    metadata,
    nbformat,
    nbformatMinor: nbformat_minor,
    extra,
  });
}

export async function readNotebook(path: string): Promise<NotebookDocument> {
  const text = await readFile(path, "utf8");
  return parseNotebook(text, { path });
}

export function readNotebookSync(path: string): NotebookDocument {
  return parseNotebook(readFileSync(path, "utf8"), { path });
}
