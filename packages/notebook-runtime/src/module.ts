import path from "node:path";

import { notebookLanguage, readNotebookSync, type NotebookDocument } from "@nbkit/format";

import { RunnableCell } from "./cell.js";
import { getRuntimeConfig, type RuntimeConfig } from "./config.js";
import { CellExecutionError } from "./errors.js";
import { VmCellExecutor, type CellExecutor, type NotebookNamespace } from "./executor.js";
import { getDefaultLogger, type Logger } from "./logger.js";

export interface LoadNotebookOptions {
  /** Module name; defaults to the file name without its suffix, spaces as `_`. */
  name?: string;
  executor?: CellExecutor;
  /** Error channel for lenient `runCells`; defaults to the process-wide stderr logger. */
  logger?: Logger;
  /** Extra globals seeded into the namespace before any cell runs. */
  globals?: Record<string, unknown>;
  config?: RuntimeConfig;
}

export function notebookModuleName(notebookPath: string): string {
  const base = path.basename(notebookPath);
  const ext = path.extname(base);
  return (ext ? base.slice(0, -ext.length) : base).replaceAll(" ", "_");
}

/**
 * A notebook loaded as a module: its parsed document plus one namespace that
 * every code cell executes in. Constructing it runs nothing.
 */
export class NotebookModule {
  readonly name: string;
  readonly path: string;
  readonly document: NotebookDocument;
  readonly language: string;
  readonly namespace: NotebookNamespace;
  readonly executor: CellExecutor;
  readonly logger: Logger;
  /** Runnable wrappers for the code cells, in document order. */
  readonly cells: readonly RunnableCell[];

  constructor(notebookPath: string, document: NotebookDocument, options: LoadNotebookOptions = {}) {
    const config = options.config ?? getRuntimeConfig();
    this.path = path.resolve(notebookPath);
    this.name = options.name ?? notebookModuleName(this.path);
    this.document = document;
    this.language = notebookLanguage(document) ?? config.defaultLanguage;
    this.executor = options.executor ?? new VmCellExecutor();
    this.logger = options.logger ?? getDefaultLogger();
    this.namespace = this.executor.createNamespace({ filename: this.path, globals: options.globals });
    this.cells = Object.freeze(
      document.cells.filter((cell) => cell.cellType === "code").map((cell) => new RunnableCell(cell, this))
    );
  }

  toString(): string {
    return `<NotebookModule ${this.name} from ${this.path}>`;
  }
}

export function loadNotebookModule(notebookPath: string, options: LoadNotebookOptions = {}): NotebookModule {
  const resolved = path.resolve(notebookPath);
  return new NotebookModule(resolved, readNotebookSync(resolved), options);
}

export function getCells(module: NotebookModule): readonly RunnableCell[] {
  return module.cells;
}

export interface RunCellsOptions {
  /**
   * `true` (default): the first failing cell's error propagates unchanged and
   * later cells do not run. `false`: each failure is logged and the next cell runs.
   */
  raiseOnError?: boolean;
  logger?: Logger;
}

export function runCells(module: NotebookModule, options: RunCellsOptions = {}): void {
  const raiseOnError = options.raiseOnError ?? true;
  const logger = options.logger ?? module.logger;

  for (const cell of module.cells) {
    if (raiseOnError) {
      cell.run();
      continue;
    }
    try {
      cell.run();
    } catch (err) {
      const error = new CellExecutionError(cell, err);
      logger.error(
        { err: error, notebook: module.path, cellId: cell.id, cellIndex: cell.index },
        "notebook cell raised an error"
      );
    }
  }
}
