import {
  importNotebookFromPath,
  resolveCellLanguage,
  type LoadNotebookOptions,
  type NotebookModule,
  type RunnableCell,
} from "@nbkit/runtime";

import { COMMENT_MARKERS, SCRIPT_COMMENT_MARKERS, collectTestUnits, type TestUnit } from "./collector.js";

export interface NotebookTestCase {
  readonly name: string;
  /** Absolute path of the notebook the case was collected from. */
  readonly notebookPath: string;
  /** 0-based position among the notebook's test cases. */
  readonly position: number;
  readonly unit: TestUnit<RunnableCell>;
  /** Loaded instance whose namespace every case of the notebook shares. */
  readonly module: NotebookModule;
}

/**
 * Comment markers that open a test cell in a notebook of `language`. Cells of
 * the languages nbkit runs only take `//`: a `#` first line would never compile.
 */
export function testCellMarkers(language: string): readonly string[] {
  return resolveCellLanguage(language) ? SCRIPT_COMMENT_MARKERS : COMMENT_MARKERS;
}

/**
 * Load a notebook as a module and collect its test cases. Nothing executes
 * here; cases run later, in order, through `runNotebookTest`.
 */
export function discoverNotebookTests(notebookPath: string, options: LoadNotebookOptions = {}): NotebookTestCase[] {
  const module = importNotebookFromPath(notebookPath, options);
  return collectTestUnits(module.cells, { markers: testCellMarkers(module.language) }).map((unit, position) =>
    Object.freeze({ name: unit.name, notebookPath: module.path, position, unit, module })
  );
}
