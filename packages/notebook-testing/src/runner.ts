import { CellExecutionError, type RunnableCell } from "@nbkit/runtime";

import type { NotebookTestCase } from "./discover.js";
import { formatFailure } from "./report.js";

/** Cell metadata key holding grading directives such as `{ "skip": true }`. */
export const SKIP_METADATA_KEY = "markus";
export const SKIP_TAG = "skip";

export type NotebookTestOutcome =
  | { readonly status: "passed" }
  | {
      readonly status: "failed";
      readonly error: CellExecutionError;
      /** The cell that raised: a setup cell or the test cell itself. */
      readonly failedCell: RunnableCell;
      readonly report: string;
    };

/**
 * Whether a setup cell is left out of test runs: its `markus` metadata is an
 * object whose `skip` is absent or truthy, or its `tags` include `skip`.
 */
export function isSkippedCell(cell: Pick<RunnableCell, "metadata">): boolean {
  const directives = cell.metadata[SKIP_METADATA_KEY];
  if (typeof directives === "object" && directives !== null && !Array.isArray(directives)) {
    const skip: unknown = Reflect.get(directives, "skip");
    if (skip === undefined || Boolean(skip)) return true;
  }

  const tags = cell.metadata.tags;
  return Array.isArray(tags) && tags.includes(SKIP_TAG);
}

/**
 * Run one test case: its setup cells, then its test cell, in the notebook's
 * shared namespace. Stops at the first cell that raises and reports it; a
 * failure never stops later cases from running.
 */
export function runNotebookTest(testCase: NotebookTestCase): NotebookTestOutcome {
  const { setupCells, testCell } = testCase.unit;

  for (const cell of [...setupCells, testCell]) {
    const isTestCell = cell === testCell;
    if (!isTestCell && isSkippedCell(cell)) continue;
    try {
      cell.run();
    } catch (err) {
      const error = new CellExecutionError(cell, err);
      return {
        status: "failed",
        error,
        failedCell: cell,
        report: formatFailure({ cell, isTestCell, error }),
      };
    }
  }

  return { status: "passed" };
}
