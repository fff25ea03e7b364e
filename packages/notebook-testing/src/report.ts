import type { CellExecutionError, RunnableCell } from "@nbkit/runtime";

export const FAILURE_HEADER = "Failure in test cell:";
export const ERROR_HEADER = "Error in test cell:";
export const SETUP_ERROR_HEADER = "Test cell was not executed because an earlier cell raised an error:";

export interface FailureContext {
  /** The cell that raised. */
  cell: Pick<RunnableCell, "source" | "filename">;
  /** Whether that cell is the unit's test cell (as opposed to one of its setup cells). */
  isTestCell: boolean;
  error: CellExecutionError;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function cellLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * 1-based line of `filename` the error points at: the first stack frame (or
 * syntax-error location) naming the cell. `null` when the stack never mentions it.
 */
export function errorLine(
  error: Pick<CellExecutionError, "originalStack" | "errorMessage">,
  filename: string
): number | null {
  const pattern = new RegExp(`${escapeRegExp(filename)}:(\\d+)`);
  for (const text of [error.originalStack, error.errorMessage]) {
    const match = text ? pattern.exec(text) : null;
    if (match?.[1]) return Number(match[1]);
  }
  return null;
}

export function failureHeader(context: Pick<FailureContext, "isTestCell" | "error">): string {
  if (!context.isTestCell) return SETUP_ERROR_HEADER;
  return context.error.errorName === "AssertionError" ? FAILURE_HEADER : ERROR_HEADER;
}

/**
 * Render a failed unit: header, the raising cell with the failing line marked
 * `-> `, then `<ErrorName>: <message>`.
 */
export function formatFailure(context: FailureContext): string {
  const line = errorLine(context.error, context.cell.filename);
  const body = cellLines(context.cell.source)
    .map((text, i) => `${i + 1 === line ? "-> " : "   "}${text}`)
    .join("\n");
  return `${failureHeader(context)}\n\n${body}\n\n${context.error.errorName}: ${context.error.errorMessage}`;
}
