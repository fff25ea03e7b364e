/** Line-comment markers a test cell's first line may start with, each repeatable. */
export const COMMENT_MARKERS: readonly string[] = ["//", "#"];
/** Markers of the languages cells run in; `#` is not a comment there. */
export const SCRIPT_COMMENT_MARKERS: readonly string[] = ["//"];

const TEST_WORD = /\btest/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function commentLinePattern(markers: readonly string[]): RegExp {
  const alternatives = markers.map((marker) => `${escapeRegExp(marker)}${escapeRegExp(marker.slice(-1))}*`);
  return new RegExp(`^\\s*(?:${alternatives.join("|")})(.*)$`);
}

const DEFAULT_COMMENT_LINE = commentLinePattern(COMMENT_MARKERS);

/** Minimal view of a cell the collector needs; satisfied by parsed and runnable cells. */
export interface CollectableCell {
  readonly cellType: string;
  readonly source: string;
}

export interface TestUnit<C extends CollectableCell = CollectableCell> {
  /** Comment text of the test cell's first line, trimmed. */
  readonly name: string;
  /** Code cells since the previous test cell, in document order. */
  readonly setupCells: readonly C[];
  readonly testCell: C;
}

export interface CollectOptions {
  /** Comment markers that can open a test cell; defaults to `COMMENT_MARKERS`. */
  markers?: readonly string[];
}

function commentLine(options: CollectOptions): RegExp {
  return options.markers ? commentLinePattern(options.markers) : DEFAULT_COMMENT_LINE;
}

function nameFromFirstLine(source: string, pattern: RegExp): string | null {
  const firstLine = source.split(/\r?\n/, 1)[0] ?? "";
  const match = pattern.exec(firstLine);
  if (!match) return null;
  const text = (match[1] ?? "").trim();
  return TEST_WORD.test(text) ? text : null;
}

/**
 * Name of the test a cell declares, or `null` when the cell is not a test cell:
 * its first line is a comment whose text mentions `test` at a word start.
 */
export function testCellName(source: string, options: CollectOptions = {}): string | null {
  return nameFromFirstLine(source, commentLine(options));
}

export function isTestCell(cell: CollectableCell, options: CollectOptions = {}): boolean {
  return cell.cellType === "code" && testCellName(cell.source, options) !== null;
}

/**
 * Partition code cells into test units. Every test cell closes a unit whose
 * setup is the code cells since the previous test cell; code cells after the
 * last test cell belong to no unit.
 */
export function collectTestUnits<C extends CollectableCell>(
  cells: readonly C[],
  options: CollectOptions = {}
): TestUnit<C>[] {
  const pattern = commentLine(options);
  const units: TestUnit<C>[] = [];
  let setupCells: C[] = [];

  for (const cell of cells) {
    if (cell.cellType !== "code") continue;
    const name = nameFromFirstLine(cell.source, pattern);
    if (name === null) {
      setupCells.push(cell);
      continue;
    }
    units.push(Object.freeze({ name, setupCells: Object.freeze(setupCells), testCell: cell }));
    setupCells = [];
  }

  return units;
}
