export interface ErrorDescription {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Read `name`/`message`/`stack` off a thrown value.
 *
 * Cells run in their own realm, so their errors fail `instanceof Error` checks
 * in the host; go by shape instead.
 */
export function describeError(value: unknown): ErrorDescription {
  if (typeof value === "object" && value !== null) {
    const name: unknown = Reflect.get(value, "name");
    const message: unknown = Reflect.get(value, "message");
    const stack: unknown = Reflect.get(value, "stack");
    if (typeof message === "string") {
      return {
        name: typeof name === "string" && name.length > 0 ? name : "Error",
        message,
        stack: typeof stack === "string" ? stack : undefined,
      };
    }
  }
  return { name: "Error", message: String(value) };
}

export interface CellLocation {
  readonly id: string | null;
  readonly index: number;
  readonly filename: string;
}

/**
 * Captured failure of one cell. Only produced where errors are collected
 * (lenient `runCells`, test outcomes); `RunnableCell.run()` rethrows the
 * original value.
 */
export class CellExecutionError extends Error {
  readonly cellId: string | null;
  readonly cellIndex: number;
  readonly filename: string;
  readonly errorName: string;
  readonly errorMessage: string;
  readonly originalStack?: string;

  constructor(cell: CellLocation, cause: unknown) {
    const described = describeError(cause);
    super(`${described.name}: ${described.message}`, { cause });
    this.name = "CellExecutionError";
    this.cellId = cell.id;
    this.cellIndex = cell.index;
    this.filename = cell.filename;
    this.errorName = described.name;
    this.errorMessage = described.message;
    this.originalStack = described.stack;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedLanguageError extends Error {
  readonly language: string;

  constructor(language: string) {
    super(`Cannot execute notebook cells written in "${language}"`);
    this.name = "UnsupportedLanguageError";
    this.language = language;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotebookNotFoundError extends Error {
  readonly target: string;
  readonly searchPath: readonly string[];

  constructor(message: string, options: { target: string; searchPath?: readonly string[] }) {
    super(message);
    this.name = "NotebookNotFoundError";
    this.target = options.target;
    this.searchPath = options.searchPath ?? [];
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
