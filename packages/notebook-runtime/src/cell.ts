import type { JsonObject, NotebookCell } from "@nbkit/format";

import type { CellExecutor, NotebookNamespace } from "./executor.js";

/** What a cell needs from the notebook instance that owns it. */
export interface CellOwner {
  readonly path: string;
  readonly language: string;
  readonly namespace: NotebookNamespace;
  readonly executor: CellExecutor;
}

export function cellFilename(notebookPath: string, cell: Pick<NotebookCell, "id" | "index">): string {
  return cell.id !== null ? `${notebookPath} (cell id: ${cell.id})` : `${notebookPath} (cell ${cell.index})`;
}

export class RunnableCell {
  readonly cellType = "code" as const;
  readonly filename: string;

  constructor(
    readonly cell: NotebookCell,
    private readonly owner: CellOwner
  ) {
    this.filename = cellFilename(owner.path, cell);
  }

  get id(): string | null {
    return this.cell.id;
  }

  get index(): number {
    return this.cell.index;
  }

  get source(): string {
    return this.cell.source;
  }

  get metadata(): JsonObject {
    return this.cell.metadata;
  }

  /**
   * Compile and execute the cell in the owning notebook's namespace.
   *
   * Returns the value of the cell's last expression statement. Errors are thrown
   * as raised by the cell. Every call executes the source again.
   */
  run(): unknown {
    return this.owner.executor.execute(this.cell.source, this.owner.namespace, {
      filename: this.filename,
      language: this.owner.language,
    });
  }

  toString(): string {
    return `<CodeCell index=${this.index} id=${this.id ?? "none"}>`;
  }
}
