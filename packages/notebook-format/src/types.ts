export type CellType = "code" | "markdown" | "raw";

export type JsonObject = Readonly<Record<string, unknown>>;

export interface NotebookCell {
  /**
   * Stable cell identifier (nbformat >= 4.5).
   *
   * `null` for notebooks written before cell ids existed. Editors of that era
   * regenerate ids on every save, so id-based alignment is only as good as the
   * tool that wrote the file.
   */
  readonly id: string | null;
  readonly cellType: CellType;
  /** Cell text, with list-of-lines sources already joined. */
  readonly source: string;
  /** Dense position of the cell within its document. */
  readonly index: number;
  readonly metadata: JsonObject;
  /**
   * Every other field of the cell object (`outputs`, `execution_count`,
   * `attachments`, ...). Preserved on write, never interpreted.
   */
  readonly extra: JsonObject;
}

export interface NotebookDocument {
  readonly cells: readonly NotebookCell[];
  readonly metadata: JsonObject;
  readonly nbformat: number;
  readonly nbformatMinor: number;
  /** Unknown top-level fields, written back as they were read. */
  readonly extra: JsonObject;
}

export interface CellInit {
  id?: string | null;
  cellType: CellType;
  source: string | readonly string[];
  metadata?: Record<string, unknown>;
  extra?: Record<string, unknown>;
}

export interface DocumentInit {
  cells: readonly CellInit[];
  metadata?: Record<string, unknown>;
  nbformat?: number;
  nbformatMinor?: number;
  extra?: Record<string, unknown>;
}
