export interface FormatIssue {
  /** Dotted path of the offending field, e.g. `cells.2.source`. Empty for the root. */
  path: string;
  message: string;
}

export class FormatError extends Error {
  readonly path?: string;
  readonly issues: FormatIssue[];

  constructor(message: string, options: { path?: string; issues?: FormatIssue[]; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "FormatError";
    this.path = options.path;
    this.issues = options.issues ?? [];
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
