export type IdPair = readonly [string, string];

/**
 * Two notebooks share cells whose relative order differs between them.
 *
 * `firstId` precedes `secondId` in the first notebook but follows it in the
 * second. `conflicts` lists such pairs in first-notebook order; `truncated`
 * is set when more pairs conflict than were collected.
 */
export class MergeOrderError extends Error {
  readonly firstId: string;
  readonly secondId: string;
  readonly conflicts: readonly IdPair[];
  readonly truncated: boolean;

  constructor(conflicts: readonly IdPair[], options: { truncated?: boolean } = {}) {
    const [first] = conflicts;
    if (!first) throw new RangeError("MergeOrderError needs at least one conflicting pair");
    const truncated = options.truncated ?? false;
    const more =
      conflicts.length > 1 || truncated
        ? ` (${truncated ? "at least " : ""}${conflicts.length - 1} more conflicting pair(s))`
        : "";
    super(
      `Notebooks have shared cells in different orders: "${first[0]}" comes before "${first[1]}" in the first notebook but after it in the second${more}`
    );
    this.name = "MergeOrderError";
    this.firstId = first[0];
    this.secondId = first[1];
    this.conflicts = conflicts;
    this.truncated = truncated;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
