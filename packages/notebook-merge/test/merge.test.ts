import { createDocument, type CellType, type NotebookDocument } from "@nbkit/format";
import { describe, expect, it } from "vitest";

import { merge } from "../src/merge.js";

/** Document whose cells carry the given ids; each source records which side it came from. */
function doc(side: string, ids: Array<string | null>, cellType: CellType = "code"): NotebookDocument {
  return createDocument({
    cells: ids.map((id) => ({ id, cellType, source: `${side}:${id ?? "none"}` })),
    metadata: { side },
  });
}

function sources(document: NotebookDocument): string[] {
  return document.cells.map((cell) => cell.source);
}

describe("merge", () => {
  it("is the identity when merging a notebook with itself", () => {
    const d = createDocument({
      cells: [
        { id: "a", cellType: "markdown", source: "# Title" },
        { id: "b", cellType: "code", source: "var b = 1;", extra: { outputs: [], execution_count: 3 } },
        { id: "c", cellType: "raw", source: "raw" },
      ],
      metadata: { kernelspec: { language: "javascript" } },
    });

    expect(merge(d, d)).toEqual(d);
  });

  it("concatenates notebooks that share no ids", () => {
    const merged = merge(doc("one", ["a", "b"]), doc("two", ["c", "d"]));
    expect(sources(merged)).toEqual(["one:a", "one:b", "two:c", "two:d"]);
  });

  it("takes the second notebook's version at shared ids and appends its trailing cells", () => {
    const merged = merge(doc("one", ["1", "2", "3"]), doc("two", ["2", "4"]));
    expect(sources(merged)).toEqual(["one:1", "two:2", "one:3", "two:4"]);
  });

  it("emits second-only cells just before the shared cell that follows them", () => {
    const merged = merge(doc("one", ["a", "b", "c"]), doc("two", ["a", "new1", "new2", "c"]));
    expect(sources(merged)).toEqual(["two:a", "one:b", "two:new1", "two:new2", "two:c"]);
  });

  it("passes first-only cells through at their position", () => {
    const merged = merge(doc("one", ["x", "a", "y", "b", "z"]), doc("two", ["a", "b"]));
    expect(sources(merged)).toEqual(["one:x", "two:a", "one:y", "two:b", "one:z"]);
  });

  it("never aligns cells without ids", () => {
    const merged = merge(doc("one", [null, "a"]), doc("two", [null, "a"]));
    expect(sources(merged)).toEqual(["one:none", "two:none", "two:a"]);
  });

  it("keeps following the pointer when shared cells are out of order", () => {
    const merged = merge(doc("one", ["a", "b"]), doc("two", ["b", "a"]));
    expect(sources(merged)).toEqual(["two:b", "two:a", "one:b"]);
  });

  it("merges across cell types", () => {
    const first = createDocument({
      cells: [
        { id: "intro", cellType: "markdown", source: "old intro" },
        { id: "code", cellType: "code", source: "1" },
      ],
    });
    const second = createDocument({
      cells: [
        { id: "intro", cellType: "markdown", source: "new intro" },
        { id: "code", cellType: "code", source: "2" },
      ],
    });

    expect(merge(first, second).cells.map((cell) => [cell.cellType, cell.source])).toEqual([
      ["markdown", "new intro"],
      ["code", "2"],
    ]);
  });

  it("keeps the first notebook's metadata and re-indexes cells", () => {
    const merged = merge(doc("one", ["1", "2", "3"]), doc("two", ["2", "4"]));

    expect(merged.metadata).toEqual({ side: "one" });
    expect(merged.cells.map((cell) => cell.index)).toEqual([0, 1, 2, 3]);
  });

  it("leaves its inputs untouched", () => {
    const first = doc("one", ["1", "2"]);
    const second = doc("two", ["0", "2"]);

    merge(first, second);

    expect(first.cells.map((cell) => cell.index)).toEqual([0, 1]);
    expect(second.cells.map((cell) => cell.index)).toEqual([0, 1]);
  });
});
