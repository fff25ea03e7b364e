import { readNotebook, type NotebookDocument } from "@nbkit/format";

import { check } from "./check.js";
import { merge } from "./merge.js";

export async function mergeNotebookFiles(firstPath: string, secondPath: string): Promise<NotebookDocument> {
  const [first, second] = await Promise.all([readNotebook(firstPath), readNotebook(secondPath)]);
  return merge(first, second);
}

export async function checkNotebookFiles(firstPath: string, secondPath: string): Promise<void> {
  const [first, second] = await Promise.all([readNotebook(firstPath), readNotebook(secondPath)]);
  check(first, second);
}
