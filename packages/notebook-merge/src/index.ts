export { MAX_REPORTED_CONFLICTS, check, findOrderConflicts } from "./check.js";
export { MergeOrderError, type IdPair } from "./errors.js";
export { checkNotebookFiles, mergeNotebookFiles } from "./files.js";
export { merge } from "./merge.js";
