export {
  COMMENT_MARKERS,
  SCRIPT_COMMENT_MARKERS,
  collectTestUnits,
  isTestCell,
  testCellName,
  type CollectOptions,
  type CollectableCell,
  type TestUnit,
} from "./collector.js";
export { discoverNotebookTests, testCellMarkers, type NotebookTestCase } from "./discover.js";
export { NotebookTestFailure, type FailedOutcome } from "./errors.js";
export { registerNotebookTests, type TestRegistrar } from "./register.js";
export {
  ERROR_HEADER,
  FAILURE_HEADER,
  SETUP_ERROR_HEADER,
  errorLine,
  failureHeader,
  formatFailure,
  type FailureContext,
} from "./report.js";
export { SKIP_METADATA_KEY, SKIP_TAG, isSkippedCell, runNotebookTest, type NotebookTestOutcome } from "./runner.js";
