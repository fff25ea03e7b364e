export { RunnableCell, cellFilename, type CellOwner } from "./cell.js";
export {
  getRuntimeConfig,
  loadRuntimeConfigFromEnv,
  resolveCellLanguage,
  type CellLanguage,
  type RuntimeConfig,
} from "./config.js";
export {
  CellExecutionError,
  NotebookNotFoundError,
  UnsupportedLanguageError,
  describeError,
  type CellLocation,
  type ErrorDescription,
} from "./errors.js";
export {
  VmCellExecutor,
  type CellExecutor,
  type ExecuteOptions,
  type NamespaceInit,
  type NotebookNamespace,
} from "./executor.js";
export { NOTEBOOK_SUFFIX, findNotebook, normalizeSuffix } from "./finder.js";
export { NOTEBOOK_SCHEME, notebookModuleSource, type NotebookHooksData } from "./hooks.js";
export { createLogger, getDefaultLogger, type Logger } from "./logger.js";
export {
  NotebookModule,
  getCells,
  loadNotebookModule,
  notebookModuleName,
  runCells,
  type LoadNotebookOptions,
  type RunCellsOptions,
} from "./module.js";
export { registerNotebookHooks } from "./register.js";
export {
  importNotebook,
  importNotebookFromPath,
  invalidateNotebookCaches,
  ipynbResolver,
  loadedNotebook,
  registerNotebookResolver,
  registeredSuffixes,
  reloadNotebook,
  type ImportNotebookOptions,
  type NotebookResolver,
} from "./registry.js";
export { transpileCell } from "./transpile.js";
