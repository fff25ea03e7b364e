/**
 * Node.js module customization hooks that make notebooks importable:
 *
 *   import analysis from "./analysis.ipynb";
 *   import report from "notebook:weekly_report";
 *
 * The imported module's default export is the `NotebookModule` instance (no
 * cell has run yet); `cells` is re-exported for convenience. Install with
 * `registerNotebookHooks()`.
 */
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

import { loadRuntimeConfigFromEnv } from "./config.js";
import { NotebookNotFoundError } from "./errors.js";
import { findNotebook, normalizeSuffix, NOTEBOOK_SUFFIX } from "./finder.js";

export const NOTEBOOK_SCHEME = "notebook:";

export interface NotebookHooksData {
  suffixes?: readonly string[];
  searchPath?: readonly string[];
}

export interface ResolveContext {
  parentURL?: string;
  conditions?: readonly string[];
  importAttributes?: Record<string, string>;
}

export interface ResolveResult {
  url: string;
  format?: string | null;
  shortCircuit?: boolean;
}

export type NextResolve = (specifier: string, context?: ResolveContext) => ResolveResult | Promise<ResolveResult>;

export interface LoadContext {
  format?: string | null;
  conditions?: readonly string[];
  importAttributes?: Record<string, string>;
}

export interface LoadResult {
  format?: string | null;
  source?: string | ArrayBuffer | Uint8Array | null;
  shortCircuit?: boolean;
}

export type NextLoad = (url: string, context?: LoadContext) => LoadResult | Promise<LoadResult>;

// Runs from src/ under a TS loader and from dist/ once built; import the
// runtime entry point with whichever extension this file has.
const RUNTIME_ENTRY_URL = new URL(
  `./index${path.extname(fileURLToPath(import.meta.url))}`,
  import.meta.url
).href;

let suffixes: string[] = [NOTEBOOK_SUFFIX];
let searchPath: string[] | null = null;

export function initialize(data: NotebookHooksData = {}): void {
  suffixes = data.suffixes && data.suffixes.length > 0 ? [...new Set(data.suffixes.map(normalizeSuffix))] : [NOTEBOOK_SUFFIX];
  searchPath = data.searchPath ? [...data.searchPath] : null;
}

function hasNotebookSuffix(value: string): boolean {
  return suffixes.some((suffix) => value.endsWith(suffix));
}

function isPathSpecifier(specifier: string): boolean {
  return (
    specifier.startsWith("./") ||
    specifier.startsWith("../") ||
    specifier.startsWith("/") ||
    specifier.startsWith("file:")
  );
}

function resolveByName(name: string): string {
  const dirs = searchPath ?? loadRuntimeConfigFromEnv().searchPath;
  for (const suffix of suffixes) {
    const found = findNotebook(name, dirs, suffix);
    if (found) return found;
  }
  throw new NotebookNotFoundError(`No notebook named "${name}" on the search path`, { target: name, searchPath: dirs });
}

export async function resolve(
  specifier: string,
  context: ResolveContext,
  nextResolve: NextResolve
): Promise<ResolveResult> {
  if (specifier.startsWith(NOTEBOOK_SCHEME)) {
    const found = resolveByName(specifier.slice(NOTEBOOK_SCHEME.length));
    return { url: pathToFileURL(found).href, shortCircuit: true };
  }

  if (isPathSpecifier(specifier) && hasNotebookSuffix(specifier)) {
    const base = context.parentURL ?? pathToFileURL(`${process.cwd()}${path.sep}`).href;
    return { url: new URL(specifier, base).href, shortCircuit: true };
  }

  return nextResolve(specifier, context);
}

/** ES module text that imports the notebook at `notebookPath` through the shared registry. */
export function notebookModuleSource(notebookPath: string): string {
  return [
    `import { importNotebookFromPath } from ${JSON.stringify(RUNTIME_ENTRY_URL)};`,
    `const notebook = importNotebookFromPath(${JSON.stringify(notebookPath)});`,
    "export const cells = notebook.cells;",
    "export default notebook;",
    "",
  ].join("\n");
}

export async function load(url: string, context: LoadContext, nextLoad: NextLoad): Promise<LoadResult> {
  if (url.startsWith("file:") && hasNotebookSuffix(new URL(url).pathname)) {
    return {
      format: "module",
      source: notebookModuleSource(fileURLToPath(url)),
      shortCircuit: true,
    };
  }
  return nextLoad(url, context);
}
