import path from "node:path";

import { getRuntimeConfig } from "./config.js";
import { NotebookNotFoundError } from "./errors.js";
import { findNotebook, normalizeSuffix, NOTEBOOK_SUFFIX } from "./finder.js";
import { loadNotebookModule, NotebookModule, type LoadNotebookOptions } from "./module.js";

/**
 * Teaches the importer about one kind of notebook file.
 *
 * `resolve` maps a module-style name to a file on the search path (or `null`);
 * `load` builds the module instance for a resolved file without running it.
 */
export interface NotebookResolver {
  readonly suffix: string;
  resolve(name: string, searchPath: readonly string[]): string | null;
  load(notebookPath: string, options: LoadNotebookOptions): NotebookModule;
}

export interface ImportNotebookOptions extends LoadNotebookOptions {
  searchPath?: readonly string[];
}

// Both maps live for the whole process. Instances are keyed by absolute path so
// that every import of one file shares a single namespace.
const resolvers = new Map<string, NotebookResolver>();
const instances = new Map<string, NotebookModule>();

export const ipynbResolver: NotebookResolver = {
  suffix: NOTEBOOK_SUFFIX,
  resolve: (name, searchPath) => findNotebook(name, searchPath, NOTEBOOK_SUFFIX),
  load: (notebookPath, options) => loadNotebookModule(notebookPath, options),
};

/**
 * Register a resolver for its suffix. Registering a suffix that already has a
 * resolver is a no-op and returns `false`.
 */
export function registerNotebookResolver(resolver: NotebookResolver): boolean {
  const suffix = normalizeSuffix(resolver.suffix);
  if (resolvers.has(suffix)) return false;
  resolvers.set(suffix, resolver);
  return true;
}

export function registeredSuffixes(): string[] {
  return [...resolvers.keys()];
}

function resolverForPath(notebookPath: string): NotebookResolver | null {
  let best: [string, NotebookResolver] | null = null;
  for (const entry of resolvers) {
    if (notebookPath.endsWith(entry[0]) && (!best || entry[0].length > best[0].length)) {
      best = entry;
    }
  }
  return best ? best[1] : null;
}

function importResolved(
  notebookPath: string,
  resolver: NotebookResolver,
  options: LoadNotebookOptions
): NotebookModule {
  const cached = instances.get(notebookPath);
  if (cached) return cached;

  const module = resolver.load(notebookPath, options);
  instances.set(notebookPath, module);
  module.logger.debug({ notebook: notebookPath, cells: module.cells.length }, "loaded notebook");
  return module;
}

/**
 * Import a notebook by module-style name, searching `options.searchPath`
 * (default: the configured `NBKIT_PATH`). Repeated imports of the same file
 * return the cached instance; load options only apply to the first import.
 */
export function importNotebook(name: string, options: ImportNotebookOptions = {}): NotebookModule {
  const searchPath = options.searchPath ?? getRuntimeConfig().searchPath;
  for (const resolver of resolvers.values()) {
    const found = resolver.resolve(name, searchPath);
    if (found) return importResolved(path.resolve(found), resolver, options);
  }
  throw new NotebookNotFoundError(`No notebook named "${name}" on the search path`, { target: name, searchPath });
}

export function importNotebookFromPath(notebookPath: string, options: LoadNotebookOptions = {}): NotebookModule {
  const resolved = path.resolve(notebookPath);
  const resolver = resolverForPath(resolved);
  if (!resolver) {
    throw new NotebookNotFoundError(`No notebook resolver is registered for ${resolved}`, { target: resolved });
  }
  return importResolved(resolved, resolver, options);
}

/** Replace the cached instance of `module`'s file with a freshly loaded one (new namespace). */
export function reloadNotebook(module: NotebookModule, options: LoadNotebookOptions = {}): NotebookModule {
  const resolver = resolverForPath(module.path);
  if (!resolver) {
    throw new NotebookNotFoundError(`No notebook resolver is registered for ${module.path}`, { target: module.path });
  }
  instances.delete(module.path);
  const fresh = importResolved(module.path, resolver, {
    ...options,
    name: options.name ?? module.name,
    logger: options.logger ?? module.logger,
    executor: options.executor ?? module.executor,
  });
  fresh.logger.debug({ notebook: module.path }, "reloaded notebook");
  return fresh;
}

export function loadedNotebook(notebookPath: string): NotebookModule | null {
  return instances.get(path.resolve(notebookPath)) ?? null;
}

export function invalidateNotebookCaches(): void {
  instances.clear();
}

registerNotebookResolver(ipynbResolver);
