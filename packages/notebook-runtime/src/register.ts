import { register } from "node:module";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { NotebookHooksData } from "./hooks.js";
import { registeredSuffixes } from "./registry.js";

const HOOKS_URL = new URL(`./hooks${path.extname(fileURLToPath(import.meta.url))}`, import.meta.url);

let registered = false;

/**
 * Install the notebook import hooks into Node's module loader. Safe to call from
 * several entry points: only the first call registers anything.
 *
 * Suffixes default to every suffix known to the resolver registry at call time.
 */
export function registerNotebookHooks(options: NotebookHooksData = {}): boolean {
  if (registered) return false;

  const data: NotebookHooksData = {
    suffixes: options.suffixes ?? registeredSuffixes(),
    searchPath: options.searchPath,
  };
  register(HOOKS_URL, { parentURL: import.meta.url, data });
  registered = true;
  return true;
}
