import { statSync } from "node:fs";
import path from "node:path";

export const NOTEBOOK_SUFFIX = ".ipynb";

export function normalizeSuffix(suffix: string): string {
  return suffix.startsWith(".") ? suffix : `.${suffix}`;
}

function isFile(candidate: string): boolean {
  return statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Locate a notebook by module-style name.
 *
 * `reports.weekly` looks for `weekly.ipynb` in each search-path directory, in
 * order. When `My_Notes.ipynb` does not exist, `My Notes.ipynb` is tried, so
 * notebooks with spaces in their names stay importable.
 */
export function findNotebook(
  fullname: string,
  searchPath: readonly string[] = [""],
  suffix: string = NOTEBOOK_SUFFIX
): string | null {
  const ext = normalizeSuffix(suffix);
  const bare = fullname.endsWith(ext) ? fullname.slice(0, -ext.length) : fullname;
  const name = bare.split(".").pop() ?? bare;
  if (name.length === 0) return null;

  const dirs = searchPath.length > 0 ? searchPath : [""];
  for (const dir of dirs) {
    const direct = path.resolve(dir, `${name}${ext}`);
    if (isFile(direct)) return direct;

    const spaced = path.resolve(dir, `${name.replaceAll("_", " ")}${ext}`);
    if (spaced !== direct && isFile(spaced)) return spaced;
  }
  return null;
}
