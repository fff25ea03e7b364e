import assert from "node:assert";
import { createRequire } from "node:module";
import path from "node:path";
import vm from "node:vm";

import { resolveCellLanguage } from "./config.js";
import { UnsupportedLanguageError } from "./errors.js";
import { redeclarableSource } from "./redeclare.js";
import { transpileCell } from "./transpile.js";

/** Global scope shared by every cell of one loaded notebook. */
export type NotebookNamespace = vm.Context;

export interface NamespaceInit {
  /** Absolute path of the notebook; anchors `require` and `__dirname`. */
  filename: string;
  globals?: Record<string, unknown>;
}

export interface ExecuteOptions {
  /** Name reported in stack traces for this cell. */
  filename: string;
  language: string;
}

/**
 * Boundary between nbkit and whatever actually runs cell code. Execution is
 * synchronous: `execute` returns the cell's completion value or throws what the
 * cell threw.
 */
export interface CellExecutor {
  createNamespace(init: NamespaceInit): NotebookNamespace;
  execute(source: string, namespace: NotebookNamespace, options: ExecuteOptions): unknown;
}

/** Host globals a script run directly under Node can use; vm contexts only get the language built-ins. */
function hostGlobals(): Record<string, unknown> {
  return {
    process,
    Buffer,
    setTimeout,
    clearTimeout,
    setInterval,
    clearInterval,
    setImmediate,
    clearImmediate,
    queueMicrotask,
    structuredClone,
    URL,
    URLSearchParams,
    TextEncoder,
    TextDecoder,
    AbortController,
    AbortSignal,
    performance,
    atob,
    btoa,
  };
}

/**
 * Compile a cell. The source as written is compiled first so that syntax errors
 * point at the cell's own text; the redeclarable rewrite is what runs.
 */
function compileCell(code: string, filename: string): vm.Script {
  const script = new vm.Script(code, { filename });
  const rewritten = redeclarableSource(code);
  return rewritten === code ? script : new vm.Script(rewritten, { filename });
}

export class VmCellExecutor implements CellExecutor {
  createNamespace(init: NamespaceInit): NotebookNamespace {
    return vm.createContext({
      ...hostGlobals(),
      console,
      assert,
      require: createRequire(init.filename),
      __filename: init.filename,
      __dirname: path.dirname(init.filename),
      ...init.globals,
    });
  }

  execute(source: string, namespace: NotebookNamespace, options: ExecuteOptions): unknown {
    const language = resolveCellLanguage(options.language);
    if (!language) throw new UnsupportedLanguageError(options.language);

    const code = language === "typescript" ? transpileCell(source, options.filename) : source;
    return compileCell(code, options.filename).runInContext(namespace, { displayErrors: true });
  }
}
