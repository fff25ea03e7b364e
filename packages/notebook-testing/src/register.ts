import path from "node:path";

import type { LoadNotebookOptions } from "@nbkit/runtime";

import { discoverNotebookTests, type NotebookTestCase } from "./discover.js";
import { NotebookTestFailure } from "./errors.js";
import { runNotebookTest } from "./runner.js";

/** The part of a test runner's API that registration needs (Vitest's `describe`/`it` fit). */
export interface TestRegistrar {
  describe(name: string, fn: () => void): void;
  it(name: string, fn: () => void): void;
}

/**
 * Collect `notebookPath`'s test cases now and register them with the runner:
 * one suite named after the file, one test per case. Each test runs its case
 * when the runner gets to it and throws `NotebookTestFailure` on failure.
 *
 * ```ts
 * import { describe, it } from "vitest";
 * registerNotebookTests(new URL("./exercise.ipynb", import.meta.url).pathname, { describe, it });
 * ```
 */
export function registerNotebookTests(
  notebookPath: string,
  registrar: TestRegistrar,
  options: LoadNotebookOptions = {}
): NotebookTestCase[] {
  const cases = discoverNotebookTests(notebookPath, options);

  registrar.describe(path.basename(notebookPath), () => {
    for (const testCase of cases) {
      registrar.it(testCase.name, () => {
        const outcome = runNotebookTest(testCase);
        if (outcome.status === "failed") {
          throw new NotebookTestFailure(testCase.notebookPath, testCase.name, outcome);
        }
      });
    }
  });

  return cases;
}
