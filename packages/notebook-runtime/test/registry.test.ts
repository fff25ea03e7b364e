import { createDocument } from "@nbkit/format";
import { afterEach, describe, expect, it } from "vitest";

import { NotebookNotFoundError } from "../src/errors.js";
import { NotebookModule } from "../src/module.js";
import {
  importNotebook,
  importNotebookFromPath,
  invalidateNotebookCaches,
  ipynbResolver,
  loadedNotebook,
  registerNotebookResolver,
  registeredSuffixes,
  reloadNotebook,
  type NotebookResolver,
} from "../src/registry.js";
import { captureLogger, FIXTURES, fixture } from "./helpers.js";

const virtualResolver: NotebookResolver = {
  suffix: "nbvirtual",
  resolve: (name) => (name === "answer" ? "/virtual/answer.nbvirtual" : null),
  load: (notebookPath, options) =>
    new NotebookModule(notebookPath, createDocument({ cells: [{ cellType: "code", source: "40 + 2" }] }), options),
};

afterEach(() => {
  invalidateNotebookCaches();
});

describe("importNotebook", () => {
  it("returns one cached instance per notebook file", () => {
    const { logger } = captureLogger();
    const first = importNotebook("counter", { searchPath: [FIXTURES], logger });
    const second = importNotebook("counter", { searchPath: [FIXTURES], logger });
    const byPath = importNotebookFromPath(fixture("counter.ipynb"));

    expect(second).toBe(first);
    expect(byPath).toBe(first);
    expect(loadedNotebook(fixture("counter.ipynb"))).toBe(first);
  });

  it("shares the namespace between imports of the same file", () => {
    const { logger } = captureLogger();
    const first = importNotebook("counter", { searchPath: [FIXTURES], logger });
    first.cells[0]?.run();

    expect(importNotebook("counter", { searchPath: [FIXTURES] }).cells[1]?.run()).toBe(2);
  });

  it("logs a debug line when it loads an instance", () => {
    const capture = captureLogger();
    importNotebook("counter", { searchPath: [FIXTURES], logger: capture.logger });
    importNotebook("counter", { searchPath: [FIXTURES], logger: capture.logger });

    expect(capture.records()).toEqual([
      expect.objectContaining({ level: 20, msg: "loaded notebook", notebook: fixture("counter.ipynb"), cells: 3 }),
    ]);
  });

  it("throws NotebookNotFoundError for unknown names", () => {
    expect(() => importNotebook("absent", { searchPath: [FIXTURES] })).toThrow(
      new NotebookNotFoundError('No notebook named "absent" on the search path', { target: "absent" })
    );
  });

  it("uses resolvers registered for other suffixes", () => {
    registerNotebookResolver(virtualResolver);
    const module = importNotebook("answer", { searchPath: [FIXTURES], logger: captureLogger().logger });

    expect(module.path).toBe("/virtual/answer.nbvirtual");
    expect(module.cells[0]?.run()).toBe(42);
    expect(importNotebookFromPath("/virtual/answer.nbvirtual")).toBe(module);
  });
});

describe("importNotebookFromPath", () => {
  it("rejects files without a registered suffix", () => {
    expect(() => importNotebookFromPath(fixture("counter.txt"))).toThrow(NotebookNotFoundError);
  });
});

describe("registerNotebookResolver", () => {
  it("registers the ipynb resolver at startup", () => {
    expect(registeredSuffixes()).toContain(".ipynb");
  });

  it("is a no-op for a suffix that already has a resolver", () => {
    expect(registerNotebookResolver(ipynbResolver)).toBe(false);
    expect(registerNotebookResolver({ ...ipynbResolver, suffix: "ipynb" })).toBe(false);
    expect(registeredSuffixes().filter((suffix) => suffix === ".ipynb")).toHaveLength(1);
  });

  it("accepts a new suffix once", () => {
    const resolver: NotebookResolver = { ...virtualResolver, suffix: ".nbonce" };
    expect(registerNotebookResolver(resolver)).toBe(true);
    expect(registerNotebookResolver(resolver)).toBe(false);
  });
});

describe("reloadNotebook", () => {
  it("replaces the cached instance with a fresh namespace", () => {
    const original = importNotebook("counter", { searchPath: [FIXTURES], logger: captureLogger().logger });
    original.cells[0]?.run();

    const fresh = reloadNotebook(original);

    expect(fresh).not.toBe(original);
    expect(fresh.namespace.x).toBeUndefined();
    expect(original.namespace.x).toBe(1);
    expect(importNotebookFromPath(fixture("counter.ipynb"))).toBe(fresh);
  });
});

describe("reloadNotebook options", () => {
  it("keeps the inherited logger and executor when options leave them undefined", () => {
    const original = importNotebook("counter", { searchPath: [FIXTURES], logger: captureLogger().logger });

    const fresh = reloadNotebook(original, { logger: undefined, executor: undefined, name: undefined });

    expect(fresh.logger).toBe(original.logger);
    expect(fresh.executor).toBe(original.executor);
    expect(fresh.name).toBe(original.name);
  });

  it("applies options that are given", () => {
    const original = importNotebook("counter", { searchPath: [FIXTURES], logger: captureLogger().logger });
    const { logger } = captureLogger();

    const fresh = reloadNotebook(original, { logger, name: "renamed" });

    expect(fresh.logger).toBe(logger);
    expect(fresh.name).toBe("renamed");
    expect(fresh.executor).toBe(original.executor);
  });
});

describe("invalidateNotebookCaches", () => {
  it("forgets every loaded instance", () => {
    const first = importNotebook("counter", { searchPath: [FIXTURES], logger: captureLogger().logger });
    invalidateNotebookCaches();

    expect(loadedNotebook(fixture("counter.ipynb"))).toBeNull();
    expect(importNotebook("counter", { searchPath: [FIXTURES], logger: captureLogger().logger })).not.toBe(first);
  });
});
