import { fileURLToPath } from "node:url";

import { createLogger } from "../src/logger.js";

export const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

/** Logger whose JSON lines are kept in memory instead of going to stderr. */
export function captureLogger(level = "debug") {
  const lines: string[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      lines.push(msg);
    },
  });
  return {
    logger,
    records: (): Array<Record<string, unknown>> => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

/** Whatever `fn` throws, or `undefined` when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
