import path from "node:path";

export type CellLanguage = "javascript" | "typescript";

export type RuntimeConfig = {
  /** Directories searched, in order, by `importNotebook(name)`. */
  searchPath: string[];
  logLevel: string;
  /** Language assumed for notebooks whose metadata names none. */
  defaultLanguage: CellLanguage;
};

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const LANGUAGE_ALIASES: Record<string, CellLanguage> = {
  javascript: "javascript",
  js: "javascript",
  node: "javascript",
  nodejs: "javascript",
  typescript: "typescript",
  ts: "typescript",
};

export function resolveCellLanguage(name: string | null | undefined): CellLanguage | null {
  if (!name) return null;
  return LANGUAGE_ALIASES[name.trim().toLowerCase()] ?? null;
}

function envList(value: string | undefined): string[] | null {
  const raw = value?.trim() ?? "";
  if (raw.length === 0) return null;
  const parts = raw
    .split(path.delimiter)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return parts.length > 0 ? [...new Set(parts)] : null;
}

export function loadRuntimeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const searchPath = envList(env.NBKIT_PATH) ?? [process.cwd()];

  const logLevel = (env.NBKIT_LOG_LEVEL ?? env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!LOG_LEVELS.has(logLevel)) {
    throw new Error(
      `NBKIT_LOG_LEVEL must be one of ${[...LOG_LEVELS].join(", ")} (got "${logLevel}").`
    );
  }

  const languageEnv = env.NBKIT_DEFAULT_LANGUAGE?.trim() ?? "";
  const defaultLanguage = languageEnv.length === 0 ? "javascript" : resolveCellLanguage(languageEnv);
  if (!defaultLanguage) {
    throw new Error(`NBKIT_DEFAULT_LANGUAGE must be javascript or typescript (got "${languageEnv}").`);
  }

  return { searchPath, logLevel, defaultLanguage };
}

let cachedConfig: RuntimeConfig | null = null;

/** Process-wide configuration, read from the environment on first use. */
export function getRuntimeConfig(): RuntimeConfig {
  cachedConfig ??= loadRuntimeConfigFromEnv();
  return cachedConfig;
}
