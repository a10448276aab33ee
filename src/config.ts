// config.ts

export interface Config {
  port: number;
  corsOrigin?: string;
  outputDir: string;
  workers: number;
  packageName: string;
  languages: string[] | "all";
  /** empty means `<packageName>.db` */
  dbName: string;
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number) {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer, got '${raw}'`);
  }
  return n;
}

function text(env: NodeJS.ProcessEnv, key: string, fallback: string) {
  return env[key]?.trim() || fallback;
}

export function parseLanguages(raw: string): string[] | "all" {
  const list = raw
    .split(",")
    .map((l) => l.trim().toLowerCase())
    .filter(Boolean);
  if (list.length === 0 || list.includes("all")) return "all";
  return list;
}

/** @throws Error when a numeric setting is not a positive integer */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const packageName = text(env, "SHEETFORGE_PACKAGE", "models");

  return {
    port: positiveInt(env, "PORT", 4000),
    corsOrigin: env.CORS_ORIGIN?.trim() || undefined,
    outputDir: text(env, "SHEETFORGE_OUTPUT_DIR", "generated"),
    workers: positiveInt(env, "SHEETFORGE_WORKERS", 4),
    packageName,
    languages: parseLanguages(text(env, "SHEETFORGE_LANGUAGES", "all")),
    dbName: text(env, "SHEETFORGE_DB_NAME", `${packageName}.db`),
  };
}
