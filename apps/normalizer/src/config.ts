import { fileURLToPath } from "node:url";

export type NormalizerConfig = {
  logLevel: string;
  /** Last entry in the script search order. */
  builtinScriptsDir: string;
  /** Upper bound in seconds for every script timeout, when set. */
  scriptTimeoutCap: number | null;
};

export const DEFAULT_BUILTIN_SCRIPTS_DIR = fileURLToPath(new URL("../scripts", import.meta.url));

const LOG_LEVELS = new Set(["error", "warn", "info", "http", "verbose", "debug", "silly"]);

function parsePositiveNumber(raw: string | undefined): number | null {
  if (!raw) return null;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NormalizerConfig {
  const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
  return {
    logLevel: LOG_LEVELS.has(level) ? level : "info",
    builtinScriptsDir: env.NORMALIZER_BUILTIN_SCRIPTS_DIR || DEFAULT_BUILTIN_SCRIPTS_DIR,
    scriptTimeoutCap: parsePositiveNumber(env.NORMALIZER_SCRIPT_TIMEOUT_CAP),
  };
}
