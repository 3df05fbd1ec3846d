// apps/normalizer/src/scriptExecutor.ts
//
// Escape hatch for field logic too complex for paths and expressions.
//
//   stdin  — JSON: {"fields": {...}, "args": {...}}
//   stdout — one JSON value
//   exit 0 — success, stdout is the value
//   exit 1 — data not available on this host; caller uses the fallback quietly
//   exit 2+, signal, timeout, spawn failure — broken; caller uses the sentinel
//
// Scripts run synchronously, one at a time, bounded by their timeout.

import { existsSync } from "node:fs";
import { spawnSync } from "node:child_process";
import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { Fields, JsonObject } from "shared-types";
import type { WarnLogger } from "./logger";

export type ScriptRequest = {
  scriptPath: string;
  fields: Readonly<Fields>;
  args: JsonObject;
  timeoutSeconds: number;
};

export type ScriptOutcome =
  | { status: "ok"; value: unknown }
  | { status: "absent" }
  | { status: "broken"; reason: string };

export type ScriptExecutor = {
  run: (request: ScriptRequest) => ScriptOutcome;
};

export type ScriptCommand = { command: string; args: string[] };

const STDERR_SNIPPET = 200;

let tsxLoader: string | undefined;

/**
 * File URL of the tsx loader installed with this package. Passing it to
 * `--import` keeps the child independent of its working directory.
 */
export function tsxLoaderUrl(): string {
  tsxLoader ??= pathToFileURL(createRequire(import.meta.url).resolve("tsx")).href;
  return tsxLoader;
}

export function commandFor(scriptPath: string): ScriptCommand {
  const ext = path.extname(scriptPath).toLowerCase();
  if (ext === ".js" || ext === ".mjs" || ext === ".cjs") {
    return { command: process.execPath, args: [scriptPath] };
  }
  if (ext === ".ts" || ext === ".mts") {
    return { command: process.execPath, args: ["--import", tsxLoaderUrl(), scriptPath] };
  }
  if (ext === ".py") {
    return { command: "python3", args: [scriptPath] };
  }
  return { command: scriptPath, args: [] };
}

export type SpawnResult = {
  status: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  error?: NodeJS.ErrnoException;
};

export function classifyExit(result: SpawnResult, timeoutSeconds: number): ScriptOutcome {
  if (result.error) {
    if (result.error.code === "ETIMEDOUT") {
      return { status: "broken", reason: `timed out after ${timeoutSeconds}s` };
    }
    return { status: "broken", reason: `failed: ${result.error.message}` };
  }
  if (result.status === 0) {
    try {
      return { status: "ok", value: JSON.parse(result.stdout.trim()) };
    } catch (err) {
      return { status: "broken", reason: `invalid JSON output: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
  if (result.status === 1) return { status: "absent" };
  const code = result.status ?? result.signal ?? "unknown";
  const stderr = result.stderr.trim().slice(0, STDERR_SNIPPET);
  return { status: "broken", reason: `exited ${code}${stderr ? `: ${stderr}` : ""}` };
}

export type SubprocessExecutorOptions = {
  logger: WarnLogger;
  cwd?: string;
  maxBufferBytes?: number;
};

export function createSubprocessExecutor(opts: SubprocessExecutorOptions): ScriptExecutor {
  return {
    run: (request: ScriptRequest): ScriptOutcome => {
      const broken = (reason: string): ScriptOutcome => {
        opts.logger.warn(`Script ${request.scriptPath} broken: ${reason}`, {
          script: request.scriptPath,
          reason,
        });
        return { status: "broken", reason };
      };

      let command: string;
      let args: string[];
      try {
        ({ command, args } = commandFor(request.scriptPath));
      } catch (err) {
        return broken(`no runner: ${err instanceof Error ? err.message : String(err)}`);
      }
      const payload = JSON.stringify({ fields: request.fields, args: request.args });
      const res = spawnSync(command, args, {
        input: payload,
        encoding: "utf-8",
        cwd: opts.cwd,
        timeout: Math.max(1, Math.round(request.timeoutSeconds * 1000)),
        killSignal: "SIGKILL",
        maxBuffer: opts.maxBufferBytes ?? 64 * 1024 * 1024,
      });
      const outcome = classifyExit(
        {
          status: res.status,
          signal: res.signal,
          stdout: res.stdout ?? "",
          stderr: res.stderr ?? "",
          error: res.error,
        },
        request.timeoutSeconds
      );
      return outcome.status === "broken" ? broken(outcome.reason) : outcome;
    },
  };
}

export type ScriptSearchPaths = {
  schemaSourcePath: string | null;
  cwd: string;
  builtinDir: string;
};

/**
 * Search order: absolute path, schema file directory, cwd, built-in scripts.
 */
export function resolveScript(script: string, search: ScriptSearchPaths): string | null {
  if (path.isAbsolute(script)) return existsSync(script) ? script : null;

  const candidates: string[] = [];
  if (search.schemaSourcePath) candidates.push(path.join(path.dirname(search.schemaSourcePath), script));
  candidates.push(path.resolve(search.cwd, script));
  candidates.push(path.join(search.builtinDir, script));

  for (const c of candidates) {
    if (existsSync(c)) return c;
  }
  return null;
}
