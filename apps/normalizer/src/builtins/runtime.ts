// apps/normalizer/src/builtins/runtime.ts
//
// Shared stdin → handler → stdout plumbing for the built-in helper scripts.
// A handler returns the JSON value to print, or undefined when the data is
// not available (exit 1). Anything thrown is exit 2.

import type { JsonValue } from "shared-types";
import { isRecord } from "../values";

export type ScriptPayload = {
  fields: Record<string, unknown>;
  args: Record<string, unknown>;
};

export type BuiltinHandler = (payload: ScriptPayload) => JsonValue | undefined;

export type HandlerRun = {
  exitCode: 0 | 1 | 2;
  stdout: string;
  stderr: string;
};

export function parsePayload(text: string): ScriptPayload {
  const data: unknown = JSON.parse(text);
  if (!isRecord(data)) throw new Error("payload must be a JSON object");
  return {
    fields: isRecord(data.fields) ? data.fields : {},
    args: isRecord(data.args) ? data.args : {},
  };
}

export function runHandler(handler: BuiltinHandler, input: string): HandlerRun {
  try {
    const result = handler(parsePayload(input));
    if (result === undefined) return { exitCode: 1, stdout: "", stderr: "" };
    return { exitCode: 0, stdout: `${JSON.stringify(result)}\n`, stderr: "" };
  } catch (err) {
    return { exitCode: 2, stdout: "", stderr: `error: ${err instanceof Error ? err.message : String(err)}\n` };
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export async function runBuiltinScript(handler: BuiltinHandler): Promise<void> {
  let input: string;
  try {
    input = await readStdin();
  } catch (err) {
    process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 2;
    return;
  }
  const run = runHandler(handler, input);
  if (run.stdout) process.stdout.write(run.stdout);
  if (run.stderr) process.stderr.write(run.stderr);
  process.exitCode = run.exitCode;
}
