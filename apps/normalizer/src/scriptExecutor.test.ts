// apps/normalizer/src/scriptExecutor.test.ts
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, describe, expect, it, vi } from "vitest";
import { DEFAULT_BUILTIN_SCRIPTS_DIR } from "./config";
import { classifyExit, commandFor, createSubprocessExecutor, resolveScript, tsxLoaderUrl } from "./scriptExecutor";

const FIXTURES = fileURLToPath(new URL("../test-fixtures/scripts", import.meta.url));
const fixture = (name: string) => path.join(FIXTURES, name);

describe("commandFor", () => {
  it("picks an interpreter from the extension", () => {
    expect(commandFor("/x/a.mjs")).toEqual({ command: process.execPath, args: ["/x/a.mjs"] });
    expect(commandFor("/x/a.ts")).toEqual({ command: process.execPath, args: ["--import", tsxLoaderUrl(), "/x/a.ts"] });
    expect(commandFor("/x/a.py")).toEqual({ command: "python3", args: ["/x/a.py"] });
    expect(commandFor("/x/collect")).toEqual({ command: "/x/collect", args: [] });
  });
});

describe("tsxLoaderUrl", () => {
  it("points at the installed tsx package by file URL", () => {
    expect(tsxLoaderUrl()).toMatch(/^file:\/\/.*\/node_modules\/tsx\//);
  });
});

describe("classifyExit", () => {
  const base = { status: 0, signal: null, stdout: "", stderr: "" };

  it("parses stdout on exit 0", () => {
    expect(classifyExit({ ...base, stdout: ' {"a": [1]}\n' }, 5)).toEqual({ status: "ok", value: { a: [1] } });
  });

  it("treats exit 1 as absent data", () => {
    expect(classifyExit({ ...base, status: 1, stderr: "ignored" }, 5)).toEqual({ status: "absent" });
  });

  it("reports other exits with the start of stderr", () => {
    expect(classifyExit({ ...base, status: 2, stderr: "  bad input \n" }, 5)).toEqual({
      status: "broken",
      reason: "exited 2: bad input",
    });
    expect(classifyExit({ ...base, status: null, signal: "SIGKILL" }, 5)).toEqual({
      status: "broken",
      reason: "exited SIGKILL",
    });
  });

  it("reports timeouts and spawn errors", () => {
    const timeout = Object.assign(new Error("spawnSync node ETIMEDOUT"), { code: "ETIMEDOUT" });
    expect(classifyExit({ ...base, status: null, error: timeout }, 3)).toEqual({
      status: "broken",
      reason: "timed out after 3s",
    });
    const missing = Object.assign(new Error("spawnSync nope ENOENT"), { code: "ENOENT" });
    expect(classifyExit({ ...base, status: null, error: missing }, 3)).toEqual({
      status: "broken",
      reason: "failed: spawnSync nope ENOENT",
    });
  });

  it("treats unparseable stdout as broken", () => {
    const out = classifyExit({ ...base, stdout: "not json" }, 5);
    expect(out.status).toBe("broken");
  });
});

describe("createSubprocessExecutor", () => {
  function setup() {
    const logger = { warn: vi.fn() };
    return { logger, executor: createSubprocessExecutor({ logger }) };
  }

  it("passes fields and args on stdin and reads JSON from stdout", () => {
    const { executor, logger } = setup();
    const out = executor.run({
      scriptPath: fixture("echo-field.mjs"),
      fields: { hosts: ["a", "b"] },
      args: { field: "hosts" },
      timeoutSeconds: 10,
    });
    expect(out).toEqual({ status: "ok", value: ["a", "b"] });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("maps exit 1 to absent without logging", () => {
    const { executor, logger } = setup();
    const out = executor.run({ scriptPath: fixture("not-available.mjs"), fields: {}, args: {}, timeoutSeconds: 10 });
    expect(out).toEqual({ status: "absent" });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("logs broken scripts", () => {
    const { executor, logger } = setup();
    const out = executor.run({ scriptPath: fixture("crash.mjs"), fields: {}, args: {}, timeoutSeconds: 10 });
    expect(out).toEqual({ status: "broken", reason: "exited 3: boom: collector output malformed" });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[0]).toBe(
      `Script ${fixture("crash.mjs")} broken: exited 3: boom: collector output malformed`
    );
  });

  it("kills scripts that exceed their timeout", () => {
    const { executor } = setup();
    const out = executor.run({ scriptPath: fixture("sleep.mjs"), fields: {}, args: {}, timeoutSeconds: 0.5 });
    expect(out).toEqual({ status: "broken", reason: "timed out after 0.5s" });
  });

  it("treats invalid JSON output as broken", () => {
    const { executor } = setup();
    const out = executor.run({ scriptPath: fixture("bad-json.mjs"), fields: {}, args: {}, timeoutSeconds: 10 });
    expect(out.status).toBe("broken");
  });
});

describe("built-in TypeScript scripts", () => {
  const outside = mkdtempSync(path.join(os.tmpdir(), "normalizer-cwd-"));
  afterAll(() => rmSync(outside, { recursive: true, force: true }));

  it("run from a working directory outside the project", () => {
    const logger = { warn: vi.fn() };
    const executor = createSubprocessExecutor({ logger, cwd: outside });
    const out = executor.run({
      scriptPath: path.join(DEFAULT_BUILTIN_SCRIPTS_DIR, "normalizeDatastores.ts"),
      fields: { datastores_raw: [{ name: "ds1", capacity: 1073741824, freeSpace: 536870912 }] },
      args: {},
      timeoutSeconds: 15,
    });
    expect(out).toEqual({
      status: "ok",
      value: [{ name: "ds1", capacity: 1073741824, freeSpace: 536870912, capacity_gb: 1, free_gb: 0.5, used_pct: 50 }],
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("pass script args through to the handler", () => {
    const logger = { warn: vi.fn() };
    const executor = createSubprocessExecutor({ logger, cwd: outside });
    const results = [{ item: "DC1", clusters: { C1: { hosts: ["h1", "h2"] }, C2: { hosts: ["h3"] } } }];
    const run = (metric: string) =>
      executor.run({
        scriptPath: path.join(DEFAULT_BUILTIN_SCRIPTS_DIR, "countClustersAndHosts.ts"),
        fields: { clusters_info_results: results },
        args: { metric },
        timeoutSeconds: 15,
      });
    expect(run("cluster_count")).toEqual({ status: "ok", value: 2 });
    expect(run("host_count")).toEqual({ status: "ok", value: 3 });
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("resolveScript", () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "normalizer-scripts-"));
  const schemaDir = path.join(root, "schemas");
  const cwd = path.join(root, "cwd");
  const builtinDir = path.join(root, "builtin");
  for (const dir of [schemaDir, cwd, builtinDir]) mkdirSync(dir);

  afterAll(() => rmSync(root, { recursive: true, force: true }));

  function place(dir: string, name: string): string {
    const p = path.join(dir, name);
    writeFileSync(p, "");
    return p;
  }

  it("searches schema dir, then cwd, then built-ins", () => {
    const search = { schemaSourcePath: path.join(schemaDir, "s.json"), cwd, builtinDir };

    const builtin = place(builtinDir, "a.mjs");
    expect(resolveScript("a.mjs", search)).toBe(builtin);
    const inCwd = place(cwd, "a.mjs");
    expect(resolveScript("a.mjs", search)).toBe(inCwd);
    const beside = place(schemaDir, "a.mjs");
    expect(resolveScript("a.mjs", search)).toBe(beside);

    expect(resolveScript("a.mjs", { ...search, schemaSourcePath: null })).toBe(inCwd);
  });

  it("uses absolute paths as given", () => {
    const abs = place(root, "abs.mjs");
    expect(resolveScript(abs, { schemaSourcePath: null, cwd, builtinDir })).toBe(abs);
    expect(resolveScript(path.join(root, "missing.mjs"), { schemaSourcePath: null, cwd, builtinDir })).toBeNull();
  });

  it("returns null when nothing matches", () => {
    expect(resolveScript("nowhere.mjs", { schemaSourcePath: null, cwd, builtinDir })).toBeNull();
  });
});
