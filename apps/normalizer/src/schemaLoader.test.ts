// apps/normalizer/src/schemaLoader.test.ts
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { LoadedSchema } from "shared-types";
import {
  SchemaLoadError,
  detectSchemasForBundle,
  discoverSchemas,
  loadSchemaFromFile,
  matchesDetection,
  parseReportSchema,
  validateSchemaPaths,
} from "./schemaLoader";
import { createDefaultTransforms } from "./transforms";

function minimal(extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { name: "linux", platform: "linux", display_name: "Linux Host", ...extra };
}

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchemaLoadError) return err.problems;
    throw err;
  }
  throw new Error("expected SchemaLoadError");
}

describe("parseReportSchema", () => {
  it("fills defaults without touching the input", () => {
    const input = minimal({ fields: { host: { path: "facts.hostname" } } });
    const schema = parseReportSchema(input);
    expect(schema.detection).toEqual({ keys_any: [], keys_all: [] });
    expect(schema.alerts).toEqual([]);
    expect(schema.widgets).toEqual([]);
    expect(schema.fleet_columns).toEqual([]);
    expect(schema.fields.host).toEqual({
      path: "facts.hostname",
      script_args: {},
      script_timeout: 30,
      type: "str",
      fallback: null,
      sentinel: null,
    });
    expect(input).toEqual(minimal({ fields: { host: { path: "facts.hostname" } } }));
  });

  it("fills alert rule defaults", () => {
    const schema = parseReportSchema(
      minimal({
        fields: { cpu: { path: "cpu", type: "float" } },
        alerts: [{ id: "hot", category: "perf", condition: { op: "gt", field: "cpu", threshold: 90 }, message: "hot" }],
      })
    );
    expect(schema.alerts[0]).toEqual({
      id: "hot",
      category: "perf",
      severity: "WARNING",
      condition: { op: "gt", field: "cpu", threshold: 90 },
      message: "hot",
      detail_fields: [],
      affected_items_field: null,
    });
  });

  it("rejects non-objects", () => {
    expect(() => parseReportSchema([])).toThrow("Schema document must be a JSON object");
  });

  it("lists structural errors", () => {
    const problems = problemsOf(() => parseReportSchema({ platform: "x", display_name: "X" }));
    expect(problems).toContain("/ must have required property 'name'");
  });

  it("rejects unknown condition shapes and field types", () => {
    expect(() =>
      parseReportSchema(
        minimal({
          fields: { a: { path: "a" } },
          alerts: [{ id: "r", category: "c", condition: { op: "matches", field: "a" }, message: "m" }],
        })
      )
    ).toThrow(SchemaLoadError);
    expect(() => parseReportSchema(minimal({ fields: { a: { path: "a", type: "decimal" } } }))).toThrow(
      SchemaLoadError
    );
  });

  it("requires exactly one source per field", () => {
    const problems = problemsOf(() =>
      parseReportSchema(minimal({ fields: { both: { path: "a", compute: "1 + 1" }, none: { type: "int" } } }))
    );
    expect(problems).toEqual([
      "field 'both': 'path', 'compute' and 'script' are mutually exclusive",
      "field 'none': requires one of 'path', 'compute' or 'script'",
    ]);
  });

  it("checks field references but allows virtual fields", () => {
    const problems = problemsOf(() =>
      parseReportSchema(
        minimal({
          fields: { a: { path: "a" } },
          alerts: [
            {
              id: "r1",
              category: "c",
              condition: { op: "age_gt", field: "a", days: 3, reference_field: "ref" },
              message: "m",
              detail_fields: ["a", "ghost"],
              affected_items_field: "items",
            },
          ],
          widgets: [
            { id: "kv", title: "KV", type: "key_value", fields: [{ label: "A", field: "a" }, { label: "B", field: "b" }] },
            { id: "t", title: "T", type: "table", rows_field: "rows", columns: [] },
          ],
          fleet_columns: [
            { label: "Alerts", field: "_total_alerts" },
            { label: "Z", field: "z" },
          ],
        })
      )
    );
    expect(problems).toEqual([
      "alert 'r1': reference_field references undeclared field 'ref'",
      "alert 'r1': detail_fields references undeclared field 'ghost'",
      "alert 'r1': affected_items_field references undeclared field 'items'",
      "widget 'kv': key_value references undeclared field 'b'",
      "widget 't': rows_field references undeclared field 'rows'",
      "fleet_column: references undeclared field 'z'",
    ]);
  });
});

describe("validateSchemaPaths", () => {
  it("reports path fields that resolve to nothing in the example", () => {
    const logger = { warn: vi.fn() };
    const schema = parseReportSchema(
      minimal({ fields: { host: { path: "facts.hostname" }, mem: { path: "facts.mem" }, c: { compute: "1" } } })
    );
    expect(
      validateSchemaPaths(schema, { facts: { hostname: "web01" } }, { transforms: createDefaultTransforms(), logger })
    ).toEqual({
      mem: "field 'mem': path 'facts.mem' resolves to nothing (check path segments against the example file)",
    });
  });
});

describe("loading from disk", () => {
  let dir: string;
  let logger: { warn: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "normalizer-schemas-"));
    logger = { warn: vi.fn() };
  });

  afterEach(() => rmSync(dir, { recursive: true, force: true }));

  const deps = () => ({ transforms: createDefaultTransforms(), logger });
  const write = (name: string, data: unknown) => writeFileSync(path.join(dir, name), JSON.stringify(data));

  it("computes broken paths from the example bundle beside the schema", async () => {
    write("linux.json", minimal({ fields: { host: { path: "facts.hostname" }, mem: { path: "facts.mem" } } }));
    write("linux.example.json", { facts: { hostname: "web01" } });

    const schema = await loadSchemaFromFile(path.join(dir, "linux.json"), deps());
    expect(schema.sourcePath).toBe(path.join(dir, "linux.json"));
    expect([...schema.brokenPaths]).toEqual(["mem"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[0]).toBe(
      "Schema 'linux': field 'mem': path 'facts.mem' resolves to nothing (check path segments against the example file)"
    );
  });

  it("has no broken paths without an example bundle", async () => {
    write("linux.json", minimal({ fields: { mem: { path: "facts.mem" } } }));
    const schema = await loadSchemaFromFile(path.join(dir, "linux.json"), deps());
    expect(schema.brokenPaths.size).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("wraps unreadable files in SchemaLoadError", async () => {
    writeFileSync(path.join(dir, "bad.json"), "{ not json");
    await expect(loadSchemaFromFile(path.join(dir, "bad.json"), deps())).rejects.toThrow(SchemaLoadError);
    await expect(loadSchemaFromFile(path.join(dir, "missing.json"), deps())).rejects.toThrow(/^Cannot read schema/);
  });

  it("discovers schemas, keeping the first of a name and skipping bad files", async () => {
    write("a.json", minimal({ name: "alpha", display_name: "First" }));
    write("b.json", minimal({ name: "alpha", display_name: "Second" }));
    write("c.json", { name: "broken" });
    write("skip.example.json", []);
    writeFileSync(path.join(dir, "notes.txt"), "ignored");
    mkdirSync(path.join(dir, "nested"));
    write(path.join("nested", "deep.json"), minimal({ name: "deep" }));

    const found = await discoverSchemas([dir, path.join(dir, "does-not-exist")], deps());
    expect([...found.keys()]).toEqual(["alpha"]);
    expect(found.get("alpha")?.display_name).toBe("First");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(String(logger.warn.mock.calls[0]?.[0])).toContain(`Failed to load schema ${path.join(dir, "c.json")}`);
  });
});

describe("detection", () => {
  function loaded(name: string, keys_any: string[], keys_all: string[]): LoadedSchema {
    const schema = parseReportSchema(minimal({ name, detection: { keys_any, keys_all } }));
    return { ...schema, sourcePath: null, brokenPaths: new Set<string>() };
  }

  const linux = loaded("linux", ["ansible_facts", "setup"], []);
  const vcenter = loaded("vcenter", [], ["vcenter_info", "clusters_info"]);
  const catchAll = loaded("any", [], []);

  it("matches keys_any and keys_all against top-level keys", () => {
    expect(matchesDetection(linux, { setup: {} })).toBe(true);
    expect(matchesDetection(linux, { other: {} })).toBe(false);
    expect(matchesDetection(vcenter, { vcenter_info: {} })).toBe(false);
    expect(matchesDetection(vcenter, { vcenter_info: {}, clusters_info: [] })).toBe(true);
  });

  it("ignores keys inherited from Object.prototype", () => {
    const inherited = loaded("inherited", ["constructor", "toString"], []);
    expect(matchesDetection(inherited, {})).toBe(false);
    expect(matchesDetection(loaded("all", [], ["hasOwnProperty"]), {})).toBe(false);
    expect(matchesDetection(inherited, { toString: "x" })).toBe(true);
  });

  it("returns every matching schema in order", () => {
    const names = detectSchemasForBundle([linux, vcenter, catchAll], { ansible_facts: {} }).map((s) => s.name);
    expect(names).toEqual(["linux", "any"]);
  });
});
