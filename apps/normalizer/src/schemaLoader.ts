// apps/normalizer/src/schemaLoader.ts
//
// Reads schema documents from disk, validates them and attaches load-time facts
// (source path, broken paths). The normalization core never imports this.

import { readFileSync } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv, { type ErrorObject, type SchemaObject } from "ajv";
import type { LoadedSchema, RawBundle, ReportSchema } from "shared-types";
import { resolveField } from "./fieldResolver";
import type { WarnLogger } from "./logger";
import type { TransformRegistry } from "./transforms";
import { hasOwn, isRecord } from "./values";

const SCHEMA_DEFINITION_PATH = fileURLToPath(new URL("../schema/report-schema.schema.json", import.meta.url));

export class SchemaLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string | null,
    public readonly problems: string[] = []
  ) {
    super(problems.length ? `${message}\n${problems.map((p) => `  - ${p}`).join("\n")}` : message);
    this.name = "SchemaLoadError";
  }
}

export type LoaderDeps = {
  transforms: TransformRegistry;
  logger: WarnLogger;
};

const definition: SchemaObject = JSON.parse(readFileSync(SCHEMA_DEFINITION_PATH, "utf-8"));
const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
const validateDocument = ajv.compile<ReportSchema>(definition);

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

function isDeclared(declared: Set<string>, name: string): boolean {
  return name.startsWith("_") || declared.has(name);
}

/**
 * Each field has exactly one source, and field references in alerts, widgets
 * and fleet columns name declared fields (names starting with `_` are virtual).
 */
export function crossCheckReferences(schema: ReportSchema): string[] {
  const declared = new Set(Object.keys(schema.fields));
  const errors: string[] = [];

  for (const [name, spec] of Object.entries(schema.fields)) {
    const sources = [spec.path, spec.compute, spec.script].filter((s) => s !== undefined).length;
    if (sources === 0) errors.push(`field '${name}': requires one of 'path', 'compute' or 'script'`);
    if (sources > 1) errors.push(`field '${name}': 'path', 'compute' and 'script' are mutually exclusive`);
  }

  for (const rule of schema.alerts) {
    const cond = rule.condition;
    if (!isDeclared(declared, cond.field)) {
      errors.push(`alert '${rule.id}': condition references undeclared field '${cond.field}'`);
    }
    if (cond.op === "age_gt" || cond.op === "age_lt" || cond.op === "age_gte" || cond.op === "age_lte") {
      if (cond.reference_field && !isDeclared(declared, cond.reference_field)) {
        errors.push(`alert '${rule.id}': reference_field references undeclared field '${cond.reference_field}'`);
      }
    }
    for (const f of rule.detail_fields) {
      if (!isDeclared(declared, f)) errors.push(`alert '${rule.id}': detail_fields references undeclared field '${f}'`);
    }
    if (rule.affected_items_field && !isDeclared(declared, rule.affected_items_field)) {
      errors.push(`alert '${rule.id}': affected_items_field references undeclared field '${rule.affected_items_field}'`);
    }
  }

  for (const widget of schema.widgets) {
    if (widget.type === "key_value") {
      for (const kv of widget.fields) {
        if (!isDeclared(declared, kv.field)) {
          errors.push(`widget '${widget.id}': key_value references undeclared field '${kv.field}'`);
        }
      }
    } else if (widget.type === "table") {
      if (!isDeclared(declared, widget.rows_field)) {
        errors.push(`widget '${widget.id}': rows_field references undeclared field '${widget.rows_field}'`);
      }
    }
  }

  for (const col of schema.fleet_columns) {
    if (!isDeclared(declared, col.field)) errors.push(`fleet_column: references undeclared field '${col.field}'`);
  }

  return errors;
}

/** Validates and fills defaults on a copy of `data`; throws SchemaLoadError listing every problem. */
export function parseReportSchema(data: unknown, sourcePath: string | null = null): ReportSchema {
  if (!isRecord(data)) throw new SchemaLoadError("Schema document must be a JSON object", sourcePath);
  const doc = structuredClone(data);
  if (!validateDocument(doc)) {
    throw new SchemaLoadError("Invalid schema", sourcePath, formatAjvErrors(validateDocument.errors));
  }
  const problems = crossCheckReferences(doc);
  if (problems.length) throw new SchemaLoadError("Schema cross-reference errors", sourcePath, problems);
  return doc;
}

/** Maps field name → message for every path field that is absent in the example bundle. */
export function validateSchemaPaths(
  schema: Pick<ReportSchema, "fields">,
  example: RawBundle,
  deps: LoaderDeps
): Record<string, string> {
  const errors: Record<string, string> = {};
  for (const [name, spec] of Object.entries(schema.fields)) {
    if (spec.path === undefined) continue;
    if (resolveField(spec.path, example, deps.transforms, deps.logger) === undefined) {
      errors[name] = `field '${name}': path '${spec.path}' resolves to nothing (check path segments against the example file)`;
    }
  }
  return errors;
}

export function exampleBundlePath(schemaPath: string, schemaName: string): string {
  return path.join(path.dirname(schemaPath), `${schemaName}.example.json`);
}

async function readJson(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

async function loadExampleBundle(schemaPath: string, schemaName: string, deps: LoaderDeps): Promise<RawBundle | null> {
  const examplePath = exampleBundlePath(schemaPath, schemaName);
  let data: unknown;
  try {
    data = await readJson(examplePath);
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") return null;
    deps.logger.warn(`Failed to load example bundle ${examplePath}: ${err instanceof Error ? err.message : String(err)}`, {
      path: examplePath,
    });
    return null;
  }
  return isRecord(data) ? data : null;
}

export async function loadSchemaFromFile(filePath: string, deps: LoaderDeps): Promise<LoadedSchema> {
  const absPath = path.resolve(filePath);
  let data: unknown;
  try {
    data = await readJson(absPath);
  } catch (err) {
    throw new SchemaLoadError(`Cannot read schema ${absPath}: ${err instanceof Error ? err.message : String(err)}`, absPath);
  }
  const schema = parseReportSchema(data, absPath);

  const example = await loadExampleBundle(absPath, schema.name, deps);
  const broken = example ? validateSchemaPaths(schema, example, deps) : {};
  for (const message of Object.values(broken)) {
    deps.logger.warn(`Schema '${schema.name}': ${message}`, { schema: schema.name });
  }

  return { ...schema, sourcePath: absPath, brokenPaths: new Set(Object.keys(broken)) };
}

/**
 * Scans directories (non-recursive) for `*.json` schemas, skipping
 * `*.example.json`. The first schema registered under a name wins; files
 * that fail to load are logged and skipped.
 */
export async function discoverSchemas(dirs: string[], deps: LoaderDeps): Promise<Map<string, LoadedSchema>> {
  const result = new Map<string, LoadedSchema>();
  for (const dir of dirs) {
    let names: string[];
    try {
      names = (await readdir(dir)).sort();
    } catch {
      // missing directories are simply not searched
      continue;
    }
    for (const name of names) {
      if (!name.endsWith(".json") || name.endsWith(".example.json")) continue;
      let schema: LoadedSchema;
      try {
        schema = await loadSchemaFromFile(path.join(dir, name), deps);
      } catch (err) {
        deps.logger.warn(`Failed to load schema ${path.join(dir, name)}: ${err instanceof Error ? err.message : String(err)}`, {
          path: path.join(dir, name),
        });
        continue;
      }
      if (!result.has(schema.name)) result.set(schema.name, schema);
    }
  }
  return result;
}

export function matchesDetection(schema: Pick<ReportSchema, "detection">, bundle: RawBundle): boolean {
  const { keys_any, keys_all } = schema.detection;
  if (keys_any.length && !keys_any.some((k) => hasOwn(bundle, k))) return false;
  if (keys_all.length && !keys_all.every((k) => hasOwn(bundle, k))) return false;
  return true;
}

export function detectSchemasForBundle(schemas: Iterable<LoadedSchema>, bundle: RawBundle): LoadedSchema[] {
  return [...schemas].filter((s) => matchesDetection(s, bundle));
}
