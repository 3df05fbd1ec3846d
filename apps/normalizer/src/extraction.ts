// apps/normalizer/src/extraction.ts
//
// Four ordered passes over a schema's field specs. Each pass takes the map the
// previous pass produced and returns a new one, which fixes what may reference
// what: path → compute → script → compute.

import type { FieldCoverage, FieldSpec, Fields, ReportSchema } from "shared-types";
import { coerceValue, sentinelFor } from "./coerce";
import { evaluateExpression } from "./expression";
import { resolveField } from "./fieldResolver";
import type { WarnLogger } from "./logger";
import { resolveScript, type ScriptExecutor } from "./scriptExecutor";
import type { TransformRegistry } from "./transforms";

/** A plain schema, or one carrying the facts the loader attaches. */
export type ExtractableSchema = Pick<ReportSchema, "fields"> & {
  sourcePath?: string | null;
  brokenPaths?: ReadonlySet<string>;
};

export type ExtractionDeps = {
  transforms: TransformRegistry;
  executor: ScriptExecutor;
  logger: WarnLogger;
  builtinScriptsDir: string;
  cwd: string;
  scriptTimeoutCap: number | null;
};

export type ExtractionResult = {
  fields: Fields;
  coverage: FieldCoverage;
};

type ComputePass = "compute" | "recompute";

function specsWith(schema: ExtractableSchema, key: "path" | "compute" | "script"): Array<[string, FieldSpec]> {
  return Object.entries(schema.fields).filter(([, spec]) => typeof spec[key] === "string");
}

export function pathPass(schema: ExtractableSchema, raw: unknown, deps: ExtractionDeps): ExtractionResult {
  const fields: Fields = {};
  const coverage: FieldCoverage = { resolved: 0, total: 0, broken: 0 };
  const broken = schema.brokenPaths ?? new Set<string>();

  for (const [name, spec] of specsWith(schema, "path")) {
    coverage.total++;
    const value = resolveField(spec.path ?? "", raw, deps.transforms, deps.logger);
    if (value === undefined && broken.has(name)) {
      fields[name] = sentinelFor(spec);
      coverage.broken++;
      continue;
    }
    fields[name] = coerceValue(value, spec.type, spec.fallback);
    if (value !== undefined) coverage.resolved++;
  }

  return { fields, coverage };
}

export function computePass(
  schema: ExtractableSchema,
  prior: Readonly<Fields>,
  deps: ExtractionDeps,
  pass: ComputePass
): Fields {
  const fields: Fields = { ...prior };
  for (const [name, spec] of specsWith(schema, "compute")) {
    try {
      const computed = evaluateExpression(spec.compute ?? "", fields);
      fields[name] = coerceValue(computed, spec.type, spec.fallback);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.warn(`compute field '${name}' failed${pass === "recompute" ? " (recompute)" : ""}: ${message}`, {
        field: name,
        pass,
      });
      // A recompute failure keeps the first pass's value.
      const previous = fields[name];
      fields[name] = pass === "recompute" && previous !== undefined ? previous : sentinelFor(spec);
    }
  }
  return fields;
}

export function scriptPass(schema: ExtractableSchema, prior: Readonly<Fields>, deps: ExtractionDeps): Fields {
  const fields: Fields = { ...prior };
  for (const [name, spec] of specsWith(schema, "script")) {
    const script = spec.script ?? "";
    const scriptPath = resolveScript(script, {
      schemaSourcePath: schema.sourcePath ?? null,
      cwd: deps.cwd,
      builtinDir: deps.builtinScriptsDir,
    });
    if (scriptPath === null) {
      deps.logger.warn(`Script not found for field '${name}': ${script}`, { field: name, script });
      fields[name] = sentinelFor(spec);
      continue;
    }

    const timeoutSeconds =
      deps.scriptTimeoutCap === null ? spec.script_timeout : Math.min(spec.script_timeout, deps.scriptTimeoutCap);
    const outcome = deps.executor.run({ scriptPath, fields: { ...fields }, args: spec.script_args, timeoutSeconds });
    switch (outcome.status) {
      case "ok":
        fields[name] = coerceValue(outcome.value, spec.type, spec.fallback);
        break;
      case "absent":
        fields[name] = spec.fallback;
        break;
      case "broken":
        fields[name] = sentinelFor(spec);
        break;
    }
  }
  return fields;
}

export function extractFields(schema: ExtractableSchema, raw: unknown, deps: ExtractionDeps): ExtractionResult {
  const { fields: pathFields, coverage } = pathPass(schema, raw, deps);
  const computed = computePass(schema, pathFields, deps, "compute");
  const scripted = scriptPass(schema, computed, deps);
  const fields = computePass(schema, scripted, deps, "recompute");
  return { fields, coverage };
}
