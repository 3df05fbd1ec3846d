// apps/normalizer/src/normalize.ts
//
// Sole entry point for report builders: schema + raw bundle → normalized record.

import type { NormalizedRecord, ReportSchema, WidgetMeta } from "shared-types";
import { buildSchemaAlerts } from "./alerts";
import { createConditionRegistry, type ConditionRegistry } from "./conditions";
import { loadConfig } from "./config";
import { extractFields, type ExtractableSchema, type ExtractionDeps } from "./extraction";
import { logger as defaultLogger } from "./logger";
import { computeAuditRollups } from "./rollup";
import { createSubprocessExecutor } from "./scriptExecutor";
import { createDefaultTransforms } from "./transforms";

export type NormalizerDeps = ExtractionDeps & {
  conditions: ConditionRegistry;
  clock: () => Date;
};

export type NormalizableSchema = ReportSchema & ExtractableSchema;

export function createNormalizerDeps(overrides: Partial<NormalizerDeps> = {}): NormalizerDeps {
  const config = loadConfig();
  const log = overrides.logger ?? defaultLogger;
  const cwd = overrides.cwd ?? process.cwd();
  const clock = overrides.clock ?? (() => new Date());
  return {
    transforms: overrides.transforms ?? createDefaultTransforms(),
    executor: overrides.executor ?? createSubprocessExecutor({ logger: log, cwd }),
    logger: log,
    builtinScriptsDir: overrides.builtinScriptsDir ?? config.builtinScriptsDir,
    cwd,
    scriptTimeoutCap: overrides.scriptTimeoutCap === undefined ? config.scriptTimeoutCap : overrides.scriptTimeoutCap,
    conditions: overrides.conditions ?? createConditionRegistry({ now: clock }),
    clock,
  };
}

export function normalizeFromSchema(
  schema: NormalizableSchema,
  rawBundle: unknown,
  deps: NormalizerDeps = createNormalizerDeps()
): NormalizedRecord {
  const extracted = extractFields(schema, rawBundle, deps);
  const alerts = buildSchemaAlerts(schema, extracted.fields, deps.conditions);
  const rollups = computeAuditRollups(alerts);

  // Virtual fields so widgets and fleet columns can show alert statistics.
  const crit = alerts.filter((a) => a.severity === "CRITICAL").length;
  const warn = alerts.filter((a) => a.severity === "WARNING").length;
  const fields = {
    ...extracted.fields,
    _critical_count: crit,
    _warning_count: warn,
    _total_alerts: crit + warn,
  };

  const widgetsMeta: Record<string, WidgetMeta> = {};
  for (const w of schema.widgets) {
    widgetsMeta[w.id] = { id: w.id, title: w.title, type: w.type };
  }

  return {
    metadata: {
      audit_type: `schema_${schema.name}`,
      schema_name: schema.name,
      platform: schema.platform,
      display_name: schema.display_name,
      generated_at: deps.clock().toISOString(),
      field_coverage: extracted.coverage,
    },
    health: rollups.health,
    summary: rollups.summary,
    alerts,
    fields,
    widgets_meta: widgetsMeta,
    schema: {
      name: schema.name,
      display_name: schema.display_name,
      widgets: [...schema.widgets],
    },
  };
}
