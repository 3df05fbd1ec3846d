// apps/normalizer/src/alerts.ts
//
// Turns matching alert rules into alert records, in schema rule order.

import type { Alert, Fields, JsonValue, ReportSchema } from "shared-types";
import { evaluateCondition, type ConditionRegistry } from "./conditions";
import { canonicalSeverity } from "./rollup";
import { hasOwn, stringifyValue } from "./values";

// Supported placeholder specs: {name}, {name:.1f}, {name:d}, {name:,}, {name:,.2f}, {name:.0%}
const FORMAT_SPEC_RE = /^(,)?(?:\.(\d+))?([fd%])?$/;
const NAME_RE = /^\w+$/;

function groupDigits(value: number, fractionDigits: number | null): string {
  return value.toLocaleString("en-US", {
    useGrouping: true,
    minimumFractionDigits: fractionDigits ?? 0,
    maximumFractionDigits: fractionDigits ?? 20,
  });
}

export function formatValue(value: unknown, spec: string): string | null {
  if (spec === "") return stringifyValue(value);
  const m = FORMAT_SPEC_RE.exec(spec);
  if (!m || typeof value !== "number") return null;

  const grouping = m[1] === ",";
  const precision = m[2] === undefined ? null : Number(m[2]);
  const kind = m[3];

  if (kind === "d") {
    if (precision !== null || !Number.isInteger(value)) return null;
    return grouping ? groupDigits(value, 0) : String(value);
  }
  if (kind === "f") {
    const digits = precision ?? 6;
    return grouping ? groupDigits(value, digits) : value.toFixed(digits);
  }
  if (kind === "%") {
    return `${(value * 100).toFixed(precision ?? 6)}%`;
  }
  // bare precision without a presentation type is not supported
  if (precision !== null) return null;
  return grouping ? groupDigits(value, null) : String(value);
}

function renderTemplate(template: string, fields: Readonly<Fields>): string | null {
  let out = "";
  let i = 0;
  while (i < template.length) {
    const ch = template.charAt(i);
    const next = template.charAt(i + 1);

    if (ch === "{" && next === "{") {
      out += "{";
      i += 2;
      continue;
    }
    if (ch === "}" && next === "}") {
      out += "}";
      i += 2;
      continue;
    }
    if (ch === "}") return null;
    if (ch !== "{") {
      out += ch;
      i++;
      continue;
    }

    const end = template.indexOf("}", i);
    if (end === -1) return null;
    const inner = template.slice(i + 1, end);
    const colon = inner.indexOf(":");
    const name = colon === -1 ? inner : inner.slice(0, colon);
    const spec = colon === -1 ? "" : inner.slice(colon + 1);
    if (!NAME_RE.test(name) || !hasOwn(fields, name)) return null;

    const formatted = formatValue(fields[name], spec);
    if (formatted === null) return null;
    out += formatted;
    i = end + 1;
  }
  return out;
}

/** Falls back to the raw template when a field is missing or a spec is unsupported. */
export function interpolateMessage(template: string, fields: Readonly<Fields>): string {
  return renderTemplate(template, fields) ?? template;
}

export function buildSchemaAlerts(
  schema: Pick<ReportSchema, "alerts">,
  fields: Readonly<Fields>,
  registry: ConditionRegistry
): Alert[] {
  const alerts: Alert[] = [];
  for (const rule of schema.alerts) {
    if (!evaluateCondition(rule.condition, fields, registry)) continue;

    const detail: Record<string, JsonValue> = {};
    for (const df of rule.detail_fields) {
      const v = fields[df];
      if (hasOwn(fields, df) && v !== undefined) detail[df] = v;
    }

    let affected: JsonValue[] = [];
    if (rule.affected_items_field) {
      const items = fields[rule.affected_items_field];
      affected = Array.isArray(items) ? [...items] : [];
    }

    alerts.push({
      id: rule.id,
      severity: canonicalSeverity(rule.severity),
      category: rule.category,
      message: interpolateMessage(rule.message, fields),
      detail,
      affected_items: affected,
      condition: true,
    });
  }
  return alerts;
}
