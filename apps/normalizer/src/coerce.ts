// apps/normalizer/src/coerce.ts
//
// Declared-type coercion for extracted fields, plus sentinel selection.

import type { FieldSpec, FieldType, JsonValue } from "shared-types";
import { isRecord, stringifyValue, toJsonValue, toNumber } from "./values";

// Some collectors serialize booleans as text ("False", "no", "off").
const FALSY_STRINGS: ReadonlySet<string> = new Set(["false", "no", "0", "off", ""]);

const INT_RE = /^\s*[+-]?\d+\s*$/;

// Deliberately wrong-looking so broken sources stand out in rendered reports.
const TYPE_SENTINELS: Partial<Record<FieldType, JsonValue>> = {
  str: "ERROR",
  int: -1,
  float: -1,
};

export function coerceBool(value: unknown): boolean {
  if (typeof value === "string") return !FALSY_STRINGS.has(value.toLowerCase());
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function coerceInt(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : undefined;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && INT_RE.test(value)) return Number.parseInt(value.trim(), 10);
  return undefined;
}

function coerceFloat(value: unknown): number | undefined {
  if (Array.isArray(value) || isRecord(value)) return undefined;
  const n = toNumber(value);
  return n !== undefined && Number.isFinite(n) ? n : undefined;
}

function coerceDefined(value: unknown, type: FieldType): JsonValue | undefined {
  switch (type) {
    case "str":
      return stringifyValue(value);
    case "int":
      return coerceInt(value);
    case "float":
      return coerceFloat(value);
    case "bool":
      return coerceBool(value);
    case "list":
      return Array.isArray(value) ? toJsonValue(value) : [];
    case "dict":
      return isRecord(value) ? toJsonValue(value) : undefined;
  }
}

/** Absent values and failed conversions both yield the fallback. */
export function coerceValue(value: unknown, type: FieldType, fallback: JsonValue): JsonValue {
  if (value === undefined || value === null) return fallback;
  return coerceDefined(value, type) ?? fallback;
}

export function sentinelFor(spec: Pick<FieldSpec, "sentinel" | "type" | "fallback">): JsonValue {
  if (spec.sentinel !== null && spec.sentinel !== undefined) return spec.sentinel;
  return TYPE_SENTINELS[spec.type] ?? spec.fallback;
}
