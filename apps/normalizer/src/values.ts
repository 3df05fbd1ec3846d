// apps/normalizer/src/values.ts
//
// Boundary helpers between untyped raw bundle data and JSON field values.

import type { JsonObject, JsonValue } from "shared-types";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function hasOwn(obj: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Arrays are copied; anything else becomes an empty list. */
export function safeList(v: unknown): unknown[] {
  return Array.isArray(v) ? [...v] : [];
}

/**
 * Convert an arbitrary value to a JSON value. Returns undefined for values
 * JSON cannot represent (functions, symbols, non-finite numbers).
 */
export function toJsonValue(v: unknown): JsonValue | undefined {
  if (v === null) return null;
  if (typeof v === "string" || typeof v === "boolean") return v;
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? undefined : v.toISOString();
  if (Array.isArray(v)) return v.map((item) => toJsonValue(item) ?? null);
  if (isRecord(v)) {
    const out: JsonObject = {};
    for (const [k, item] of Object.entries(v)) {
      const converted = toJsonValue(item);
      if (converted !== undefined) out[k] = converted;
    }
    return out;
  }
  return undefined;
}

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$|^[+-]?Infinity$/;

/** Numeric view of a value: numbers, booleans and decimal strings. */
export function toNumber(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isNaN(v) ? undefined : v;
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") {
    const s = v.trim();
    return DECIMAL.test(s) ? Number(s) : undefined;
  }
  return undefined;
}

export function jsonEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => jsonEquals(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const ka = Object.keys(a);
    const kb = Object.keys(b);
    if (ka.length !== kb.length) return false;
    return ka.every((k) => hasOwn(b, k) && jsonEquals(a[k], b[k]));
  }
  return false;
}

/** String form used for `str` coercion, string conditions and message templates. */
export function stringifyValue(v: unknown): string {
  if (v === undefined || v === null) return "";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  try {
    return JSON.stringify(toJsonValue(v) ?? null);
  } catch {
    return String(v);
  }
}
