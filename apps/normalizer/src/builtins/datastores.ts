// Datastore sizes arrive in bytes; reports want GB and a used percentage.

import type { JsonObject, JsonValue } from "shared-types";
import { isRecord, toJsonValue, toNumber } from "../values";
import type { ScriptPayload } from "./runtime";

const GB = 1024 * 1024 * 1024;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function bytes(v: unknown): number {
  const n = toNumber(v);
  return n !== undefined && Number.isFinite(n) ? n : 0;
}

export function enrichDatastore(ds: Record<string, unknown>): JsonObject {
  const item: JsonObject = {};
  for (const [k, v] of Object.entries(ds)) {
    const converted = toJsonValue(v);
    if (converted !== undefined) item[k] = converted;
  }
  const capacity = bytes(ds.capacity);
  const free = bytes(ds.freeSpace);

  item.capacity_gb = roundTo(capacity / GB, 2);
  item.free_gb = roundTo(free / GB, 2);
  item.used_pct = capacity > 0 ? roundTo(((capacity - free) / capacity) * 100, 1) : 0;
  return item;
}

export function normalizeDatastores({ fields }: ScriptPayload): JsonValue {
  const list = fields.datastores_raw;
  if (!Array.isArray(list)) return [];
  return list.filter(isRecord).map(enrichDatastore);
}
