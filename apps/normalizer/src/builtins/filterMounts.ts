// Drops pseudo and loop mounts before disk usage alerts look at them.

import type { JsonValue } from "shared-types";
import { isRecord, stringifyValue, toJsonValue } from "../values";
import type { ScriptPayload } from "./runtime";

export const DEFAULT_EXCLUDE_DEVICE_PATTERNS = ["loop", "tmpfs", "devtmpfs", "squashfs"];
export const DEFAULT_EXCLUDE_FSTYPES = ["tmpfs", "devtmpfs", "squashfs", "overlay", "proc", "sysfs", "devpts"];

function stringList(v: unknown, fallback: string[]): string[] {
  if (!Array.isArray(v)) return fallback;
  return v.map((s) => stringifyValue(s));
}

export function filterMounts({ fields, args }: ScriptPayload): JsonValue {
  const patterns = stringList(args.exclude_device_patterns, DEFAULT_EXCLUDE_DEVICE_PATTERNS);
  const fstypes = new Set(stringList(args.exclude_fstypes, DEFAULT_EXCLUDE_FSTYPES).map((f) => f.toLowerCase()));
  const mounts = Array.isArray(fields.mounts) ? fields.mounts : [];

  const kept: JsonValue[] = [];
  for (const mount of mounts) {
    if (!isRecord(mount)) continue;
    const device = stringifyValue(mount.device);
    const fstype = stringifyValue(mount.fstype).toLowerCase();
    if (patterns.some((p) => device.includes(p))) continue;
    if (fstypes.has(fstype)) continue;
    kept.push(toJsonValue(mount) ?? null);
  }
  return kept;
}
