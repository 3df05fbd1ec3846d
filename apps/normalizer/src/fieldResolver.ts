// apps/normalizer/src/fieldResolver.ts
//
// Dot-path traversal over a raw bundle with an optional pipe transform:
//   "ansible_facts.hostname"
//   "ansible_facts.interfaces | len_if_list"
// `undefined` is the only failure signal; this never throws.

import type { WarnLogger } from "./logger";
import type { TransformRegistry } from "./transforms";
import { hasOwn, isRecord } from "./values";

const PIPE = " | ";

export type ParsedPath = {
  segments: string[];
  transformName: string | null;
};

export function parseFieldPath(path: string): ParsedPath {
  let pathPart = path;
  let transformName: string | null = null;
  const idx = path.indexOf(PIPE);
  if (idx !== -1) {
    pathPart = path.slice(0, idx).trim();
    transformName = path.slice(idx + PIPE.length).trim();
  }
  const segments = pathPart
    .split(".")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return { segments, transformName };
}

function traverse(segments: string[], raw: unknown): unknown {
  let obj: unknown = raw;
  for (const segment of segments) {
    if (!isRecord(obj)) return undefined;
    obj = hasOwn(obj, segment) ? obj[segment] : undefined;
  }
  return obj === null ? undefined : obj;
}

export function resolveField(
  path: string,
  raw: unknown,
  transforms: TransformRegistry,
  logger: WarnLogger
): unknown {
  const { segments, transformName } = parseFieldPath(path);
  let value = traverse(segments, raw);

  if (transformName !== null) {
    const transform = transforms.get(transformName);
    if (!transform) {
      logger.warn(`Unknown transform '${transformName}' in path '${path}'`, { transform: transformName, path });
    } else {
      value = transform(value);
    }
  }

  return value === null ? undefined : value;
}
