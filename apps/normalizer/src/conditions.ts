// apps/normalizer/src/conditions.ts
//
// Alert condition evaluation. Handlers live in an explicit registry built once
// per run; dispatch is an exhaustive switch over `op`. Evaluation never throws:
// any internal error is `false` for that one condition.

import type {
  AlertCondition,
  ComparisonOp,
  ComputedFilterCondition,
  DateThresholdCondition,
  ExistsCondition,
  Fields,
  FilterCountCondition,
  MultiFilterCondition,
  RangeCondition,
  StringCondition,
  StringInCondition,
  ThresholdCondition,
} from "shared-types";
import { ageInDays, parseIsoTimestamp } from "./dates";
import { evaluateExpression } from "./expression";
import { isRecord, jsonEquals, safeList, stringifyValue, toNumber } from "./values";

type Handler<C extends AlertCondition> = (condition: C, fields: Readonly<Fields>) => boolean;

export type ConditionRegistry = {
  threshold: Handler<ThresholdCondition>;
  range: Handler<RangeCondition>;
  exists: Handler<ExistsCondition>;
  filterCount: Handler<FilterCountCondition>;
  multiFilter: Handler<MultiFilterCondition>;
  stringEquality: Handler<StringCondition>;
  stringMembership: Handler<StringInCondition>;
  computedFilter: Handler<ComputedFilterCondition>;
  dateThreshold: Handler<DateThresholdCondition>;
};

export type ConditionRegistryOptions = {
  now: () => Date;
};

export function compare(op: ComparisonOp, value: number, threshold: number): boolean {
  switch (op) {
    case "gt":
      return value > threshold;
    case "lt":
      return value < threshold;
    case "gte":
      return value >= threshold;
    case "lte":
      return value <= threshold;
    case "eq":
      return value === threshold;
    case "ne":
      return value !== threshold;
  }
}

function isEmptyValue(v: unknown): boolean {
  if (v === undefined || v === null) return true;
  if (Array.isArray(v)) return v.length === 0;
  if (isRecord(v)) return Object.keys(v).length === 0;
  return false;
}

function countMatching(list: unknown[], matches: (item: Record<string, unknown>) => boolean): number {
  let count = 0;
  for (const item of list) {
    if (isRecord(item) && matches(item)) count++;
  }
  return count;
}

// A missing sub-field compares as null, so `filter_value: null` matches it.
function itemValue(item: Record<string, unknown>, key: string): unknown {
  return item[key] ?? null;
}

function anyItem(list: unknown[], expression: string, test: (value: number) => boolean): boolean {
  for (const item of list) {
    if (!isRecord(item)) continue;
    let value: number;
    try {
      value = evaluateExpression(expression, item);
    } catch {
      // entries whose expression fails are skipped
      continue;
    }
    if (test(value)) return true;
  }
  return false;
}

export function createConditionRegistry(opts: Partial<ConditionRegistryOptions> = {}): ConditionRegistry {
  const now = opts.now ?? (() => new Date());

  return {
    threshold: (c, fields) => {
      const value = toNumber(fields[c.field]);
      return value !== undefined && compare(c.op, value, c.threshold);
    },

    range: (c, fields) => {
      const raw = fields[c.field];
      const value = raw === undefined ? 0 : toNumber(raw);
      return value !== undefined && c.min <= value && value < c.max;
    },

    exists: (c, fields) => {
      const empty = isEmptyValue(fields[c.field]);
      return c.op === "exists" ? !empty : empty;
    },

    filterCount: (c, fields) => {
      const count = countMatching(safeList(fields[c.field]), (item) =>
        jsonEquals(itemValue(item, c.filter_field), c.filter_value)
      );
      return count > (c.threshold ?? 0);
    },

    multiFilter: (c, fields) => {
      const count = countMatching(safeList(fields[c.field]), (item) =>
        c.filters.every((f) => jsonEquals(itemValue(item, f.filter_field), f.filter_value))
      );
      return count > (c.threshold ?? 0);
    },

    stringEquality: (c, fields) => {
      const value = stringifyValue(fields[c.field]);
      return c.op === "eq_str" ? value === c.value : value !== c.value;
    },

    stringMembership: (c, fields) => {
      const member = c.values.includes(stringifyValue(fields[c.field]));
      return c.op === "in_str" ? member : !member;
    },

    computedFilter: (c, fields) => {
      const list = safeList(fields[c.field]);
      if (c.cmp === "range") {
        const { min, max } = c;
        if (min === null || min === undefined || max === null || max === undefined) return false;
        return anyItem(list, c.expression, (v) => min <= v && v < max);
      }
      const cmp = c.cmp;
      const threshold = c.threshold;
      if (threshold === null || threshold === undefined) return false;
      return anyItem(list, c.expression, (v) => compare(cmp, v, threshold));
    },

    dateThreshold: (c, fields) => {
      const raw = fields[c.field];
      const value = typeof raw === "string" ? parseIsoTimestamp(raw) : null;
      if (!value) return false;

      let reference: Date | null = null;
      if (c.reference_field) {
        const ref = fields[c.reference_field];
        reference = typeof ref === "string" ? parseIsoTimestamp(ref) : null;
      }
      const age = ageInDays(value, reference ?? now());

      switch (c.op) {
        case "age_gt":
          return age > c.days;
        case "age_lt":
          return age < c.days;
        case "age_gte":
          return age >= c.days;
        case "age_lte":
          return age <= c.days;
      }
    },
  };
}

function dispatch(condition: AlertCondition, fields: Readonly<Fields>, registry: ConditionRegistry): boolean {
  switch (condition.op) {
    case "gt":
    case "lt":
    case "gte":
    case "lte":
    case "eq":
    case "ne":
      return registry.threshold(condition, fields);
    case "range":
      return registry.range(condition, fields);
    case "exists":
    case "not_exists":
      return registry.exists(condition, fields);
    case "filter_count":
      return registry.filterCount(condition, fields);
    case "filter_multi":
      return registry.multiFilter(condition, fields);
    case "eq_str":
    case "ne_str":
      return registry.stringEquality(condition, fields);
    case "in_str":
    case "not_in_str":
      return registry.stringMembership(condition, fields);
    case "computed_filter":
      return registry.computedFilter(condition, fields);
    case "age_gt":
    case "age_lt":
    case "age_gte":
    case "age_lte":
      return registry.dateThreshold(condition, fields);
    default: {
      const unhandled: never = condition;
      void unhandled;
      return false;
    }
  }
}

export function evaluateCondition(
  condition: AlertCondition,
  fields: Readonly<Fields>,
  registry: ConditionRegistry
): boolean {
  try {
    return dispatch(condition, fields, registry);
  } catch {
    return false;
  }
}
