// packages/shared-types/src/index.ts
//
// Canonical contract types shared by the normalizer, its loader and the
// report renderers that consume normalized records.
// NO runtime logic — only types and type-level unions.

/* ------------------------------------------------------------------ */
/*  Primitives                                                         */
/* ------------------------------------------------------------------ */

export type JsonPrimitive = string | number | boolean | null;
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/** One host's collected audit data, as assembled by the collector layer. */
export type RawBundle = Record<string, unknown>;

export type FieldType = "str" | "int" | "float" | "bool" | "list" | "dict";

export type Severity = "CRITICAL" | "WARNING" | "INFO";
export type Health = "HEALTHY" | "WARNING" | "CRITICAL";

/* ------------------------------------------------------------------ */
/*  Field specs                                                        */
/* ------------------------------------------------------------------ */

/** Exactly one of path / compute / script is set (enforced by the loader). */
export type FieldSpec = {
    path?: string;
    compute?: string;
    script?: string;
    /** Static key/value args passed to the script alongside extracted fields. */
    script_args: JsonObject;
    /** Seconds before a script invocation is killed. */
    script_timeout: number;
    type: FieldType;
    fallback: JsonValue;
    /** null means a type-appropriate default ("ERROR", -1). */
    sentinel: JsonValue;
};

/* ------------------------------------------------------------------ */
/*  Alert conditions (discriminated on `op`)                           */
/* ------------------------------------------------------------------ */

export type ComparisonOp = "gt" | "lt" | "gte" | "lte" | "eq" | "ne";

export type ThresholdCondition = {
    op: ComparisonOp;
    field: string;
    threshold: number;
};

/** Fires when min <= value < max. */
export type RangeCondition = {
    op: "range";
    field: string;
    min: number;
    max: number;
};

export type ExistsCondition = {
    op: "exists" | "not_exists";
    field: string;
};

export type FilterCountCondition = {
    op: "filter_count";
    field: string;
    filter_field: string;
    filter_value: JsonValue;
    threshold?: number;
};

export type FilterSpec = {
    filter_field: string;
    filter_value: JsonValue;
};

export type MultiFilterCondition = {
    op: "filter_multi";
    field: string;
    filters: FilterSpec[];
    threshold?: number;
};

/** Case-sensitive string equality / inequality. */
export type StringCondition = {
    op: "eq_str" | "ne_str";
    field: string;
    value: string;
};

export type StringInCondition = {
    op: "in_str" | "not_in_str";
    field: string;
    values: string[];
};

/**
 * Fires when any list entry satisfies an arithmetic expression threshold,
 * e.g. `"{freeSpace} / {capacity} * 100"` with `cmp: "lt"`, `threshold: 10`.
 */
export type ComputedFilterCondition = {
    op: "computed_filter";
    field: string;
    expression: string;
    cmp: ComparisonOp | "range";
    threshold?: number | null;
    min?: number | null;
    max?: number | null;
};

/**
 * age_gt / age_lt compare the age in days of an ISO-8601 timestamp field;
 * age_gte / age_lte are the inclusive variants. The reference is
 * `reference_field` when it parses, otherwise the current time.
 */
export type DateThresholdCondition = {
    op: "age_gt" | "age_lt" | "age_gte" | "age_lte";
    field: string;
    days: number;
    reference_field?: string | null;
};

export type AlertCondition =
    | ThresholdCondition
    | RangeCondition
    | ExistsCondition
    | FilterCountCondition
    | MultiFilterCondition
    | StringCondition
    | StringInCondition
    | ComputedFilterCondition
    | DateThresholdCondition;

export type ConditionOp = AlertCondition["op"];

export type AlertRule = {
    id: string;
    category: string;
    severity: Severity;
    condition: AlertCondition;
    message: string;
    detail_fields: string[];
    affected_items_field: string | null;
};

/* ------------------------------------------------------------------ */
/*  Widgets, detection, fleet columns                                  */
/* ------------------------------------------------------------------ */

export type KeyValueField = { label: string; field: string; format?: string | null };

export type KeyValueWidget = {
    id: string;
    title: string;
    type: "key_value";
    fields: KeyValueField[];
};

export type TableColumn = {
    label: string;
    field: string;
    badge?: boolean;
    format?: string | null;
    link_field?: string | null;
};

export type TableWidget = {
    id: string;
    title: string;
    type: "table";
    rows_field: string;
    columns: TableColumn[];
};

export type AlertPanelWidget = {
    id: string;
    title: string;
    type: "alert_panel";
};

export type ReportWidget = KeyValueWidget | TableWidget | AlertPanelWidget;

export type DetectionSpec = {
    keys_any: string[];
    keys_all: string[];
};

export type FleetColumn = { label: string; field: string; width?: string | null };

/* ------------------------------------------------------------------ */
/*  Schema                                                             */
/* ------------------------------------------------------------------ */

export type ReportSchema = {
    name: string;
    platform: string;
    display_name: string;
    detection: DetectionSpec;
    fields: Record<string, FieldSpec>;
    alerts: AlertRule[];
    widgets: ReportWidget[];
    fleet_columns: FleetColumn[];
    template_override?: string | null;
};

/** A schema plus the facts established when it was read from disk. */
export type LoadedSchema = ReportSchema & {
    readonly sourcePath: string | null;
    /** Path fields that did not resolve against the schema's example bundle. */
    readonly brokenPaths: ReadonlySet<string>;
};

/* ------------------------------------------------------------------ */
/*  Normalized output                                                  */
/* ------------------------------------------------------------------ */

export type Fields = Record<string, JsonValue>;

export type FieldCoverage = {
    resolved: number;
    total: number;
    broken: number;
};

export type Alert = {
    id: string;
    severity: Severity;
    category: string;
    message: string;
    detail: Record<string, JsonValue>;
    affected_items: JsonValue[];
    condition: true;
};

export type AlertSummary = {
    total: number;
    critical_count: number;
    warning_count: number;
    info_count: number;
    by_category: Record<string, number>;
};

export type AuditRollups = {
    summary: AlertSummary;
    health: Health;
};

export type WidgetMeta = { id: string; title: string; type: ReportWidget["type"] };

export type NormalizedRecord = {
    metadata: {
        audit_type: string;
        schema_name: string;
        platform: string;
        display_name: string;
        generated_at: string;
        field_coverage: FieldCoverage;
    };
    health: Health;
    summary: AlertSummary;
    alerts: Alert[];
    fields: Fields;
    widgets_meta: Record<string, WidgetMeta>;
    schema: {
        name: string;
        display_name: string;
        widgets: ReportWidget[];
    };
};
