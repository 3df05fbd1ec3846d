// apps/normalizer/src/rollup.ts
//
// Severity tallies and worst-case health for a list of alerts.

import type { AlertSummary, AuditRollups, Health, Severity } from "shared-types";

export type RollupInput = { severity?: string; category?: string };

export function canonicalSeverity(value: unknown): Severity {
  const s = String(value ?? "").trim().toUpperCase();
  if (s === "CRITICAL" || s === "CRIT") return "CRITICAL";
  if (s === "WARNING" || s === "WARN") return "WARNING";
  return "INFO";
}

export function summarizeAlerts(alerts: ReadonlyArray<RollupInput>): AlertSummary {
  const summary: AlertSummary = {
    total: alerts.length,
    critical_count: 0,
    warning_count: 0,
    info_count: 0,
    by_category: {},
  };

  for (const alert of alerts) {
    const severity = canonicalSeverity(alert.severity ?? "INFO");
    if (severity === "CRITICAL") summary.critical_count++;
    else if (severity === "WARNING") summary.warning_count++;
    else summary.info_count++;

    const cat = String(alert.category ?? "uncategorized").toLowerCase();
    summary.by_category[cat] = (summary.by_category[cat] ?? 0) + 1;
  }

  return summary;
}

export function healthRollup(alerts: ReadonlyArray<RollupInput>): Health {
  const severities = new Set(alerts.map((a) => canonicalSeverity(a.severity ?? "INFO")));
  if (severities.has("CRITICAL")) return "CRITICAL";
  if (severities.has("WARNING")) return "WARNING";
  return "HEALTHY";
}

export function computeAuditRollups(alerts: ReadonlyArray<RollupInput>): AuditRollups {
  return { summary: summarizeAlerts(alerts), health: healthRollup(alerts) };
}
