// Counts clusters or hosts across per-datacenter cluster inventory results:
//   [{ "item": "DC1", "clusters": { "C1": { "hosts": [...] } } }, ...]

import type { JsonValue } from "shared-types";
import { isRecord } from "../values";
import type { ScriptPayload } from "./runtime";

export type ClusterTotals = { clusters: number; hosts: number };

export function countClusterTotals(results: unknown): ClusterTotals {
  const totals: ClusterTotals = { clusters: 0, hosts: 0 };
  if (!Array.isArray(results)) return totals;
  for (const entry of results) {
    if (!isRecord(entry) || !isRecord(entry.clusters)) continue;
    const clusters = Object.values(entry.clusters);
    totals.clusters += clusters.length;
    for (const cluster of clusters) {
      if (isRecord(cluster) && Array.isArray(cluster.hosts)) totals.hosts += cluster.hosts.length;
    }
  }
  return totals;
}

/** `args.metric` is "cluster_count" (default); any other value counts hosts. */
export function countClustersAndHosts({ fields, args }: ScriptPayload): JsonValue {
  const metric = typeof args.metric === "string" ? args.metric : "cluster_count";
  const totals = countClusterTotals(fields.clusters_info_results);
  return metric === "cluster_count" ? totals.clusters : totals.hosts;
}
