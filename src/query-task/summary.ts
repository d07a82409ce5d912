// ============================================================================
// SUMMARY — result aggregation and human-readable run messages
// ============================================================================

import { DETAIL, type QueryResult } from "./types";

export interface QuerySummary {
  succeeded: number;
  /** Failed rows, excluding records interrupted by a stop */
  failed: number;
  stopped: number;
  total: number;
  /** succeeded / total, 0 for an empty run */
  successRate: number;
}

export function aggregateResults(results: QueryResult[]): QuerySummary {
  const succeeded = results.filter(r => r.status === "success").length;
  const stopped = results.filter(r => r.status === "failure" && r.detail === DETAIL.stopped).length;
  return {
    succeeded,
    failed: results.length - succeeded - stopped,
    stopped,
    total: results.length,
    successRate: results.length === 0 ? 0 : succeeded / results.length,
  };
}

export function generateSummary(results: QueryResult[]): string {
  const { succeeded, failed, stopped, total } = aggregateResults(results);
  const parts: string[] = [`${succeeded} of ${total} ${total === 1 ? "query" : "queries"} succeeded`];

  if (failed > 0) parts.push(`${failed} failed`);
  if (stopped > 0) parts.push(`${stopped} stopped`);

  return parts.join(", ");
}

/** Mask an identity number for logs: first six, `****`, last four. */
export function maskIdNumber(idNumber: string): string {
  if (idNumber.length <= 10) return "****";
  return `${idNumber.slice(0, 6)}****${idNumber.slice(-4)}`;
}
