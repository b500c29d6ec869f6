// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { classify } from "./classifier.js";
import type { ActivityRecord, ReportAggregate, TraceWindow } from "./types.js";

export type AccumulateOutcome = "inactive" | "active" | "duplicate";

export function createAggregate(
  inactivityDays: number,
  thresholdDate: Date,
  window: TraceWindow,
): ReportAggregate {
  return {
    inactivityDays,
    thresholdDate,
    traceWindow: window,
    records: [],
    skipped: [],
    seen: new Set<string>(),
    scanned: 0,
  };
}

/**
 * Count a processed entity and keep its record only when it is inactive.
 * Active records are dropped here. A primary address already processed
 * this run is ignored.
 */
export function accumulate(aggregate: ReportAggregate, record: ActivityRecord): AccumulateOutcome {
  const key = record.primaryAddress.toLowerCase();
  if (aggregate.seen.has(key)) return "duplicate";
  aggregate.seen.add(key);
  aggregate.scanned++;
  if (!classify(record, aggregate.thresholdDate)) return "active";
  aggregate.records.push(record);
  return "inactive";
}

export function recordSkipped(aggregate: ReportAggregate, id: string, reason: string): void {
  aggregate.skipped.push({ id, reason });
}

/** Inactive share of scanned entities, one decimal place. */
export function inactiveRate(aggregate: Pick<ReportAggregate, "scanned" | "records">): string {
  if (aggregate.scanned === 0) return "0.0%";
  return `${((aggregate.records.length / aggregate.scanned) * 100).toFixed(1)}%`;
}
