// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { addDays } from "../utils.js";
import type { ActivityRecord, TraceWindow } from "./types.js";

/**
 * A record is inactive when it has no modification signal at all, or when
 * the last modification is older than the threshold. Trace events are
 * descriptive and take no part in the decision.
 */
export function classify(record: Pick<ActivityRecord, "lastModified">, thresholdDate: Date): boolean {
  return record.lastModified === null || record.lastModified.getTime() < thresholdDate.getTime();
}

export function inactivityThreshold(now: Date, inactivityDays: number): Date {
  return addDays(now, -inactivityDays);
}

export function traceWindow(now: Date, traceWindowDays: number): TraceWindow {
  return { start: addDays(now, -traceWindowDays), end: now };
}
