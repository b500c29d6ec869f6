// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { MemberDescriptor, TraceEvent } from "../inactivity/types.js";

// Absent data never renders as an empty string
export const NOT_AVAILABLE = "N/A";
export const NO_TRACE_ACTIVITY = "No activity in window";
// An empty list is data, not an absence of it
export const NO_MEMBERS = "No members";
export const NO_OWNERS = "No owners";

export function orNA(value: string | null | undefined): string {
  return value === null || value === undefined || value.trim() === "" ? NOT_AVAILABLE : value;
}

export function isoOrNA(date: Date | null): string {
  return date ? date.toISOString() : NOT_AVAILABLE;
}

export function yesNo(flag: boolean): string {
  return flag ? "Yes" : "No";
}

export function describeList(items: readonly MemberDescriptor[], emptyText: string): string {
  return items.length === 0 ? emptyText : items.map(describeMember).join("\n");
}

export function describeMember(m: MemberDescriptor): string {
  if (!m.address) return m.displayName;
  return m.displayName && m.displayName !== m.address ? `${m.displayName} <${m.address}>` : m.address;
}

export function traceTimestamp(event: TraceEvent): string {
  switch (event.status) {
    case "found":
      return event.timestamp.toISOString();
    case "none":
      return NO_TRACE_ACTIVITY;
    case "error":
      return `Trace unavailable: ${event.reason}`;
  }
}

export function traceCounterpart(event: TraceEvent): string {
  return event.status === "found" ? orNA(event.counterpart) : NOT_AVAILABLE;
}

export function traceSubject(event: TraceEvent): string {
  return event.status === "found" ? orNA(event.subject) : NOT_AVAILABLE;
}
