// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Narrative Report Model ───
// The narrative report is assembled as an ordered list of typed blocks and
// serialised once by a renderer (see html.ts). Nothing here formats markup.

import { inactiveRate } from "../inactivity/aggregate.js";
import type { ActivityRecord, ReportAggregate, TraceEvent } from "../inactivity/types.js";
import { displayDate, displayTimestamp, wholeDaysBetween } from "../utils.js";
import {
  NOT_AVAILABLE,
  NO_MEMBERS,
  NO_OWNERS,
  describeMember,
  orNA,
  traceCounterpart,
  traceSubject,
  traceTimestamp,
  yesNo,
} from "./placeholders.js";

// ─── Types ───

export interface Fact {
  label: string;
  value: string;
  /** Present only when the fact is a timestamp that exists. */
  daysAgo?: number;
}

export type Block =
  | { kind: "facts"; title: string; facts: Fact[] }
  | { kind: "list"; title: string; items: string[]; emptyText: string }
  | { kind: "paragraph"; text: string };

export interface RecordSection {
  anchor: string;
  title: string;
  subtitle: string;
  blocks: Block[];
}

export interface SummaryBlock {
  generatedAt: string;
  scanned: number;
  inactive: number;
  skipped: number;
  inactiveRate: string;
  inactivityDays: number;
  thresholdDate: string;
  traceWindow: string;
}

export interface NarrativeDocument {
  title: string;
  summary: SummaryBlock;
  sections: RecordSection[];
  skipped: string[];
  recommendations: readonly string[];
}

// ─── Static guidance ───

export const RECOMMENDATIONS: readonly string[] = [
  "Confirm with the listed owners whether each group is still needed before removing it.",
  "Export the membership of a group before deleting it so that it can be recreated if required.",
  "Hide candidate groups from address lists for a few weeks first and watch for complaints or bounce reports.",
  "Assign an owner to, or retire, any group whose owners are missing or could not be resolved.",
  "Groups that show recent message trace activity despite no modification may still be in use; review them individually.",
];

// ─── Builders ───

/** Whole days from `date` to `now`; `undefined` when there is no date. */
export function daysAgo(date: Date | null, now: Date): number | undefined {
  return date ? wholeDaysBetween(date, now) : undefined;
}

function timestampFact(label: string, date: Date | null, now: Date): Fact {
  if (!date) return { label, value: NOT_AVAILABLE };
  return { label, value: displayTimestamp(date), daysAgo: daysAgo(date, now) };
}

function traceFacts(prefix: string, counterpartLabel: string, event: TraceEvent, now: Date): Fact[] {
  const time: Fact =
    event.status === "found"
      ? timestampFact(`${prefix} time`, event.timestamp, now)
      : { label: `${prefix} time`, value: traceTimestamp(event) };
  return [
    time,
    { label: counterpartLabel, value: traceCounterpart(event) },
    { label: `${prefix} subject`, value: traceSubject(event) },
  ];
}

/** Element id for a record section; the position keeps ids unique when addresses slug alike. */
export function anchorFor(address: string, index: number): string {
  return `group-${index + 1}-` + address.toLowerCase().replace(/[^a-z0-9]+/g, "-");
}

export function inactivityReason(
  record: ActivityRecord,
  aggregate: Pick<ReportAggregate, "inactivityDays" | "thresholdDate">,
): string {
  if (!record.lastModified) {
    return "No folder statistics were returned, so there is no modification signal for this group.";
  }
  return (
    `Last modified ${displayDate(record.lastModified)}, before the ${aggregate.inactivityDays}-day ` +
    `threshold (${displayDate(aggregate.thresholdDate)}).`
  );
}

export function buildRecordSection(
  record: ActivityRecord,
  aggregate: Pick<ReportAggregate, "inactivityDays" | "thresholdDate">,
  now: Date,
  index = 0,
): RecordSection {
  const blocks: Block[] = [
    { kind: "paragraph", text: inactivityReason(record, aggregate) },
    {
      kind: "facts",
      title: "Timeline",
      facts: [
        timestampFact("Last modified", record.lastModified, now),
        timestampFact("Created", record.created, now),
        timestampFact("Directory object changed", record.directoryChanged, now),
      ],
    },
    {
      kind: "list",
      title: `Members (${record.memberCount === null ? NOT_AVAILABLE : record.memberCount})`,
      items: record.members.map(describeMember),
      emptyText: NO_MEMBERS,
    },
    {
      kind: "list",
      title: "Owners",
      items: record.owners.map(describeMember),
      emptyText: NO_OWNERS,
    },
    {
      kind: "facts",
      title: "Email activity",
      facts: [
        ...traceFacts("Last received", "Last received from", record.lastInbound, now),
        ...traceFacts("Last sent", "Last sent to", record.lastOutbound, now),
      ],
    },
    {
      kind: "facts",
      title: "Attributes",
      facts: [
        { label: "Hidden from address lists", value: yesNo(record.hiddenFromAddressLists) },
        { label: "Require sender authentication", value: yesNo(record.requireSenderAuthentication) },
        { label: "Accept messages only from", value: orNA(record.acceptMessagesOnlyFrom) },
        { label: "Accept messages only from DL members", value: orNA(record.acceptMessagesOnlyFromDLMembers) },
        { label: "Reject messages from", value: orNA(record.rejectMessagesFrom) },
        { label: "Notes", value: orNA(record.notes) },
        { label: "Custom attributes", value: orNA(record.customAttributes) },
      ],
    },
  ];

  return {
    anchor: anchorFor(record.primaryAddress, index),
    title: record.displayName,
    subtitle: record.primaryAddress,
    blocks,
  };
}

export function buildNarrative(aggregate: ReportAggregate, now: Date): NarrativeDocument {
  const { start, end } = aggregate.traceWindow;
  return {
    title: "Inactive Distribution Groups",
    summary: {
      generatedAt: displayTimestamp(now),
      scanned: aggregate.scanned,
      inactive: aggregate.records.length,
      skipped: aggregate.skipped.length,
      inactiveRate: inactiveRate(aggregate),
      inactivityDays: aggregate.inactivityDays,
      thresholdDate: displayDate(aggregate.thresholdDate),
      traceWindow: `${displayDate(start)} to ${displayDate(end)}`,
    },
    sections: aggregate.records.map((r, i) => buildRecordSection(r, aggregate, now, i)),
    skipped: aggregate.skipped.map((s) => `${s.id}: ${s.reason}`),
    recommendations: RECOMMENDATIONS,
  };
}
