// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { ActivityRecord, ReportAggregate } from "../inactivity/types.js";
import { toCsv } from "./csv.js";
import {
  NO_MEMBERS,
  NO_OWNERS,
  describeList,
  isoOrNA,
  orNA,
  traceCounterpart,
  traceSubject,
  traceTimestamp,
  yesNo,
} from "./placeholders.js";

type Column = [header: string, cell: (r: ActivityRecord) => string];

// Order follows the ActivityRecord field list
const COLUMNS: readonly Column[] = [
  ["DisplayName", (r) => r.displayName],
  ["PrimarySmtpAddress", (r) => r.primaryAddress],
  ["MemberCount", (r) => (r.memberCount === null ? orNA(null) : String(r.memberCount))],
  ["Members", (r) => describeList(r.members, NO_MEMBERS)],
  ["Owners", (r) => describeList(r.owners, NO_OWNERS)],
  ["LastModified", (r) => isoOrNA(r.lastModified)],
  ["Created", (r) => isoOrNA(r.created)],
  ["DirectoryChanged", (r) => isoOrNA(r.directoryChanged)],
  ["LastReceivedTime", (r) => traceTimestamp(r.lastInbound)],
  ["LastReceivedFrom", (r) => traceCounterpart(r.lastInbound)],
  ["LastReceivedSubject", (r) => traceSubject(r.lastInbound)],
  ["LastSentTime", (r) => traceTimestamp(r.lastOutbound)],
  ["LastSentTo", (r) => traceCounterpart(r.lastOutbound)],
  ["LastSentSubject", (r) => traceSubject(r.lastOutbound)],
  ["HiddenFromAddressLists", (r) => yesNo(r.hiddenFromAddressLists)],
  ["RequireSenderAuthentication", (r) => yesNo(r.requireSenderAuthentication)],
  ["AcceptMessagesOnlyFrom", (r) => orNA(r.acceptMessagesOnlyFrom)],
  ["AcceptMessagesOnlyFromDLMembers", (r) => orNA(r.acceptMessagesOnlyFromDLMembers)],
  ["RejectMessagesFrom", (r) => orNA(r.rejectMessagesFrom)],
  ["Notes", (r) => orNA(r.notes)],
  ["CustomAttributes", (r) => orNA(r.customAttributes)],
];

export const TABLE_HEADER: readonly string[] = COLUMNS.map(([header]) => header);

export function tableRow(record: ActivityRecord): string[] {
  return COLUMNS.map(([, cell]) => cell(record));
}

/** One CSV row per inactive record; no summary rows. */
export function renderTable(aggregate: Pick<ReportAggregate, "records">): string {
  return toCsv(TABLE_HEADER, aggregate.records.map(tableRow));
}
