// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { FetchError, Result } from "../result.js";

// ─── Signals (fetch-layer output) ───

export interface MemberDescriptor {
  displayName: string;
  address: string;
}

export interface EntityAttributes {
  displayName: string;
  /** Report key; unique within a run. */
  primaryAddress: string;
  created: Date | null;
  modified: Date | null;
  hiddenFromAddressLists: boolean;
  requireSenderAuthentication: boolean;
  acceptMessagesOnlyFrom: string[];
  acceptMessagesOnlyFromDLMembers: string[];
  rejectMessagesFrom: string[];
  notes: string;
  /** CustomAttribute1..15, only the populated ones, keyed by attribute name. */
  customAttributes: Record<string, string>;
}

export interface TraceHit {
  timestamp: Date;
  counterpartAddress: string;
  subject: string;
}

export type TraceDirection = "inbound" | "outbound";

export interface OwnerLookup {
  rawIdentifier: string;
  resolution: Result<MemberDescriptor, FetchError>;
}

/** Everything fetched for one entity. Each signal fails independently. */
export interface RawSignalBundle {
  folderStats: Result<{ lastModified: Date } | null, FetchError>;
  members: Result<MemberDescriptor[], FetchError>;
  owners: Result<OwnerLookup[], FetchError>;
  inboundTrace: Result<TraceHit[], FetchError>;
  outboundTrace: Result<TraceHit[], FetchError>;
}

// ─── Fused record ───

export type TraceEvent =
  | { status: "found"; timestamp: Date; counterpart: string; subject: string }
  | { status: "none" }
  | { status: "error"; reason: string };

export interface ActivityRecord {
  readonly displayName: string;
  readonly primaryAddress: string;
  /** `null` when member lookup failed. */
  readonly memberCount: number | null;
  readonly members: readonly MemberDescriptor[];
  readonly owners: readonly MemberDescriptor[];
  readonly lastModified: Date | null;
  readonly created: Date | null;
  /** WhenChanged of the directory object; descriptive only. */
  readonly directoryChanged: Date | null;
  readonly lastInbound: TraceEvent;
  readonly lastOutbound: TraceEvent;
  readonly hiddenFromAddressLists: boolean;
  readonly requireSenderAuthentication: boolean;
  readonly acceptMessagesOnlyFrom: string;
  readonly acceptMessagesOnlyFromDLMembers: string;
  readonly rejectMessagesFrom: string;
  readonly notes: string;
  readonly customAttributes: string;
}

// ─── Run aggregate ───

export interface TraceWindow {
  start: Date;
  end: Date;
}

export interface SkippedEntity {
  id: string;
  reason: string;
}

export interface ReportAggregate {
  readonly inactivityDays: number;
  readonly thresholdDate: Date;
  readonly traceWindow: TraceWindow;
  /** Inactive records in scan order. */
  readonly records: ActivityRecord[];
  readonly skipped: SkippedEntity[];
  /** Lower-cased primary addresses already processed this run. */
  readonly seen: Set<string>;
  scanned: number;
}

// ─── Fetch layer contract ───

export interface GroupListing {
  /** Identity passed back to the per-entity fetchers. */
  id: string;
  displayName: string;
  primaryAddress: string;
}

export interface GroupSignalSource {
  listGroups(): Promise<GroupListing[]>;
  fetchAttributes(id: string): Promise<Result<EntityAttributes, FetchError>>;
  fetchFolderStats(id: string): Promise<Result<{ lastModified: Date } | null, FetchError>>;
  fetchMembers(id: string): Promise<Result<MemberDescriptor[], FetchError>>;
  fetchOwners(id: string): Promise<Result<string[], FetchError>>;
  resolveIdentifier(rawIdentifier: string): Promise<Result<MemberDescriptor, FetchError>>;
  fetchTrace(
    address: string,
    direction: TraceDirection,
    window: TraceWindow,
  ): Promise<Result<TraceHit[], FetchError>>;
}
