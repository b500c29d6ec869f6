// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Signal Fusion ───
// Merges the independently fetched signals of one entity into a single
// ActivityRecord. Pure: all I/O has already happened in the fetch layer,
// and a failed signal only swaps in a sentinel.

import type { FetchError, Result } from "../result.js";
import type {
  ActivityRecord,
  EntityAttributes,
  MemberDescriptor,
  OwnerLookup,
  RawSignalBundle,
  TraceEvent,
  TraceHit,
} from "./types.js";

export const RESOLUTION_FAILED_PREFIX = "Error retrieving list";

// Sentinel descriptors carry no address
export function resolutionFailed(error: FetchError): MemberDescriptor {
  return { displayName: `${RESOLUTION_FAILED_PREFIX}: ${error.message}`, address: "" };
}

export function unresolvedOwner(rawIdentifier: string): MemberDescriptor {
  return { displayName: `${rawIdentifier} (unresolved)`, address: "" };
}

/**
 * The most recent hit. Ties keep the first one seen.
 */
export function selectLatest(hits: readonly TraceHit[]): TraceHit | undefined {
  let latest: TraceHit | undefined;
  for (const hit of hits) {
    if (!latest || hit.timestamp.getTime() > latest.timestamp.getTime()) {
      latest = hit;
    }
  }
  return latest;
}

export function toTraceEvent(trace: Result<TraceHit[], FetchError>): TraceEvent {
  if (!trace.ok) return { status: "error", reason: trace.error.message };
  const latest = selectLatest(trace.value);
  if (!latest) return { status: "none" };
  return {
    status: "found",
    timestamp: latest.timestamp,
    counterpart: latest.counterpartAddress,
    subject: latest.subject,
  };
}

/** One descriptor per raw identifier, in input order. */
export function resolveOwners(owners: Result<OwnerLookup[], FetchError>): MemberDescriptor[] {
  if (!owners.ok) return [resolutionFailed(owners.error)];
  return owners.value.map((o) =>
    o.resolution.ok ? o.resolution.value : unresolvedOwner(o.rawIdentifier),
  );
}

function joinList(values: readonly string[]): string {
  return values.join(", ");
}

function joinCustomAttributes(attrs: Record<string, string>): string {
  return Object.entries(attrs)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

export function fuse(attributes: EntityAttributes, bundle: RawSignalBundle): ActivityRecord {
  if (attributes.primaryAddress.trim() === "") {
    throw new Error(`Entity "${attributes.displayName}" has no primary address`);
  }

  const members = bundle.members.ok ? bundle.members.value : [resolutionFailed(bundle.members.error)];
  const lastModified =
    bundle.folderStats.ok && bundle.folderStats.value ? bundle.folderStats.value.lastModified : null;

  return {
    displayName: attributes.displayName,
    primaryAddress: attributes.primaryAddress,
    memberCount: bundle.members.ok ? bundle.members.value.length : null,
    members,
    owners: resolveOwners(bundle.owners),
    lastModified,
    created: attributes.created,
    directoryChanged: attributes.modified,
    lastInbound: toTraceEvent(bundle.inboundTrace),
    lastOutbound: toTraceEvent(bundle.outboundTrace),
    hiddenFromAddressLists: attributes.hiddenFromAddressLists,
    requireSenderAuthentication: attributes.requireSenderAuthentication,
    acceptMessagesOnlyFrom: joinList(attributes.acceptMessagesOnlyFrom),
    acceptMessagesOnlyFromDLMembers: joinList(attributes.acceptMessagesOnlyFromDLMembers),
    rejectMessagesFrom: joinList(attributes.rejectMessagesFrom),
    notes: attributes.notes,
    customAttributes: joinCustomAttributes(attributes.customAttributes),
  };
}
