// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Distribution Group Signals ───
// Exchange Online bindings for the per-group fetchers. Every command is a
// read-only, single-line pipeline ending in ConvertTo-Json.

import { z } from "zod";
import type { CommandRunner } from "../powershell/executor.js";
import { err, fetchError, ok, type FetchError, type Result } from "../result.js";
import { psLiteral } from "../utils.js";
import type {
  EntityAttributes,
  GroupListing,
  GroupSignalSource,
  MemberDescriptor,
  TraceDirection,
  TraceHit,
  TraceWindow,
} from "../inactivity/types.js";
import { fetchJson, psBool, psCollection, psDate, psString, psStringList } from "./ps-json.js";

const TO_JSON = "ConvertTo-Json -Depth 3 -Compress";

// Get-MessageTraceV2 caps a single page at 5000 rows
const TRACE_RESULT_SIZE = 5000;

// ...and a single query at 10 days between -StartDate and -EndDate
const TRACE_SLICE_MS = 10 * 24 * 60 * 60 * 1000;

const CUSTOM_ATTRIBUTE_NAMES = Array.from({ length: 15 }, (_, i) => `CustomAttribute${i + 1}`);

// ─── Schemas ───

const ListingSchema = psCollection(
  z.object({
    ExternalDirectoryObjectId: psString,
    DisplayName: psString,
    PrimarySmtpAddress: z.string().min(1),
  }),
);

const AttributesSchema = z
  .object({
    DisplayName: psString,
    PrimarySmtpAddress: z.string().trim().min(1),
    WhenCreatedUTC: psDate,
    WhenChangedUTC: psDate,
    HiddenFromAddressListsEnabled: psBool,
    RequireSenderAuthenticationEnabled: psBool,
    AcceptMessagesOnlyFrom: psStringList,
    AcceptMessagesOnlyFromDLMembers: psStringList,
    RejectMessagesFrom: psStringList,
    Notes: psString,
  })
  // CustomAttribute1..15 come through untyped and are picked out below
  .passthrough();

const FolderStatsSchema = psCollection(z.object({ LastModifiedTime: psDate }));

const RecipientSchema = psCollection(
  z.object({
    DisplayName: psString,
    PrimarySmtpAddress: psString,
  }),
);

const OwnersSchema = psStringList;

const TraceSchema = psCollection(
  z.object({
    Received: psDate,
    SenderAddress: psString,
    RecipientAddress: psString,
    Subject: psString,
  }),
);

// ─── Source ───

export class ExchangeGroupSignals implements GroupSignalSource {
  constructor(private readonly runner: CommandRunner) {}

  async listGroups(): Promise<GroupListing[]> {
    const result = await fetchJson(
      this.runner,
      `Get-DistributionGroup -ResultSize Unlimited | ` +
        `Select-Object ExternalDirectoryObjectId, DisplayName, PrimarySmtpAddress | ${TO_JSON}`,
      ListingSchema,
    );
    if (!result.ok) {
      throw new Error(`Failed to list distribution groups: ${result.error.message}`);
    }
    return result.value.map((g) => ({
      id: g.ExternalDirectoryObjectId || g.PrimarySmtpAddress,
      displayName: g.DisplayName || g.PrimarySmtpAddress,
      primaryAddress: g.PrimarySmtpAddress,
    }));
  }

  async fetchAttributes(id: string): Promise<Result<EntityAttributes, FetchError>> {
    const identity = psLiteral(id);
    const properties = [
      "DisplayName",
      "PrimarySmtpAddress",
      "WhenCreatedUTC",
      "WhenChangedUTC",
      "HiddenFromAddressListsEnabled",
      "RequireSenderAuthenticationEnabled",
      "AcceptMessagesOnlyFrom",
      "AcceptMessagesOnlyFromDLMembers",
      "RejectMessagesFrom",
      ...CUSTOM_ATTRIBUTE_NAMES,
    ].join(", ");
    // Notes live on the group object, not the distribution group view
    const result = await fetchJson(
      this.runner,
      `$_notes = (Get-Group -Identity ${identity}).Notes; ` +
        `Get-DistributionGroup -Identity ${identity} | ` +
        `Select-Object ${properties}, @{Name='Notes';Expression={$_notes}} | ${TO_JSON}`,
      AttributesSchema,
    );
    if (!result.ok) return result;

    const g = result.value;
    const customAttributes: Record<string, string> = {};
    for (const name of CUSTOM_ATTRIBUTE_NAMES) {
      const value = g[name];
      if (typeof value === "string" && value !== "") customAttributes[name] = value;
    }
    return ok({
      displayName: g.DisplayName || g.PrimarySmtpAddress,
      primaryAddress: g.PrimarySmtpAddress,
      created: g.WhenCreatedUTC,
      modified: g.WhenChangedUTC,
      hiddenFromAddressLists: g.HiddenFromAddressListsEnabled,
      requireSenderAuthentication: g.RequireSenderAuthenticationEnabled,
      acceptMessagesOnlyFrom: g.AcceptMessagesOnlyFrom,
      acceptMessagesOnlyFromDLMembers: g.AcceptMessagesOnlyFromDLMembers,
      rejectMessagesFrom: g.RejectMessagesFrom,
      notes: g.Notes,
      customAttributes,
    });
  }

  async fetchFolderStats(id: string): Promise<Result<{ lastModified: Date } | null, FetchError>> {
    const result = await fetchJson(
      this.runner,
      `Get-MailboxFolderStatistics -Identity ${psLiteral(id)} | Select-Object LastModifiedTime | ${TO_JSON}`,
      FolderStatsSchema,
    );
    if (!result.ok) return result;

    let newest: Date | null = null;
    for (const folder of result.value) {
      const t = folder.LastModifiedTime;
      if (t && (!newest || t.getTime() > newest.getTime())) newest = t;
    }
    return ok(newest ? { lastModified: newest } : null);
  }

  async fetchMembers(id: string): Promise<Result<MemberDescriptor[], FetchError>> {
    const result = await fetchJson(
      this.runner,
      `Get-DistributionGroupMember -Identity ${psLiteral(id)} -ResultSize Unlimited | ` +
        `Select-Object DisplayName, PrimarySmtpAddress | ${TO_JSON}`,
      RecipientSchema,
    );
    if (!result.ok) return result;
    return ok(result.value.map((m) => ({ displayName: m.DisplayName, address: m.PrimarySmtpAddress })));
  }

  fetchOwners(id: string): Promise<Result<string[], FetchError>> {
    return fetchJson(
      this.runner,
      `Get-DistributionGroup -Identity ${psLiteral(id)} | Select-Object -ExpandProperty ManagedBy | ${TO_JSON}`,
      OwnersSchema,
    );
  }

  async resolveIdentifier(rawIdentifier: string): Promise<Result<MemberDescriptor, FetchError>> {
    const result = await fetchJson(
      this.runner,
      `Get-Recipient -Identity ${psLiteral(rawIdentifier)} | Select-Object DisplayName, PrimarySmtpAddress | ${TO_JSON}`,
      RecipientSchema,
    );
    if (!result.ok) return result;
    const [first] = result.value;
    if (!first) return err(fetchError("command", `No recipient found for ${rawIdentifier}`));
    return ok({ displayName: first.DisplayName, address: first.PrimarySmtpAddress });
  }

  /**
   * Trace for one direction over `window`, queried in slices of at most ten
   * days, newest first. Stops at the first slice with hits, since only the
   * latest hit is reported.
   */
  async fetchTrace(
    address: string,
    direction: TraceDirection,
    window: TraceWindow,
  ): Promise<Result<TraceHit[], FetchError>> {
    let end = window.end;
    while (end.getTime() > window.start.getTime()) {
      const start = new Date(Math.max(window.start.getTime(), end.getTime() - TRACE_SLICE_MS));
      const slice = await this.fetchTraceSlice(address, direction, start, end);
      if (!slice.ok || slice.value.length > 0) return slice;
      end = start;
    }
    return ok([]);
  }

  private async fetchTraceSlice(
    address: string,
    direction: TraceDirection,
    start: Date,
    end: Date,
  ): Promise<Result<TraceHit[], FetchError>> {
    const filter = direction === "inbound" ? "-RecipientAddress" : "-SenderAddress";
    const result = await fetchJson(
      this.runner,
      `Get-MessageTraceV2 ${filter} ${psLiteral(address)} ` +
        `-StartDate ${psLiteral(start.toISOString())} -EndDate ${psLiteral(end.toISOString())} ` +
        `-ResultSize ${TRACE_RESULT_SIZE} | ` +
        `Select-Object Received, SenderAddress, RecipientAddress, Subject | ${TO_JSON}`,
      TraceSchema,
    );
    if (!result.ok) return result;

    const hits: TraceHit[] = [];
    for (const row of result.value) {
      if (!row.Received) continue;
      hits.push({
        timestamp: row.Received,
        counterpartAddress: direction === "inbound" ? row.SenderAddress : row.RecipientAddress,
        subject: row.Subject,
      });
    }
    return ok(hits);
  }
}
