// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Shared Test Fixtures ───
// In-process stand-ins for the PowerShell session and the signal source.

import type { CommandRunner, ExecuteOptions, PsJsonResult, PsResult } from "./powershell/executor.js";
import { err, fetchError, ok, type FetchError, type Result } from "./result.js";
import type {
  ActivityRecord,
  EntityAttributes,
  GroupListing,
  GroupSignalSource,
  MemberDescriptor,
  TraceDirection,
  TraceHit,
  TraceWindow,
} from "./inactivity/types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

// ─── Fake PowerShell ───

type Reply = PsResult | ((command: string) => PsResult);

export interface RecordedCommand {
  command: string;
  options: ExecuteOptions;
}

/** Answers commands from the first route whose pattern matches. Unmatched commands fail. */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private routes: Array<[RegExp, Reply]> = [];

  on(pattern: RegExp, reply: Reply): this {
    this.routes.push([pattern, reply]);
    return this;
  }

  /** Reply with `value` serialised the way ConvertTo-Json -Compress would. */
  onJson(pattern: RegExp, value: unknown): this {
    return this.on(pattern, { success: true, output: value === null ? "" : JSON.stringify(value) });
  }

  onError(pattern: RegExp, error: string, failure: PsResult["failure"] = "command"): this {
    return this.on(pattern, { success: false, output: "", error, failure });
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<PsResult> {
    this.calls.push({ command, options });
    for (const [pattern, reply] of this.routes) {
      if (pattern.test(command)) return typeof reply === "function" ? reply(command) : reply;
    }
    return { success: false, output: "", error: `No fake route for: ${command}`, failure: "command" };
  }

  async executeJson(command: string, options: ExecuteOptions = {}): Promise<PsJsonResult> {
    const r = await this.execute(command, options);
    if (!r.success) return { success: false, raw: r.output, error: r.error, failure: r.failure };
    if (r.output === "") return { success: true, data: null, raw: r.output };
    try {
      return { success: true, data: JSON.parse(r.output), raw: r.output };
    } catch {
      return { success: true, raw: r.output };
    }
  }

  commands(): string[] {
    return this.calls.map((c) => c.command);
  }
}

// ─── Fake signal source ───

export interface FakeGroup {
  listing: GroupListing;
  attributes: Result<EntityAttributes, FetchError>;
  lastModified?: Date | null;
  folderStatsError?: string;
  members?: Result<MemberDescriptor[], FetchError>;
  owners?: Result<string[], FetchError>;
  inbound?: Result<TraceHit[], FetchError>;
  outbound?: Result<TraceHit[], FetchError>;
}

export class FakeSignalSource implements GroupSignalSource {
  readonly traceWindows: TraceWindow[] = [];

  constructor(
    private readonly groups: FakeGroup[],
    private readonly directory: Record<string, MemberDescriptor> = {},
  ) {}

  private group(id: string): FakeGroup {
    const g = this.groups.find((x) => x.listing.id === id);
    if (!g) throw new Error(`unknown group ${id}`);
    return g;
  }

  async listGroups(): Promise<GroupListing[]> {
    return this.groups.map((g) => g.listing);
  }

  async fetchAttributes(id: string): Promise<Result<EntityAttributes, FetchError>> {
    return this.group(id).attributes;
  }

  async fetchFolderStats(id: string): Promise<Result<{ lastModified: Date } | null, FetchError>> {
    const g = this.group(id);
    if (g.folderStatsError) return err(fetchError("command", g.folderStatsError));
    return ok(g.lastModified ? { lastModified: g.lastModified } : null);
  }

  async fetchMembers(id: string): Promise<Result<MemberDescriptor[], FetchError>> {
    return this.group(id).members ?? ok([]);
  }

  async fetchOwners(id: string): Promise<Result<string[], FetchError>> {
    return this.group(id).owners ?? ok([]);
  }

  async resolveIdentifier(rawIdentifier: string): Promise<Result<MemberDescriptor, FetchError>> {
    const found = this.directory[rawIdentifier];
    return found ? ok(found) : err(fetchError("command", `Couldn't find object "${rawIdentifier}"`));
  }

  async fetchTrace(
    address: string,
    direction: TraceDirection,
    window: TraceWindow,
  ): Promise<Result<TraceHit[], FetchError>> {
    this.traceWindows.push(window);
    const g = this.groups.find((x) => x.listing.primaryAddress === address);
    const trace = direction === "inbound" ? g?.inbound : g?.outbound;
    return trace ?? ok([]);
  }
}

// ─── Builders ───

export function makeAttributes(overrides: Partial<EntityAttributes> = {}): EntityAttributes {
  return {
    displayName: "Sales Team",
    primaryAddress: "sales@contoso.test",
    created: new Date("2020-03-01T09:00:00Z"),
    modified: new Date("2024-06-01T12:00:00Z"),
    hiddenFromAddressLists: false,
    requireSenderAuthentication: true,
    acceptMessagesOnlyFrom: [],
    acceptMessagesOnlyFromDLMembers: [],
    rejectMessagesFrom: [],
    notes: "",
    customAttributes: {},
    ...overrides,
  };
}

export function makeGroup(
  name: string,
  address: string,
  rest: Omit<FakeGroup, "listing" | "attributes"> & { attributes?: FakeGroup["attributes"] } = {},
): FakeGroup {
  return {
    listing: { id: `id-${address}`, displayName: name, primaryAddress: address },
    attributes: ok(makeAttributes({ displayName: name, primaryAddress: address })),
    ...rest,
  };
}

export function makeRecord(overrides: Partial<ActivityRecord> = {}): ActivityRecord {
  return {
    displayName: "Sales Team",
    primaryAddress: "sales@contoso.test",
    memberCount: 2,
    members: [
      { displayName: "Ada Park", address: "ada@contoso.test" },
      { displayName: "Ben Ito", address: "ben@contoso.test" },
    ],
    owners: [{ displayName: "Cy Moss", address: "cy@contoso.test" }],
    lastModified: new Date("2024-01-10T08:30:00Z"),
    created: new Date("2020-03-01T09:00:00Z"),
    directoryChanged: null,
    lastInbound: { status: "none" },
    lastOutbound: { status: "none" },
    hiddenFromAddressLists: false,
    requireSenderAuthentication: true,
    acceptMessagesOnlyFrom: "",
    acceptMessagesOnlyFromDLMembers: "",
    rejectMessagesFrom: "",
    notes: "",
    customAttributes: "",
    ...overrides,
  };
}
