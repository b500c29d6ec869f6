// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describe, it, expect } from "vitest";
import { ConnectionError } from "../errors.js";
import { FakeRunner } from "../test-helpers.js";
import { ExchangeGroupSignals } from "./group-signals.js";
import { parsePsDate } from "./ps-json.js";

const WINDOW = {
  start: new Date("2025-04-01T06:00:00Z"),
  end: new Date("2025-04-11T06:00:00Z"),
};

describe("parsePsDate", () => {
  it("reads ISO-8601 and /Date()/ forms", () => {
    expect(parsePsDate("2024-06-01T12:00:00Z")?.toISOString()).toBe("2024-06-01T12:00:00.000Z");
    expect(parsePsDate("/Date(1583053200000)/")?.toISOString()).toBe("2020-03-01T09:00:00.000Z");
    expect(parsePsDate("/Date(1583053200000+0100)/")?.toISOString()).toBe("2020-03-01T09:00:00.000Z");
  });

  it("returns null for unparseable text", () => {
    expect(parsePsDate("yesterday")).toBeNull();
  });
});

describe("ExchangeGroupSignals", () => {
  describe("listGroups", () => {
    it("accepts a single unwrapped object", async () => {
      const runner = new FakeRunner().onJson(/^Get-DistributionGroup -ResultSize Unlimited/, {
        ExternalDirectoryObjectId: "g-1",
        DisplayName: "Sales Team",
        PrimarySmtpAddress: "sales@contoso.test",
      });
      const groups = await new ExchangeGroupSignals(runner).listGroups();
      expect(groups).toEqual([{ id: "g-1", displayName: "Sales Team", primaryAddress: "sales@contoso.test" }]);
    });

    it("falls back to the address when id or name is missing", async () => {
      const runner = new FakeRunner().onJson(/^Get-DistributionGroup/, [
        { ExternalDirectoryObjectId: null, DisplayName: null, PrimarySmtpAddress: "ops@contoso.test" },
        { ExternalDirectoryObjectId: "g-2", DisplayName: "Legal", PrimarySmtpAddress: "legal@contoso.test" },
      ]);
      const groups = await new ExchangeGroupSignals(runner).listGroups();
      expect(groups).toEqual([
        { id: "ops@contoso.test", displayName: "ops@contoso.test", primaryAddress: "ops@contoso.test" },
        { id: "g-2", displayName: "Legal", primaryAddress: "legal@contoso.test" },
      ]);
    });

    it("returns nothing for empty output", async () => {
      const runner = new FakeRunner().onJson(/^Get-DistributionGroup/, null);
      expect(await new ExchangeGroupSignals(runner).listGroups()).toEqual([]);
    });

    it("throws when the listing fails", async () => {
      const runner = new FakeRunner().onError(/^Get-DistributionGroup/, "Access denied");
      await expect(new ExchangeGroupSignals(runner).listGroups()).rejects.toThrow(
        "Failed to list distribution groups: Access denied",
      );
    });

    it("throws ConnectionError when the session is not ready", async () => {
      const runner = new FakeRunner().onError(/^Get-DistributionGroup/, "PowerShell session not ready", "not-ready");
      await expect(new ExchangeGroupSignals(runner).listGroups()).rejects.toBeInstanceOf(ConnectionError);
    });
  });

  describe("fetchAttributes", () => {
    it("normalises dates, lists and custom attributes", async () => {
      const runner = new FakeRunner().onJson(/Get-Group -Identity/, {
        DisplayName: "Sales Team",
        PrimarySmtpAddress: "sales@contoso.test",
        WhenCreatedUTC: "/Date(1583053200000)/",
        WhenChangedUTC: "2024-06-01T12:00:00Z",
        HiddenFromAddressListsEnabled: true,
        RequireSenderAuthenticationEnabled: null,
        AcceptMessagesOnlyFrom: "Ada Park",
        AcceptMessagesOnlyFromDLMembers: ["Managers", ""],
        RejectMessagesFrom: null,
        CustomAttribute1: "EMEA",
        CustomAttribute2: "",
        CustomAttribute9: "cost-4410",
        Notes: null,
      });

      const result = await new ExchangeGroupSignals(runner).fetchAttributes("g-1");

      expect(result).toEqual({
        ok: true,
        value: {
          displayName: "Sales Team",
          primaryAddress: "sales@contoso.test",
          created: new Date("2020-03-01T09:00:00Z"),
          modified: new Date("2024-06-01T12:00:00Z"),
          hiddenFromAddressLists: true,
          requireSenderAuthentication: false,
          acceptMessagesOnlyFrom: ["Ada Park"],
          acceptMessagesOnlyFromDLMembers: ["Managers"],
          rejectMessagesFrom: [],
          notes: "",
          customAttributes: { CustomAttribute1: "EMEA", CustomAttribute9: "cost-4410" },
        },
      });
    });

    it("quotes the identity as a PowerShell literal", async () => {
      const runner = new FakeRunner().onJson(/Get-Group/, { PrimarySmtpAddress: "ob@contoso.test" });
      await new ExchangeGroupSignals(runner).fetchAttributes("O'Brien Fans");
      expect(runner.commands()[0]).toContain("Get-DistributionGroup -Identity 'O''Brien Fans' |");
      expect(runner.commands()[0].startsWith("$_notes = (Get-Group -Identity 'O''Brien Fans').Notes; ")).toBe(true);
    });

    it("reports a parse error for output that is not JSON", async () => {
      const runner = new FakeRunner().on(/Get-Group/, { success: true, output: "WARNING: something odd" });
      expect(await new ExchangeGroupSignals(runner).fetchAttributes("g-1")).toEqual({
        ok: false,
        error: { kind: "parse", message: "Command output was not JSON" },
      });
    });

    it("reports a parse error for output of the wrong shape", async () => {
      const runner = new FakeRunner().onJson(/Get-Group/, { DisplayName: "No address" });
      const result = await new ExchangeGroupSignals(runner).fetchAttributes("g-1");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("parse");
      expect(result.error.message).toMatch(/^Unexpected output shape at PrimarySmtpAddress: /);
    });
  });

  describe("fetchFolderStats", () => {
    it("picks the newest folder timestamp", async () => {
      const runner = new FakeRunner().onJson(/^Get-MailboxFolderStatistics/, [
        { LastModifiedTime: "2024-01-01T00:00:00Z" },
        { LastModifiedTime: "2024-03-05T10:00:00Z" },
        { LastModifiedTime: null },
      ]);
      expect(await new ExchangeGroupSignals(runner).fetchFolderStats("g-1")).toEqual({
        ok: true,
        value: { lastModified: new Date("2024-03-05T10:00:00Z") },
      });
    });

    it("is null when no folder reports a timestamp", async () => {
      const runner = new FakeRunner().onJson(/^Get-MailboxFolderStatistics/, null);
      expect(await new ExchangeGroupSignals(runner).fetchFolderStats("g-1")).toEqual({ ok: true, value: null });
    });

    it("returns a command error as a result", async () => {
      const runner = new FakeRunner().onError(/^Get-MailboxFolderStatistics/, "mailbox not found");
      expect(await new ExchangeGroupSignals(runner).fetchFolderStats("g-1")).toEqual({
        ok: false,
        error: { kind: "command", message: "mailbox not found" },
      });
    });
  });

  describe("fetchMembers and fetchOwners", () => {
    it("maps members to descriptors", async () => {
      const runner = new FakeRunner().onJson(/^Get-DistributionGroupMember/, [
        { DisplayName: "Ada Park", PrimarySmtpAddress: "ada@contoso.test" },
        { DisplayName: "Contractors", PrimarySmtpAddress: null },
      ]);
      expect(await new ExchangeGroupSignals(runner).fetchMembers("g-1")).toEqual({
        ok: true,
        value: [
          { displayName: "Ada Park", address: "ada@contoso.test" },
          { displayName: "Contractors", address: "" },
        ],
      });
    });

    it("reads owners as a single value or a list", async () => {
      const single = new FakeRunner().onJson(/ManagedBy/, "cy");
      const many = new FakeRunner().onJson(/ManagedBy/, ["cy", "dee"]);
      expect(await new ExchangeGroupSignals(single).fetchOwners("g-1")).toEqual({ ok: true, value: ["cy"] });
      expect(await new ExchangeGroupSignals(many).fetchOwners("g-1")).toEqual({ ok: true, value: ["cy", "dee"] });
    });

    it("surfaces a blocked command as a blocked fetch error", async () => {
      const runner = new FakeRunner().onError(/^Get-DistributionGroupMember/, "Unknown cmdlet: X", "blocked");
      expect(await new ExchangeGroupSignals(runner).fetchMembers("g-1")).toEqual({
        ok: false,
        error: { kind: "blocked", message: "Unknown cmdlet: X" },
      });
    });

    it("throws ConnectionError when the process is gone", async () => {
      const runner = new FakeRunner().onError(/^Get-DistributionGroupMember/, "pwsh exited", "transport");
      await expect(new ExchangeGroupSignals(runner).fetchMembers("g-1")).rejects.toThrow(ConnectionError);
    });
  });

  describe("resolveIdentifier", () => {
    it("takes the first recipient", async () => {
      const runner = new FakeRunner().onJson(/^Get-Recipient/, {
        DisplayName: "Cy Moss",
        PrimarySmtpAddress: "cy@contoso.test",
      });
      expect(await new ExchangeGroupSignals(runner).resolveIdentifier("cy")).toEqual({
        ok: true,
        value: { displayName: "Cy Moss", address: "cy@contoso.test" },
      });
    });

    it("fails when nothing is found", async () => {
      const runner = new FakeRunner().onJson(/^Get-Recipient/, null);
      expect(await new ExchangeGroupSignals(runner).resolveIdentifier("ghost")).toEqual({
        ok: false,
        error: { kind: "command", message: "No recipient found for ghost" },
      });
    });
  });

  describe("fetchTrace", () => {
    const rows = [
      {
        Received: "2025-04-03T09:00:00Z",
        SenderAddress: "buyer@fabrikam.test",
        RecipientAddress: "sales@contoso.test",
        Subject: "Order",
      },
      { Received: null, SenderAddress: "x@fabrikam.test", RecipientAddress: "sales@contoso.test", Subject: "" },
    ];

    it("queries inbound trace by recipient and reports the sender", async () => {
      const runner = new FakeRunner().onJson(/^Get-MessageTraceV2/, rows);
      const result = await new ExchangeGroupSignals(runner).fetchTrace("sales@contoso.test", "inbound", WINDOW);

      expect(runner.commands()[0]).toContain(
        "Get-MessageTraceV2 -RecipientAddress 'sales@contoso.test' " +
          "-StartDate '2025-04-01T06:00:00.000Z' -EndDate '2025-04-11T06:00:00.000Z' -ResultSize 5000 |",
      );
      expect(result).toEqual({
        ok: true,
        value: [
          { timestamp: new Date("2025-04-03T09:00:00Z"), counterpartAddress: "buyer@fabrikam.test", subject: "Order" },
        ],
      });
    });

    it("splits a long window into ten-day queries, newest first", async () => {
      const runner = new FakeRunner().onJson(/^Get-MessageTraceV2/, null);
      const month = { start: new Date("2025-03-12T06:00:00Z"), end: new Date("2025-04-11T06:00:00Z") };

      const result = await new ExchangeGroupSignals(runner).fetchTrace("sales@contoso.test", "inbound", month);

      expect(result).toEqual({ ok: true, value: [] });
      expect(runner.commands().map((c) => /-StartDate '([^']+)' -EndDate '([^']+)'/.exec(c)?.slice(1))).toEqual([
        ["2025-04-01T06:00:00.000Z", "2025-04-11T06:00:00.000Z"],
        ["2025-03-22T06:00:00.000Z", "2025-04-01T06:00:00.000Z"],
        ["2025-03-12T06:00:00.000Z", "2025-03-22T06:00:00.000Z"],
      ]);
    });

    it("stops at the first slice with hits", async () => {
      const runner = new FakeRunner()
        .onJson(/-EndDate '2025-04-01T06:00:00.000Z'/, rows)
        .onJson(/^Get-MessageTraceV2/, null);
      const month = { start: new Date("2025-03-12T06:00:00Z"), end: new Date("2025-04-11T06:00:00Z") };

      const result = await new ExchangeGroupSignals(runner).fetchTrace("sales@contoso.test", "inbound", month);

      expect(runner.calls).toHaveLength(2);
      expect(result.ok && result.value.map((h) => h.counterpartAddress)).toEqual(["buyer@fabrikam.test"]);
    });

    it("returns the error of a failed slice", async () => {
      const runner = new FakeRunner().onError(/^Get-MessageTraceV2/, "throttled");
      const month = { start: new Date("2025-03-12T06:00:00Z"), end: new Date("2025-04-11T06:00:00Z") };

      expect(await new ExchangeGroupSignals(runner).fetchTrace("sales@contoso.test", "outbound", month)).toEqual({
        ok: false,
        error: { kind: "command", message: "throttled" },
      });
      expect(runner.calls).toHaveLength(1);
    });

    it("queries outbound trace by sender and reports the recipient", async () => {
      const runner = new FakeRunner().onJson(/^Get-MessageTraceV2/, rows[0]);
      const result = await new ExchangeGroupSignals(runner).fetchTrace("sales@contoso.test", "outbound", WINDOW);

      expect(runner.commands()[0]).toContain("Get-MessageTraceV2 -SenderAddress 'sales@contoso.test' ");
      expect(result.ok && result.value[0].counterpartAddress).toBe("sales@contoso.test");
    });
  });
});
