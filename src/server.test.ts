// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { ExecutionLog } from "./logger.js";
import { createServer } from "./server.js";
import { FakeRunner } from "./test-helpers.js";

const NOW = new Date("2025-04-11T06:00:00Z");

// ─── Helpers ───

interface ToolReply {
  text: string;
  isError: boolean;
}

let reportDir: string;
let client: Client | null = null;

async function connect(runner: FakeRunner, log = new ExecutionLog()): Promise<Client> {
  const server = createServer({ runner, log, reportDir, clock: () => NOW });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const c = new Client({ name: "test-client", version: "1.0.0" });
  await Promise.all([c.connect(clientTransport), server.connect(serverTransport)]);
  client = c;
  return c;
}

async function callTool(c: Client, name: string, args: Record<string, unknown> = {}): Promise<ToolReply> {
  const result = CallToolResultSchema.parse(await c.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`Expected text content from ${name}`);
  return { text: first.text, isError: result.isError ?? false };
}

function staleGroupRunner(): FakeRunner {
  return new FakeRunner()
    .onJson(/^Get-DistributionGroup -ResultSize Unlimited/, {
      ExternalDirectoryObjectId: "g-1",
      DisplayName: "Alpha",
      PrimarySmtpAddress: "alpha@contoso.test",
    })
    .onJson(/^\$_notes/, {
      DisplayName: "Alpha",
      PrimarySmtpAddress: "alpha@contoso.test",
      WhenCreatedUTC: "2020-01-01T00:00:00Z",
    })
    .onJson(/^Get-MailboxFolderStatistics/, { LastModifiedTime: "2025-01-01T06:00:00Z" })
    .onJson(/^Get-DistributionGroupMember/, null)
    .onJson(/ManagedBy/, null)
    .onJson(/^Get-MessageTraceV2/, null);
}

beforeEach(async () => {
  reportDir = await mkdtemp(join(tmpdir(), "hygiene-server-"));
});

afterEach(async () => {
  await client?.close();
  client = null;
  await rm(reportDir, { recursive: true, force: true });
});

// ─── Tools ───

describe("MCP server", () => {
  it("lists its tools", async () => {
    const c = await connect(new FakeRunner());
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "convert_to_shared_mailboxes",
      "get_execution_log",
      "scan_inactive_groups",
    ]);
  });

  it("scans groups and writes both reports", async () => {
    const c = await connect(staleGroupRunner());
    const reply = await callTool(c, "scan_inactive_groups");

    expect(reply.isError).toBe(false);
    const csvPath = join(reportDir, "InactiveDistributionGroups_20250411_060000.csv");
    expect(JSON.parse(reply.text)).toEqual({
      success: true,
      discovered: 1,
      processed: 1,
      inactive: 1,
      skipped: [],
      inactiveRate: "100.0%",
      csvPath,
      htmlPath: join(reportDir, "InactiveDistributionGroups_20250411_060000.html"),
      warnings: [],
    });
    const csv = await readFile(csvPath, "utf8");
    const row = csv.split("\r\n")[1];
    expect(row.startsWith("Alpha,alpha@contoso.test,0,No members,No owners,2025-01-01T06:00:00.000Z,")).toBe(true);
  });

  it("applies the name filter from the tool arguments", async () => {
    const c = await connect(staleGroupRunner());
    const reply = await callTool(c, "scan_inactive_groups", { nameFilter: "Bravo*" });
    expect(JSON.parse(reply.text)).toMatchObject({ discovered: 1, processed: 0, inactive: 0, inactiveRate: "0.0%" });
  });

  it("reports a lost session as fatal and writes nothing", async () => {
    const runner = new FakeRunner().onError(/./, "PowerShell session not initialized", "not-ready");
    const c = await connect(runner);
    const reply = await callTool(c, "scan_inactive_groups");

    expect(reply.isError).toBe(true);
    expect(JSON.parse(reply.text)).toEqual({
      success: false,
      error: "PowerShell session not initialized",
      fatal: true,
    });
    expect(await readdir(reportDir)).toEqual([]);
  });

  it("converts mailboxes and writes the outcome report", async () => {
    const runner = new FakeRunner().onJson(/^Get-Mailbox /, {
      RecipientTypeDetails: "SharedMailbox",
      UserPrincipalName: "desk@contoso.test",
      PrimarySmtpAddress: "desk@contoso.test",
    });
    const c = await connect(runner);
    const reply = await callTool(c, "convert_to_shared_mailboxes", { identities: ["desk@contoso.test"] });

    const body = JSON.parse(reply.text);
    expect(body.success).toBe(true);
    expect(body.reportPath).toBe(join(reportDir, "SharedMailboxConversion_20250411_060000.csv"));
    expect(body.outcomes).toHaveLength(1);
    expect(body.outcomes[0].status).toBe("already-shared");
  });

  it("returns the execution log as Markdown", async () => {
    const log = new ExecutionLog();
    log.append({
      timestamp: "2025-04-11T06:00:00.000Z",
      command: "Get-DistributionGroup -ResultSize Unlimited",
      mode: "read",
      success: true,
      output: "[]",
      durationMs: 120,
    });
    const c = await connect(new FakeRunner(), log);
    const reply = await callTool(c, "get_execution_log");
    expect(reply.text).toBe(log.toMarkdown());
    expect(reply.text).toContain("**Total commands:** 1");
  });
});
