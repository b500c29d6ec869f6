// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CommandRunner } from "./powershell/executor.js";
import { logLine, type ExecutionLog } from "./logger.js";
import { ConnectionError, errorMessage } from "./errors.js";
import { conversionOptionsShape, scanOptionsShape } from "./config.js";
import { ExchangeGroupSignals } from "./exchange/group-signals.js";
import { inactiveRate } from "./inactivity/aggregate.js";
import { runInactivityScan, writeScanReports } from "./inactivity/scan.js";
import { convertMailboxes, writeConversionReport, type GraphConnector } from "./mailbox/convert.js";

const COMPONENT = "Exchange Hygiene MCP";

export interface ServerDeps {
  runner: CommandRunner;
  log: ExecutionLog;
  reportDir: string;
  connectGraph?: GraphConnector;
  clock?: () => Date;
}

function jsonResponse(body: unknown, isError = false) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(body, null, 2) }],
    isError,
  };
}

function failure(error: unknown) {
  return jsonResponse(
    {
      success: false,
      error: errorMessage(error),
      fatal: error instanceof ConnectionError,
    },
    true,
  );
}

export function createServer(deps: ServerDeps): McpServer {
  const { runner, log, reportDir, connectGraph } = deps;
  const clock = deps.clock ?? (() => new Date());
  const signals = new ExchangeGroupSignals(runner);

  const server = new McpServer({
    name: "exchange-hygiene",
    version: "1.0.0",
  });

  // ── Tool 1: scan_inactive_groups ──
  server.tool(
    "scan_inactive_groups",
    "Scan Exchange Online distribution groups for inactivity. A group is inactive when its " +
      "last folder modification is older than `inactivityDays` or missing entirely. " +
      "Members, owners and the last sent/received message (from message trace over " +
      "`traceWindowDays`) are collected for each inactive group. Writes a CSV and an HTML " +
      "report and returns { processed, inactive, skipped, inactiveRate, csvPath, htmlPath, warnings }.",
    scanOptionsShape,
    async (options) => {
      try {
        const now = clock();
        const run = await runInactivityScan(signals, options, now);
        const paths = await writeScanReports(run.aggregate, options.outputDir ?? reportDir, now);
        const { aggregate } = run;
        return jsonResponse({
          success: true,
          discovered: run.discovered,
          processed: aggregate.scanned,
          inactive: aggregate.records.length,
          skipped: aggregate.skipped,
          inactiveRate: inactiveRate(aggregate),
          ...paths,
          warnings: run.warnings,
        });
      } catch (error) {
        logLine(COMPONENT, `Scan aborted: ${errorMessage(error)}`);
        return failure(error);
      }
    },
  );

  // ── Tool 2: convert_to_shared_mailboxes ──
  server.tool(
    "convert_to_shared_mailboxes",
    "Convert user mailboxes to shared mailboxes. Each mailbox is checked (must be a UserMailbox), " +
      "converted with Set-Mailbox -Type Shared, optionally has sign-in blocked and its password " +
      "reset through Microsoft Graph, and is then verified. Writes an outcome CSV and returns the " +
      "per-mailbox outcomes. Rotated passwords are never returned or logged.",
    conversionOptionsShape,
    async (options) => {
      try {
        const outcomes = await convertMailboxes(runner, options.identities, options, connectGraph, clock);
        const reportPath = await writeConversionReport(outcomes, options.outputDir ?? reportDir, clock());
        return jsonResponse({
          success: outcomes.every((o) => o.status === "converted" || o.status === "already-shared"),
          reportPath,
          outcomes,
        });
      } catch (error) {
        logLine(COMPONENT, `Conversion aborted: ${errorMessage(error)}`);
        return failure(error);
      }
    },
  );

  // ── Tool 3: get_execution_log ──
  server.tool(
    "get_execution_log",
    "Retrieve the full execution log of all PowerShell commands run during this session. " +
      "Returns a Markdown-formatted log with timestamps, commands, outputs, errors, and durations. " +
      "Mutations are marked; password values are redacted.",
    {},
    async () => {
      return {
        content: [{ type: "text" as const, text: log.toMarkdown() }],
      };
    },
  );

  return server;
}
