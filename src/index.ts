#!/usr/bin/env node
// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { PsExecutor } from "./powershell/executor.js";
import { ExecutionLog, logLine } from "./logger.js";
import { errorMessage } from "./errors.js";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

const COMPONENT = "Exchange Hygiene MCP";

// ── Main ──
async function main(): Promise<void> {
  const config = loadConfig();
  const log = new ExecutionLog();
  const executor = new PsExecutor(
    { adminUpn: config.adminUpn, organization: config.organization },
    log,
  );

  const server = createServer({
    runner: executor,
    log,
    reportDir: config.reportDir,
    connectGraph: () => executor.ensureGraph(),
  });

  // Connect MCP transport FIRST so the server can respond to `initialize`
  logLine(COMPONENT, "Starting…");
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logLine(COMPONENT, "Server running ✓");

  // Sessions connect in the background; tools report "not initialized" until then
  executor.init().catch((error: unknown) => {
    logLine(COMPONENT, `Failed to initialize PowerShell session: ${errorMessage(error)}`);
    logLine(COMPONENT, "Commands will fail until the session connects.");
  });

  const stop = () => {
    executor
      .shutdown()
      .catch((error: unknown) => logLine(COMPONENT, `Shutdown error: ${errorMessage(error)}`))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

main().catch((error: unknown) => {
  logLine(COMPONENT, `Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
