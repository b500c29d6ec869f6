// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describe, it, expect } from "vitest";
import { ExecutionLog } from "../logger.js";
import { PsExecutor } from "./executor.js";

const IDENTITY = { adminUpn: "admin@contoso.test", organization: "contoso.test" };

// These cover the paths that run before a pwsh process exists.
describe("PsExecutor before init", () => {
  it("reports not-ready and logs the attempt", async () => {
    const log = new ExecutionLog();
    const executor = new PsExecutor(IDENTITY, log);

    const result = await executor.execute("Get-Mailbox -Identity 'a'");

    expect(executor.isReady()).toBe(false);
    expect(result).toEqual({
      success: false,
      output: "",
      error: "PowerShell session not initialized",
      failure: "not-ready",
    });
    expect(log.count()).toBe(1);
    expect(log.getAll()[0]).toMatchObject({
      command: "Get-Mailbox -Identity 'a'",
      mode: "read",
      success: false,
      error: "PowerShell session not initialized",
    });
  });

  it("records the redacted form of a command", async () => {
    const log = new ExecutionLog();
    const executor = new PsExecutor(IDENTITY, log);

    await executor.execute("Update-MgUser -UserId 'a' -PasswordProfile @{ Password = 'test-secret' }", {
      mode: "mutate",
      logAs: "Update-MgUser -UserId 'a' -PasswordProfile @{ Password = '********' }",
    });

    expect(log.getAll()[0].command).toBe("Update-MgUser -UserId 'a' -PasswordProfile @{ Password = '********' }");
    expect(log.getAll()[0].mode).toBe("mutate");
    expect(log.toMarkdown()).not.toContain("test-secret");
  });

  it("passes the failure kind through executeJson", async () => {
    const executor = new PsExecutor(IDENTITY);
    expect(await executor.executeJson("Get-Mailbox")).toEqual({
      success: false,
      raw: "",
      error: "PowerShell session not initialized",
      failure: "not-ready",
    });
  });

  it("refuses to connect Graph without a session", async () => {
    await expect(new PsExecutor(IDENTITY).ensureGraph()).rejects.toThrow("PowerShell session not initialized");
  });

  it("shuts down cleanly when nothing was started", async () => {
    await expect(new PsExecutor(IDENTITY).shutdown()).resolves.toBeUndefined();
  });
});
