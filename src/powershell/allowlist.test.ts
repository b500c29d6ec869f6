// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describe, it, expect } from "vitest";
import { validateCommand } from "./allowlist.js";

describe("validateCommand", () => {
  describe("read mode", () => {
    it.each([
      "Get-DistributionGroup -ResultSize Unlimited | Select-Object DisplayName | ConvertTo-Json -Compress",
      "Get-MessageTraceV2 -SenderAddress 'a@contoso.test' -ResultSize 5000",
      "$_notes = (Get-Group -Identity 'g-1').Notes; Get-DistributionGroup -Identity 'g-1'",
      "Get-MailboxFolderStatistics -Identity 'g-1' | Select-Object LastModifiedTime | ConvertTo-Json -Depth 3 -Compress",
    ])("allows %s", (command) => {
      expect(validateCommand(command)).toEqual({ valid: true });
    });

    it("blocks the conversion cmdlets", () => {
      expect(validateCommand("Set-Mailbox -Identity 'a' -Type Shared")).toEqual({
        valid: false,
        violation: "Blocked cmdlet: Set-Mailbox — mutations are only allowed in mutate mode",
      });
      expect(validateCommand("Update-MgUser -UserId 'a' -AccountEnabled:$false").violation).toBe(
        "Blocked cmdlet: Update-MgUser — mutations are only allowed in mutate mode",
      );
    });

    it("rejects cmdlets outside the allowlist", () => {
      expect(validateCommand("Get-Process")).toEqual({
        valid: false,
        violation: "Unknown cmdlet: Get-Process — not in the allowlist",
      });
    });

    it.each(["Get-User", "Get-MgUser", "Where-Object", "Measure-Object", "Get-Date", "Write-Host"])(
      "rejects %s, which no generated command uses",
      (cmdlet) => {
        expect(validateCommand(`Get-Mailbox -Identity 'a' | ${cmdlet}`).violation).toBe(
          `Unknown cmdlet: ${cmdlet} — not in the allowlist`,
        );
      },
    );
  });

  describe("mutate mode", () => {
    it("allows the conversion cmdlets", () => {
      expect(validateCommand("Set-Mailbox -Identity 'a' -Type Shared", "mutate")).toEqual({ valid: true });
      expect(
        validateCommand(
          "Update-MgUser -UserId 'a' -PasswordProfile @{ Password = 'test-secret'; ForceChangePasswordNextSignIn = $true }",
          "mutate",
        ),
      ).toEqual({ valid: true });
    });

    it("still blocks every other mutating verb", () => {
      expect(validateCommand("Remove-DistributionGroup -Identity 'a'", "mutate")).toEqual({
        valid: false,
        violation: "Blocked cmdlet: Remove-DistributionGroup — Remove-* cmdlets are not allowed",
      });
      expect(validateCommand("Invoke-Expression 'Get-Date'", "mutate").violation).toBe(
        "Blocked cmdlet: Invoke-Expression — Invoke-* cmdlets are not allowed",
      );
    });
  });

  describe("quoted literals", () => {
    it("ignores cmdlet-shaped text inside single quotes", () => {
      expect(validateCommand("Get-DistributionGroup -Identity 'All-Staff'")).toEqual({ valid: true });
      expect(validateCommand("Get-Recipient -Identity 'Remove-Me'")).toEqual({ valid: true });
    });

    it("does not let an escaped quote hide a following command", () => {
      expect(validateCommand("Get-Mailbox -Identity 'O''Brien'; Remove-Mailbox -Identity x")).toEqual({
        valid: false,
        violation: "Blocked cmdlet: Remove-Mailbox — Remove-* cmdlets are not allowed",
      });
    });
  });
});
