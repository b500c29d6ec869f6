// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Cmdlet Allow-list ───
// Every command string is validated against these lists before being sent to PowerShell.
// Reporting runs in "read" mode; only the mailbox conversion workflow uses "mutate".

export type CommandMode = "read" | "mutate";

export const READ_CMDLETS: ReadonlySet<string> = new Set([
  "Get-DistributionGroup",
  "Get-DistributionGroupMember",
  "Get-Group",
  "Get-Recipient",
  "Get-Mailbox",
  "Get-MailboxFolderStatistics",
  "Get-MessageTraceV2",
]);

// The only mutations this server performs
export const MUTATION_CMDLETS: ReadonlySet<string> = new Set([
  "Set-Mailbox",
  "Update-MgUser",
]);

// Prefixes that are NEVER allowed outside MUTATION_CMDLETS
const BLOCKED_PREFIXES = [
  "Set-",
  "New-",
  "Remove-",
  "Enable-",
  "Start-",
  "Disable-",
  "Stop-",
  "Invoke-",
  "Add-",
  "Clear-",
  "Uninstall-",
  "Update-",
  "Register-",
  "Revoke-",
  "Grant-",
];

// Pipeline cmdlets the generated commands end in
const SAFE_BUILTINS: ReadonlySet<string> = new Set([
  "Select-Object",
  "ConvertTo-Json",
]);

// Regex that matches Verb-Noun cmdlet patterns
const CMDLET_RE = /\b([A-Z][a-z]+-[A-Z][A-Za-z0-9]+)\b/g;

// Single-quoted literals ('' is an escaped quote). Group names such as
// 'All-Staff' look like cmdlets, so literals are blanked before matching.
const SINGLE_QUOTED_RE = /'(?:[^']|'')*'/g;

export interface ValidationResult {
  valid: boolean;
  violation?: string;
}

/**
 * Validate a PowerShell command string against the allowlist.
 * Returns `{ valid: true }` when safe, or `{ valid: false, violation }` when blocked.
 */
export function validateCommand(command: string, mode: CommandMode = "read"): ValidationResult {
  const code = command.replace(SINGLE_QUOTED_RE, "''");
  const matches = [...code.matchAll(CMDLET_RE)].map((m) => m[1]);

  for (const cmdlet of matches) {
    if (MUTATION_CMDLETS.has(cmdlet)) {
      if (mode === "mutate") continue;
      return {
        valid: false,
        violation: `Blocked cmdlet: ${cmdlet} — mutations are only allowed in mutate mode`,
      };
    }

    for (const prefix of BLOCKED_PREFIXES) {
      if (cmdlet.startsWith(prefix)) {
        return {
          valid: false,
          violation: `Blocked cmdlet: ${cmdlet} — ${prefix}* cmdlets are not allowed`,
        };
      }
    }

    if (!READ_CMDLETS.has(cmdlet) && !SAFE_BUILTINS.has(cmdlet)) {
      return {
        valid: false,
        violation: `Unknown cmdlet: ${cmdlet} — not in the allowlist`,
      };
    }
  }

  return { valid: true };
}
