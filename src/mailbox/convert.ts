// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Shared Mailbox Conversion ───
// Straight-line workflow per mailbox: check the current type, switch it to
// Shared, harden the account, then confirm the new type.

import { randomBytes } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { CommandRunner } from "../powershell/executor.js";
import { fetchJson, psString } from "../exchange/ps-json.js";
import { toCsv } from "../report/csv.js";
import { errorMessage } from "../errors.js";
import { logLine } from "../logger.js";
import { fileTimestamp, psLiteral } from "../utils.js";

export type ConversionStatus = "converted" | "already-shared" | "partial" | "failed";

export interface ConversionStep {
  step: string;
  success: boolean;
  detail: string;
}

export interface ConversionOutcome {
  identity: string;
  userPrincipalName: string | null;
  previousType: string | null;
  status: ConversionStatus;
  signInDisabled: boolean;
  passwordRotated: boolean;
  steps: ConversionStep[];
  timestamp: string;
}

export interface ConversionSettings {
  disableSignIn: boolean;
  rotatePassword: boolean;
}

/** Hook for connecting Microsoft Graph before the account steps run. */
export type GraphConnector = () => Promise<void>;

const COMPONENT = "MailboxConvert";

const MailboxSchema = z.object({
  RecipientTypeDetails: z.string(),
  UserPrincipalName: psString,
  PrimarySmtpAddress: psString,
});

const PASSWORD_ALPHABET =
  "ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz23456789!#%+=?@";

/** Random password with at least one character from each class Entra ID checks for. */
export function generatePassword(length = 24): string {
  const classes = ["ABCDEFGHJKLMNPQRSTUVWXYZ", "abcdefghijkmnopqrstuvwxyz", "23456789", "!#%+=?@"];
  const bytes = randomBytes(length);
  const chars = Array.from(bytes, (b) => PASSWORD_ALPHABET[b % PASSWORD_ALPHABET.length]);
  classes.forEach((cls, i) => {
    chars[i] = cls[bytes[i] % cls.length];
  });
  return chars.join("");
}

async function lookupMailbox(runner: CommandRunner, identity: string) {
  return fetchJson(
    runner,
    `Get-Mailbox -Identity ${psLiteral(identity)} | ` +
      `Select-Object RecipientTypeDetails, UserPrincipalName, PrimarySmtpAddress | ConvertTo-Json -Compress`,
    MailboxSchema,
  );
}

export async function convertToSharedMailbox(
  runner: CommandRunner,
  identity: string,
  settings: ConversionSettings,
  connectGraph?: GraphConnector,
  now: () => Date = () => new Date(),
): Promise<ConversionOutcome> {
  const outcome: ConversionOutcome = {
    identity,
    userPrincipalName: null,
    previousType: null,
    status: "failed",
    signInDisabled: false,
    passwordRotated: false,
    steps: [],
    timestamp: now().toISOString(),
  };
  const record = (step: string, success: boolean, detail: string) => {
    outcome.steps.push({ step, success, detail });
    if (!success) logLine(COMPONENT, `${identity}: ${step} failed: ${detail}`);
  };

  // 1. Current state
  const before = await lookupMailbox(runner, identity);
  if (!before.ok) {
    record("validate", false, before.error.message);
    return outcome;
  }
  const mailbox = before.value;
  outcome.previousType = mailbox.RecipientTypeDetails;
  outcome.userPrincipalName = mailbox.UserPrincipalName || null;
  if (mailbox.RecipientTypeDetails === "SharedMailbox") {
    record("validate", true, "Mailbox is already shared");
    outcome.status = "already-shared";
    return outcome;
  }
  if (mailbox.RecipientTypeDetails !== "UserMailbox") {
    record("validate", false, `Cannot convert a ${mailbox.RecipientTypeDetails}`);
    return outcome;
  }
  record("validate", true, "UserMailbox");

  // 2. Convert
  const set = await runner.execute(`Set-Mailbox -Identity ${psLiteral(identity)} -Type Shared`, {
    mode: "mutate",
  });
  if (!set.success) {
    record("convert", false, set.error ?? "unknown error");
    return outcome;
  }
  record("convert", true, "Set-Mailbox -Type Shared");

  // 3–4. Account hardening
  let hardened = true;
  const upn = outcome.userPrincipalName;
  if ((settings.disableSignIn || settings.rotatePassword) && connectGraph) {
    try {
      await connectGraph();
    } catch (error) {
      record("connect-graph", false, errorMessage(error));
      hardened = false;
    }
  }
  if (hardened && settings.disableSignIn) {
    if (!upn) {
      record("disable-sign-in", false, "Mailbox has no UserPrincipalName");
      hardened = false;
    } else {
      const r = await runner.execute(`Update-MgUser -UserId ${psLiteral(upn)} -AccountEnabled:$false`, {
        mode: "mutate",
      });
      record("disable-sign-in", r.success, r.success ? "AccountEnabled = False" : (r.error ?? "unknown error"));
      outcome.signInDisabled = r.success;
      hardened = r.success;
    }
  }
  if (hardened && settings.rotatePassword) {
    if (!upn) {
      record("rotate-password", false, "Mailbox has no UserPrincipalName");
      hardened = false;
    } else {
      const command =
        `Update-MgUser -UserId ${psLiteral(upn)} -PasswordProfile ` +
        `@{ Password = ${psLiteral(generatePassword())}; ForceChangePasswordNextSignIn = $true }`;
      const r = await runner.execute(command, {
        mode: "mutate",
        logAs: `Update-MgUser -UserId ${psLiteral(upn)} -PasswordProfile @{ Password = '********'; ForceChangePasswordNextSignIn = $true }`,
      });
      record("rotate-password", r.success, r.success ? "Password reset" : (r.error ?? "unknown error"));
      outcome.passwordRotated = r.success;
      hardened = r.success;
    }
  }

  // 5. Verify
  const after = await lookupMailbox(runner, identity);
  if (!after.ok) {
    record("verify", false, after.error.message);
    return outcome;
  }
  if (after.value.RecipientTypeDetails !== "SharedMailbox") {
    record("verify", false, `RecipientTypeDetails = ${after.value.RecipientTypeDetails}`);
    return outcome;
  }
  record("verify", true, "RecipientTypeDetails = SharedMailbox");
  outcome.status = hardened ? "converted" : "partial";
  return outcome;
}

/** Convert mailboxes one at a time, in the order given. */
export async function convertMailboxes(
  runner: CommandRunner,
  identities: readonly string[],
  settings: ConversionSettings,
  connectGraph?: GraphConnector,
  now?: () => Date,
): Promise<ConversionOutcome[]> {
  const outcomes: ConversionOutcome[] = [];
  for (let i = 0; i < identities.length; i++) {
    logLine(COMPONENT, `Converting ${i + 1} of ${identities.length}: ${identities[i]}`);
    outcomes.push(await convertToSharedMailbox(runner, identities[i], settings, connectGraph, now));
  }
  return outcomes;
}

export const CONVERSION_HEADER = [
  "Identity",
  "UserPrincipalName",
  "Status",
  "PreviousType",
  "SignInDisabled",
  "PasswordRotated",
  "Detail",
  "Timestamp",
] as const;

export function renderConversionCsv(outcomes: readonly ConversionOutcome[]): string {
  return toCsv(
    CONVERSION_HEADER,
    outcomes.map((o) => [
      o.identity,
      o.userPrincipalName ?? "N/A",
      o.status,
      o.previousType ?? "N/A",
      o.signInDisabled ? "Yes" : "No",
      o.passwordRotated ? "Yes" : "No",
      o.steps.map((s) => `${s.step}: ${s.success ? "ok" : "failed"} (${s.detail})`).join("\n"),
      o.timestamp,
    ]),
  );
}

export async function writeConversionReport(
  outcomes: readonly ConversionOutcome[],
  outputDir: string,
  now: Date,
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, `SharedMailboxConversion_${fileTimestamp(now)}.csv`);
  await writeFile(path, renderConversionCsv(outcomes), "utf8");
  return path;
}
