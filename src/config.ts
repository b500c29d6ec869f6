// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { z } from "zod";
import { ConfigError } from "./errors.js";

// ─── Environment ───

const EnvSchema = z.object({
  EXO_ADMIN_UPN: z.string().email(),
  EXO_ORGANIZATION: z.string().min(1),
  EXO_REPORT_DIR: z.string().min(1).default("reports"),
});

export interface ServerConfig {
  adminUpn: string;
  organization: string;
  reportDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return {
    adminUpn: parsed.data.EXO_ADMIN_UPN,
    organization: parsed.data.EXO_ORGANIZATION,
    reportDir: parsed.data.EXO_REPORT_DIR,
  };
}

// ─── Tool Options ───

export const DEFAULT_INACTIVITY_DAYS = 90;
export const DEFAULT_TRACE_WINDOW_DAYS = 10;

// Get-MessageTraceV2 only reaches back 90 days
const MAX_TRACE_WINDOW_DAYS = 90;

export const scanOptionsShape = {
  inactivityDays: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_INACTIVITY_DAYS)
    .describe("Groups with no modification within this many days are reported as inactive."),
  traceWindowDays: z
    .number()
    .int()
    .min(1)
    .max(MAX_TRACE_WINDOW_DAYS)
    .default(DEFAULT_TRACE_WINDOW_DAYS)
    .describe("Message-trace lookback used for the last sent/received columns."),
  nameFilter: z
    .string()
    .min(1)
    .optional()
    .describe("Wildcard filter on group display name, e.g. 'Sales*'."),
  domains: z
    .array(z.string().min(1))
    .optional()
    .describe("Only scan groups whose primary SMTP address is in one of these domains."),
  outputDir: z.string().min(1).optional().describe("Directory for the CSV and HTML reports."),
};

export const ScanOptionsSchema = z.object(scanOptionsShape);
export type ScanOptions = z.infer<typeof ScanOptionsSchema>;

export const conversionOptionsShape = {
  identities: z
    .array(z.string().min(1))
    .min(1)
    .max(500)
    .describe("Mailbox identities (UPN or primary SMTP address) to convert."),
  disableSignIn: z.boolean().default(true).describe("Block sign-in on the converted account."),
  rotatePassword: z
    .boolean()
    .default(false)
    .describe("Reset the account password to a random value that is not returned."),
  outputDir: z.string().min(1).optional().describe("Directory for the outcome CSV."),
};

export const ConversionOptionsSchema = z.object(conversionOptionsShape);
export type ConversionOptions = z.infer<typeof ConversionOptionsSchema>;
