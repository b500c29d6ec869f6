// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── ConvertTo-Json Normalisation ───
// PowerShell serialises the same property differently depending on the
// host and on how many objects came down the pipeline. These schemas absorb
// that once, so nothing past the fetch layer sees a raw display string.

import { z } from "zod";
import type { CommandRunner, ExecuteOptions } from "../powershell/executor.js";
import { ConnectionError } from "../errors.js";
import { err, fetchError, ok, type Result } from "../result.js";

// Windows PowerShell 5.1 writes DateTime as "/Date(1700000000000)/"; pwsh 7 writes ISO-8601
const MS_DATE_RE = /^\/Date\((-?\d+)(?:[+-]\d{4})?\)\/$/;

export function parsePsDate(value: string): Date | null {
  const ms = MS_DATE_RE.exec(value);
  const d = ms ? new Date(Number(ms[1])) : new Date(value);
  return isNaN(d.getTime()) ? null : d;
}

/** Nullable DateTime property. */
export const psDate = z
  .union([z.string(), z.null()])
  .optional()
  .transform((v) => (v ? parsePsDate(v) : null));

/** Multi-valued property: null, a single string or an array of strings. */
export const psStringList = z
  .union([z.array(z.string()), z.string(), z.null()])
  .optional()
  .transform((v) => {
    if (v === null || v === undefined || v === "") return [];
    return Array.isArray(v) ? v.filter((s) => s !== "") : [v];
  });

export const psString = z
  .union([z.string(), z.null()])
  .optional()
  .transform((v) => v ?? "");

export const psBool = z
  .union([z.boolean(), z.null()])
  .optional()
  .transform((v) => v ?? false);

/** Zero, one or many objects: ConvertTo-Json unwraps a single-element pipeline. */
export function psCollection<T extends z.ZodTypeAny>(item: T) {
  return z
    .union([z.array(item), item, z.null()])
    .transform((v): z.output<T>[] => (v === null ? [] : Array.isArray(v) ? v : [v]));
}

/**
 * Run a command, parse its JSON output and validate it. Per-command failures
 * come back as a Result; a session that is gone throws ConnectionError.
 */
export async function fetchJson<T extends z.ZodTypeAny>(
  runner: CommandRunner,
  command: string,
  schema: T,
  options?: ExecuteOptions,
): Promise<Result<z.output<T>>> {
  const r = await runner.executeJson(command, options);
  if (!r.success) {
    if (r.failure === "not-ready" || r.failure === "transport") {
      throw new ConnectionError(r.error ?? "PowerShell session unavailable");
    }
    return err(fetchError(r.failure === "blocked" ? "blocked" : "command", r.error ?? "unknown error"));
  }
  if (r.data === undefined) {
    return err(fetchError("parse", "Command output was not JSON"));
  }
  const parsed = schema.safeParse(r.data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(fetchError("parse", `Unexpected output shape at ${issue.path.join(".") || "(root)"}: ${issue.message}`));
  }
  return ok(parsed.data);
}
