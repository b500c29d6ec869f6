// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * Escape a string for safe use inside a PowerShell single-quoted string.
 * Single quotes inside single-quoted strings are escaped by doubling them.
 */
export function escapeForPs(input: string): string {
  return input.replace(/'/g, "''");
}

/** Quote a value as a PowerShell single-quoted literal. */
export function psLiteral(input: string): string {
  return `'${escapeForPs(input)}'`;
}

/**
 * Try to parse a string as JSON.  Returns undefined on failure.
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Strip ANSI colour codes that pwsh emits even when piped. */
export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, "");
}

/**
 * Match a PowerShell `-like` wildcard pattern (`*`, `?`), case-insensitively.
 */
export function matchesWildcard(value: string, pattern: string): boolean {
  const source = pattern
    .split("")
    .map((ch) => {
      if (ch === "*") return ".*";
      if (ch === "?") return ".";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`, "is").test(value);
}

export function domainOf(address: string): string {
  const at = address.lastIndexOf("@");
  return at === -1 ? "" : address.slice(at + 1).toLowerCase();
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Whole days elapsed from `from` to `now`, rounded down. */
export function wholeDaysBetween(from: Date, now: Date): number {
  return Math.floor((now.getTime() - from.getTime()) / DAY_MS);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `yyyyMMdd_HHmmss` in UTC, for report file names. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}_` +
    `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`
  );
}

/** `yyyy-MM-dd HH:mm UTC`, for human-readable report fields. */
export function displayTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())} UTC`
  );
}

/** `yyyy-MM-dd` in UTC. */
export function displayDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}
