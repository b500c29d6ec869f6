// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Delimited text ───
// RFC 4180: rows end in CRLF, a field is quoted when it holds a comma,
// a quote or a line break, and quotes inside it are doubled.

const NEEDS_QUOTING = /[",\r\n]/;

export function csvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function csvRow(values: readonly string[]): string {
  return values.map(csvField).join(",");
}

export function toCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map(csvRow).join("\r\n") + "\r\n";
}
