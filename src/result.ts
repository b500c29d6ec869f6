// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Per-signal Results ───
// Fetchers never throw for an individual signal; they hand back a Result
// that fusion matches on to pick a sentinel.

export type FetchErrorKind = "command" | "parse" | "blocked";

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
}

export type Result<T, E = FetchError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = FetchError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function fetchError(kind: FetchErrorKind, message: string): FetchError {
  return { kind, message };
}
