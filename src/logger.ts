// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { CommandMode } from "./powershell/allowlist.js";

// ─── Execution Log ───
// In-memory transcript of every PowerShell command executed during this MCP session.

export interface LogEntry {
  timestamp: string;
  command: string;
  mode: CommandMode;
  success: boolean;
  output: string;
  error?: string;
  durationMs: number;
}

const MAX_LOGGED_OUTPUT = 2_000;

export class ExecutionLog {
  private entries: LogEntry[] = [];

  append(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getAll(): ReadonlyArray<LogEntry> {
    return this.entries;
  }

  count(): number {
    return this.entries.length;
  }

  /** Render the full session log as Markdown. */
  toMarkdown(): string {
    if (this.entries.length === 0) {
      return "# Execution Log\n\nNo commands have been executed yet.";
    }

    const lines: string[] = [];
    lines.push("# Execution Log\n");
    lines.push(`**Total commands:** ${this.entries.length}`);
    lines.push(`**Mutations:** ${this.entries.filter((e) => e.mode === "mutate").length}`);
    lines.push(`**Failures:** ${this.entries.filter((e) => !e.success).length}\n`);

    for (let i = 0; i < this.entries.length; i++) {
      const e = this.entries[i];
      const icon = e.success ? "✅" : "❌";
      const tag = e.mode === "mutate" ? " (mutation)" : "";
      lines.push(`## ${icon} Command ${i + 1}${tag} — ${e.timestamp}`);
      lines.push("");
      lines.push("```powershell");
      lines.push(e.command);
      lines.push("```");
      lines.push("");
      lines.push(`**Duration:** ${e.durationMs} ms`);
      lines.push("");
      if (e.success) {
        lines.push("**Output:**");
        lines.push("```");
        lines.push(truncate(e.output, MAX_LOGGED_OUTPUT) || "(no output)");
        lines.push("```");
      } else {
        lines.push(`**Error:** ${e.error ?? "unknown error"}`);
      }
      lines.push("");
      lines.push("---");
      lines.push("");
    }

    return lines.join("\n");
  }
}

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + "… (truncated)";
}

/** Write an operational message to stderr; stdout belongs to the MCP transport. */
export function logLine(component: string, message: string): void {
  process.stderr.write(`[${component}] ${message}\n`);
}
