// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { randomUUID } from "node:crypto";
import { validateCommand, type CommandMode } from "./allowlist.js";
import { errorMessage } from "../errors.js";
import { logLine, type ExecutionLog } from "../logger.js";
import { escapeForPs, stripAnsi, tryParseJson } from "../utils.js";

// ─── Types ───

export type PsFailure = "not-ready" | "blocked" | "command" | "transport";

export interface PsResult {
  success: boolean;
  output: string;
  error?: string;
  failure?: PsFailure;
}

export interface PsJsonResult {
  success: boolean;
  /** Parsed payload; `null` when the command produced no output. */
  data?: unknown;
  raw: string;
  error?: string;
  failure?: PsFailure;
}

export interface ExecuteOptions {
  mode?: CommandMode;
  /** Text recorded in the execution log instead of the command (for commands carrying secrets). */
  logAs?: string;
}

/** The seam between the workflows and PowerShell. Tests supply an in-process fake. */
export interface CommandRunner {
  execute(command: string, options?: ExecuteOptions): Promise<PsResult>;
  executeJson(command: string, options?: ExecuteOptions): Promise<PsJsonResult>;
}

export interface SessionIdentity {
  adminUpn: string;
  organization: string;
}

// Public client ids of the first-party PowerShell apps
const EXO_APP_ID = "fb78d390-0c51-40cd-8e17-fdbfab77341b";
const GRAPH_APP_ID = "14d82eec-204b-4c2f-b7e8-296a70dab67e";

const COMPONENT = "PsExecutor";

// ─── Executor ───

/**
 * Manages a single long-lived PowerShell 7 (pwsh) process.
 * On init it acquires an access token via MSAL interactive browser auth
 * (in a separate short-lived pwsh process), then uses that token to
 * connect to Exchange Online in the main piped process. Microsoft Graph
 * is connected the same way, on first use.
 */
export class PsExecutor implements CommandRunner {
  private proc: ChildProcessWithoutNullStreams | null = null;
  private buf = "";
  private ready = false;
  private graphConnected = false;

  constructor(
    private readonly identity: SessionIdentity,
    private readonly log?: ExecutionLog,
  ) {}

  /* ───────── Lifecycle ───────── */

  async init(): Promise<void> {
    const proc = spawn("pwsh", ["-NoExit", "-NoProfile", "-Command", "-"], {
      shell: false,
      env: { ...process.env },
    });
    this.proc = proc;

    // Accumulate stdout for marker-based I/O
    proc.stdout.on("data", (d: Buffer) => {
      this.buf += d.toString();
    });
    proc.stderr.on("data", (d: Buffer) => {
      process.stderr.write(d);
    });
    proc.on("exit", (code) => {
      logLine(COMPONENT, `pwsh exited (code ${code})`);
      this.ready = false;
      this.graphConnected = false;
      this.proc = null;
    });

    await this.waitForMarker();

    // Progress bars don't render in piped mode and can block stdout
    await this.execRaw("$ProgressPreference = 'SilentlyContinue'", 5_000);
    // Non-terminating cmdlet errors must reach the catch in execRaw
    await this.execRaw("$ErrorActionPreference = 'Stop'", 5_000);

    const { adminUpn, organization } = this.identity;

    // The auto-import triggered by Connect-ExchangeOnline can hang in a piped process
    logLine(COMPONENT, "Importing ExchangeOnlineManagement module…");
    await this.execRaw("Import-Module ExchangeOnlineManagement -ErrorAction Stop", 30_000);

    logLine(COMPONENT, "Acquiring Exchange Online access token (browser will open)…");
    const token = await this.acquireAccessToken(
      EXO_APP_ID,
      "https://outlook.office365.com/.default",
      adminUpn,
      organization,
      300_000,
    );

    logLine(COMPONENT, "Connecting to Exchange Online…");
    await this.execRaw(
      `Connect-ExchangeOnline -AccessToken '${token}' ` +
        `-Organization '${escapeForPs(organization)}' -ShowBanner:$false`,
      120_000,
    );

    this.ready = true;
    logLine(COMPONENT, "Exchange Online connected ✓");
  }

  /**
   * Connect Microsoft Graph in the same pwsh process. Needed only for the
   * account changes made during mailbox conversion.
   */
  async ensureGraph(): Promise<void> {
    if (this.graphConnected) return;
    if (!this.ready) throw new Error("PowerShell session not initialized");

    const { adminUpn, organization } = this.identity;
    await this.execRaw("Import-Module Microsoft.Graph.Users -ErrorAction Stop", 60_000);

    logLine(COMPONENT, "Acquiring Microsoft Graph access token…");
    const token = await this.acquireAccessToken(
      GRAPH_APP_ID,
      "https://graph.microsoft.com/User.ReadWrite.All",
      adminUpn,
      organization,
      300_000,
    );

    // Keep the token in a PS variable to avoid line-length issues (~2000 chars)
    await this.execRaw(`$_graphToken = '${token}'`, 5_000);
    const out = await this.execRaw(
      "Connect-MgGraph -AccessToken (ConvertTo-SecureString $_graphToken -AsPlainText -Force) -NoWelcome",
      120_000,
    );
    if (out.startsWith("PS_ERROR:")) {
      throw new Error(`Connect-MgGraph failed: ${out.slice(10).trim()}`);
    }
    this.graphConnected = true;
    logLine(COMPONENT, "Microsoft Graph connected ✓");
  }

  isReady(): boolean {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    if (this.proc) {
      this.proc.stdin.end("exit\n");
      this.proc.kill();
      this.proc = null;
      this.ready = false;
      this.graphConnected = false;
    }
  }

  /* ───────── Token Acquisition ───────── */

  /**
   * Spawn a dedicated short-lived pwsh process to acquire an access token
   * via MSAL's AcquireTokenInteractive. This opens the system browser for
   * sign-in and captures the token from stdout.
   *
   * The main session's stdin/stdout are piped for marker-based parsing;
   * interactive auth needs a browser and a localhost redirect listener,
   * which the piped child cannot host.
   */
  private acquireAccessToken(
    appId: string,
    scope: string,
    upn: string,
    org: string,
    timeoutMs: number,
  ): Promise<string> {
    const escapedUpn = escapeForPs(upn);

    // Self-contained PS script. stdout = token ONLY. stderr = log messages.
    const script = [
      `$ErrorActionPreference = 'Stop'`,
      // Find MSAL DLL bundled with ExchangeOnlineManagement module
      `$exoModule = Get-Module ExchangeOnlineManagement -ListAvailable | Select-Object -First 1`,
      `if (-not $exoModule) { throw 'ExchangeOnlineManagement module not found' }`,
      `$msalPath = Join-Path $exoModule.ModuleBase 'NetCore' 'Microsoft.Identity.Client.dll'`,
      `if (-not (Test-Path $msalPath)) { $msalPath = Join-Path $exoModule.ModuleBase 'NetFramework' 'Microsoft.Identity.Client.dll' }`,
      `if (-not (Test-Path $msalPath)) { throw 'MSAL DLL not found in EXO module' }`,
      `Add-Type -Path $msalPath -ErrorAction SilentlyContinue`,
      ``,
      `$authority = 'https://login.microsoftonline.com/${escapeForPs(org)}'`,
      `$appBuilder = [Microsoft.Identity.Client.PublicClientApplicationBuilder]::Create('${appId}')`,
      `$appBuilder = $appBuilder.WithAuthority($authority)`,
      `$appBuilder = $appBuilder.WithRedirectUri('http://localhost')`,
      `$app = $appBuilder.Build()`,
      ``,
      `$scopes = [string[]]@('${scope}')`,
      ``,
      `# Interactive browser auth`,
      `[Console]::Error.WriteLine('[PsExecutor] Opening browser for sign-in…')`,
      `$builder = $app.AcquireTokenInteractive($scopes)`,
      `$builder = $builder.WithLoginHint('${escapedUpn}')`,
      `$builder = $builder.WithUseEmbeddedWebView($false)`,
      `$tokenResult = $builder.ExecuteAsync().GetAwaiter().GetResult()`,
      ``,
      `[Console]::Error.WriteLine('[PsExecutor] Token acquired successfully')`,
      `[Console]::Out.Write($tokenResult.AccessToken)`,
    ].join("\n");

    return new Promise<string>((resolve, reject) => {
      const child = spawn("pwsh", ["-NoProfile", "-NonInteractive", "-Command", script], {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: false, // allow browser launch
      });

      let stdout = "";
      let stderr = "";

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        const msg = data.toString();
        stderr += msg;
        process.stderr.write(msg);
      });

      const timer = setTimeout(() => {
        child.kill();
        reject(new Error(`Token acquisition timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      child.on("close", (code) => {
        clearTimeout(timer);
        if (code !== 0) {
          reject(new Error(`Token acquisition failed (exit ${code}): ${stderr.trim()}`));
          return;
        }
        const token = stdout.trim();
        if (token.length < 100) {
          reject(new Error(`Invalid access token (length=${token.length}). stderr: ${stderr.trim()}`));
          return;
        }
        logLine(COMPONENT, `Access token acquired (${token.length} chars)`);
        resolve(token);
      });

      child.on("error", (error) => {
        clearTimeout(timer);
        reject(new Error(`Failed to spawn PowerShell for auth: ${error.message}`));
      });
    });
  }

  /* ───────── Public API ───────── */

  /**
   * Execute a **validated** PowerShell command and record it in the execution log.
   * Returns the raw text output.  Rejects blocked cmdlets.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<PsResult> {
    const mode = options.mode ?? "read";
    const start = Date.now();
    const result = await this.run(command, mode);
    this.log?.append({
      timestamp: new Date(start).toISOString(),
      command: options.logAs ?? command,
      mode,
      success: result.success,
      output: result.output,
      error: result.error,
      durationMs: Date.now() - start,
    });
    return result;
  }

  /**
   * Execute a command and JSON-parse the output.
   */
  async executeJson(command: string, options: ExecuteOptions = {}): Promise<PsJsonResult> {
    const r = await this.execute(command, options);
    if (!r.success) return { success: false, raw: r.output, error: r.error, failure: r.failure };
    if (r.output === "") return { success: true, data: null, raw: r.output };
    // Output wasn't JSON — data stays undefined and the caller decides
    return { success: true, data: tryParseJson(r.output), raw: r.output };
  }

  /* ───────── Internals ───────── */

  private async run(command: string, mode: CommandMode): Promise<PsResult> {
    if (!this.ready || !this.proc) {
      return { success: false, output: "", error: "PowerShell session not initialized", failure: "not-ready" };
    }
    const v = validateCommand(command, mode);
    if (!v.valid) {
      return { success: false, output: "", error: v.violation, failure: "blocked" };
    }
    try {
      const out = stripAnsi(await this.execRaw(command));
      if (out.startsWith("PS_ERROR:")) {
        return { success: false, output: "", error: out.slice(10).trim(), failure: "command" };
      }
      return { success: true, output: out };
    } catch (error) {
      const failure: PsFailure = this.proc ? "command" : "transport";
      return { success: false, output: "", error: errorMessage(error), failure };
    }
  }

  /** Send a command and read stdout until the end-marker appears. */
  private execRaw(command: string, timeoutMs = 180_000): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = this.proc;
      if (!proc) return reject(new Error("No pwsh process"));

      const marker = `__MCP_END_${randomUUID()}__`;
      this.buf = "";

      // Send everything as a SINGLE LINE ending with \n.
      // PowerShell's piped stdin parser can hang on multi-line try/catch blocks.
      const script =
        `try { ${command} } catch { Write-Output "PS_ERROR: $($_.Exception.Message)" }; ` +
        `Write-Output '${marker}'\n`;

      const timeout = setTimeout(() => {
        clearInterval(poll);
        reject(new Error("Command timed out"));
      }, timeoutMs);

      const poll = setInterval(() => {
        if (!this.proc) {
          clearInterval(poll);
          clearTimeout(timeout);
          reject(new Error("pwsh process exited"));
          return;
        }
        const idx = this.buf.indexOf(marker);
        if (idx !== -1) {
          clearInterval(poll);
          clearTimeout(timeout);
          const output = this.buf.substring(0, idx).trim();
          this.buf = this.buf.substring(idx + marker.length);
          resolve(output);
        }
      }, 150);

      proc.stdin.write(script);
    });
  }

  /** Wait for pwsh to be responsive after spawn. */
  private waitForMarker(): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = this.proc;
      if (!proc) return reject(new Error("No pwsh process"));
      const marker = `__READY_${randomUUID()}__`;
      this.buf = "";
      proc.stdin.write(`Write-Output '${marker}'\n`);

      const timeout = setTimeout(() => {
        clearInterval(poll);
        reject(new Error("pwsh startup timeout"));
      }, 30_000);
      const poll = setInterval(() => {
        if (this.buf.includes(marker)) {
          clearInterval(poll);
          clearTimeout(timeout);
          this.buf = "";
          resolve();
        }
      }, 100);
    });
  }
}
