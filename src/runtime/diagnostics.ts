import { spawn } from "node:child_process";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logging/logger.js";
import type { PackageManager } from "../sessions/packageManager.js";
import type { SessionStats } from "../sessions/sessionRegistry.js";

export type RuntimeCheck = {
  name: PackageManager;
  ok: boolean;
  fatal: boolean;
  message: string;
  version?: string;
  details?: Record<string, unknown>;
};

export type RuntimeDiagnostics = {
  generatedAt: string;
  uptimeSec: number;
  ready: boolean;
  checks: RuntimeCheck[];
  projects: number;
  sessions: SessionStats;
};

export type DiagnosticsSources = {
  projectCount(): number;
  sessionStats(): SessionStats;
};

type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

const PROBES: Array<{ name: PackageManager; fatal: boolean }> = [
  { name: "npm", fatal: true },
  { name: "yarn", fatal: false },
  { name: "pnpm", fatal: false },
];

function runCommand(file: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(file, args, {
      env: process.env,
      shell: process.platform === "win32",
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";

    const timer = setTimeout(() => {
      child.kill();
      resolve({
        code: 1,
        stdout: stdout.trim(),
        stderr: `command timeout after ${timeoutMs}ms`,
      });
    }, timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      resolve({
        code: 1,
        stdout: stdout.trim(),
        stderr: error.message,
      });
    });
  });
}

export class RuntimeDiagnosticsManager {
  private cache: { at: number; data: RuntimeDiagnostics } | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly sources: DiagnosticsSources,
    private readonly logger: Logger,
  ) {}

  async getDiagnostics(refresh = false): Promise<RuntimeDiagnostics> {
    const now = Date.now();

    if (!refresh && this.cache && now - this.cache.at < this.config.diagnosticsTtlMs) {
      return this.cache.data;
    }

    const data = await this.collect();
    this.cache = {
      at: now,
      data,
    };

    return data;
  }

  private async collect(): Promise<RuntimeDiagnostics> {
    const results = await Promise.all(PROBES.map((probe) => runCommand(probe.name, ["--version"], 5_000)));

    const checks: RuntimeCheck[] = PROBES.map((probe, index) => {
      const result = results[index];
      const ok = result.code === 0 && result.stdout.length > 0;

      return {
        name: probe.name,
        fatal: probe.fatal,
        ok,
        message: ok ? `${probe.name} available` : `${probe.name} unavailable`,
        version: ok ? result.stdout.split(/\r?\n/)[0] : undefined,
        details: ok ? undefined : { stderr: result.stderr },
      };
    });

    const ready = checks.filter((check) => check.fatal).every((check) => check.ok);

    const diagnostics: RuntimeDiagnostics = {
      generatedAt: new Date().toISOString(),
      uptimeSec: Math.round(process.uptime()),
      ready,
      checks,
      projects: this.sources.projectCount(),
      sessions: this.sources.sessionStats(),
    };

    this.logger.debug("runtime.diagnostics", {
      ready,
      available: checks.filter((check) => check.ok).map((check) => check.name),
      runningSessions: diagnostics.sessions.running,
    });

    return diagnostics;
  }
}
