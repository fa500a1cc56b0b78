import path from "node:path";
import { isLogLevel, type LogLevel } from "./logging/logger.js";
import { isEnvProfile, type EnvProfile } from "./env/envStore.js";

export type AppConfig = {
  appName: string;
  host: string;
  port: number;
  workspaceRoot: string;
  projectPaths: string[];
  envProfile: EnvProfile;
  tickIntervalMs: number;
  maxSessions: number;
  maxLinesPerSession: number;
  pumpJoinGraceMs: number;
  killSignal: NodeJS.Signals;
  maxWsMessageBytes: number;
  wsBackpressureBytes: number;
  diagnosticsTtlMs: number;
  logLevel: LogLevel;
  logPath?: string;
};

const KILL_SIGNALS: NodeJS.Signals[] = ["SIGKILL", "SIGTERM", "SIGINT", "SIGHUP"];

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  if (!raw) {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function envList(name: string): string[] {
  const raw = envString(name);
  if (!raw) {
    return [];
  }

  return raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function resolveLogLevel(): LogLevel {
  const raw = envString("LOG_LEVEL")?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

function resolveEnvProfile(): EnvProfile {
  const raw = envString("ENV_PROFILE")?.toLowerCase();
  return raw && isEnvProfile(raw) ? raw : "dev";
}

function resolveKillSignal(): NodeJS.Signals {
  const raw = envString("KILL_SIGNAL")?.toUpperCase();
  return KILL_SIGNALS.find((signal) => signal === raw) ?? "SIGKILL";
}

export function loadConfig(): AppConfig {
  const cwd = process.cwd();
  const workspaceRoot = path.resolve(cwd, envString("WORKSPACE_ROOT") || ".");
  const configuredProjects = envList("PROJECT_PATHS").map((entry) => path.resolve(workspaceRoot, entry));

  return {
    appName: envString("APP_NAME") || "script-deck",
    host: envString("HOST") || "127.0.0.1",
    port: envNumber("PORT", 8080),
    workspaceRoot,
    projectPaths: configuredProjects.length > 0 ? configuredProjects : [workspaceRoot],
    envProfile: resolveEnvProfile(),
    tickIntervalMs: clamp(envNumber("TICK_INTERVAL_MS", 50), 10, 1_000),
    maxSessions: clamp(envNumber("MAX_SESSIONS", 64), 1, 500),
    maxLinesPerSession: clamp(envNumber("MAX_LINES_PER_SESSION", 10_000), 100, 1_000_000),
    pumpJoinGraceMs: clamp(envNumber("PUMP_JOIN_GRACE_MS", 500), 0, 10_000),
    killSignal: resolveKillSignal(),
    maxWsMessageBytes: clamp(envNumber("MAX_WS_MESSAGE_BYTES", 65_536), 256, 2_000_000),
    wsBackpressureBytes: clamp(envNumber("WS_BACKPRESSURE_BYTES", 1_000_000), 10_000, 10_000_000),
    diagnosticsTtlMs: clamp(envNumber("DIAGNOSTICS_TTL_MS", 5_000), 100, 60_000),
    logLevel: resolveLogLevel(),
    logPath: envString("LOG_PATH"),
  };
}
