import { v7 as uuidv7 } from "uuid";
import { AppError, ValidationError } from "../api/types.js";
import type { EnvVars } from "../env/envStore.js";
import type { Logger } from "../logging/logger.js";
import { declaresScript, type Project, type ProjectCatalog } from "../projects/types.js";
import { CaptureUnavailableError, SpawnError } from "./errors.js";
import { describeCommand, resolvePackageManager } from "./packageManager.js";
import {
  createInvocation,
  type DrainReport,
  type ExitStatus,
  type ProcessLauncher,
  type SessionEvent,
  type SessionInfo,
  type SessionListener,
  type SessionTarget,
  type TerminalSession,
} from "./types.js";

export const SESSION_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const PLACEHOLDER_NAME = "New terminal";

export const STOPPED_MARKER = "[process stopped]";

export function sessionName(projectName: string, scriptName: string): string {
  return `${projectName} » ${scriptName}`;
}

export function headerLine(projectName: string, command: string): string {
  return `> ${projectName} » ${command}`;
}

export function errorLine(message: string): string {
  return `[error] ${message}`;
}

export function finishedMarker(exit: ExitStatus): string {
  if (exit.signal) {
    return `[process finished: signal ${exit.signal}]`;
  }
  return `[process finished: exit code ${exit.code ?? "unknown"}]`;
}

export function assertValidSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new AppError(400, "INVALID_SESSION_ID", "Session ID must be a UUIDv7", false, {
      sessionId,
    });
  }
}

export type SessionRegistryOptions = {
  launcher: ProcessLauncher;
  projects: ProjectCatalog;
  logger: Logger;
  maxSessions?: number;
  maxLinesPerSession?: number;
  /** How long an exited process may wait for its pumps to reach end-of-stream. */
  pumpJoinGraceMs?: number;
  now?: () => number;
};

export type SessionLines = {
  sessionId: string;
  /** Absolute number of the first returned line; lines dropped by the cap still count. */
  from: number;
  next: number;
  lines: string[];
};

export type SessionStats = {
  total: number;
  running: number;
  placeholders: number;
  finished: number;
  stopped: number;
  subscribers: number;
};

type StoredSession = TerminalSession & {
  droppedLines: number;
};

/**
 * Owns every terminal session and the one process each may run. Mutations
 * happen only through these methods; pumps feed sessions exclusively through
 * their channels, which `drain()` empties once per tick.
 */
export class SessionRegistry {
  private readonly sessions: StoredSession[] = [];

  private readonly listeners = new Set<SessionListener>();

  private readonly launching = new Set<string>();

  /** New sessions whose process is still starting; they count against the cap. */
  private pendingStarts = 0;

  private shuttingDown = false;

  private readonly launcher: ProcessLauncher;

  private readonly projects: ProjectCatalog;

  private readonly logger: Logger;

  private readonly maxSessions: number;

  private readonly maxLinesPerSession: number;

  private readonly pumpJoinGraceMs: number;

  private readonly now: () => number;

  constructor(options: SessionRegistryOptions) {
    this.launcher = options.launcher;
    this.projects = options.projects;
    this.logger = options.logger;
    this.maxSessions = options.maxSessions ?? 64;
    this.maxLinesPerSession = options.maxLinesPerSession ?? 10_000;
    this.pumpJoinGraceMs = options.pumpJoinGraceMs ?? 500;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.length;
  }

  list(): SessionInfo[] {
    return this.sessions.map((session) => this.toSessionInfo(session));
  }

  get(sessionId: string): SessionInfo {
    return this.toSessionInfo(this.getSession(sessionId));
  }

  indexOf(sessionId: string): number {
    return this.sessions.findIndex((session) => session.id === sessionId);
  }

  readLines(sessionId: string, from = 0): SessionLines {
    const session = this.getSession(sessionId);
    const start = Math.max(from, session.droppedLines);
    const lines = session.lines.slice(start - session.droppedLines);

    return {
      sessionId,
      from: start,
      next: start + lines.length,
      lines,
    };
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async start(projectPath: string, scriptName: string, env: EnvVars = {}): Promise<SessionInfo> {
    const project = this.resolveTarget({ projectPath, scriptName });
    this.assertCapacity();

    const session: StoredSession = {
      id: uuidv7(),
      name: sessionName(project.name, scriptName),
      createdAt: this.now(),
      lines: [],
      droppedLines: 0,
      state: { kind: "placeholder" },
    };

    this.pendingStarts += 1;
    try {
      await this.launchInto(session, project, scriptName, env);
    } finally {
      this.pendingStarts -= 1;
    }

    if (this.shuttingDown) {
      this.discardLaunch(session);
      throw new AppError(503, "SHUTTING_DOWN", "Sessions are shutting down", true, {
        sessionId: session.id,
      });
    }

    this.sessions.push(session);
    this.emitState(session);

    return this.toSessionInfo(session);
  }

  /** Starts `scriptName` in every listed project that declares it; unknown projects are skipped. */
  async startMany(projectPaths: string[], scriptName: string, env: EnvVars = {}): Promise<SessionInfo[]> {
    const matching = projectPaths
      .map((projectPath) => this.projects.findProject(projectPath))
      .filter((project): project is Project => Boolean(project && declaresScript(project, scriptName)));

    if (matching.length === 0) {
      throw new ValidationError(400, "NO_MATCHING_PROJECTS", `No selected project declares "${scriptName}"`, {
        scriptName,
        projectPaths,
      });
    }

    const started: SessionInfo[] = [];
    for (const project of matching) {
      started.push(await this.start(project.path, scriptName, env));
    }

    return started;
  }

  addPlaceholder(): SessionInfo {
    this.assertCapacity();

    const session: StoredSession = {
      id: uuidv7(),
      name: PLACEHOLDER_NAME,
      createdAt: this.now(),
      lines: [],
      droppedLines: 0,
      state: { kind: "placeholder" },
    };

    this.sessions.push(session);
    this.emitState(session);

    this.logger.info("session.placeholder", {
      sessionId: session.id,
    });

    return this.toSessionInfo(session);
  }

  setPlaceholderTarget(sessionId: string, projectPath: string, scriptName: string): SessionInfo {
    const session = this.getSession(sessionId);
    if (session.state.kind !== "placeholder") {
      throw this.invalidState(session, "placeholder");
    }

    const project = this.resolveTarget({ projectPath, scriptName });
    session.state = { kind: "placeholder", target: { projectPath: project.path, scriptName } };
    this.emitState(session);

    return this.toSessionInfo(session);
  }

  async runPlaceholder(sessionId: string, env: EnvVars = {}): Promise<SessionInfo> {
    const session = this.getSession(sessionId);
    if (session.state.kind !== "placeholder") {
      throw this.invalidState(session, "placeholder");
    }

    const target = session.state.target;
    if (!target) {
      throw new ValidationError(400, "PLACEHOLDER_INCOMPLETE", "Choose a project and a script first", {
        sessionId,
      });
    }

    const project = this.resolveTarget(target);
    session.name = sessionName(project.name, target.scriptName);

    return this.relaunch(session, project, target.scriptName, env);
  }

  async rerun(sessionId: string, env: EnvVars = {}): Promise<SessionInfo> {
    const session = this.getSession(sessionId);
    if (session.state.kind !== "finished" && session.state.kind !== "stopped") {
      throw this.invalidState(session, "finished or stopped");
    }

    const { target } = session.state;
    const project = this.resolveTarget(target);

    return this.relaunch(session, project, target.scriptName, env);
  }

  /** Moves queued output into sessions and retires processes that have exited. Never waits. */
  drain(): DrainReport {
    const report: DrainReport = { appended: [], finished: [] };
    const now = this.now();

    for (const session of this.sessions) {
      const state = session.state;
      if (state.kind !== "running") {
        continue;
      }

      const lines = state.channel.drain();
      if (lines.length > 0) {
        this.appendLines(session, lines);
        report.appended.push({ sessionId: session.id, count: lines.length });
      }

      const exit = state.process.tryWait();
      if (!exit) {
        continue;
      }

      if (state.exitObservedAt === undefined) {
        state.exitObservedAt = now;
      }

      const pumpsDone = state.pumps.every((pump) => pump.finished);
      if (!pumpsDone && now - state.exitObservedAt < this.pumpJoinGraceMs) {
        continue;
      }

      state.channel.close();
      this.appendLines(session, [finishedMarker(exit)]);
      session.state = { kind: "finished", target: state.target, exit };
      report.finished.push(session.id);
      this.emitState(session);

      this.logger.info("session.exit", {
        sessionId: session.id,
        exitCode: exit.code,
        signal: exit.signal,
        pumpsDone,
      });
    }

    return report;
  }

  /** Kills a running session's process. Sessions in any other state are left as they are. */
  stop(sessionId: string): SessionInfo {
    const session = this.getSession(sessionId);
    this.stopSession(session);
    return this.toSessionInfo(session);
  }

  stopAll(): number {
    let stopped = 0;
    for (const session of this.sessions) {
      if (this.stopSession(session)) {
        stopped += 1;
      }
    }
    return stopped;
  }

  close(sessionId: string): { sessionId: string; index: number } {
    const session = this.getSession(sessionId);
    this.stopSession(session);

    const index = this.sessions.indexOf(session);
    this.sessions.splice(index, 1);
    this.emit({ type: "removed", sessionId, index });

    this.logger.info("session.close", {
      sessionId,
      index,
      remaining: this.sessions.length,
    });

    return { sessionId, index };
  }

  getStats(): SessionStats {
    const count = (kind: TerminalSession["state"]["kind"]): number =>
      this.sessions.filter((session) => session.state.kind === kind).length;

    return {
      total: this.sessions.length,
      running: count("running"),
      placeholders: count("placeholder"),
      finished: count("finished"),
      stopped: count("stopped"),
      subscribers: this.listeners.size,
    };
  }

  shutdown(): void {
    this.shuttingDown = true;
    const stopped = this.stopAll();
    this.sessions.splice(0, this.sessions.length);
    this.listeners.clear();

    this.logger.info("session.shutdown", {
      stopped,
    });
  }

  private async relaunch(
    session: StoredSession,
    project: Project,
    scriptName: string,
    env: EnvVars,
  ): Promise<SessionInfo> {
    if (this.launching.has(session.id)) {
      throw new ValidationError(409, "INVALID_SESSION_STATE", "Session is already starting", {
        sessionId: session.id,
      });
    }

    this.launching.add(session.id);
    try {
      await this.launchInto(session, project, scriptName, env);
    } finally {
      this.launching.delete(session.id);
    }

    if (!this.sessions.includes(session)) {
      // closed while the process was starting
      this.discardLaunch(session);
      throw new AppError(404, "SESSION_NOT_FOUND", "Session was closed while starting", false, {
        sessionId: session.id,
      });
    }

    this.emitState(session);
    return this.toSessionInfo(session);
  }

  private async launchInto(session: StoredSession, project: Project, scriptName: string, env: EnvVars): Promise<void> {
    const packageManager = resolvePackageManager(project.path);
    const invocation = createInvocation({
      projectPath: project.path,
      projectName: project.name,
      scriptName,
      packageManager,
      env,
    });
    const target: SessionTarget = { projectPath: project.path, scriptName };

    try {
      const captured = await this.launcher.launchCaptured(invocation);

      this.resetLines(session, [headerLine(project.name, describeCommand(packageManager, scriptName))]);
      session.state = {
        kind: "running",
        target,
        invocation,
        process: captured.process,
        channel: captured.channel,
        pumps: captured.pumps,
        startedAt: this.now(),
      };

      this.logger.info("session.start", {
        sessionId: session.id,
        project: project.name,
        script: scriptName,
        packageManager,
        pid: captured.process.pid,
      });
    } catch (error) {
      if (!(error instanceof SpawnError) && !(error instanceof CaptureUnavailableError)) {
        throw error;
      }

      this.resetLines(session, [errorLine(error.message)]);
      session.state = { kind: "finished", target, exit: null, error: error.message };

      this.logger.warn("session.start_failed", {
        sessionId: session.id,
        project: project.name,
        script: scriptName,
        code: error.code,
        message: error.message,
      });
    }
  }

  private discardLaunch(session: StoredSession): void {
    if (session.state.kind === "running") {
      session.state.process.kill();
      session.state.channel.close();
    }
  }

  private stopSession(session: StoredSession): boolean {
    const state = session.state;
    if (state.kind !== "running") {
      return false;
    }

    state.process.kill();
    state.channel.close();
    this.appendLines(session, [STOPPED_MARKER]);
    session.state = { kind: "stopped", target: state.target };
    this.emitState(session);

    this.logger.info("session.stop", {
      sessionId: session.id,
      pid: state.process.pid,
    });

    return true;
  }

  private resolveTarget(target: SessionTarget): Project {
    const project = this.projects.findProject(target.projectPath);
    if (!project) {
      throw new ValidationError(404, "PROJECT_NOT_FOUND", "Project not found", {
        projectPath: target.projectPath,
      });
    }

    if (!declaresScript(project, target.scriptName)) {
      throw new ValidationError(
        400,
        "SCRIPT_NOT_DECLARED",
        `Project "${project.name}" does not declare the script "${target.scriptName}"`,
        {
          projectPath: project.path,
          scriptName: target.scriptName,
        },
      );
    }

    return project;
  }

  private assertCapacity(): void {
    if (this.shuttingDown) {
      throw new AppError(503, "SHUTTING_DOWN", "Sessions are shutting down", true);
    }

    if (this.sessions.length + this.pendingStarts >= this.maxSessions) {
      throw new AppError(429, "SESSION_LIMIT_REACHED", `Session limit reached (${this.maxSessions})`, true, {
        maxSessions: this.maxSessions,
      });
    }
  }

  private invalidState(session: StoredSession, expected: string): ValidationError {
    return new ValidationError(409, "INVALID_SESSION_STATE", `Session is ${session.state.kind}, expected ${expected}`, {
      sessionId: session.id,
      state: session.state.kind,
    });
  }

  private resetLines(session: StoredSession, lines: string[]): void {
    session.droppedLines += session.lines.length;
    session.lines = [];
    this.appendLines(session, lines);
  }

  private appendLines(session: StoredSession, lines: string[]): void {
    session.lines.push(...lines);

    const overflow = session.lines.length - this.maxLinesPerSession;
    if (overflow > 0) {
      session.lines.splice(0, overflow);
      session.droppedLines += overflow;
    }

    this.emit({ type: "lines", sessionId: session.id, lines });
  }

  private emitState(session: StoredSession): void {
    this.emit({ type: "state", session: this.toSessionInfo(session) });
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn("session.listener_error", {
          event: event.type,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private toSessionInfo(session: StoredSession): SessionInfo {
    const state = session.state;
    const info: SessionInfo = {
      sessionId: session.id,
      name: session.name,
      createdAt: session.createdAt,
      state: state.kind,
      target: state.target ? { ...state.target } : undefined,
      lineCount: session.droppedLines + session.lines.length,
    };

    if (state.kind === "running") {
      info.command = describeCommand(state.invocation.packageManager, state.invocation.scriptName);
      info.pid = state.process.pid;
      info.startedAt = state.startedAt;
    } else if (state.kind === "finished") {
      info.exit = state.exit ?? undefined;
      info.error = state.error;
    }

    return info;
  }

  private getSession(sessionId: string): StoredSession {
    assertValidSessionId(sessionId);

    const session = this.sessions.find((candidate) => candidate.id === sessionId);
    if (!session) {
      throw new AppError(404, "SESSION_NOT_FOUND", "Session not found", false, {
        sessionId,
      });
    }

    return session;
  }
}
