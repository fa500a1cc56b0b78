import path from "node:path";
import type WebSocket from "ws";
import type { AppConfig } from "../src/config.js";
import type { EnvProfile, EnvStore, EnvVars } from "../src/env/envStore.js";
import { Logger } from "../src/logging/logger.js";
import type { Project } from "../src/projects/types.js";
import { LineChannel, type LineSender } from "../src/sessions/lineChannel.js";
import type { PumpHandle, PumpSource } from "../src/sessions/outputPump.js";
import type {
  CapturedProcess,
  ExitStatus,
  ProcessHandle,
  ProcessLauncher,
  ScriptInvocation,
} from "../src/sessions/types.js";

export function makeConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    appName: "script-deck-test",
    host: "127.0.0.1",
    port: 0,
    workspaceRoot: path.resolve("/workspace"),
    projectPaths: [],
    envProfile: "dev",
    tickIntervalMs: 50,
    maxSessions: 64,
    maxLinesPerSession: 10_000,
    pumpJoinGraceMs: 500,
    killSignal: "SIGKILL",
    maxWsMessageBytes: 65_536,
    wsBackpressureBytes: 1_000_000,
    diagnosticsTtlMs: 5_000,
    logLevel: "silent",
    logPath: undefined,
    ...overrides,
  };
}

export function makeLogger(): Logger {
  return new Logger({ appName: "script-deck-test", level: "silent" });
}

export function makeProject(name: string, scripts: Record<string, string>): Project {
  return {
    name,
    path: path.resolve("/projects", name),
    scripts: Object.entries(scripts).sort(([a], [b]) => a.localeCompare(b)),
  };
}

export class StaticProjectCatalog {
  refreshes = 0;

  constructor(private readonly projects: Project[]) {}

  listProjects(): Project[] {
    return this.projects.map((project) => ({ ...project, scripts: [...project.scripts] }));
  }

  findProject(projectPath: string): Project | undefined {
    const resolved = path.resolve(projectPath);
    return this.listProjects().find((project) => project.path === resolved);
  }

  async refresh(): Promise<Project[]> {
    this.refreshes += 1;
    return this.listProjects();
  }
}

export class MemoryEnvStore implements EnvStore {
  readonly files = new Map<EnvProfile, EnvVars>();

  async load(_root: string, profile: EnvProfile): Promise<EnvVars> {
    return { ...this.files.get(profile) };
  }

  async save(_root: string, profile: EnvProfile, vars: EnvVars): Promise<void> {
    this.files.set(profile, { ...vars });
  }
}

let nextPid = 4_000;

export class FakeProcess implements ProcessHandle {
  readonly pid = nextPid++;

  readonly exited: Promise<ExitStatus>;

  kills = 0;

  private status: ExitStatus | null = null;

  private resolveExit: (status: ExitStatus) => void = () => undefined;

  constructor() {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  tryWait(): ExitStatus | null {
    return this.status;
  }

  kill(): boolean {
    if (this.kills > 0 || this.status) {
      return false;
    }
    this.kills += 1;
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.status) {
      return;
    }
    this.status = { code, signal };
    this.resolveExit(this.status);
  }
}

export class FakePump implements PumpHandle {
  finished = false;

  readonly done: Promise<void>;

  private resolveDone: () => void = () => undefined;

  constructor(
    readonly source: PumpSource,
    private readonly sender: LineSender,
  ) {
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  send(line: string): boolean {
    return this.sender.send(line);
  }

  finish(): void {
    this.finished = true;
    this.sender.close();
    this.resolveDone();
  }
}

export type FakeRun = {
  invocation: ScriptInvocation;
  process: FakeProcess;
  channel: LineChannel;
  stdout: FakePump;
  stderr: FakePump;
};

export class FakeLauncher implements ProcessLauncher {
  readonly captured: FakeRun[] = [];

  readonly visible: Array<{ invocation: ScriptInvocation; process: FakeProcess }> = [];

  /** Thrown by the next launches until cleared. */
  failWith: Error | null = null;

  /** Exit status visible runs report right away; `null` leaves them running. */
  visibleExit: ExitStatus | null = { code: 0, signal: null };

  private gate: Promise<void> | null = null;

  /** Holds every launch until the returned function is called. */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  get lastRun(): FakeRun {
    const run = this.captured.at(-1);
    if (!run) {
      throw new Error("nothing has been launched");
    }
    return run;
  }

  async launch(invocation: ScriptInvocation, captureOutput: boolean): Promise<ProcessHandle> {
    if (captureOutput) {
      const captured = await this.launchCaptured(invocation);
      captured.channel.close();
      return captured.process;
    }

    await this.gate;
    if (this.failWith) {
      throw this.failWith;
    }

    const handle = new FakeProcess();
    if (this.visibleExit) {
      handle.exit(this.visibleExit.code, this.visibleExit.signal);
    }
    this.visible.push({ invocation, process: handle });
    return handle;
  }

  async launchCaptured(invocation: ScriptInvocation): Promise<CapturedProcess> {
    await this.gate;
    if (this.failWith) {
      throw this.failWith;
    }

    const channel = new LineChannel();
    const run: FakeRun = {
      invocation,
      process: new FakeProcess(),
      channel,
      stdout: new FakePump("stdout", channel.sender()),
      stderr: new FakePump("stderr", channel.sender()),
    };
    this.captured.push(run);

    return { process: run.process, channel, pumps: [run.stdout, run.stderr] };
  }
}

export type WsMessage = Record<string, unknown>;

function isMessage(value: unknown): value is WsMessage {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Records every JSON message a socket receives from the moment it is created. */
export function collectMessages(socket: WebSocket): {
  messages: WsMessage[];
  waitFor(predicate: (message: WsMessage) => boolean, timeoutMs?: number): Promise<WsMessage>;
} {
  const messages: WsMessage[] = [];
  const waiters = new Set<() => void>();

  socket.on("message", (raw) => {
    const parsed: unknown = JSON.parse(raw.toString());
    if (isMessage(parsed)) {
      messages.push(parsed);
      for (const waiter of waiters) {
        waiter();
      }
    }
  });

  const waitFor = (predicate: (message: WsMessage) => boolean, timeoutMs = 2_000): Promise<WsMessage> =>
    new Promise((resolve, reject) => {
      const check = (): boolean => {
        const found = messages.find(predicate);
        if (found) {
          cleanup();
          resolve(found);
          return true;
        }
        return false;
      };

      const timeout = setTimeout(() => {
        cleanup();
        reject(new Error("Timed out waiting for websocket message"));
      }, timeoutMs);

      const waiter = (): void => {
        check();
      };

      const cleanup = (): void => {
        clearTimeout(timeout);
        waiters.delete(waiter);
      };

      if (!check()) {
        waiters.add(waiter);
      }
    });

  return { messages, waitFor };
}
