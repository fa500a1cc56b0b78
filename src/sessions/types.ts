import type { EnvVars } from "../env/envStore.js";
import type { LineChannel } from "./lineChannel.js";
import type { PumpHandle } from "./outputPump.js";
import type { PackageManager } from "./packageManager.js";

export type ScriptInvocation = Readonly<{
  projectPath: string;
  projectName: string;
  scriptName: string;
  packageManager: PackageManager;
  env: Readonly<EnvVars>;
}>;

export function createInvocation(input: {
  projectPath: string;
  projectName: string;
  scriptName: string;
  packageManager: PackageManager;
  env?: EnvVars;
}): ScriptInvocation {
  return Object.freeze({
    projectPath: input.projectPath,
    projectName: input.projectName,
    scriptName: input.scriptName,
    packageManager: input.packageManager,
    env: Object.freeze({ ...input.env }),
  });
}

export type ExitStatus = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

export interface ProcessHandle {
  readonly pid: number | undefined;
  /** Exit status if the process has exited, `null` while it is still alive. Never blocks. */
  tryWait(): ExitStatus | null;
  /** Signals the process once; later calls and calls after exit return false. */
  kill(): boolean;
  readonly exited: Promise<ExitStatus>;
}

export type CapturedProcess = {
  process: ProcessHandle;
  channel: LineChannel;
  pumps: PumpHandle[];
};

export interface ProcessLauncher {
  launch(invocation: ScriptInvocation, captureOutput: boolean): Promise<ProcessHandle>;
  launchCaptured(invocation: ScriptInvocation): Promise<CapturedProcess>;
}

export type SessionTarget = {
  projectPath: string;
  scriptName: string;
};

export type PlaceholderState = {
  kind: "placeholder";
  target?: SessionTarget;
};

export type RunningState = {
  kind: "running";
  target: SessionTarget;
  invocation: ScriptInvocation;
  process: ProcessHandle;
  channel: LineChannel;
  pumps: PumpHandle[];
  startedAt: number;
  exitObservedAt?: number;
};

export type FinishedState = {
  kind: "finished";
  target: SessionTarget;
  /** `null` when the process never started; `error` then says why. */
  exit: ExitStatus | null;
  error?: string;
};

export type StoppedState = {
  kind: "stopped";
  target: SessionTarget;
};

export type SessionState = PlaceholderState | RunningState | FinishedState | StoppedState;

export type SessionStateKind = SessionState["kind"];

export type TerminalSession = {
  id: string;
  name: string;
  createdAt: number;
  lines: string[];
  state: SessionState;
};

export type SessionInfo = {
  sessionId: string;
  name: string;
  createdAt: number;
  state: SessionStateKind;
  target?: SessionTarget;
  command?: string;
  pid?: number;
  /** When the current process was started; set while running. */
  startedAt?: number;
  exit?: ExitStatus;
  error?: string;
  lineCount: number;
};

export type SessionEvent =
  | { type: "lines"; sessionId: string; lines: string[] }
  | { type: "state"; session: SessionInfo }
  | { type: "removed"; sessionId: string; index: number };

export type SessionListener = (event: SessionEvent) => void;

export type DrainReport = {
  appended: Array<{ sessionId: string; count: number }>;
  finished: string[];
};
