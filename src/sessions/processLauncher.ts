import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs/promises";
import { errorMessage } from "../api/types.js";
import type { Logger } from "../logging/logger.js";
import { createCommandBuilder, type CommandBuilder, type CommandLine } from "./commandBuilder.js";
import { CaptureUnavailableError, SpawnError } from "./errors.js";
import { LineChannel } from "./lineChannel.js";
import { startPump } from "./outputPump.js";
import type { CapturedProcess, ExitStatus, ProcessHandle, ProcessLauncher, ScriptInvocation } from "./types.js";

export type ChildProcessLauncherOptions = {
  logger: Logger;
  commandBuilder?: CommandBuilder;
  baseEnv?: Record<string, string | undefined>;
  killSignal?: NodeJS.Signals;
  platform?: NodeJS.Platform;
};

function cleanEnv(overrides: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === "string") {
      out[key] = value;
    }
  }
  return out;
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off("error", onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off("spawn", onSpawn);
      reject(error);
    };

    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}

async function assertDirectory(directory: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(directory)).isDirectory();
  } catch (error) {
    throw new SpawnError(`Working directory unavailable: ${directory}`, {
      cwd: directory,
      cause: errorMessage(error),
    });
  }

  if (!isDirectory) {
    throw new SpawnError(`Working directory is not a directory: ${directory}`, {
      cwd: directory,
    });
  }
}

class ChildProcessHandle implements ProcessHandle {
  readonly exited: Promise<ExitStatus>;

  private exitStatus: ExitStatus | null = null;

  private signalled = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly killSignal: NodeJS.Signals,
    private readonly ownsProcessGroup: boolean,
  ) {
    this.exited = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        this.exitStatus = { code, signal };
        resolve(this.exitStatus);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  tryWait(): ExitStatus | null {
    return this.exitStatus;
  }

  kill(): boolean {
    if (this.signalled || this.exitStatus) {
      return false;
    }
    this.signalled = true;

    const pid = this.child.pid;
    if (this.ownsProcessGroup && pid !== undefined) {
      try {
        // negative pid: the whole group, so the script's own children go too
        process.kill(-pid, this.killSignal);
        return true;
      } catch {
        return this.child.kill(this.killSignal);
      }
    }

    return this.child.kill(this.killSignal);
  }
}

export class ChildProcessLauncher implements ProcessLauncher {
  private readonly logger: Logger;

  private readonly commandBuilder: CommandBuilder;

  private readonly baseEnv: Record<string, string | undefined>;

  private readonly killSignal: NodeJS.Signals;

  private readonly platform: NodeJS.Platform;

  constructor(options: ChildProcessLauncherOptions) {
    this.logger = options.logger;
    this.platform = options.platform ?? process.platform;
    this.commandBuilder = options.commandBuilder ?? createCommandBuilder(this.platform);
    this.baseEnv = options.baseEnv ?? {};
    this.killSignal = options.killSignal ?? "SIGKILL";
  }

  async launch(invocation: ScriptInvocation, captureOutput: boolean): Promise<ProcessHandle> {
    if (captureOutput) {
      const captured = await this.launchCaptured(invocation);
      // no reader here: refuse the lines and let the pumps run to end-of-stream
      captured.channel.close();
      return captured.process;
    }

    const { child, command } = await this.spawnChild(invocation, false);
    child.unref();

    this.logger.info("process.launch_visible", {
      pid: child.pid,
      project: invocation.projectName,
      script: invocation.scriptName,
      command: command.display,
    });

    return new ChildProcessHandle(child, this.killSignal, false);
  }

  async launchCaptured(invocation: ScriptInvocation): Promise<CapturedProcess> {
    const { child, command } = await this.spawnChild(invocation, true);
    const ownsProcessGroup = this.platform !== "win32";
    const handle = new ChildProcessHandle(child, this.killSignal, ownsProcessGroup);

    const { stdout, stderr } = child;
    if (!stdout || !stderr) {
      handle.kill();
      throw new CaptureUnavailableError("Output pipes unavailable after spawn", {
        pid: child.pid,
        command: command.display,
      });
    }

    const channel = new LineChannel();
    const log = this.logger.child({ pid: child.pid });
    const onError = (error: Error): void => {
      log.warn("process.pipe_error", { message: error.message });
    };

    const pumps = [
      startPump(stdout, channel.sender(), { source: "stdout", onError }),
      startPump(stderr, channel.sender(), { source: "stderr", onError }),
    ];

    log.info("process.launch_captured", {
      project: invocation.projectName,
      script: invocation.scriptName,
      command: command.display,
    });

    return { process: handle, channel, pumps };
  }

  private async spawnChild(
    invocation: ScriptInvocation,
    captureOutput: boolean,
  ): Promise<{ child: ChildProcess; command: CommandLine }> {
    await assertDirectory(invocation.projectPath);

    const command = this.commandBuilder.build(invocation, captureOutput);
    const env = {
      ...cleanEnv(process.env),
      ...cleanEnv(this.baseEnv),
      ...invocation.env,
    };

    let child: ChildProcess;
    try {
      child = spawn(command.file, command.args, {
        cwd: invocation.projectPath,
        env,
        stdio: captureOutput ? ["ignore", "pipe", "pipe"] : "inherit",
        detached: captureOutput ? this.platform !== "win32" : true,
        windowsHide: captureOutput,
      });
    } catch (error) {
      throw new SpawnError(errorMessage(error), {
        command: command.display,
        cwd: invocation.projectPath,
      });
    }

    try {
      await waitForSpawn(child);
    } catch (error) {
      this.logger.warn("process.spawn_failed", {
        command: command.display,
        cwd: invocation.projectPath,
        message: errorMessage(error),
      });
      throw new SpawnError(errorMessage(error), {
        command: command.display,
        cwd: invocation.projectPath,
      });
    }

    child.on("error", (error) => {
      this.logger.warn("process.error", {
        pid: child.pid,
        message: error.message,
      });
    });

    return { child, command };
  }
}
