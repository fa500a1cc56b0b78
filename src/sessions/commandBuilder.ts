import { describeCommand, scriptArgs } from "./packageManager.js";
import type { ScriptInvocation } from "./types.js";

export type CommandLine = {
  file: string;
  args: string[];
  /** What the user would type to get the same run. */
  display: string;
};

export interface CommandBuilder {
  readonly kind: "shell" | "direct";
  build(invocation: ScriptInvocation, captureOutput: boolean): CommandLine;
}

/**
 * Package-manager entry points are `.cmd` shims on Windows and only resolve
 * through the command interpreter, so the whole command goes through cmd.exe.
 * Visible runs use `/k` to keep the console open after the script ends.
 */
export class ShellCommandBuilder implements CommandBuilder {
  readonly kind = "shell";

  constructor(private readonly interpreter = "cmd.exe") {}

  build(invocation: ScriptInvocation, captureOutput: boolean): CommandLine {
    const display = describeCommand(invocation.packageManager, invocation.scriptName);
    return {
      file: this.interpreter,
      args: ["/d", "/s", captureOutput ? "/c" : "/k", display],
      display,
    };
  }
}

export class DirectCommandBuilder implements CommandBuilder {
  readonly kind = "direct";

  build(invocation: ScriptInvocation, _captureOutput: boolean): CommandLine {
    return {
      file: invocation.packageManager,
      args: scriptArgs(invocation.packageManager, invocation.scriptName),
      display: describeCommand(invocation.packageManager, invocation.scriptName),
    };
  }
}

export function createCommandBuilder(platform: NodeJS.Platform = process.platform): CommandBuilder {
  return platform === "win32" ? new ShellCommandBuilder(process.env.ComSpec || "cmd.exe") : new DirectCommandBuilder();
}
