import { AppError, ValidationError } from "../api/types.js";
import type { EnvVars } from "../env/envStore.js";
import type { Logger } from "../logging/logger.js";
import { declaresScript, type Project } from "../projects/types.js";
import { describeCommand, resolvePackageManager } from "./packageManager.js";
import { createInvocation, type ExitStatus, type ProcessLauncher } from "./types.js";

export type ExternalRunMode = "parallel" | "sequence";

export type ExternalRunResult = {
  projectPath: string;
  projectName: string;
  command: string;
  pid?: number;
  exit?: ExitStatus;
  error?: string;
};

/**
 * Runs `scriptName` with inherited, visible output in every project that
 * declares it. In sequence mode each run waits for the previous process to exit.
 */
export async function runExternal(
  launcher: ProcessLauncher,
  projects: Project[],
  scriptName: string,
  env: EnvVars,
  mode: ExternalRunMode,
  logger: Logger,
): Promise<ExternalRunResult[]> {
  const matching = projects.filter((project) => declaresScript(project, scriptName));
  if (matching.length === 0) {
    throw new ValidationError(400, "NO_MATCHING_PROJECTS", `No selected project declares "${scriptName}"`, {
      scriptName,
    });
  }

  const results: ExternalRunResult[] = [];

  for (const project of matching) {
    const packageManager = resolvePackageManager(project.path);
    const result: ExternalRunResult = {
      projectPath: project.path,
      projectName: project.name,
      command: describeCommand(packageManager, scriptName),
    };

    try {
      const handle = await launcher.launch(
        createInvocation({
          projectPath: project.path,
          projectName: project.name,
          scriptName,
          packageManager,
          env,
        }),
        false,
      );
      result.pid = handle.pid;

      if (mode === "sequence") {
        result.exit = await handle.exited;
      }
    } catch (error) {
      if (!(error instanceof AppError)) {
        throw error;
      }
      result.error = error.message;
    }

    logger.info("external.run", {
      project: project.name,
      script: scriptName,
      mode,
      pid: result.pid,
      error: result.error,
    });

    results.push(result);
  }

  return results;
}
