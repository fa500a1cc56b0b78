import { loadConfig } from "./config.js";
import { FileEnvStore } from "./env/envStore.js";
import { createControlServer } from "./http/app.js";
import { Logger } from "./logging/logger.js";
import { ManifestProjectCatalog } from "./projects/catalog.js";
import { RuntimeDiagnosticsManager } from "./runtime/diagnostics.js";
import { ChildProcessLauncher } from "./sessions/processLauncher.js";
import { SessionSelection } from "./sessions/selection.js";
import { SessionRegistry } from "./sessions/sessionRegistry.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger({
    appName: config.appName,
    level: config.logLevel,
    path: config.logPath,
  });

  const projects = new ManifestProjectCatalog(config.projectPaths, logger);
  await projects.refresh();

  const launcher = new ChildProcessLauncher({
    logger,
    killSignal: config.killSignal,
    baseEnv: {
      // scripts see pipes, not a TTY; most tools still colour when asked
      FORCE_COLOR: "1",
    },
  });

  const sessions = new SessionRegistry({
    launcher,
    projects,
    logger,
    maxSessions: config.maxSessions,
    maxLinesPerSession: config.maxLinesPerSession,
    pumpJoinGraceMs: config.pumpJoinGraceMs,
  });

  const tick = setInterval(() => {
    sessions.drain();
  }, config.tickIntervalMs);

  const diagnostics = new RuntimeDiagnosticsManager(
    config,
    {
      projectCount: () => projects.listProjects().length,
      sessionStats: () => sessions.getStats(),
    },
    logger,
  );
  const startupDiagnostics = await diagnostics.getDiagnostics(true);

  logger.info("runtime.startup", {
    ready: startupDiagnostics.ready,
    available: startupDiagnostics.checks.filter((check) => check.ok).map((check) => check.name),
    host: config.host,
    port: config.port,
    workspaceRoot: config.workspaceRoot,
    projects: startupDiagnostics.projects,
    envProfile: config.envProfile,
    tickIntervalMs: config.tickIntervalMs,
  });

  const { server, gateway } = createControlServer({
    config,
    logger,
    sessions,
    selection: new SessionSelection(),
    projects,
    envStore: new FileEnvStore(),
    launcher,
    diagnostics,
  });

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => {
      logger.info("server.listen", {
        host: config.host,
        port: config.port,
      });
      resolve();
    });
  });

  let shuttingDown = false;

  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info("runtime.shutdown.begin", {
      signal,
    });

    clearInterval(tick);
    sessions.shutdown();
    gateway.close();

    server.close(() => {
      logger.info("runtime.shutdown.complete", {
        signal,
      });
      logger.close();
      process.exit(0);
    });

    setTimeout(() => {
      logger.error("runtime.shutdown.timeout", { signal });
      process.exit(1);
    }, 5_000).unref();
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error("script-deck startup failed", error);
  process.exit(1);
});
