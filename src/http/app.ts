import http from "node:http";
import { randomUUID } from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { ANSI_PALETTE, renderLines } from "../ansi/ansiCodec.js";
import { fail, ok, toApiFailure, ValidationError } from "../api/types.js";
import { parseBody, parseParams, parseQuery } from "../api/validation.js";
import type { AppConfig } from "../config.js";
import { ENV_PROFILES, type EnvProfile, type EnvStore, type EnvVars } from "../env/envStore.js";
import type { Logger } from "../logging/logger.js";
import { COVERAGE_SCRIPT, inspectCoverage } from "../projects/coverage.js";
import { commonScriptNames, type Project, type ProjectCatalog } from "../projects/types.js";
import type { RuntimeDiagnosticsManager } from "../runtime/diagnostics.js";
import { runExternal } from "../sessions/externalRunner.js";
import type { SessionSelection } from "../sessions/selection.js";
import { SESSION_ID_PATTERN, type SessionRegistry } from "../sessions/sessionRegistry.js";
import type { ProcessLauncher } from "../sessions/types.js";
import { SessionGateway } from "../ws/sessionGateway.js";

const scriptNameSchema = z.string().trim().min(1).max(200);

const projectPathSchema = z.string().min(1);

const profileSchema = z.enum(ENV_PROFILES);

const sessionParamsSchema = z.object({
  sessionId: z.string().regex(SESSION_ID_PATTERN),
});

const profileParamsSchema = z.object({
  profile: profileSchema,
});

const startSessionBodySchema = z.object({
  projectPath: projectPathSchema,
  script: scriptNameSchema,
  profile: profileSchema.optional(),
});

const startBatchBodySchema = z.object({
  projectPaths: z.array(projectPathSchema).min(1),
  script: scriptNameSchema,
  profile: profileSchema.optional(),
});

const setTargetBodySchema = z.object({
  projectPath: projectPathSchema,
  script: scriptNameSchema,
});

const runSessionBodySchema = z
  .object({
    profile: profileSchema.optional(),
  })
  .default({});

const externalRunBodySchema = z.object({
  projectPaths: z.array(projectPathSchema).min(1),
  script: scriptNameSchema,
  mode: z.enum(["parallel", "sequence"]).default("parallel"),
  profile: profileSchema.optional(),
});

const coverageQuerySchema = z.object({
  projectPath: projectPathSchema,
});

const coverageRunBodySchema = z.object({
  projectPath: projectPathSchema,
  profile: profileSchema.optional(),
});

const envBodySchema = z.object({
  vars: z.record(z.string().min(1), z.string()),
});

const selectionBodySchema = z.object({
  index: z.number().int().min(0),
});

const linesQuerySchema = z.object({
  format: z.enum(["raw", "plain", "segments"]).default("raw"),
  from: z.coerce.number().int().min(0).default(0),
});

const diagnosticsQuerySchema = z.object({
  refresh: z.enum(["true", "false"]).optional(),
});

export type RefreshableCatalog = ProjectCatalog & {
  refresh(): Promise<Project[]>;
};

type DiagnosticsProvider = Pick<RuntimeDiagnosticsManager, "getDiagnostics">;

export type AppServices = {
  config: AppConfig;
  logger: Logger;
  sessions: SessionRegistry;
  selection: SessionSelection;
  projects: RefreshableCatalog;
  envStore: EnvStore;
  launcher: ProcessLauncher;
  diagnostics: DiagnosticsProvider;
};

function withErrorBoundary(
  handler: (req: Request, res: Response) => Promise<void> | void,
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve(handler(req, res)).catch(next);
  };
}

function requestId(req: Request): string {
  const id = req.header("x-request-id");
  return id && id.length > 0 ? id : randomUUID();
}

function localRequestId(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : randomUUID();
}

export function createApp(services: AppServices): express.Express {
  const app = express();
  const { sessions, selection } = services;

  const loadEnv = (profile: EnvProfile | undefined): Promise<EnvVars> =>
    services.envStore.load(services.config.workspaceRoot, profile ?? services.config.envProfile);

  const findProject = (projectPath: string): Project => {
    const project = services.projects.findProject(projectPath);
    if (!project) {
      throw new ValidationError(404, "PROJECT_NOT_FOUND", "Project not found", { projectPath });
    }
    return project;
  };

  const selectSession = (sessionId: string): void => {
    selection.select(sessions.indexOf(sessionId), sessions.size);
  };

  app.use(express.json({ limit: "128kb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    const id = requestId(req);
    res.locals.requestId = id;
    res.setHeader("x-request-id", id);

    res.on("finish", () => {
      services.logger.info("http.request", {
        requestId: id,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  });

  app.get(
    "/health",
    withErrorBoundary(async (_req, res) => {
      res.status(200).json(
        ok({
          name: services.config.appName,
          status: "ok",
          uptimeSec: Math.round(process.uptime()),
          version: process.env.npm_package_version || "0.1.0",
        }),
      );
    }),
  );

  app.get(
    "/ready",
    withErrorBoundary(async (_req, res) => {
      const diagnostics = await services.diagnostics.getDiagnostics(false);

      if (!diagnostics.ready) {
        res.status(503).json(
          fail("NOT_READY", "No usable package manager found", localRequestId(res), true, {
            checks: diagnostics.checks,
          }),
        );
        return;
      }

      res.status(200).json(ok({ ready: true }));
    }),
  );

  app.get(
    "/api/runtime/diagnostics",
    withErrorBoundary(async (req, res) => {
      const query = parseQuery(req, diagnosticsQuerySchema);
      const diagnostics = await services.diagnostics.getDiagnostics(query.refresh === "true");

      res.status(200).json(ok(diagnostics));
    }),
  );

  app.get(
    "/api/projects",
    withErrorBoundary(async (_req, res) => {
      res.status(200).json(ok({ projects: services.projects.listProjects() }));
    }),
  );

  app.post(
    "/api/projects/refresh",
    withErrorBoundary(async (_req, res) => {
      const projects = await services.projects.refresh();
      res.status(200).json(ok({ projects }));
    }),
  );

  app.get(
    "/api/projects/common-scripts",
    withErrorBoundary(async (_req, res) => {
      res.status(200).json(ok({ scripts: commonScriptNames(services.projects.listProjects()) }));
    }),
  );

  app.get(
    "/api/projects/coverage",
    withErrorBoundary(async (req, res) => {
      const query = parseQuery(req, coverageQuerySchema);
      const report = await inspectCoverage(findProject(query.projectPath));

      res.status(200).json(ok({ coverage: report }));
    }),
  );

  app.post(
    "/api/projects/coverage/run",
    withErrorBoundary(async (req, res) => {
      const payload = parseBody(req, coverageRunBodySchema);
      const project = findProject(payload.projectPath);
      const session = await sessions.start(project.path, COVERAGE_SCRIPT, await loadEnv(payload.profile));
      selectSession(session.sessionId);

      services.logger.info("api.coverage.run", {
        requestId: res.locals.requestId,
        sessionId: session.sessionId,
        project: project.name,
      });

      res.status(201).json(
        ok({
          session,
          selectedIndex: selection.index,
          coverage: await inspectCoverage(project),
        }),
      );
    }),
  );

  app.post(
    "/api/projects/run-external",
    withErrorBoundary(async (req, res) => {
      const payload = parseBody(req, externalRunBodySchema);
      const projects = payload.projectPaths
        .map((projectPath) => services.projects.findProject(projectPath))
        .filter((project): project is Project => project !== undefined);

      const results = await runExternal(
        services.launcher,
        projects,
        payload.script,
        await loadEnv(payload.profile),
        payload.mode,
        services.logger,
      );

      res.status(200).json(ok({ mode: payload.mode, results }));
    }),
  );

  app.get(
    "/api/env/:profile",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, profileParamsSchema);
      const vars = await loadEnv(params.profile);

      res.status(200).json(ok({ profile: params.profile, vars }));
    }),
  );

  app.put(
    "/api/env/:profile",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, profileParamsSchema);
      const payload = parseBody(req, envBodySchema);

      await services.envStore.save(services.config.workspaceRoot, params.profile, payload.vars);

      services.logger.info("api.env.save", {
        requestId: res.locals.requestId,
        profile: params.profile,
        keys: Object.keys(payload.vars).length,
      });

      res.status(200).json(ok({ profile: params.profile, vars: payload.vars }));
    }),
  );

  app.get(
    "/api/sessions",
    withErrorBoundary(async (_req, res) => {
      res.status(200).json(
        ok({
          sessions: sessions.list(),
          selectedIndex: selection.index,
          stats: sessions.getStats(),
        }),
      );
    }),
  );

  app.post(
    "/api/sessions",
    withErrorBoundary(async (req, res) => {
      const payload = parseBody(req, startSessionBodySchema);
      const session = await sessions.start(payload.projectPath, payload.script, await loadEnv(payload.profile));
      selectSession(session.sessionId);

      services.logger.info("api.session.start", {
        requestId: res.locals.requestId,
        sessionId: session.sessionId,
        state: session.state,
      });

      res.status(201).json(ok({ session, selectedIndex: selection.index }));
    }),
  );

  app.post(
    "/api/sessions/batch",
    withErrorBoundary(async (req, res) => {
      const payload = parseBody(req, startBatchBodySchema);
      const started = await sessions.startMany(payload.projectPaths, payload.script, await loadEnv(payload.profile));

      const firstRunning = started.find((session) => session.state === "running");
      if (firstRunning) {
        selectSession(firstRunning.sessionId);
      }

      res.status(201).json(ok({ sessions: started, selectedIndex: selection.index }));
    }),
  );

  app.post(
    "/api/sessions/placeholder",
    withErrorBoundary(async (_req, res) => {
      const session = sessions.addPlaceholder();
      selectSession(session.sessionId);

      res.status(201).json(ok({ session, selectedIndex: selection.index }));
    }),
  );

  app.post(
    "/api/sessions/stop-all",
    withErrorBoundary(async (_req, res) => {
      const stopped = sessions.stopAll();
      res.status(200).json(ok({ stopped }));
    }),
  );

  app.put(
    "/api/sessions/:sessionId/target",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, sessionParamsSchema);
      const payload = parseBody(req, setTargetBodySchema);
      const session = sessions.setPlaceholderTarget(params.sessionId, payload.projectPath, payload.script);

      res.status(200).json(ok({ session }));
    }),
  );

  app.post(
    "/api/sessions/:sessionId/run",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, sessionParamsSchema);
      const payload = parseBody(req, runSessionBodySchema);
      const session = await sessions.runPlaceholder(params.sessionId, await loadEnv(payload.profile));

      res.status(200).json(ok({ session }));
    }),
  );

  app.post(
    "/api/sessions/:sessionId/rerun",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, sessionParamsSchema);
      const payload = parseBody(req, runSessionBodySchema);
      const session = await sessions.rerun(params.sessionId, await loadEnv(payload.profile));

      res.status(200).json(ok({ session }));
    }),
  );

  app.post(
    "/api/sessions/:sessionId/stop",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, sessionParamsSchema);
      const session = sessions.stop(params.sessionId);

      res.status(200).json(ok({ session }));
    }),
  );

  app.get(
    "/api/sessions/:sessionId/lines",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, sessionParamsSchema);
      const query = parseQuery(req, linesQuerySchema);
      const chunk = sessions.readLines(params.sessionId, query.from);

      res.status(200).json(
        ok({
          sessionId: chunk.sessionId,
          from: chunk.from,
          next: chunk.next,
          ...renderLines(chunk.lines, query.format),
          ...(query.format === "segments" ? { palette: ANSI_PALETTE } : {}),
        }),
      );
    }),
  );

  app.delete(
    "/api/sessions/:sessionId",
    withErrorBoundary(async (req, res) => {
      const params = parseParams(req, sessionParamsSchema);
      const closed = sessions.close(params.sessionId);
      const selectedIndex = selection.sessionRemoved(closed.index, sessions.size);

      res.status(200).json(ok({ ...closed, closed: true, selectedIndex }));
    }),
  );

  app.put(
    "/api/selection",
    withErrorBoundary(async (req, res) => {
      const payload = parseBody(req, selectionBodySchema);
      const selectedIndex = selection.select(payload.index, sessions.size);

      res.status(200).json(ok({ selectedIndex }));
    }),
  );

  app.use((req, res) => {
    res.status(404).json(
      fail("ROUTE_NOT_FOUND", `Route not found: ${req.method} ${req.path}`, localRequestId(res), false, {
        path: req.path,
        method: req.method,
      }),
    );
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const id = localRequestId(res);
    const { status, body } = toApiFailure(error, id);

    const log = status >= 500 ? services.logger.error.bind(services.logger) : services.logger.warn.bind(services.logger);
    log("api.error", {
      requestId: id,
      path: req.path,
      method: req.method,
      status,
      code: body.error.code,
      message: body.error.message,
    });

    res.status(status).json(body);
  });

  return app;
}

export function createControlServer(services: AppServices): {
  app: express.Express;
  server: http.Server;
  gateway: SessionGateway;
} {
  const app = createApp(services);
  const server = http.createServer(app);

  const gateway = new SessionGateway(server, services.config, services.logger, services.sessions);

  return {
    app,
    server,
    gateway,
  };
}
