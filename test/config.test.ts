import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { loadConfig } from "../src/config.js";

const KEYS = [
  "WORKSPACE_ROOT",
  "PROJECT_PATHS",
  "PORT",
  "KILL_SIGNAL",
  "TICK_INTERVAL_MS",
  "ENV_PROFILE",
  "LOG_LEVEL",
] as const;

function withEnv(t: TestContext, values: Partial<Record<(typeof KEYS)[number], string>>): void {
  const saved = new Map(KEYS.map((key): [string, string | undefined] => [key, process.env[key]]));

  for (const key of KEYS) {
    const value = values[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  t.after(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });
}

test("defaults use the working directory as the only project", (t) => {
  withEnv(t, {});
  const config = loadConfig();

  assert.equal(config.workspaceRoot, process.cwd());
  assert.deepEqual(config.projectPaths, [process.cwd()]);
  assert.equal(config.port, 8080);
  assert.equal(config.killSignal, "SIGKILL");
  assert.equal(config.envProfile, "dev");
  assert.equal(config.logLevel, "info");
});

test("environment overrides are parsed and clamped", (t) => {
  const root = path.resolve("/srv/workspace");
  withEnv(t, {
    WORKSPACE_ROOT: root,
    PROJECT_PATHS: "web, api ,,",
    PORT: "9000",
    KILL_SIGNAL: "sigterm",
    TICK_INTERVAL_MS: "1",
    ENV_PROFILE: "STAGING",
    LOG_LEVEL: "loud",
  });
  const config = loadConfig();

  assert.deepEqual(config.projectPaths, [path.join(root, "web"), path.join(root, "api")]);
  assert.equal(config.port, 9000);
  assert.equal(config.killSignal, "SIGTERM");
  assert.equal(config.tickIntervalMs, 10);
  assert.equal(config.envProfile, "staging");
  assert.equal(config.logLevel, "info");
});
