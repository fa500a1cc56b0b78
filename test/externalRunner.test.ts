import test from "node:test";
import assert from "node:assert/strict";
import { SpawnError } from "../src/sessions/errors.js";
import { runExternal } from "../src/sessions/externalRunner.js";
import { FakeLauncher, makeLogger, makeProject } from "./helpers.js";

const web = makeProject("web", { build: "vite build", dev: "vite" });
const api = makeProject("api", { build: "tsc" });
const docs = makeProject("docs", { serve: "mkdocs serve" });

test("parallel runs start every matching project without waiting", async () => {
  const launcher = new FakeLauncher();
  launcher.visibleExit = null;

  const results = await runExternal(launcher, [web, api, docs], "build", { NODE_ENV: "production" }, "parallel", makeLogger());

  assert.deepEqual(
    results.map((result) => [result.projectName, result.command, result.exit]),
    [
      ["web", "npm run build", undefined],
      ["api", "npm run build", undefined],
    ],
  );
  assert.equal(results[0].pid, launcher.visible[0].process.pid);
  assert.deepEqual(launcher.visible[1].invocation.env, { NODE_ENV: "production" });
  assert.equal(launcher.captured.length, 0);
});

test("sequence runs wait for each exit", async () => {
  const launcher = new FakeLauncher();
  launcher.visibleExit = { code: 2, signal: null };

  const results = await runExternal(launcher, [web, api], "build", {}, "sequence", makeLogger());

  assert.deepEqual(
    results.map((result) => result.exit),
    [
      { code: 2, signal: null },
      { code: 2, signal: null },
    ],
  );
});

test("a launch failure is reported per project", async () => {
  const launcher = new FakeLauncher();
  launcher.failWith = new SpawnError("spawn npm ENOENT");

  const results = await runExternal(launcher, [web], "dev", {}, "parallel", makeLogger());

  assert.deepEqual(results, [
    {
      projectPath: web.path,
      projectName: "web",
      command: "npm run dev",
      error: "spawn npm ENOENT",
    },
  ]);
});

test("no matching project is a validation error", async () => {
  await assert.rejects(runExternal(new FakeLauncher(), [docs], "build", {}, "parallel", makeLogger()), {
    status: 400,
    code: "NO_MATCHING_PROJECTS",
  });
});
