import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ManifestProjectCatalog } from "../src/projects/catalog.js";
import { commonScriptNames } from "../src/projects/types.js";
import { makeLogger, makeProject } from "./helpers.js";

async function writeProject(root: string, dir: string, manifest: string | null): Promise<string> {
  const projectPath = path.join(root, dir);
  await fs.mkdir(projectPath, { recursive: true });
  if (manifest !== null) {
    await fs.writeFile(path.join(projectPath, "package.json"), manifest);
  }
  return projectPath;
}

test("refresh loads listed projects and skips unreadable manifests", async (t) => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "script-deck-catalog-"));
  t.after(() => fs.rm(root, { recursive: true, force: true }));

  const apiPath = await writeProject(
    root,
    "api",
    JSON.stringify({ name: "@acme/api", scripts: { test: "vitest", build: "tsc" } }),
  );
  const toolsPath = await writeProject(root, "tools", JSON.stringify({ private: true }));
  const brokenPath = await writeProject(root, "broken", "{ not json");
  const emptyPath = await writeProject(root, "empty", null);

  const catalog = new ManifestProjectCatalog([apiPath, toolsPath, brokenPath, emptyPath, apiPath], makeLogger());
  const projects = await catalog.refresh();

  assert.deepEqual(projects, [
    {
      name: "@acme/api",
      path: apiPath,
      scripts: [
        ["build", "tsc"],
        ["test", "vitest"],
      ],
    },
    { name: "tools", path: toolsPath, scripts: [] },
  ]);

  assert.equal(catalog.findProject(path.join(apiPath, "."))?.name, "@acme/api");
  assert.equal(catalog.findProject(brokenPath), undefined);
});

test("listProjects hands out copies", async (t) => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "script-deck-catalog-"));
  t.after(() => fs.rm(root, { recursive: true, force: true }));

  const webPath = await writeProject(root, "web", JSON.stringify({ name: "web", scripts: { dev: "vite" } }));
  const catalog = new ManifestProjectCatalog([webPath], makeLogger());
  await catalog.refresh();

  catalog.listProjects()[0].scripts.push(["injected", "rm -rf"]);

  assert.deepEqual(catalog.listProjects()[0].scripts, [["dev", "vite"]]);
});

test("common scripts are those every project declares", () => {
  const projects = [
    makeProject("web", { build: "vite build", dev: "vite", lint: "eslint ." }),
    makeProject("api", { dev: "tsx watch", build: "tsc", test: "vitest" }),
  ];

  assert.deepEqual(commonScriptNames(projects), ["build", "dev"]);
  assert.deepEqual(commonScriptNames([]), []);
});
