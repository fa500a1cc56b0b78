import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { FileEnvStore, isEnvProfile, parseEnvFile, renderEnvFile } from "../src/env/envStore.js";

async function makeRoot(t: TestContext): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "script-deck-env-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
}

test("env files parse into key/value pairs", () => {
  const vars = parseEnvFile('# comment\nA=1\n\n  B = "two"  \nBAD\n=novalue\nURL=http://x?a=b\n');

  assert.deepEqual(vars, { A: "1", B: "two", URL: "http://x?a=b" });
});

test("env files render sorted", () => {
  assert.equal(renderEnvFile({ b: "2", a: "1" }), "a=1\nb=2");
});

test("profile names are checked", () => {
  assert.equal(isEnvProfile("staging"), true);
  assert.equal(isEnvProfile("qa"), false);
});

test("a missing profile file falls back to .env", async (t) => {
  const root = await makeRoot(t);
  await fs.writeFile(path.join(root, ".env"), "SHARED=yes\n");
  const store = new FileEnvStore();

  assert.deepEqual(await store.load(root, "dev"), { SHARED: "yes" });

  await fs.writeFile(path.join(root, ".env.prod"), "# nothing declared\n");
  assert.deepEqual(await store.load(root, "prod"), { SHARED: "yes" });
});

test("saved profiles load back and shadow .env", async (t) => {
  const root = await makeRoot(t);
  await fs.writeFile(path.join(root, ".env"), "SHARED=yes\n");
  const store = new FileEnvStore();

  await store.save(root, "staging", { API_KEY: "test-secret", PORT: "4000" });

  assert.equal(await fs.readFile(path.join(root, ".env.staging"), "utf8"), "API_KEY=test-secret\nPORT=4000");
  assert.deepEqual(await store.load(root, "staging"), { API_KEY: "test-secret", PORT: "4000" });
});

test("no env files at all yields no variables", async (t) => {
  const root = await makeRoot(t);

  assert.deepEqual(await new FileEnvStore().load(root, "dev"), {});
});
