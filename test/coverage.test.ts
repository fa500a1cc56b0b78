import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { coverageReportPath, inspectCoverage } from "../src/projects/coverage.js";
import type { Project } from "../src/projects/types.js";

test("an existing lcov report is found", async (t) => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "script-deck-coverage-"));
  t.after(() => fs.rm(root, { recursive: true, force: true }));

  const project: Project = { name: "api", path: root, scripts: [["test", "vitest --coverage"]] };
  const reportPath = path.join(root, "coverage", "lcov-report", "index.html");

  assert.equal(coverageReportPath(project), reportPath);
  assert.equal((await inspectCoverage(project)).reportExists, false);

  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, "<html></html>");

  assert.deepEqual(await inspectCoverage(project), {
    projectPath: root,
    projectName: "api",
    hasTestScript: true,
    reportPath,
    reportExists: true,
  });
});

test("a directory in place of the report does not count", async (t) => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "script-deck-coverage-"));
  t.after(() => fs.rm(root, { recursive: true, force: true }));

  const project: Project = { name: "web", path: root, scripts: [["build", "vite build"]] };
  await fs.mkdir(coverageReportPath(project), { recursive: true });

  const report = await inspectCoverage(project);
  assert.equal(report.reportExists, false);
  assert.equal(report.hasTestScript, false);
});
