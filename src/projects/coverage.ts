import fs from "node:fs/promises";
import path from "node:path";
import { declaresScript, type Project } from "./types.js";

export const COVERAGE_SCRIPT = "test";

/** Where an lcov HTML report lands, relative to the project root. */
export const COVERAGE_REPORT_SEGMENTS = ["coverage", "lcov-report", "index.html"] as const;

export type CoverageReport = {
  projectPath: string;
  projectName: string;
  hasTestScript: boolean;
  reportPath: string;
  reportExists: boolean;
};

export function coverageReportPath(project: Project): string {
  return path.join(project.path, ...COVERAGE_REPORT_SEGMENTS);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function inspectCoverage(project: Project): Promise<CoverageReport> {
  const reportPath = coverageReportPath(project);

  return {
    projectPath: project.path,
    projectName: project.name,
    hasTestScript: declaresScript(project, COVERAGE_SCRIPT),
    reportPath,
    reportExists: await isFile(reportPath),
  };
}
