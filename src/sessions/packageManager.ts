import fs from "node:fs";
import path from "node:path";

export type PackageManager = "npm" | "yarn" | "pnpm";

/** Lock files checked in priority order; the first one present decides. */
const LOCK_FILE_MARKERS: Array<[marker: string, packageManager: PackageManager]> = [
  ["pnpm-lock.yaml", "pnpm"],
  ["yarn.lock", "yarn"],
];

export const DEFAULT_PACKAGE_MANAGER: PackageManager = "npm";

function fileExists(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function resolvePackageManager(projectPath: string): PackageManager {
  for (const [marker, packageManager] of LOCK_FILE_MARKERS) {
    if (fileExists(path.join(projectPath, marker))) {
      return packageManager;
    }
  }

  return DEFAULT_PACKAGE_MANAGER;
}

/** Arguments, after the package-manager binary, that run `scriptName`. */
export function scriptArgs(packageManager: PackageManager, scriptName: string): string[] {
  return packageManager === "npm" ? ["run", scriptName] : [scriptName];
}

export function describeCommand(packageManager: PackageManager, scriptName: string): string {
  return [packageManager, ...scriptArgs(packageManager, scriptName)].join(" ");
}
