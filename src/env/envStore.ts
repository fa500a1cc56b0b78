import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

export const ENV_PROFILES = ["dev", "staging", "prod"] as const;

export type EnvProfile = (typeof ENV_PROFILES)[number];

export type EnvVars = Record<string, string>;

export function isEnvProfile(value: string): value is EnvProfile {
  return ENV_PROFILES.some((profile) => profile === value);
}

export function envFileName(profile: EnvProfile): string {
  return `.env.${profile}`;
}

function unquote(value: string): string {
  return value.replace(/^["']+/, "").replace(/["']+$/, "");
}

/** `KEY=value` lines; blank lines and `#` comments are skipped, surrounding quotes dropped. */
export function parseEnvFile(content: string): EnvVars {
  const vars: EnvVars = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }

    const eq = line.indexOf("=");
    if (eq === -1) {
      continue;
    }

    const key = line.slice(0, eq).trim();
    if (key.length === 0) {
      continue;
    }

    vars[key] = unquote(line.slice(eq + 1).trim());
  }

  return vars;
}

export function renderEnvFile(vars: EnvVars): string {
  return Object.keys(vars)
    .sort()
    .map((key) => `${key}=${vars[key]}`)
    .join("\n");
}

async function readIfPresent(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

export interface EnvStore {
  load(root: string, profile: EnvProfile): Promise<EnvVars>;
  save(root: string, profile: EnvProfile, vars: EnvVars): Promise<void>;
}

/**
 * Reads `<root>/.env.<profile>`, falling back to `<root>/.env` when the profile
 * file is missing or declares nothing. Saves always target the profile file.
 */
export class FileEnvStore implements EnvStore {
  async load(root: string, profile: EnvProfile): Promise<EnvVars> {
    const profileContent = await readIfPresent(path.join(root, envFileName(profile)));
    const vars = profileContent === undefined ? {} : parseEnvFile(profileContent);

    if (Object.keys(vars).length > 0) {
      return vars;
    }

    const fallbackContent = await readIfPresent(path.join(root, ".env"));
    return fallbackContent === undefined ? vars : parseEnvFile(fallbackContent);
  }

  async save(root: string, profile: EnvProfile, vars: EnvVars): Promise<void> {
    const filePath = path.join(root, envFileName(profile));
    const tempPath = `${filePath}.tmp-${randomUUID()}`;

    await fs.writeFile(tempPath, renderEnvFile(vars));
    await fs.rename(tempPath, filePath);
  }
}
