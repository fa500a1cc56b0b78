import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../api/types.js";
import type { Logger } from "../logging/logger.js";
import type { Project, ProjectCatalog } from "./types.js";

const manifestSchema = z.object({
  name: z.string().min(1).optional(),
  scripts: z.record(z.string()).optional(),
});

type Manifest = z.infer<typeof manifestSchema>;

type ManifestRead = { manifest: Manifest } | { error: string };

async function readManifest(manifestPath: string): Promise<ManifestRead> {
  try {
    const raw = await fs.readFile(manifestPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return { manifest: manifestSchema.parse(parsed) };
  } catch (error) {
    return { error: errorMessage(error) };
  }
}

export function projectFromManifest(projectPath: string, manifest: Manifest): Project {
  return {
    name: manifest.name || path.basename(projectPath),
    path: projectPath,
    scripts: Object.entries(manifest.scripts ?? {}).sort(([a], [b]) => a.localeCompare(b)),
  };
}

/**
 * Projects listed explicitly by directory. Each directory's package.json gives
 * the project name and its declared scripts; directories without a readable
 * manifest are skipped.
 */
export class ManifestProjectCatalog implements ProjectCatalog {
  private projects: Project[] = [];

  constructor(
    private readonly projectPaths: string[],
    private readonly logger: Logger,
  ) {}

  listProjects(): Project[] {
    return this.projects.map((project) => ({
      ...project,
      scripts: project.scripts.map(([name, command]) => [name, command]),
    }));
  }

  findProject(projectPath: string): Project | undefined {
    const resolved = path.resolve(projectPath);
    return this.listProjects().find((project) => project.path === resolved);
  }

  async refresh(): Promise<Project[]> {
    const loaded: Project[] = [];

    for (const entry of this.projectPaths) {
      const projectPath = path.resolve(entry);
      const manifestPath = path.join(projectPath, "package.json");
      const read = await readManifest(manifestPath);

      if ("error" in read) {
        this.logger.warn("projects.invalid_manifest", {
          manifestPath,
          message: read.error,
        });
        continue;
      }

      if (loaded.some((project) => project.path === projectPath)) {
        this.logger.warn("projects.duplicate_path", {
          projectPath,
        });
        continue;
      }

      loaded.push(projectFromManifest(projectPath, read.manifest));
    }

    this.projects = loaded;

    this.logger.info("projects.loaded", {
      count: loaded.length,
      configured: this.projectPaths.length,
    });

    return this.listProjects();
  }
}
