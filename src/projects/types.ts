/** A script declared by a project manifest: `[scriptName, rawCommand]`. */
export type ScriptEntry = [name: string, command: string];

export type Project = {
  name: string;
  path: string;
  scripts: ScriptEntry[];
};

export interface ProjectCatalog {
  listProjects(): Project[];
  findProject(projectPath: string): Project | undefined;
}

export function declaresScript(project: Project, scriptName: string): boolean {
  return project.scripts.some(([name]) => name === scriptName);
}

/** Script names every project declares, sorted. */
export function commonScriptNames(projects: readonly Project[]): string[] {
  const [first, ...rest] = projects;
  if (!first) {
    return [];
  }

  return first.scripts
    .map(([name]) => name)
    .filter((name) => rest.every((project) => declaresScript(project, name)))
    .sort();
}
