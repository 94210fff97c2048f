import fs from "node:fs";
import path from "node:path";
import { MANIFEST_FILE, type DetachedManifest } from "./manifest.ts";

const HOST_MODULE = new URL("../service/host.ts", import.meta.url).href;

export const ENTRY_FILE = "main.mts";

export interface DetachedProject {
  projectDir: string;
  entry: string;
  manifestPath: string;
  logFile: string;
}

export interface CreateProjectOptions {
  baseDir: string;
  manifest: Omit<DetachedManifest, "extraPackages">;
  extraPackages?: string[];
}

function renderEntry(): string {
  return [
    `import { fileURLToPath } from "node:url";`,
    `import { runDetachedHost } from ${JSON.stringify(HOST_MODULE)};`,
    ``,
    `await runDetachedHost(fileURLToPath(new URL("./${MANIFEST_FILE}", import.meta.url)));`,
    ``,
  ].join("\n");
}

/**
 * Lays out a self-contained project directory for a detached service: the
 * manifest, an entry script that hosts the agent module, and copies of any
 * extra packages.
 */
export function createDetachedProject(options: CreateProjectOptions): DetachedProject {
  fs.mkdirSync(options.baseDir, { recursive: true });
  const projectDir = fs.mkdtempSync(path.join(path.resolve(options.baseDir), "detached-"));

  const copied: string[] = [];
  for (const source of options.extraPackages ?? []) {
    const resolved = path.resolve(source);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Extra package not found: ${resolved}`);
    }
    const name = path.basename(resolved);
    fs.cpSync(resolved, path.join(projectDir, name), { recursive: true });
    copied.push(name);
  }

  const manifest: DetachedManifest = { ...options.manifest, extraPackages: copied };
  const manifestPath = path.join(projectDir, MANIFEST_FILE);
  fs.writeFileSync(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);

  const entry = path.join(projectDir, ENTRY_FILE);
  fs.writeFileSync(entry, renderEntry());

  return { projectDir, entry, manifestPath, logFile: path.join(projectDir, "service.log") };
}
