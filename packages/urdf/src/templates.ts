import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Read URDF templates from disk, keyed like `paths`.
 * Templates are returned as text so every export can reparse them afresh.
 */
export function readUrdfTemplates(paths: Readonly<Record<string, string>>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [modelName, path] of Object.entries(paths)) {
    out[modelName] = readFileSync(path, "utf-8");
  }
  return out;
}

/**
 * Write exported URDFs to `dir` as `<model>.urdf`, creating the directory.
 *
 * @returns Paths written, keyed by model name.
 */
export function writeUrdfs(dir: string, urdfs: Readonly<Record<string, string>>): Record<string, string> {
  mkdirSync(dir, { recursive: true });
  const written: Record<string, string> = {};
  for (const [modelName, xml] of Object.entries(urdfs)) {
    const path = join(dir, `${modelName}.urdf`);
    writeFileSync(path, xml);
    written[modelName] = path;
  }
  return written;
}
