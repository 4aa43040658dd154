import { stat, readFile } from "fs/promises";
import { join } from "path";
import fg from "fast-glob";

export async function fileExists(filepath: string): Promise<boolean> {
  try {
    const stats = await stat(filepath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Reads a workspace file, or returns null when it does not exist.
 */
export async function readWorkspaceFile(workspace: string, name: string): Promise<string | null> {
  const filepath = join(workspace, name);
  if (!(await fileExists(filepath))) {
    return null;
  }
  return readFile(filepath, "utf-8");
}

/**
 * Returns the first candidate that exists in the workspace root.
 */
export async function findFirstFile(
  workspace: string,
  candidates: readonly string[]
): Promise<string | null> {
  for (const candidate of candidates) {
    if (await fileExists(join(workspace, candidate))) {
      return candidate;
    }
  }
  return null;
}

/**
 * Workspace-relative paths matching `patterns`, sorted so callers that take a
 * prefix of the list get the same files on every run.
 */
export async function globWorkspace(
  workspace: string,
  patterns: string | string[],
  ignore: string[],
  options: { deep?: number } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: workspace,
    ignore,
    onlyFiles: true,
    dot: false,
    deep: options.deep,
  });
  return files.sort();
}

export function getRelativePath(filepath: string, basePath: string): string {
  const normalizedBase = basePath.endsWith("/") ? basePath : basePath + "/";
  if (filepath === basePath) {
    return "";
  }
  if (filepath.startsWith(normalizedBase)) {
    return filepath.slice(normalizedBase.length);
  }
  return filepath;
}
