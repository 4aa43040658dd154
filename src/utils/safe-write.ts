/**
 * Atomic, symlink-refusing writes for files the pipeline creates or rewrites inside
 * a workspace (`.dockerignore`, compose files) and for run reports.
 *
 * The data goes to a temp file in the target directory and is renamed over the
 * target, so a reader never observes a half-written compose file.
 */

import { writeFile, rename, unlink, mkdir, lstat } from "fs/promises";
import { openSync, closeSync, fsyncSync } from "fs";
import { dirname, basename, join } from "path";

export interface SafeWriteOptions {
  /**
   * Mode for a newly created file. An existing target keeps its own mode.
   * Default: 0o644. Ignored on Windows.
   */
  mode?: number;
}

async function existingMode(path: string): Promise<number | null> {
  try {
    const stats = await lstat(path);
    if (stats.isSymbolicLink()) {
      throw new Error(`Refusing to write to symlink: ${path}`);
    }
    return stats.mode & 0o777;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

export async function writeFileAtomicNoFollow(
  path: string,
  data: string | Buffer,
  opts: SafeWriteOptions = {}
): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });

  const mode = (await existingMode(path)) ?? opts.mode ?? 0o644;
  const tempPath = join(dir, `.${basename(path)}.tmp-${String(process.pid)}-${String(Date.now())}`);

  try {
    await writeFile(tempPath, data, {
      mode,
      encoding: typeof data === "string" ? "utf-8" : undefined,
    });

    try {
      const fd = openSync(tempPath, "r+");
      fsyncSync(fd);
      closeSync(fd);
    } catch {
      // fsync is best-effort; the rename below is what makes the write atomic
    }

    await rename(tempPath, path);
  } catch (err) {
    await unlink(tempPath).catch(() => undefined);
    throw err;
  }
}
