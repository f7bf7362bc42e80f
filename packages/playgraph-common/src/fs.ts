import { mkdir, readdir, stat } from "node:fs/promises";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Lists regular files directly inside `dirPath` whose extension is one of
 * `extensions` (compared case-insensitively), sorted by file name.
 */
export async function listFilesWithExtensions(dirPath: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dirPath, name));
}
