import fsp from "node:fs/promises";
import path from "node:path";

export async function pathSize(target: string): Promise<number> {
  const stat = await fsp.stat(target);
  if (!stat.isDirectory()) return stat.size;

  let total = 0;
  const entries = await fsp.readdir(target, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(target, entry.name);
    if (entry.isDirectory()) total += await pathSize(full);
    else if (entry.isFile()) total += (await fsp.stat(full)).size;
  }
  return total;
}

export async function freeSpace(dir: string): Promise<number> {
  const stats = await fsp.statfs(dir);
  return stats.bavail * stats.bsize;
}

/**
 * Whether `dest`'s parent directory has room for `source` (a file, or a
 * directory counted recursively).
 */
export async function hasEnoughDiskSpace(source: string, dest: string): Promise<boolean> {
  const required = await pathSize(path.resolve(source));
  const destDir = path.dirname(path.resolve(dest));
  const free = await freeSpace(destDir);
  console.debug(`[disk] Free space: ${free}, required size: ${required}`);
  return free > required;
}
