import fsp from "node:fs/promises";
import path from "node:path";
import { LegacyArchiveError } from "../errors.js";

async function subdirs(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
}

async function isEmptyDir(dir: string): Promise<boolean> {
  try {
    return (await fsp.readdir(dir)).length === 0;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return true;
    throw err;
  }
}

/** Old-format image backups keep datasets with their `ann` folders in the files archive. */
export async function validateLegacyLayout(filesDir: string): Promise<void> {
  console.debug("[images] Attempting to restore images project with an old archive format");
  for (const dataset of await subdirs(filesDir)) {
    if (await isEmptyDir(path.join(filesDir, dataset, "ann"))) {
      throw new LegacyArchiveError(
        `No annotation files were found in dataset '${dataset}' when trying to restore images project with an old archive format`
      );
    }
  }
}

/** Move everything in `filesDir` one level up into `projectDir`. */
export async function moveToProjectDir(filesDir: string, projectDir: string): Promise<void> {
  for (const item of await fsp.readdir(filesDir)) {
    const target = path.join(projectDir, item);
    await fsp.rm(target, { recursive: true, force: true });
    await fsp.rename(path.join(filesDir, item), target);
  }
  await fsp.rm(filesDir, { recursive: true, force: true });
}
