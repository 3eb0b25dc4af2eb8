import fsp from "node:fs/promises";
import path from "node:path";
import { HashNameMapSchema, hashFromStoredName, type HashNameMap } from "@archive-restore/shared";
import type { PlatformApi } from "../api/types.js";
import { ApiError } from "../errors.js";
import type { RestorePaths } from "../project/paths.js";

export type MissingImage = { name: string; hash: string };

const MAX_DOWNLOAD_ERRORS = 4;

/** Regular files directly inside `dir`. */
export async function listFiles(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
}

/** hash -> stored file name */
export function createReverseMapping(filenames: string[]): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const filename of filenames) {
    mapping.set(hashFromStoredName(filename), filename);
  }
  return mapping;
}

function hashesNotFound(error: ApiError): string[] | null {
  const body = error.body;
  if (typeof body !== "object" || body === null || !("details" in body)) return null;
  const details = body.details;
  if (typeof details !== "object" || details === null) return null;
  if (!("message" in details) || details.message !== "Hashes not found") return null;
  const hashes = "hashes" in details && Array.isArray(details.hashes) ? details.hashes : [];
  return hashes.filter((hash): hash is string => typeof hash === "string");
}

/**
 * Fetch images that the backup did not contain from the platform storage.
 * Hashes the storage reports as unknown are dropped and the rest retried.
 */
export async function downloadMissingHashes(
  missing: MissingImage[],
  folder: string,
  datasetName: string,
  api: PlatformApi
): Promise<void> {
  let hashes = missing.map((item) => item.hash);
  let paths = missing.map((item) => path.join(folder, item.name));
  let errors = 0;

  for (;;) {
    if (errors > MAX_DOWNLOAD_ERRORS) {
      console.warn(`[images] ⚠️ Skipping retries for dataset '${datasetName}'`);
      return;
    }
    try {
      await api.downloadImagesByHashes(hashes, paths);
      return;
    } catch (err) {
      // a body that is not JSON means something other than missing hashes
      if (!(err instanceof ApiError) || typeof err.body === "string") throw err;
      errors += 1;
      const notFound = hashesNotFound(err);
      if (!notFound) continue;
      console.warn(`[images] Skipping files with this hashes for dataset '${datasetName}'`);
      if (notFound.length === 0) continue;
      const drop = new Set(notFound);
      const keep = hashes.map((hash) => !drop.has(hash));
      hashes = hashes.filter((_, idx) => keep[idx]);
      paths = paths.filter((_, idx) => keep[idx]);
      if (hashes.length === 0) return;
    }
  }
}

/**
 * Lay out images from the flat, hash-named backup files as
 * `<projectDir>/<dataset>/img/<name>`.
 */
export async function copyFilesFromHashMap(
  map: HashNameMap,
  filesDir: string,
  reverseMapping: Map<string, string>,
  projectDir: string,
  api: PlatformApi
): Promise<void> {
  for (const dataset of map.datasets) {
    const destination = path.join(projectDir, dataset.name, "img");
    await fsp.mkdir(destination, { recursive: true });
    const missing: MissingImage[] = [];

    for (const image of dataset.images) {
      const stored = reverseMapping.get(image.hash);
      if (!stored) {
        missing.push({ name: image.name, hash: image.hash });
        continue;
      }
      await fsp.copyFile(path.join(filesDir, stored), path.join(destination, image.name));
    }

    if (missing.length > 0) {
      console.log(
        `[images] ${missing.length} image(s) of dataset '${dataset.name}' are not in the backup, downloading from storage`
      );
      await downloadMissingHashes(missing, destination, dataset.name, api);
    }
  }
}

export async function prepareImageFiles(paths: RestorePaths, api: PlatformApi): Promise<void> {
  const raw = await fsp.readFile(paths.hashNameMapPath, "utf8");
  const map = HashNameMapSchema.parse(JSON.parse(raw));
  const filenames = await listFiles(paths.filesDir);
  const reverseMapping = createReverseMapping(filenames);
  await copyFilesFromHashMap(map, paths.filesDir, reverseMapping, paths.projectDir, api);
  await fsp.rm(paths.filesDir, { recursive: true, force: true });
  await fsp.rm(paths.hashNameMapPath, { force: true });
}
