import fsp from "node:fs/promises";
import path from "node:path";

export type DatasetItems = {
  name: string;
  dir: string;
  items: string[];
};

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fsp.access(target);
    return true;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

/**
 * Datasets are the project subdirectories holding an `ann` folder. An item is
 * listed when both `ann/<item>.json` and `<itemDir>/<item>` exist; annotations
 * left without their file (a hash the storage could not serve) are skipped.
 */
export async function listDatasets(projectDir: string, itemDir = "img"): Promise<DatasetItems[]> {
  const datasets: DatasetItems[] = [];
  const entries = await fsp.readdir(projectDir, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const dir = path.join(projectDir, entry.name);
    const annFiles = await fsp.readdir(path.join(dir, "ann")).catch((err: unknown) => {
      if (isMissing(err)) return null;
      throw err;
    });
    if (!annFiles) continue;

    const items: string[] = [];
    for (const file of annFiles.filter((name) => name.endsWith(".json")).sort()) {
      const item = file.slice(0, -".json".length);
      if (await exists(path.join(dir, itemDir, item))) {
        items.push(item);
      } else {
        console.warn(
          `[datasets] Skipping '${item}' in dataset '${entry.name}': ${itemDir}/${item} is missing`
        );
      }
    }
    datasets.push({ name: entry.name, dir, items });
  }
  return datasets.sort((a, b) => a.name.localeCompare(b.name));
}
