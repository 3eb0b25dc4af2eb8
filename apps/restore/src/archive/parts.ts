import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";

const SPLIT_TAR_PATTERN = /^.+\.tar\.\d{3}$/;

export const COMBINED_ARCHIVE_NAME = "combined_parts.tar";

/** `name.tar.000`, `name.tar.001`, ... */
export function isTarPart(filename: string): boolean {
  return SPLIT_TAR_PATTERN.test(filename);
}

export async function findTarParts(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isTarPart(entry.name))
    .map((entry) => path.join(dir, entry.name));
}

/**
 * Concatenate split parts in name order into one archive inside `dir`.
 * Each part is deleted once appended.
 */
export async function combineParts(parts: string[], dir: string): Promise<string> {
  const output = path.join(dir, COMBINED_ARCHIVE_NAME);
  const sorted = [...parts].sort();
  await fsp.rm(output, { force: true });
  for (const part of sorted) {
    await pipeline(fs.createReadStream(part), fs.createWriteStream(output, { flags: "a" }));
    await fsp.rm(part);
  }
  return output;
}
