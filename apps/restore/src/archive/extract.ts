import fsp from "node:fs/promises";
import path from "node:path";
import AdmZip from "adm-zip";
import * as tar from "tar";
import {
  NotEnoughDiskSpaceError,
  UnsupportedArchiveError,
  withTroubleshootingLink,
} from "../errors.js";
import { Progress } from "../progress.js";
import { hasEnoughDiskSpace } from "./disk.js";
import { combineParts, findTarParts } from "./parts.js";

export type ArchiveType = "tar" | "zip";

const ZIP_SIGNATURES = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0x50, 0x4b, 0x05, 0x06]), // empty archive
];
const TAR_MAGIC_OFFSET = 257;
const TAR_MAGIC = Buffer.from("ustar");

export async function detectArchiveType(archivePath: string): Promise<ArchiveType> {
  const handle = await fsp.open(archivePath, "r");
  const header = Buffer.alloc(TAR_MAGIC_OFFSET + TAR_MAGIC.length);
  let bytesRead = 0;
  try {
    ({ bytesRead } = await handle.read(header, 0, header.length, 0));
  } finally {
    await handle.close();
  }

  if (ZIP_SIGNATURES.some((sig) => bytesRead >= sig.length && header.subarray(0, sig.length).equals(sig))) {
    return "zip";
  }
  if (
    bytesRead >= header.length &&
    header.subarray(TAR_MAGIC_OFFSET, TAR_MAGIC_OFFSET + TAR_MAGIC.length).equals(TAR_MAGIC)
  ) {
    return "tar";
  }
  throw new UnsupportedArchiveError(`Unsupported file type: ${path.basename(archivePath)}`);
}

export async function extractTar(archivePath: string, dir: string, message: string) {
  let total = 0;
  await tar.t({
    file: archivePath,
    onReadEntry: (entry) => {
      total += entry.size;
    },
  });

  const progress = new Progress(message, total);
  await fsp.mkdir(dir, { recursive: true });
  await tar.x({
    file: archivePath,
    cwd: dir,
    filter: (_entryPath, entry) => {
      progress.update(entry.size);
      return true;
    },
  });
}

export async function extractZip(archivePath: string, dir: string, message: string) {
  const zip = new AdmZip(archivePath);
  const entries = zip.getEntries();
  const total = entries.reduce((sum, entry) => sum + entry.header.size, 0);
  const progress = new Progress(message, total);

  await fsp.mkdir(dir, { recursive: true });
  for (const entry of entries) {
    zip.extractEntryTo(entry, dir, true, true);
    progress.update(entry.header.size);
  }
}

/**
 * Unpack a downloaded backup into `dir` and delete it. Tar archives that were
 * split into numbered parts inside the backup are stitched and unpacked too.
 */
export async function extractArchive(archivePath: string, dir: string): Promise<void> {
  if (!(await hasEnoughDiskSpace(archivePath, dir))) {
    throw withTroubleshootingLink(new NotEnoughDiskSpaceError());
  }

  const type = await detectArchiveType(archivePath);
  const message = path.parse(archivePath).name.includes("annotations")
    ? "Extracting annotations"
    : "Extracting files";
  console.log(`[extract] ${message}, please wait ...`);

  try {
    if (type === "tar") await extractTar(archivePath, dir, message);
    else await extractZip(archivePath, dir, message);
  } catch (err) {
    throw withTroubleshootingLink(err);
  }
  await fsp.rm(archivePath);

  const parts = await findTarParts(dir);
  if (parts.length > 0) {
    const combined = await combineParts(parts, dir);
    await extractTar(combined, dir, "Extracting combined parts");
    await fsp.rm(combined);
  }
}
