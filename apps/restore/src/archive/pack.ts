import fs from "node:fs";
import archiver from "archiver";

/** Tar the contents of `dir` (entries at the archive root) into `tarPath`. */
export function packDirectory(dir: string, tarPath: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(tarPath);
    const archive = archiver("tar");

    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
    archive.on("warning", (err) => {
      console.warn(`[pack] Archive warning: ${err.message}`);
    });

    archive.pipe(output);
    archive.directory(dir, false);
    archive.finalize().catch(reject);
  });
}
