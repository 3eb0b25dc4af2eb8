import fsp from "node:fs/promises";
import path from "node:path";
import { teamFilesArchivePath, type TeamFileInfo } from "@archive-restore/shared";
import type { PlatformApi } from "../api/types.js";
import { hasEnoughDiskSpace } from "../archive/disk.js";
import { packDirectory } from "../archive/pack.js";
import { NotEnoughDiskSpaceError, withTroubleshootingLink } from "../errors.js";
import { Progress } from "../progress.js";

export type ArchiveTarget = {
  api: PlatformApi;
  taskId: number;
  teamId: number;
  projectDir: string;
};

/**
 * Pack the restored project as `<projectDir>.tar`, upload it to team files and
 * attach it to the task as its downloadable result.
 */
export async function prepareDownloadableArchive(
  target: ArchiveTarget
): Promise<{ file: TeamFileInfo; archiveName: string }> {
  const { api, taskId, teamId, projectDir } = target;
  const tarPath = `${projectDir}.tar`;
  const archiveName = path.basename(tarPath);

  if (!(await hasEnoughDiskSpace(projectDir, projectDir))) {
    throw withTroubleshootingLink(new NotEnoughDiskSpaceError());
  }

  console.log(`[pack] Packing ${archiveName}`);
  await packDirectory(projectDir, tarPath);
  await fsp.rm(projectDir, { recursive: true, force: true });

  let progress: Progress | null = null;
  const file = await api.uploadTeamFile(
    teamId,
    tarPath,
    teamFilesArchivePath(taskId, archiveName),
    (sent, total) => {
      progress ??= new Progress(`Uploading ${archiveName}`, total);
      progress.setCurrent(sent);
    }
  );
  await fsp.rm(tarPath, { force: true });

  await api.setOutputArchive(taskId, file, archiveName);
  console.log(`[pack] ✅ Archive ${archiveName} is ready to download`);
  return { file, archiveName };
}
