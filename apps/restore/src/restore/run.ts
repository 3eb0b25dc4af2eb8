import fsp from "node:fs/promises";
import type { RestoreConfig, RestoreResult } from "@archive-restore/shared";
import type { FetchLike, PlatformApi } from "../api/types.js";
import { extractArchive } from "../archive/extract.js";
import { downloadBackup } from "../download/index.js";
import { InactivityError } from "../errors.js";
import { prepareImageFiles } from "../images/hashMap.js";
import { moveToProjectDir, validateLegacyLayout } from "../images/legacy.js";
import { prepareDownloadableArchive } from "../project/archive.js";
import { importProject } from "../project/import.js";
import { resolveRestorePaths } from "../project/paths.js";

export type RestoreDeps = {
  api: PlatformApi;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

async function exists(target: string): Promise<boolean> {
  try {
    await fsp.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function runRestore(
  config: RestoreConfig,
  deps: RestoreDeps
): Promise<RestoreResult> {
  const { api } = deps;
  const projectInfo = await api.getProjectInfo(config.projectId);
  if (!projectInfo.backupArchive?.url) {
    throw new Error(`Project ${projectInfo.id} has no backup archive to restore from`);
  }
  const workspace = await api.getWorkspaceInfo(projectInfo.workspaceId);
  const paths = resolveRestorePaths(config.workDir, projectInfo.id, projectInfo.name);
  console.log(
    `[restore] Restoring ${projectInfo.type} project ${projectInfo.id} (${projectInfo.name}), ${config.downloadMode ? "download" : "restore"} mode`
  );
  await fsp.mkdir(paths.projectDir, { recursive: true });

  try {
    await downloadBackup(projectInfo, paths, {
      api,
      taskId: config.taskId,
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
    });
  } catch (err) {
    if (err instanceof InactivityError) {
      // The link is gone, so the partial download can never be completed;
      // a new backup link gets a new task run and a fresh directory.
      await fsp.rm(paths.projectDir, { recursive: true, force: true });
      return { status: "expired" };
    }
    throw err;
  }

  await extractArchive(paths.filesArchivePath, paths.filesDir);

  if (projectInfo.type === "images") {
    if (await exists(paths.annotationsArchivePath)) {
      await extractArchive(paths.annotationsArchivePath, paths.projectDir);
      await prepareImageFiles(paths, api);
    } else {
      await validateLegacyLayout(paths.filesDir);
      await moveToProjectDir(paths.filesDir, paths.projectDir);
    }
  } else {
    await moveToProjectDir(paths.filesDir, paths.projectDir);
  }

  if (config.downloadMode) {
    const { file, archiveName } = await prepareDownloadableArchive({
      api,
      taskId: config.taskId,
      teamId: workspace.teamId,
      projectDir: paths.projectDir,
    });
    return { status: "archived", fileId: file.id, archiveName };
  }

  const project = await importProject({
    api,
    workspaceId: projectInfo.workspaceId,
    projectType: projectInfo.type,
    projectDir: paths.projectDir,
  });
  return { status: "restored", projectId: project.id, projectName: project.name };
}
