import path from "node:path";
import { projectDirName } from "@archive-restore/shared";

export type RestorePaths = {
  projectDir: string;
  filesDir: string;
  hashNameMapPath: string;
  filesArchivePath: string;
  annotationsArchivePath: string;
};

export function resolveRestorePaths(
  workDir: string,
  projectId: number,
  projectName: string
): RestorePaths {
  const projectDir = path.join(workDir, projectDirName(projectId, projectName));
  return {
    projectDir,
    filesDir: path.join(projectDir, "files"),
    hashNameMapPath: path.join(projectDir, "hash_name_map.json"),
    filesArchivePath: path.join(projectDir, "files.tar"),
    annotationsArchivePath: path.join(projectDir, "annotations.tar"),
  };
}
