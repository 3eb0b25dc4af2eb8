export const TEAM_FILES_EXPORT_DIR =
  "/tmp/supervisely/export/restore-archived-project/";

export const TROUBLESHOOTING_LINK =
  "https://ecosystem.supervisely.com/apps/restore-archived-project?id=283#troubleshooting";

export const RECOVERY_LINK =
  "https://docs.supervisely.com/enterprise-edition/advanced-tuning/restore-archived-projects";

/** Directory (and archive base) name of a restored project: `<id>_<name>` */
export function projectDirName(projectId: number, projectName: string): string {
  return `${projectId}_${projectName}`;
}

export function teamFilesArchivePath(taskId: number, archiveName: string): string {
  return `${TEAM_FILES_EXPORT_DIR}${taskId}_${archiveName}`;
}

export function troubleshootingMessage(link = TROUBLESHOOTING_LINK): string {
  return `Something went wrong, read the <a href=${link}>Troubleshooting Instructions</a>. If this does not help, please contact us.`;
}

/**
 * Stored backup files are named after their content hash with `/` replaced
 * by `-`, so the hash comes back by reversing that in the base name.
 */
export function hashFromStoredName(filename: string): string {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0) return filename.replace(/-/g, "/");
  return filename.slice(0, dot).replace(/-/g, "/") + filename.slice(dot);
}

const SIZE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB"];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
}
