import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import { RestoreConfigSchema, type RestoreConfig } from "@archive-restore/shared";
import { ConfigError } from "../errors.js";

export const PROJECT_ID_VAR = "modal.state.slyProjectId";
export const DOWNLOAD_MODE_VAR = "modal.state.downloadMode";

export type ConfigOverrides = {
  projectId?: number;
  taskId?: number;
  downloadMode?: boolean;
  workDir?: string;
};

type Env = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["y", "yes", "t", "true", "on", "1"]);
const FALSE_VALUES = new Set(["n", "no", "f", "false", "off", "0"]);

export function isDevelopment(env: Env = process.env): boolean {
  return env.ENV === "development";
}

/**
 * In development the platform variables come from dotenv files; values that
 * are already set win.
 */
export function loadEnvFiles(env: Env = process.env, cwd = process.cwd()) {
  if (!isDevelopment(env)) return;
  const files = [
    path.join(cwd, "local.env"),
    path.join(os.homedir(), "supervisely.env"),
  ];
  for (const file of files) {
    if (!fs.existsSync(file)) continue;
    const parsed = dotenv.parse(fs.readFileSync(file, "utf8"));
    for (const [key, value] of Object.entries(parsed)) {
      if (!env[key]?.trim()) env[key] = value;
    }
  }
}

export function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new ConfigError(`Invalid boolean value for ${name}: ${raw}`);
}

function trimValue(value: string | undefined): string | undefined {
  const next = value?.trim();
  return next ? next : undefined;
}

function requireValue(env: Env, name: string): string {
  const value = trimValue(env[name]);
  if (!value) throw new ConfigError(`Missing environment variable ${name}`);
  return value;
}

function parseId(name: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Invalid integer value for ${name}: ${raw}`);
  }
  return Number(raw);
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env
): RestoreConfig {
  const serverAddress = requireValue(env, "SERVER_ADDRESS");
  const apiToken = requireValue(env, "API_TOKEN");
  const taskId = overrides.taskId ?? parseId("TASK_ID", requireValue(env, "TASK_ID"));
  const projectId =
    overrides.projectId ?? parseId(PROJECT_ID_VAR, requireValue(env, PROJECT_ID_VAR));

  const rawMode = trimValue(env[DOWNLOAD_MODE_VAR]);
  const downloadMode =
    overrides.downloadMode ??
    (rawMode === undefined ? false : parseBoolean(DOWNLOAD_MODE_VAR, rawMode));

  const workDir = path.resolve(
    overrides.workDir ?? trimValue(env.RESTORE_WORK_DIR) ?? process.cwd()
  );

  const result = RestoreConfigSchema.safeParse({
    serverAddress,
    apiToken,
    taskId,
    projectId,
    downloadMode,
    workDir,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid config value ${issue.path.join(".")}: ${issue.message}`);
  }
  return result.data;
}
