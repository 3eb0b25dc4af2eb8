#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { fileURLToPath } from "node:url";
import type { RestoreConfig, RestoreResult } from "@archive-restore/shared";
import { HttpPlatformApi } from "../api/client.js";
import type { FetchLike, PlatformApi } from "../api/types.js";
import { loadEnvFiles, resolveConfig, type ConfigOverrides } from "../config/index.js";
import { describeError } from "../errors.js";
import { runRestore } from "../restore/run.js";

export type RunOptions = {
  projectId?: number;
  taskId?: number;
  download?: boolean;
  workDir?: string;
};

type Env = Record<string, string | undefined>;

export type TaskDeps = {
  env?: Env;
  createApi?: (config: RestoreConfig) => PlatformApi;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

function parseId(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return Number(value.trim());
}

export function toOverrides(opts: RunOptions): ConfigOverrides {
  return {
    projectId: opts.projectId,
    taskId: opts.taskId,
    downloadMode: opts.download ? true : undefined,
    workDir: opts.workDir,
  };
}

function describeResult(result: RestoreResult): string {
  switch (result.status) {
    case "archived":
      return `Archive ${result.archiveName} uploaded (file id ${result.fileId})`;
    case "restored":
      return `Project ${result.projectName} restored (id ${result.projectId})`;
    case "expired":
      return "Backup access expired, nothing restored";
  }
}

/** Run the restore task; resolves to the process exit code. */
export async function runTask(opts: RunOptions, deps: TaskDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  try {
    loadEnvFiles(env);
    const config = resolveConfig(toOverrides(opts), env);
    const api =
      deps.createApi?.(config) ??
      new HttpPlatformApi({ serverAddress: config.serverAddress, apiToken: config.apiToken });
    const result = await runRestore(config, {
      api,
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
    });
    console.log(`[restore] ${describeResult(result)}`);
    return 0;
  } catch (err) {
    console.error(`[restore] ${describeError(err)}`);
    if (err instanceof Error && err.stack) console.debug(err.stack);
    return 1;
  }
}

export const program = new Command();

program
  .name("restore-archived-project")
  .description("Restore or download an archived project from its cloud backup")
  .version("0.1.0");

program
  .command("run")
  .description("Run the restore task for the project in the task environment")
  .option("--project-id <id>", "Archived project id (default: modal.state.slyProjectId)", parseId)
  .option("--task-id <id>", "Task id (default: TASK_ID)", parseId)
  .option("--download", "Pack the project as a .tar archive instead of restoring it")
  .option("--work-dir <dir>", "Directory to unpack the backup in")
  .action(async (opts: RunOptions) => {
    process.exitCode = await runTask(opts);
  });

const isDirectRun = process.argv[1] === fileURLToPath(import.meta.url);
if (isDirectRun) {
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(describeError(err));
    process.exit(1);
  });
}
