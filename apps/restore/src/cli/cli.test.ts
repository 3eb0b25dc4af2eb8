import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { program, runTask, toOverrides } from "./index.js";
import { FakePlatformApi } from "../testing/fakePlatformApi.js";

describe("restore cli", () => {
  let tmpDir = "";

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "restore-cli-test-"));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("only overrides download mode when the flag is given", () => {
    expect(toOverrides({ projectId: 3 })).toEqual({
      projectId: 3,
      taskId: undefined,
      downloadMode: undefined,
      workDir: undefined,
    });
    expect(toOverrides({ download: true }).downloadMode).toBe(true);
  });

  it("registers the run command with its options", () => {
    const run = program.commands.find((cmd) => cmd.name() === "run");
    expect(run?.options.map((opt) => opt.long)).toEqual([
      "--project-id",
      "--task-id",
      "--download",
      "--work-dir",
    ]);
  });

  it("exits with 1 when the environment is incomplete", async () => {
    const code = await runTask({}, { env: { SERVER_ADDRESS: "http://platform.local" } });
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "[restore] Missing environment variable API_TOKEN"
    );
  });

  it("exits with 0 when the backup has expired", async () => {
    const api = new FakePlatformApi();
    api.projects.set(42, {
      id: 42,
      name: "signs",
      type: "images",
      workspaceId: 3,
      backupArchive: { url: "https://cloud/files.tar?dl=0" },
    });
    api.workspaces.set(3, { id: 3, teamId: 8 });

    const code = await runTask(
      { workDir: tmpDir },
      {
        env: {
          SERVER_ADDRESS: "http://platform.local",
          API_TOKEN: "test-token",
          TASK_ID: "5",
          "modal.state.slyProjectId": "42",
        },
        createApi: () => api,
        fetchImpl: async () => {
          throw new TypeError("fetch failed");
        },
        sleep: async () => undefined,
      }
    );

    expect(code).toBe(0);
    expect(api.outputs.map((out) => out.kind)).toEqual(["text"]);
  });
});
