import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import * as tar from "tar";
import type { ProjectType, RestoreConfig } from "@archive-restore/shared";
import { runRestore } from "./run.js";
import { FakePlatformApi } from "../testing/fakePlatformApi.js";
import type { FetchLike } from "../api/types.js";
import { UnsupportedProjectTypeError } from "../errors.js";

const FILES_URL = "https://cloud/s/files.tar?dl=0";
const ANN_URL = "https://cloud/s/annotations.tar?dl=0";

const annotation = {
  size: { height: 3, width: 4 },
  description: "",
  tags: [],
  objects: [{ classTitle: "car", geometryType: "rectangle", tags: [], points: { exterior: [], interior: [] } }],
};

const videoAnnotation = {
  size: { height: 720, width: 1280 },
  framesCount: 1,
  description: "",
  key: "clip",
  tags: [],
  objects: [],
  frames: [],
};

async function makeTar(dir: string, file: string, entries: Record<string, string>) {
  for (const [name, content] of Object.entries(entries)) {
    await fs.mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await fs.writeFile(path.join(dir, name), content);
  }
  await tar.c({ file, cwd: dir }, Object.keys(entries));
  return fs.readFile(file);
}

function servingFetch(archives: Map<string, Buffer>): FetchLike {
  return async (url) => {
    const data = archives.get(url);
    if (!data) return new Response("not found", { status: 404, headers: { "content-type": "text/html" } });
    return new Response(data, {
      status: 200,
      headers: { "content-type": "application/x-tar", "content-length": String(data.length) },
    });
  };
}

async function listTar(file: string): Promise<string[]> {
  const names: string[] = [];
  await tar.t({
    file,
    onReadEntry: (entry) => {
      if (entry.type === "File") names.push(entry.path);
    },
  });
  return names.sort();
}

describe("restore pipeline", () => {
  let tmpDir = "";
  let workDir = "";
  let api: FakePlatformApi;
  const sleep = async () => undefined;

  const config = (downloadMode: boolean): RestoreConfig => ({
    serverAddress: "http://platform.local",
    apiToken: "test-token",
    taskId: 5,
    projectId: 42,
    downloadMode,
    workDir,
  });

  const addProject = (type: ProjectType, annUrl?: string) => {
    api.projects.set(42, {
      id: 42,
      name: "signs",
      type,
      workspaceId: 3,
      backupArchive: { url: FILES_URL, annUrl },
    });
    api.workspaces.set(3, { id: 3, teamId: 8 });
  };

  async function newFormatArchives(): Promise<Map<string, Buffer>> {
    const files = await makeTar(path.join(tmpDir, "src-files"), path.join(tmpDir, "files.tar"), {
      "h1.png": "png-one",
    });
    const annotations = await makeTar(
      path.join(tmpDir, "src-ann"),
      path.join(tmpDir, "annotations.tar"),
      {
        "meta.json": JSON.stringify({
          classes: [{ title: "car", shape: "rectangle" }],
          tags: [],
        }),
        "hash_name_map.json": JSON.stringify({
          datasets: [{ name: "ds0", images: [{ name: "a.png", hash: "h1.png" }] }],
        }),
        "ds0/ann/a.png.json": JSON.stringify(annotation),
      }
    );
    return new Map([
      ["https://cloud/s/files.tar?dl=1", files],
      ["https://cloud/s/annotations.tar?dl=1", annotations],
    ]);
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "restore-run-test-"));
    workDir = path.join(tmpDir, "work");
    await fs.mkdir(workDir);
    api = new FakePlatformApi();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("packs an images backup into a downloadable archive", async () => {
    addProject("images", ANN_URL);

    const result = await runRestore(config(true), {
      api,
      fetchImpl: servingFetch(await newFormatArchives()),
      sleep,
    });

    expect(result).toEqual({ status: "archived", fileId: 1000, archiveName: "42_signs.tar" });
    expect(api.teamFiles).toHaveLength(1);
    expect(api.teamFiles[0].teamId).toBe(8);
    expect(api.teamFiles[0].remotePath).toBe(
      "/tmp/supervisely/export/restore-archived-project/5_42_signs.tar"
    );
    expect(api.outputs).toEqual([
      { kind: "archive", taskId: 5, fileId: 1000, fileName: "42_signs.tar" },
    ]);

    const uploaded = path.join(tmpDir, "uploaded.tar");
    await fs.writeFile(uploaded, api.teamFiles[0].data);
    expect(await listTar(uploaded)).toEqual(["ds0/ann/a.png.json", "ds0/img/a.png", "meta.json"]);
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("restores an images backup into the workspace", async () => {
    addProject("images", ANN_URL);

    const result = await runRestore(config(false), {
      api,
      fetchImpl: servingFetch(await newFormatArchives()),
      sleep,
    });

    const hash = createHash("sha256").update("png-one").digest("base64");
    expect(result).toEqual({ status: "restored", projectId: 1000, projectName: "42_signs" });
    expect(api.createdProjects).toEqual([
      { id: 1000, name: "42_signs", workspaceId: 3, type: "images" },
    ]);
    expect(api.metas.get(1000)?.classes).toEqual([{ title: "car", shape: "rectangle" }]);
    expect(api.datasets).toEqual([{ id: 1001, name: "ds0", projectId: 1000 }]);
    expect(api.images).toEqual([{ id: 1002, name: "a.png", datasetId: 1001, hash }]);
    expect(api.annotations.get(1002)).toEqual(annotation);
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("restores old-format image backups from the files archive alone", async () => {
    addProject("images");
    const files = await makeTar(path.join(tmpDir, "legacy"), path.join(tmpDir, "legacy.tar"), {
      "meta.json": JSON.stringify({ classes: [], tags: [] }),
      "ds0/ann/a.png.json": JSON.stringify({ size: { height: 1, width: 1 } }),
      "ds0/img/a.png": "png",
    });

    const result = await runRestore(config(true), {
      api,
      fetchImpl: servingFetch(new Map([["https://cloud/s/files.tar?dl=1", files]])),
      sleep,
    });

    expect(result.status).toBe("archived");
    const uploaded = path.join(tmpDir, "uploaded.tar");
    await fs.writeFile(uploaded, api.teamFiles[0].data);
    expect(await listTar(uploaded)).toEqual(["ds0/ann/a.png.json", "ds0/img/a.png", "meta.json"]);
  });

  it("restores the images that are available when a hash cannot be fetched", async () => {
    addProject("images", ANN_URL);
    const files = await makeTar(path.join(tmpDir, "src-files"), path.join(tmpDir, "files.tar"), {
      "h1.png": "png-one",
    });
    const annotations = await makeTar(
      path.join(tmpDir, "src-ann"),
      path.join(tmpDir, "annotations.tar"),
      {
        "meta.json": JSON.stringify({ classes: [{ title: "car", shape: "rectangle" }], tags: [] }),
        "hash_name_map.json": JSON.stringify({
          datasets: [
            {
              name: "ds0",
              images: [
                { name: "a.png", hash: "h1.png" },
                { name: "b.png", hash: "gone.png" },
              ],
            },
          ],
        }),
        "ds0/ann/a.png.json": JSON.stringify(annotation),
        "ds0/ann/b.png.json": JSON.stringify(annotation),
      }
    );

    const result = await runRestore(config(false), {
      api,
      fetchImpl: servingFetch(
        new Map([
          ["https://cloud/s/files.tar?dl=1", files],
          ["https://cloud/s/annotations.tar?dl=1", annotations],
        ])
      ),
      sleep,
    });

    const hash = createHash("sha256").update("png-one").digest("base64");
    expect(result).toEqual({ status: "restored", projectId: 1000, projectName: "42_signs" });
    expect(api.downloadCalls).toEqual([["gone.png"]]);
    expect(api.images).toEqual([{ id: 1002, name: "a.png", datasetId: 1001, hash }]);
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("packs a videos backup with its dataset layout", async () => {
    addProject("videos");
    const files = await makeTar(path.join(tmpDir, "videos"), path.join(tmpDir, "videos.tar"), {
      "meta.json": JSON.stringify({ classes: [], tags: [] }),
      "ds0/video/clip.mp4": "mp4",
      "ds0/ann/clip.mp4.json": JSON.stringify(videoAnnotation),
    });

    const result = await runRestore(config(true), {
      api,
      fetchImpl: servingFetch(new Map([["https://cloud/s/files.tar?dl=1", files]])),
      sleep,
    });

    expect(result).toEqual({ status: "archived", fileId: 1000, archiveName: "42_signs.tar" });
    const uploaded = path.join(tmpDir, "uploaded.tar");
    await fs.writeFile(uploaded, api.teamFiles[0].data);
    expect(await listTar(uploaded)).toEqual([
      "ds0/ann/clip.mp4.json",
      "ds0/video/clip.mp4",
      "meta.json",
    ]);
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("restores a videos backup into the workspace", async () => {
    addProject("videos");
    const files = await makeTar(path.join(tmpDir, "videos"), path.join(tmpDir, "videos.tar"), {
      "meta.json": JSON.stringify({ classes: [{ title: "car", shape: "rectangle" }], tags: [] }),
      "ds0/video/clip.mp4": "mp4",
      "ds0/ann/clip.mp4.json": JSON.stringify(videoAnnotation),
    });

    const result = await runRestore(config(false), {
      api,
      fetchImpl: servingFetch(new Map([["https://cloud/s/files.tar?dl=1", files]])),
      sleep,
    });

    expect(result).toEqual({ status: "restored", projectId: 1000, projectName: "42_signs" });
    expect(api.createdProjects).toEqual([
      { id: 1000, name: "42_signs", workspaceId: 3, type: "videos" },
    ]);
    expect(api.metas.get(1000)?.classes).toEqual([{ title: "car", shape: "rectangle" }]);
    expect(api.datasets).toEqual([{ id: 1001, name: "ds0", projectId: 1000 }]);
    expect(api.items).toEqual([
      { id: 1002, name: "clip.mp4", datasetId: 1001, type: "videos", data: Buffer.from("mp4") },
    ]);
    expect(api.itemAnnotations.get(1002)).toEqual(videoAnnotation);
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("restores point clouds, skipping annotations without a cloud", async () => {
    addProject("point_clouds");
    const files = await makeTar(path.join(tmpDir, "pcd"), path.join(tmpDir, "pcd.tar"), {
      "meta.json": JSON.stringify({ classes: [], tags: [] }),
      "ds0/pointcloud/scan.pcd": "pcd",
      "ds0/ann/scan.pcd.json": JSON.stringify({ objects: [], figures: [] }),
      "ds0/ann/lost.pcd.json": JSON.stringify({ objects: [], figures: [] }),
    });

    await runRestore(config(false), {
      api,
      fetchImpl: servingFetch(new Map([["https://cloud/s/files.tar?dl=1", files]])),
      sleep,
    });

    expect(api.items.map((item) => [item.name, item.type])).toEqual([["scan.pcd", "point_clouds"]]);
    expect(api.itemAnnotations.get(1002)).toEqual({ objects: [], figures: [] });
  });

  it("refuses to restore volume projects to the workspace", async () => {
    addProject("volumes");
    const files = await makeTar(path.join(tmpDir, "volumes"), path.join(tmpDir, "volumes.tar"), {
      "meta.json": "{}",
      "ds0/volume/ct.nrrd": "nrrd",
    });

    await expect(
      runRestore(config(false), {
        api,
        fetchImpl: servingFetch(new Map([["https://cloud/s/files.tar?dl=1", files]])),
        sleep,
      })
    ).rejects.toBeInstanceOf(UnsupportedProjectTypeError);
    expect(api.createdProjects).toEqual([]);
  });

  it("ends quietly when the backup link has expired", async () => {
    addProject("images", ANN_URL);

    const result = await runRestore(config(true), {
      api,
      fetchImpl: servingFetch(new Map()),
      sleep,
    });

    expect(result).toEqual({ status: "expired" });
    expect(api.outputs).toHaveLength(1);
    expect(api.outputs[0].kind).toBe("text");
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("fails when the project has no backup", async () => {
    api.projects.set(42, { id: 42, name: "signs", type: "images", workspaceId: 3 });
    api.workspaces.set(3, { id: 3, teamId: 8 });

    await expect(runRestore(config(true), { api, sleep })).rejects.toThrow(
      "Project 42 has no backup archive to restore from"
    );
  });
});
