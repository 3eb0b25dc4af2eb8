import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  ProjectInfoSchema,
  TeamFileInfoSchema,
  WorkspaceInfoSchema,
  type Annotation,
  type ItemAnnotation,
  type ProjectInfo,
  type ProjectMeta,
  type ProjectType,
  type TeamFileInfo,
  type WorkspaceInfo,
} from "@archive-restore/shared";
import { ApiError } from "../errors.js";
import { getBoundary, getDispositionName, parseMultipart } from "./multipart.js";
import type {
  CreatedEntity,
  FetchLike,
  ImageUpload,
  ItemProjectType,
  ItemUpload,
  OutputTextOptions,
  PlatformApi,
  UploadProgress,
} from "./types.js";

export type HttpPlatformApiOptions = {
  serverAddress: string;
  apiToken: string;
  fetchImpl?: FetchLike;
};

const CreatedEntitySchema = z
  .object({ id: z.number().int(), name: z.string().optional(), title: z.string().optional() })
  .passthrough();

const ITEM_METHODS: Record<ItemProjectType, { upload: string; annotations: string }> = {
  videos: { upload: "videos.bulk.upload", annotations: "videos.annotations.bulk.add" },
  point_clouds: {
    upload: "point-clouds.bulk.upload",
    annotations: "point-clouds.annotations.bulk.add",
  },
};

function toCreated(raw: unknown, fallbackName: string): CreatedEntity {
  const parsed = CreatedEntitySchema.parse(raw);
  return { id: parsed.id, name: parsed.name ?? parsed.title ?? fallbackName };
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class HttpPlatformApi implements PlatformApi {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpPlatformApiOptions) {
    this.baseUrl = options.serverAddress.replace(/\/+$/, "");
    this.apiToken = options.apiToken;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private url(method: string): string {
    return `${this.baseUrl}/public/api/v3/${method}`;
  }

  private async send(method: string, init: RequestInit): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set("x-api-key", this.apiToken);
    const res = await this.fetchImpl(this.url(method), { ...init, headers });
    if (!res.ok) {
      throw new ApiError(method, res.status, await readBody(res));
    }
    return res;
  }

  async post(method: string, body: unknown): Promise<unknown> {
    const res = await this.send(method, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    return readBody(res);
  }

  async getProjectInfo(id: number): Promise<ProjectInfo> {
    return ProjectInfoSchema.parse(await this.post("projects.info", { id }));
  }

  async getWorkspaceInfo(id: number): Promise<WorkspaceInfo> {
    return WorkspaceInfoSchema.parse(await this.post("workspaces.info", { id }));
  }

  async downloadImagesByHashes(hashes: string[], paths: string[]): Promise<void> {
    if (hashes.length !== paths.length) {
      throw new Error("Hashes and destination paths must have the same length");
    }
    if (hashes.length === 0) return;

    const res = await this.send("images.bulk.download-by-hash", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ hashes }),
    });
    const boundary = getBoundary(res.headers.get("content-type"));
    if (!boundary) {
      throw new Error("images.bulk.download-by-hash returned a non-multipart response");
    }

    const destinations = new Map<string, string[]>();
    hashes.forEach((hash, idx) => {
      const list = destinations.get(hash) ?? [];
      list.push(paths[idx]);
      destinations.set(hash, list);
    });

    const body = Buffer.from(await res.arrayBuffer());
    for (const part of parseMultipart(body, boundary)) {
      const hash = getDispositionName(part.headers);
      if (!hash) continue;
      for (const target of destinations.get(hash) ?? []) {
        await fsp.mkdir(path.dirname(target), { recursive: true });
        await fsp.writeFile(target, part.data);
      }
    }
  }

  async uploadTeamFile(
    teamId: number,
    localPath: string,
    remotePath: string,
    onProgress?: UploadProgress
  ): Promise<TeamFileInfo> {
    const boundary = `----restore-${randomUUID()}`;
    const total = (await fsp.stat(localPath)).size;
    const head = Buffer.from(
      `--${boundary}\r\n` +
        `Content-Disposition: form-data; name="path"\r\n\r\n${remotePath}\r\n` +
        `--${boundary}\r\n` +
        `Content-Disposition: form-data; name="file"; filename="${path.basename(localPath)}"\r\n` +
        `Content-Type: application/octet-stream\r\n\r\n`
    );
    const tail = Buffer.from(`\r\n--${boundary}--\r\n`);

    async function* body(): AsyncGenerator<Uint8Array> {
      yield head;
      let sent = 0;
      for await (const chunk of fs.createReadStream(localPath)) {
        const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        sent += bytes.length;
        onProgress?.(sent, total);
        yield bytes;
      }
      yield tail;
    }

    const res = await this.send(`file-storage.upload?teamId=${teamId}`, {
      method: "POST",
      headers: { "Content-Type": `multipart/form-data; boundary=${boundary}` },
      body: body(),
      duplex: "half",
    });
    const data = await readBody(res);
    const info = Array.isArray(data) ? data[0] : data;
    return TeamFileInfoSchema.parse(info);
  }

  async setOutputArchive(taskId: number, file: TeamFileInfo, fileName: string): Promise<void> {
    await this.post("tasks.output.set", {
      taskId,
      output: {
        general: {
          icon: {
            className: "zmdi zmdi-archive",
            color: "#33c94c",
            backgroundColor: "#d9f7e4",
          },
          title: fileName,
          titleUrl: file.fullStorageUrl ?? file.path,
          download: true,
          isDir: false,
          description: "File",
        },
      },
    });
  }

  async setOutputText(
    taskId: number,
    title: string,
    options: OutputTextOptions = {}
  ): Promise<void> {
    await this.post("tasks.output.set", {
      taskId,
      output: {
        general: {
          icon: {
            className: `zmdi ${options.icon ?? "zmdi-info"}`,
            color: options.iconColor ?? "#33c94c",
            backgroundColor: options.backgroundColor ?? "#d9f7e4",
          },
          title,
          description: options.description ?? "",
        },
      },
    });
  }

  async createProject(
    workspaceId: number,
    name: string,
    type: ProjectType
  ): Promise<CreatedEntity> {
    const data = await this.post("projects.add", {
      workspaceId,
      title: name,
      type,
      description: "",
      changeTitleIfExists: true,
    });
    return toCreated(data, name);
  }

  async updateProjectMeta(projectId: number, meta: ProjectMeta): Promise<void> {
    await this.post("projects.meta.update", { id: projectId, meta });
  }

  async createDataset(projectId: number, name: string): Promise<CreatedEntity> {
    const data = await this.post("datasets.add", {
      projectId,
      name,
      description: "",
      changeNameIfConflict: true,
    });
    return toCreated(data, name);
  }

  async uploadImages(images: ImageUpload[]): Promise<void> {
    if (images.length === 0) return;
    const form = new FormData();
    for (const image of images) {
      form.append(image.hash, new Blob([image.data]));
    }
    await this.send("images.bulk.upload", { method: "POST", body: form });
  }

  async addImages(
    datasetId: number,
    images: { name: string; hash: string }[]
  ): Promise<CreatedEntity[]> {
    const data = await this.post("images.bulk.add", {
      datasetId,
      images: images.map((image) => ({ title: image.name, hash: image.hash })),
    });
    const list = z.array(z.unknown()).parse(data);
    return list.map((item, idx) => toCreated(item, images[idx]?.name ?? ""));
  }

  async addAnnotations(
    datasetId: number,
    annotations: { imageId: number; annotation: Annotation }[]
  ): Promise<void> {
    if (annotations.length === 0) return;
    await this.post("annotations.bulk.add", { datasetId, annotations });
  }

  async uploadItems(
    type: ItemProjectType,
    datasetId: number,
    items: ItemUpload[]
  ): Promise<CreatedEntity[]> {
    if (items.length === 0) return [];
    const form = new FormData();
    form.append("datasetId", String(datasetId));
    for (const item of items) {
      form.append("file", new Blob([await fsp.readFile(item.path)]), item.name);
    }
    const method = ITEM_METHODS[type].upload;
    const data = await readBody(await this.send(method, { method: "POST", body: form }));
    const list = z.array(z.unknown()).parse(data);
    return list.map((entry, idx) => toCreated(entry, items[idx]?.name ?? ""));
  }

  async addItemAnnotations(
    type: ItemProjectType,
    datasetId: number,
    annotations: { itemId: number; annotation: ItemAnnotation }[]
  ): Promise<void> {
    if (annotations.length === 0) return;
    await this.post(ITEM_METHODS[type].annotations, {
      datasetId,
      annotations: annotations.map((item) => ({
        entityId: item.itemId,
        annotation: item.annotation,
      })),
    });
  }
}
