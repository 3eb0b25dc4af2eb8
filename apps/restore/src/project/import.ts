import { createHash } from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";
import {
  AnnotationSchema,
  ItemAnnotationSchema,
  type Annotation,
  type ItemAnnotation,
  type ProjectMeta,
  type ProjectType,
} from "@archive-restore/shared";
import type { CreatedEntity, ItemProjectType, PlatformApi } from "../api/types.js";
import { UnsupportedProjectTypeError } from "../errors.js";
import { cleanupImageProject, readProjectMeta } from "../shapes/index.js";
import { exists, listDatasets } from "./datasets.js";

const UPLOAD_BATCH_SIZE = 50;

/** Folder holding a dataset's item files, per project type */
const ITEM_DIRS: Record<ItemProjectType, string> = {
  videos: "video",
  point_clouds: "pointcloud",
};

export type ImportTarget = {
  api: PlatformApi;
  workspaceId: number;
  projectType: ProjectType;
  projectDir: string;
};

/** Content hash the platform stores images under */
export function imageHash(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("base64");
}

function isItemProjectType(type: ProjectType): type is ItemProjectType {
  return type === "videos" || type === "point_clouds";
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) batches.push(items.slice(i, i + size));
  return batches;
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fsp.readFile(filePath, "utf8"));
}

async function uploadImageDataset(
  api: PlatformApi,
  datasetId: number,
  dir: string,
  items: string[]
): Promise<number> {
  let uploaded = 0;
  for (const batch of chunk(items, UPLOAD_BATCH_SIZE)) {
    const files: Array<{ name: string; hash: string; data: Buffer; annotation: Annotation }> = [];
    for (const item of batch) {
      const data = await fsp.readFile(path.join(dir, "img", item));
      files.push({
        name: item,
        hash: imageHash(data),
        data,
        annotation: AnnotationSchema.parse(await readJson(path.join(dir, "ann", `${item}.json`))),
      });
    }

    await api.uploadImages(files.map((file) => ({ hash: file.hash, data: file.data })));
    const created: CreatedEntity[] = await api.addImages(
      datasetId,
      files.map((file) => ({ name: file.name, hash: file.hash }))
    );
    await api.addAnnotations(
      datasetId,
      created.map((image, idx) => ({ imageId: image.id, annotation: files[idx].annotation }))
    );
    uploaded += created.length;
  }
  return uploaded;
}

async function uploadItemDataset(
  api: PlatformApi,
  type: ItemProjectType,
  datasetId: number,
  dir: string,
  items: string[]
): Promise<number> {
  let uploaded = 0;
  for (const batch of chunk(items, UPLOAD_BATCH_SIZE)) {
    const created = await api.uploadItems(
      type,
      datasetId,
      batch.map((item) => ({ name: item, path: path.join(dir, ITEM_DIRS[type], item) }))
    );
    const annotations: { itemId: number; annotation: ItemAnnotation }[] = [];
    for (const [idx, entity] of created.entries()) {
      const annPath = path.join(dir, "ann", `${batch[idx]}.json`);
      annotations.push({
        itemId: entity.id,
        annotation: ItemAnnotationSchema.parse(await readJson(annPath)),
      });
    }
    await api.addItemAnnotations(type, datasetId, annotations);
    uploaded += created.length;
  }

  if (await exists(path.join(dir, "related_images"))) {
    console.warn(`[import] Related images in ${dir} are not restored`);
  }
  return uploaded;
}

/**
 * Upload a restored project directory into the workspace as a new project
 * named after the directory, then delete the directory. Images, videos and
 * point clouds are supported.
 */
export async function importProject(target: ImportTarget): Promise<CreatedEntity> {
  const { api, workspaceId, projectType, projectDir } = target;
  if (projectType !== "images" && !isItemProjectType(projectType)) {
    throw new UnsupportedProjectTypeError(projectType);
  }

  const projectName = path.basename(path.normalize(projectDir));
  console.log(`[import] Uploading project with name [${projectName}] to instance`);

  const meta: ProjectMeta =
    projectType === "images"
      ? await cleanupImageProject(projectDir)
      : await readProjectMeta(projectDir);
  const project = await api.createProject(workspaceId, projectName, projectType);
  await api.updateProjectMeta(project.id, meta);

  const itemDir = projectType === "images" ? "img" : ITEM_DIRS[projectType];
  for (const dataset of await listDatasets(projectDir, itemDir)) {
    const created = await api.createDataset(project.id, dataset.name);
    const uploaded =
      projectType === "images"
        ? await uploadImageDataset(api, created.id, dataset.dir, dataset.items)
        : await uploadItemDataset(api, projectType, created.id, dataset.dir, dataset.items);
    console.log(`[import] Dataset '${dataset.name}': ${uploaded} item(s) uploaded`);
  }

  await fsp.rm(projectDir, { recursive: true, force: true });
  console.log("[import] ✅ Project successfully restored");
  return project;
}
