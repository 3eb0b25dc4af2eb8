import fsp from "node:fs/promises";
import path from "node:path";
import { imageSize } from "image-size";
import {
  AnnotationObjectSchema,
  AnnotationSchema,
  AnnotationTagSchema,
  ImageSizeSchema,
  ProjectMetaSchema,
  type Annotation,
  type AnnotationObject,
  type AnnotationTag,
  type ProjectMeta,
} from "@archive-restore/shared";
import { listDatasets } from "../project/datasets.js";

/** Shapes the platform no longer accepts for image projects */
export const UNSUPPORTED_SHAPES = new Set(["cuboid"]);

type MetaIndex = {
  classes: Set<string>;
  tags: Set<string>;
};

function indexMeta(meta: ProjectMeta): MetaIndex {
  return {
    classes: new Set(meta.classes.map((cls) => cls.title)),
    tags: new Set(meta.tags.map((tag) => tag.name)),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkTags(tags: AnnotationTag[], index: MetaIndex) {
  for (const tag of tags) {
    if (!index.tags.has(tag.name)) throw new Error(`Tag "${tag.name}" is not in project meta`);
  }
}

function checkObject(obj: AnnotationObject, index: MetaIndex) {
  if (!index.classes.has(obj.classTitle)) {
    throw new Error(`Class "${obj.classTitle}" is not in project meta`);
  }
  checkTags(obj.tags, index);
}

/** Split meta classes into kept ones and removed unsupported ones. */
export function removeUnsupportedClasses(meta: ProjectMeta): {
  meta: ProjectMeta;
  keepClasses: Set<string>;
} {
  const keepClasses = new Set<string>();
  const classes = meta.classes.filter((cls) => {
    if (!UNSUPPORTED_SHAPES.has(cls.shape)) {
      keepClasses.add(cls.title);
      return true;
    }
    console.warn(
      `[shapes] Class ${cls.title} has unsupported geometry type ${cls.shape}. Class will be removed from meta and all annotations.`
    );
    return false;
  });
  return { meta: { ...meta, classes }, keepClasses };
}

/** Load an annotation that must fully agree with `meta`, keeping only `keepClasses` objects. */
export function loadAnnotation(
  json: unknown,
  meta: ProjectMeta,
  keepClasses: Set<string>
): Annotation {
  const index = indexMeta(meta);
  const ann = AnnotationSchema.parse(json);
  checkTags(ann.tags, index);
  for (const obj of ann.objects) checkObject(obj, index);
  return { ...ann, objects: ann.objects.filter((obj) => keepClasses.has(obj.classTitle)) };
}

/**
 * Salvage what is valid from an annotation that failed to load: the image
 * size is required, objects and tags that do not validate are dropped.
 */
export function rebuildBrokenAnnotation(
  json: unknown,
  meta: ProjectMeta,
  keepClasses: Set<string>,
  annName: string
): Annotation {
  const index = indexMeta(meta);
  const raw = isRecord(json) ? json : {};
  const size = ImageSizeSchema.safeParse(raw.size);
  if (!size.success) {
    throw new Error(`Image size is not found in annotation: ${annName}`);
  }

  const objects: AnnotationObject[] = [];
  for (const candidate of Array.isArray(raw.objects) ? raw.objects : []) {
    if (!isRecord(candidate) || typeof candidate.classTitle !== "string") continue;
    if (!keepClasses.has(candidate.classTitle)) continue;
    try {
      const obj = AnnotationObjectSchema.parse(candidate);
      checkObject(obj, index);
      objects.push(obj);
    } catch (err) {
      console.warn(`[shapes] Skipping invalid object: ${String(err)}`, { annName });
    }
  }

  const tags: AnnotationTag[] = [];
  for (const candidate of Array.isArray(raw.tags) ? raw.tags : []) {
    try {
      const tag = AnnotationTagSchema.parse(candidate);
      checkTags([tag], index);
      tags.push(tag);
    } catch (err) {
      console.error(`[shapes] Skipping invalid tag: ${String(err)}`, { annName });
    }
  }

  return {
    size: size.data,
    description: typeof raw.description === "string" ? raw.description : "",
    tags,
    objects,
  };
}

export async function emptyAnnotation(imagePath: string): Promise<Annotation> {
  const dimensions = imageSize(await fsp.readFile(imagePath));
  if (dimensions.width === undefined || dimensions.height === undefined) {
    throw new Error(`Cannot read image dimensions: ${imagePath}`);
  }
  return {
    size: { height: dimensions.height, width: dimensions.width },
    description: "",
    tags: [],
    objects: [],
  };
}

export async function readProjectMeta(projectDir: string): Promise<ProjectMeta> {
  const raw = await fsp.readFile(path.join(projectDir, "meta.json"), "utf8");
  return ProjectMetaSchema.parse(JSON.parse(raw));
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fsp.readFile(filePath, "utf8"));
}

/**
 * Drop unsupported shape classes from an image project on disk and repair
 * annotations the platform would reject.
 */
export async function cleanupImageProject(projectDir: string): Promise<ProjectMeta> {
  const originalMeta = await readProjectMeta(projectDir);
  const { meta, keepClasses } = removeUnsupportedClasses(originalMeta);

  for (const dataset of await listDatasets(projectDir)) {
    for (const item of dataset.items) {
      const annPath = path.join(dataset.dir, "ann", `${item}.json`);
      let ann: Annotation;
      let json: unknown = null;
      try {
        json = await readJson(annPath);
        ann = loadAnnotation(json, originalMeta, keepClasses);
      } catch (loadErr) {
        console.debug(`[shapes] Rebuilding annotation ${annPath}: ${String(loadErr)}`);
        try {
          ann = rebuildBrokenAnnotation(json, originalMeta, keepClasses, path.basename(annPath));
        } catch (err) {
          console.error(`[shapes] Annotation file is broken. ${String(err)}. Skipping it.`, {
            annPath,
          });
          ann = await emptyAnnotation(path.join(dataset.dir, "img", item));
        }
      }
      await fsp.writeFile(annPath, JSON.stringify(ann));
    }
  }

  await fsp.writeFile(path.join(projectDir, "meta.json"), JSON.stringify(meta));
  return meta;
}
