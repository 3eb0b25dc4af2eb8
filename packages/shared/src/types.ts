import { z } from "zod";

// Project types the platform knows about
export const ProjectTypeSchema = z.enum([
  "images",
  "videos",
  "volumes",
  "point_clouds",
  "point_cloud_episodes",
]);
export type ProjectType = z.infer<typeof ProjectTypeSchema>;

// Links to the cold-storage copies of an archived project
export const BackupArchiveSchema = z.object({
  url: z.string().optional(), // files archive (shared link)
  annUrl: z.string().optional(), // annotations archive, images projects only
});
export type BackupArchive = z.infer<typeof BackupArchiveSchema>;

export const ProjectInfoSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    type: ProjectTypeSchema,
    workspaceId: z.number().int(),
    backupArchive: BackupArchiveSchema.nullish(),
  })
  .passthrough();
export type ProjectInfo = z.infer<typeof ProjectInfoSchema>;

export const WorkspaceInfoSchema = z
  .object({
    id: z.number().int(),
    name: z.string().optional(),
    teamId: z.number().int(),
  })
  .passthrough();
export type WorkspaceInfo = z.infer<typeof WorkspaceInfoSchema>;

export const TeamFileInfoSchema = z
  .object({
    id: z.number().int(),
    path: z.string(),
    fullStorageUrl: z.string().optional(),
  })
  .passthrough();
export type TeamFileInfo = z.infer<typeof TeamFileInfoSchema>;

// hash_name_map.json shipped with the annotations archive
export const HashNameMapSchema = z.object({
  datasets: z
    .array(
      z.object({
        name: z.string(),
        images: z
          .array(z.object({ name: z.string(), hash: z.string() }))
          .default([]),
      })
    )
    .default([]),
});
export type HashNameMap = z.infer<typeof HashNameMapSchema>;

// Project meta (meta.json at the project root)
export const ObjClassSchema = z
  .object({
    title: z.string(),
    shape: z.string(),
    color: z.string().optional(),
  })
  .passthrough();
export type ObjClass = z.infer<typeof ObjClassSchema>;

export const TagMetaSchema = z
  .object({
    name: z.string(),
    value_type: z.string(),
  })
  .passthrough();
export type TagMeta = z.infer<typeof TagMetaSchema>;

export const ProjectMetaSchema = z
  .object({
    classes: z.array(ObjClassSchema).default([]),
    tags: z.array(TagMetaSchema).default([]),
  })
  .passthrough();
export type ProjectMeta = z.infer<typeof ProjectMetaSchema>;

// Item annotation (<dataset>/ann/<item>.json)
export const ImageSizeSchema = z.object({
  height: z.number().int().min(0),
  width: z.number().int().min(0),
});
export type ImageSize = z.infer<typeof ImageSizeSchema>;

export const AnnotationTagSchema = z
  .object({
    name: z.string(),
    value: z.union([z.string(), z.number(), z.null()]).optional(),
  })
  .passthrough();
export type AnnotationTag = z.infer<typeof AnnotationTagSchema>;

export const AnnotationObjectSchema = z
  .object({
    classTitle: z.string(),
    geometryType: z.string().optional(),
    tags: z.array(AnnotationTagSchema).default([]),
  })
  .passthrough();
export type AnnotationObject = z.infer<typeof AnnotationObjectSchema>;

export const AnnotationSchema = z
  .object({
    size: ImageSizeSchema,
    description: z.string().default(""),
    tags: z.array(AnnotationTagSchema).default([]),
    objects: z.array(AnnotationObjectSchema).default([]),
  })
  .passthrough();
export type Annotation = z.infer<typeof AnnotationSchema>;

// Video and point cloud annotations are uploaded as stored
export const ItemAnnotationSchema = z.record(z.string(), z.unknown());
export type ItemAnnotation = z.infer<typeof ItemAnnotationSchema>;

// Task configuration resolved from CLI options and environment
export const RestoreConfigSchema = z.object({
  serverAddress: z.string().url(),
  apiToken: z.string().min(1),
  taskId: z.number().int().positive(),
  projectId: z.number().int().positive(),
  downloadMode: z.boolean().default(false),
  workDir: z.string().min(1),
});
export type RestoreConfig = z.infer<typeof RestoreConfigSchema>;

export type RestoreResult =
  | { status: "archived"; fileId: number; archiveName: string }
  | { status: "restored"; projectId: number; projectName: string }
  | { status: "expired" };
