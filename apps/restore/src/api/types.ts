import type {
  Annotation,
  ItemAnnotation,
  ProjectInfo,
  ProjectMeta,
  ProjectType,
  TeamFileInfo,
  WorkspaceInfo,
} from "@archive-restore/shared";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type UploadProgress = (sentBytes: number, totalBytes: number) => void;

export type OutputTextOptions = {
  description?: string;
  icon?: string;
  iconColor?: string;
  backgroundColor?: string;
};

export type CreatedEntity = { id: number; name: string };

export type ImageUpload = { hash: string; data: Uint8Array };

/** Project types whose items are uploaded as files rather than by hash */
export type ItemProjectType = "videos" | "point_clouds";

export type ItemUpload = { name: string; path: string };

/** Platform calls the restore task depends on. */
export interface PlatformApi {
  getProjectInfo(id: number): Promise<ProjectInfo>;
  getWorkspaceInfo(id: number): Promise<WorkspaceInfo>;
  /** Writes each hash's image to the path at the same index. */
  downloadImagesByHashes(hashes: string[], paths: string[]): Promise<void>;
  uploadTeamFile(
    teamId: number,
    localPath: string,
    remotePath: string,
    onProgress?: UploadProgress
  ): Promise<TeamFileInfo>;
  setOutputArchive(taskId: number, file: TeamFileInfo, fileName: string): Promise<void>;
  setOutputText(taskId: number, title: string, options?: OutputTextOptions): Promise<void>;
  createProject(workspaceId: number, name: string, type: ProjectType): Promise<CreatedEntity>;
  updateProjectMeta(projectId: number, meta: ProjectMeta): Promise<void>;
  createDataset(projectId: number, name: string): Promise<CreatedEntity>;
  uploadImages(images: ImageUpload[]): Promise<void>;
  addImages(
    datasetId: number,
    images: { name: string; hash: string }[]
  ): Promise<CreatedEntity[]>;
  addAnnotations(
    datasetId: number,
    annotations: { imageId: number; annotation: Annotation }[]
  ): Promise<void>;
  /** Uploads video or point cloud files into a dataset, in order. */
  uploadItems(
    type: ItemProjectType,
    datasetId: number,
    items: ItemUpload[]
  ): Promise<CreatedEntity[]>;
  addItemAnnotations(
    type: ItemProjectType,
    datasetId: number,
    annotations: { itemId: number; annotation: ItemAnnotation }[]
  ): Promise<void>;
}
