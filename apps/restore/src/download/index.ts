import fsp from "node:fs/promises";
import path from "node:path";
import { RECOVERY_LINK, type ProjectInfo } from "@archive-restore/shared";
import type { FetchLike, PlatformApi } from "../api/types.js";
import { InactivityError, withTroubleshootingLink } from "../errors.js";
import { Progress } from "../progress.js";
import type { RestorePaths } from "../project/paths.js";

export const ACCEPTED_CONTENT_TYPES = [
  "application/binary",
  "application/zip",
  "application/x-tar",
];

export const INACTIVITY_TITLE =
  "The access to your project backup has expired due to inactivity.";

const INITIAL_TIMEOUT_MS = 10_000;
const TIMEOUT_STEP_MS = 10_000;
const MAX_TIMEOUT_MS = 90_000;
const MAX_REQUEST_RETRIES = 8;
const MAX_OTHER_ATTEMPTS = 3;

export type DownloadContext = {
  api: PlatformApi;
  taskId: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

/** Transport-level failure: retried with back-off until the link is deemed expired. */
class RequestFailure extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RequestFailure";
  }
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export function toDirectLink(sharedLink: string): string {
  return sharedLink.replace("dl=0", "dl=1");
}

export function retryDelayMs(attempt: number): number {
  return attempt <= 4 ? 5_000 : 10_000;
}

/** Request timeout after one more failure: +10 s while below 90 s. */
export function nextTimeoutMs(current: number): number {
  return current < MAX_TIMEOUT_MS ? current + TIMEOUT_STEP_MS : current;
}

export async function reportInactivity(api: PlatformApi, taskId: number): Promise<never> {
  console.warn("[download] Downloading has failed: data access expired due to inactivity.");
  await api.setOutputText(taskId, INACTIVITY_TITLE, {
    description: `More info: ${RECOVERY_LINK}`,
    icon: "zmdi-alert-triangle",
    iconColor: "#f5a040",
    backgroundColor: "#ffdeb9",
  });
  throw new InactivityError(INACTIVITY_TITLE);
}

function contentTypeOf(res: Response): string {
  return (res.headers.get("content-type") ?? "").split(";")[0].trim().toLowerCase();
}

async function openStream(
  fetchImpl: FetchLike,
  url: string,
  offset: number,
  timeoutMs: number
): Promise<{ res: Response; controller: AbortController }> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  let res: Response;
  try {
    res = await fetchImpl(url, {
      headers: { Range: `bytes=${offset}-` },
      signal: controller.signal,
    });
  } catch (err) {
    throw new RequestFailure(`Request failed: ${String(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }

  const contentType = contentTypeOf(res);
  if (res.status !== 206 && !ACCEPTED_CONTENT_TYPES.includes(contentType)) {
    await res.body?.cancel().catch(() => undefined);
    const msg = `Status code: ${res.status}, content type: ${contentType || "none"}.`;
    console.warn(`[download] ${msg}`);
    throw new RequestFailure(msg);
  }
  return { res, controller };
}

/**
 * Download a backup archive from a shared cloud link, appending to
 * `destination` and resuming from its current size after each failure.
 */
export async function downloadFile(
  sharedLink: string,
  destination: string,
  label: string,
  ctx: DownloadContext
): Promise<void> {
  const fetchImpl = ctx.fetchImpl ?? fetch;
  const sleep = ctx.sleep ?? defaultSleep;
  const url = toDirectLink(sharedLink);
  console.log(`[download] Started downloading backup ${label}`);
  await fsp.mkdir(path.dirname(destination), { recursive: true });

  let attempt = 0;
  let timeoutMs = INITIAL_TIMEOUT_MS;
  let progress: Progress | null = null;

  for (;;) {
    try {
      const handle = await fsp.open(destination, "a");
      try {
        const offset = (await handle.stat()).size;
        const { res, controller } = await openStream(fetchImpl, url, offset, timeoutMs);
        if (!progress) {
          const total = Number(res.headers.get("content-length") ?? 0);
          progress = new Progress(`Downloading backup ${label}`, Number.isFinite(total) ? total : 0);
        }
        const reporter = progress;
        console.debug("[download] Connection established");
        if (res.body) {
          const reader = res.body.getReader();
          // idle timeout between chunks, like a socket read timeout
          let idle = setTimeout(() => controller.abort(), timeoutMs);
          try {
            for (;;) {
              const next = await reader.read().catch((err: unknown) => {
                throw new RequestFailure(`Connection lost: ${String(err)}`, { cause: err });
              });
              if (next.done) break;
              const value: Uint8Array = next.value;
              if (value.length === 0) continue;
              clearTimeout(idle);
              attempt = 0;
              await handle.write(value);
              reporter.update(value.length);
              idle = setTimeout(() => controller.abort(), timeoutMs);
            }
          } finally {
            clearTimeout(idle);
          }
        }
      } finally {
        await handle.close();
      }
      console.debug(`[download] ${label.charAt(0).toUpperCase()}${label.slice(1)} downloaded successfully`);
      return;
    } catch (err) {
      attempt += 1;
      if (err instanceof RequestFailure) {
        timeoutMs = nextTimeoutMs(timeoutMs);
        if (attempt > MAX_REQUEST_RETRIES) {
          await reportInactivity(ctx.api, ctx.taskId);
        }
        console.warn(
          `[download] Downloading request error, please wait ... Retrying (${attempt}/${MAX_REQUEST_RETRIES})`
        );
        await sleep(retryDelayMs(attempt));
      } else {
        if (attempt >= MAX_OTHER_ATTEMPTS) throw withTroubleshootingLink(err);
        console.warn(
          `[download] Error: ${err instanceof Error ? err.message : String(err)}. Retrying (${attempt}/${MAX_OTHER_ATTEMPTS - 1})`
        );
      }
    }
  }
}

export async function downloadBackup(
  projectInfo: ProjectInfo,
  paths: RestorePaths,
  ctx: DownloadContext
): Promise<void> {
  const filesUrl = projectInfo.backupArchive?.url;
  const annotationsUrl = projectInfo.backupArchive?.annUrl;

  if (filesUrl) {
    await downloadFile(filesUrl, paths.filesArchivePath, "files", ctx);
  }
  if (annotationsUrl) {
    await downloadFile(annotationsUrl, paths.annotationsArchivePath, "annotations", ctx);
  }
}
