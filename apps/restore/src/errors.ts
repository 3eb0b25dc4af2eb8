import { troubleshootingMessage } from "@archive-restore/shared";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class NotEnoughDiskSpaceError extends Error {
  constructor(message = "Not enough disk space") {
    super(message);
    this.name = "NotEnoughDiskSpaceError";
  }
}

/** Backup link expired; the task stops without failing */
export class InactivityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InactivityError";
  }
}

export class UnsupportedArchiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedArchiveError";
  }
}

export class UnsupportedProjectTypeError extends Error {
  constructor(projectType: string) {
    super(
      `Restoring "${projectType}" projects to the workspace is not supported, run the task in download mode instead`
    );
    this.name = "UnsupportedProjectTypeError";
  }
}

export class LegacyArchiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LegacyArchiveError";
  }
}

export class ApiError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(method: string, status: number, body: unknown) {
    super(`API request ${method} failed with status ${status}`);
    this.name = "ApiError";
    this.status = status;
    this.body = body;
  }
}

/**
 * User-facing failure: the message points at the troubleshooting page, the
 * original error stays available as `cause`.
 */
export class TroubleshootingError extends Error {
  constructor(cause: unknown) {
    super(troubleshootingMessage(), { cause });
    this.name = "TroubleshootingError";
  }
}

export function withTroubleshootingLink(error: unknown): TroubleshootingError {
  if (error instanceof TroubleshootingError) return error;
  return new TroubleshootingError(error);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
