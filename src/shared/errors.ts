/**
 * Error types raised by the helpers. Anything else thrown from the
 * filesystem is left as-is and treated as fatal by the CLIs.
 */

/** A zip artifact that cannot be read or extracted. Always fatal. */
export class CorruptArchiveError extends Error {
  readonly archivePath: string;

  constructor(archivePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
    super(`Cannot extract archive ${archivePath}: ${detail}`, { cause });
    this.name = "CorruptArchiveError";
    this.archivePath = archivePath;
  }
}

/** Missing or malformed environment configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Non-success response from the release-hosting API. */
export class ReleaseApiError extends Error {
  readonly statusCode: number;

  constructor(method: string, endpoint: string, statusCode: number, detail: string) {
    super(`GitHub API ${method} ${endpoint} failed: ${statusCode} – ${detail}`);
    this.name = "ReleaseApiError";
    this.statusCode = statusCode;
  }
}
