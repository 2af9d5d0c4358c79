/**
 * Typed failures for package synchronization.
 *
 * Per-package failures are returned as values and folded into run counters;
 * only setup-level failures are thrown out of a workflow.
 */

export type ErrorKind =
  | 'link-extraction'
  | 'not-found'
  | 'transport'
  | 'size-limit-exceeded'
  | 'config-parse'
  | 'missing-tool'
  | 'precondition'
  | 'export-failed'
  | 'upload-failed';

export class PackageSyncError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

export class LinkExtractionError extends PackageSyncError {
  constructor(link: string) {
    super('link-extraction', `Could not extract file ID from URL: ${link}`, { link });
  }
}

export class NotFoundError extends PackageSyncError {
  constructor(url: string) {
    super('not-found', `File not found (404): ${url}`, { url });
  }
}

export class TransportError extends PackageSyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('transport', message, details);
  }
}

export class SizeLimitExceededError extends PackageSyncError {
  /** `sizeBytes` is `null` when the transfer was cut off before the full size was known. */
  constructor(sizeBytes: number | null, maxSizeBytes: number) {
    super(
      'size-limit-exceeded',
      sizeBytes === null
        ? `File too large: exceeds the ${maxSizeBytes} byte limit`
        : `File too large: ${sizeBytes} bytes exceeds the ${maxSizeBytes} byte limit`,
      { sizeBytes, maxSizeBytes },
    );
  }
}

export class ConfigParseError extends PackageSyncError {
  constructor(path: string, reason: string) {
    super('config-parse', `Invalid ledger file ${path}: ${reason}`, { path });
  }
}

export class MissingToolError extends PackageSyncError {
  constructor(tool: string, hint?: string) {
    super('missing-tool', hint ? `${tool} not found. ${hint}` : `${tool} not found`, { tool });
  }
}

export class PreconditionError extends PackageSyncError {
  constructor(message: string) {
    super('precondition', message);
  }
}

export class ExportFailedError extends PackageSyncError {
  constructor(packageName: string, reason: string) {
    super('export-failed', `Export failed for ${packageName}: ${reason}`, { packageName });
  }
}

export class UploadFailedError extends PackageSyncError {
  constructor(fileName: string, reason: string) {
    super('upload-failed', `Upload failed for ${fileName}: ${reason}`, { fileName });
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
