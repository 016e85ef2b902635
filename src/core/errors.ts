// src/core/errors.ts
import type { ClassifiedLink, FetchOutcome } from './types/index.js';

export enum ErrorCode {
  TRANSPORT_ERROR = 'transport_error',
  TIMEOUT = 'timeout',
  ACCESS_DENIED = 'access_denied',
  STORAGE_ERROR = 'storage_error',
  INVALID_LINK = 'invalid_link',
  PLATFORM_UNAVAILABLE = 'platform_unavailable',
  ABORTED = 'aborted',
  INVALID_CONFIG = 'invalid_config',
  UNKNOWN = 'unknown',
}

export class ScrapeError extends Error {
  code: ErrorCode;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScrapeError';
    this.code = code;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toScrapeError(error: unknown, fallback: ErrorCode): ScrapeError {
  if (error instanceof ScrapeError) {
    return error;
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new ScrapeError(
      error.name === 'TimeoutError' ? ErrorCode.TIMEOUT : ErrorCode.ABORTED,
      error.message
    );
  }
  return new ScrapeError(fallback, errorMessage(error));
}

export function createFailedOutcome(
  link: ClassifiedLink,
  error: ScrapeError,
  folder?: string
): FetchOutcome {
  return {
    link: link.rawUrl,
    kind: link.kind,
    status: 'failed',
    folder,
    files: 0,
    failedFiles: 0,
    error: {
      code: error.code,
      message: error.message,
    },
  };
}
