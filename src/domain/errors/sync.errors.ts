/**
 * Error taxonomy for a sync run.
 *
 * Only configuration and authentication failures abort a run. Remote and store
 * failures are turned into a failed document outcome by the component that
 * observed them.
 */
export enum SyncErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  AUTH_FAILED = 'AUTH_FAILED',
  REMOTE_REQUEST_FAILED = 'REMOTE_REQUEST_FAILED',
  ASSET_UPLOAD_FAILED = 'ASSET_UPLOAD_FAILED',
}

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid settings. Raised before any remote call.
 */
export class ConfigError extends SyncError {
  readonly code = SyncErrorCode.CONFIG_INVALID;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/**
 * Session credential could not be issued.
 */
export class AuthError extends SyncError {
  readonly code = SyncErrorCode.AUTH_FAILED;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A task API call failed (non-2xx response or transport failure).
 */
export class RemoteError extends SyncError {
  readonly code = SyncErrorCode.REMOTE_REQUEST_FAILED;

  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The asset store rejected an upload or could not be reached.
 */
export class StoreError extends SyncError {
  readonly code = SyncErrorCode.ASSET_UPLOAD_FAILED;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  // SDKs such as Cloudinary's reject with plain `{ message, http_code }` objects
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error';
}
