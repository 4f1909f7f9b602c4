/**
 * Sync error with type information
 */

export const SyncErrorType = {
  NETWORK: "network",
  UNAUTHORIZED: "unauthorized",
  NOT_FOUND: "not_found",
  INVALID_DATA: "invalid_data",
  STORAGE: "storage",
  UNKNOWN: "unknown",
} as const;

export type SyncErrorType = (typeof SyncErrorType)[keyof typeof SyncErrorType];

export class SyncError extends Error {
  public type: SyncErrorType;
  public retryable: boolean;

  constructor(message: string, type: SyncErrorType, retryable: boolean = false) {
    super(message);
    this.name = "SyncError";
    this.type = type;
    this.retryable = retryable;
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Human-readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Whether a failure should stop a whole pass rather than a single record.
 */
export function isFatalTransferError(error: unknown): boolean {
  return isSyncError(error) && error.type === SyncErrorType.UNAUTHORIZED;
}
