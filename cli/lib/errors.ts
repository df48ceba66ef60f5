/**
 * Error types shared by the maintenance commands
 */

export type MaintenanceErrorCode =
  | 'DIRECTORY_NOT_FOUND'
  | 'FILE_NOT_FOUND'
  | 'PACK_PARSE_FAILED'
  | 'CONFIG_INVALID'
  | 'TOKEN_MISSING';

/**
 * Fatal error that aborts a whole run (missing input, unreadable pack, bad config)
 */
export class MaintenanceError extends Error {
  constructor(
    message: string,
    public readonly code: MaintenanceErrorCode,
    public readonly path?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'MaintenanceError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
