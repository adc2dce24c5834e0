import type { OperationError } from '@filework/shared';

export class InvalidRequestError extends Error {
  readonly code = 'INVALID_REQUEST';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class FileOperationError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
    this.name = 'FileOperationError';
  }
}

export class ArchiveError extends Error {
  readonly code = 'MALFORMED_ARCHIVE';

  constructor(message: string) {
    super(message);
    this.name = 'ArchiveError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toOperationError(path: string, error: unknown): OperationError {
  const code = errorCode(error);
  return code ? { path, message: errorMessage(error), code } : { path, message: errorMessage(error) };
}
