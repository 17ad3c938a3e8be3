/**
 * Error kinds raised by the organizer core.
 *
 * DirectoryNotFoundError, WatchStartError and ConfigValidationError abort the
 * requested operation. The per-file kinds (DirectoryCreationError,
 * MoveExecutionError, NameResolutionError) are recorded against a single file
 * and never stop a batch or a watch.
 */

export type OrganizerErrorCode =
  | 'DIRECTORY_NOT_FOUND'
  | 'DIRECTORY_CREATION'
  | 'MOVE_EXECUTION'
  | 'NAME_RESOLUTION'
  | 'WATCH_START'
  | 'CONFIG_VALIDATION'

export class OrganizerError extends Error {
  constructor (
    message: string,
    public readonly code: OrganizerErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'OrganizerError';
  }
}

export class DirectoryNotFoundError extends OrganizerError {
  constructor (public readonly directory: string, reason: string = 'Directory does not exist', cause?: unknown) {
    super(`${reason}: ${directory}`, 'DIRECTORY_NOT_FOUND', cause);
    this.name = 'DirectoryNotFoundError';
  }
}

export class DirectoryCreationError extends OrganizerError {
  constructor (public readonly directory: string, cause: unknown) {
    super(`Cannot create directory ${directory}: ${describeError(cause)}`, 'DIRECTORY_CREATION', cause);
    this.name = 'DirectoryCreationError';
  }
}

export class MoveExecutionError extends OrganizerError {
  constructor (
    public readonly source: string,
    public readonly destination: string,
    cause: unknown
  ) {
    super(`Cannot move ${source} to ${destination}: ${describeError(cause)}`, 'MOVE_EXECUTION', cause);
    this.name = 'MoveExecutionError';
  }
}

export class NameResolutionError extends OrganizerError {
  constructor (public readonly source: string, public readonly attempts: number) {
    super(`No free destination name for ${source}: the name and ${attempts} numbered alternatives are taken`, 'NAME_RESOLUTION');
    this.name = 'NameResolutionError';
  }
}

export class WatchStartError extends OrganizerError {
  constructor (public readonly directory: string, cause: unknown) {
    super(`Cannot watch ${directory}: ${describeError(cause)}`, 'WATCH_START', cause);
    this.name = 'WatchStartError';
  }
}

export class ConfigValidationError extends OrganizerError {
  constructor (public readonly errors: string[]) {
    super(`Invalid config:\n• ${errors.join('\n• ')}`, 'CONFIG_VALIDATION');
    this.name = 'ConfigValidationError';
  }
}

export type MoveError = DirectoryCreationError | MoveExecutionError | NameResolutionError

// Errors raised by Node built-ins can come from another realm (Jest sandboxes,
// worker threads), so these helpers check shape rather than `instanceof`.
export function describeError (error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function errorCode (error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
