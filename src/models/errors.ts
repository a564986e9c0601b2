export type ErrorKind = 'network' | 'parse' | 'filesystem' | 'subprocess' | 'not-found';

/**
 * Base class of every failure the manager reports to its callers
 */
export abstract class GameManagerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Timeout, refused connection or non-success HTTP status
 */
export class NetworkError extends GameManagerError {
  readonly kind = 'network';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Malformed index document or corrupt archive
 */
export class ParseError extends GameManagerError {
  readonly kind = 'parse';
}

export class FilesystemError extends GameManagerError {
  readonly kind = 'filesystem';

  constructor(message: string, readonly path?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type SubprocessFailure = 'not-found' | 'failed';

/**
 * Interpreter could not be spawned or exited unsuccessfully
 */
export class SubprocessError extends GameManagerError {
  readonly kind = 'subprocess';

  constructor(
    message: string,
    readonly command: string,
    readonly reason: SubprocessFailure,
    readonly exitCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NotFoundError extends GameManagerError {
  readonly kind = 'not-found';
}

/**
 * Returns a readable message for anything thrown
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Wraps foreign errors so callers only ever see GameManagerError
 */
export const toGameManagerError = (
  error: unknown,
  fallback: (message: string, cause: unknown) => GameManagerError
): GameManagerError =>
  error instanceof GameManagerError ? error : fallback(errorMessage(error), error);

/**
 * Narrows errors thrown by node:fs calls
 */
export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;
