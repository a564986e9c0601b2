import type { GameManagerError } from './errors';

/**
 * Configured source of games
 */
export interface Repository {
  /** Identity of the repository */
  name: string;
  /** Location of the index document */
  url: string;
}

/**
 * Failure of a single repository during a sync
 */
export interface SyncError {
  repository: Repository;
  cause: GameManagerError;
}

/**
 * Located interpreter, optionally verified by running it
 */
export interface InterpreterCandidate {
  commandPath: string;
  verifiedVersion?: string;
}

/**
 * Outcome of checking the configured interpreter
 */
export interface InterpreterCheck {
  commandPath: string;
  /** True when the bundled interpreter was checked */
  builtin: boolean;
  version?: string;
  error?: GameManagerError;
}
