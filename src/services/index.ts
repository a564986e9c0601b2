export { Catalog, filterGames, findLanguages, resolveByKeyword, sortGames } from './catalog';
export { GameInstaller } from './gameInstaller';
export type { InstallerOptions } from './gameInstaller';
export { ENTRY_FILES, GameLayout, INSTALL_METADATA_FILE, readInstallMetadata } from './gameLayout';
export type { InstallMetadata } from './gameLayout';
export { GameManager } from './gameManager';
export type { GameManagerOptions, ProgressSink } from './gameManager';
export { GameRunner } from './gameRunner';
export type { InterpreterResolver } from './gameRunner';
export { defaultFetch } from './http';
export type { FetchFunction } from './http';
export { IndexParser } from './indexParser';
export type { ParsedIndex } from './indexParser';
export { InterpreterFinder, VERSION_FLAG } from './interpreterFinder';
export type { InterpreterFinderOptions } from './interpreterFinder';
export { RepositorySynchronizer } from './repositorySynchronizer';
export type { SyncResult, SynchronizerOptions } from './repositorySynchronizer';
export * from '../models/errors';
export type { Game, GameFilter, GameSortOrder, ProgressCallback } from '../models/game';
export { gameKey } from '../models/game';
export type { InterpreterCandidate, InterpreterCheck, Repository, SyncError } from '../models/repository';
export * from '../config/configuration';
export { createConsoleLogger, silentLogger } from '../util/logger';
export type { Logger, LogLevel } from '../util/logger';
