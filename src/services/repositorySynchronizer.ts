import * as path from 'path';
import * as fs from 'fs/promises';
import type { Game } from '../models/game';
import type { Repository, SyncError } from '../models/repository';
import { NetworkError, ParseError, errorMessage, isErrnoException, toGameManagerError } from '../models/errors';
import type { Logger } from '../util/logger';
import { encodeFileName } from '../util/fileNames';
import { Catalog } from './catalog';
import { IndexParser } from './indexParser';
import { DEFAULT_SYNC_TIMEOUT_MS } from '../config/configuration';
import { defaultFetch, fetchOk, toNetworkError } from './http';
import type { FetchFunction } from './http';

/**
 * Outcome of syncing every configured repository
 */
export interface SyncResult {
  catalog: Catalog;
  errors: SyncError[];
}

export interface SynchronizerOptions {
  /** Directory the fetched index documents are cached in */
  cacheDir: string;
  timeoutMs?: number;
  fetch?: FetchFunction;
  parser?: IndexParser;
}

type RepositoryOutcome =
  | { ok: true; games: Game[] }
  | { ok: false; error: SyncError };

/**
 * Fetches repository indexes and merges them into a catalog
 */
export class RepositorySynchronizer {
  private readonly cacheDir: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFunction;
  private readonly parser: IndexParser;

  constructor(options: SynchronizerOptions, private readonly logger: Logger) {
    this.cacheDir = options.cacheDir;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? defaultFetch;
    this.parser = options.parser ?? new IndexParser();
  }

  /**
   * Cached index location for a repository
   */
  public cachePath(repository: Repository): string {
    return path.join(this.cacheDir, `${encodeFileName(repository.name)}.json`);
  }

  /**
   * Fetch the raw index document of one repository
   */
  public async fetchIndex(repository: Repository): Promise<string> {
    const response = await fetchOk(this.fetchFn, repository.url, this.timeoutMs);
    try {
      return await response.text();
    } catch (error) {
      throw toNetworkError(error, repository.url);
    }
  }

  /**
   * Fetch and parse one repository, caching the document on success
   */
  public async syncRepository(repository: Repository): Promise<Game[]> {
    const body = await this.fetchIndex(repository);
    const { games, rejected } = this.parser.parseDocument(body, repository.name);

    for (const reason of rejected) {
      this.logger.warn(`Skipping ${repository.name} ${reason}`);
    }
    await this.writeCache(repository, body);

    this.logger.debug(`Fetched ${games.length} games from ${repository.name}`);
    return games;
  }

  /**
   * Sync every repository. Failures are collected per repository; the
   * catalog is only built once all of them have been attempted.
   */
  public async syncAll(repositories: readonly Repository[]): Promise<SyncResult> {
    const outcomes = await Promise.all(
      repositories.map(async (repository): Promise<RepositoryOutcome> => {
        try {
          return { ok: true, games: await this.syncRepository(repository) };
        } catch (error) {
          const cause = toGameManagerError(
            error,
            (message, original) => new NetworkError(message, undefined, { cause: original })
          );
          this.logger.warn(`Failed to update repository ${repository.name}: ${cause.message}`);
          return { ok: false, error: { repository, cause } };
        }
      })
    );

    return this.mergeOutcomes(outcomes);
  }

  /**
   * Rebuild a catalog from previously cached index documents
   */
  public async loadCached(repositories: readonly Repository[]): Promise<SyncResult> {
    const outcomes = await Promise.all(
      repositories.map(async (repository): Promise<RepositoryOutcome> => {
        const file = this.cachePath(repository);
        try {
          const body = await fs.readFile(file, 'utf-8');
          return { ok: true, games: this.parser.parseDocument(body, repository.name).games };
        } catch (error) {
          const cause = toGameManagerError(error, (message, original) => new ParseError(message, { cause: original }));
          if (!(isErrnoException(error) && error.code === 'ENOENT')) {
            this.logger.warn(`Ignoring cached index of ${repository.name}: ${cause.message}`);
          }
          return { ok: false, error: { repository, cause } };
        }
      })
    );

    return this.mergeOutcomes(outcomes);
  }

  /**
   * Whether any repository has a cached index document
   */
  public async hasCachedData(repositories: readonly Repository[]): Promise<boolean> {
    const found = await Promise.all(
      repositories.map(async (repository) => {
        try {
          return (await fs.stat(this.cachePath(repository))).isFile();
        } catch {
          return false;
        }
      })
    );
    return found.includes(true);
  }

  private mergeOutcomes(outcomes: RepositoryOutcome[]): SyncResult {
    const games: Game[] = [];
    const errors: SyncError[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        games.push(...outcome.games);
      } else {
        errors.push(outcome.error);
      }
    }
    return { catalog: new Catalog(games), errors };
  }

  private async writeCache(repository: Repository, body: string): Promise<void> {
    const file = this.cachePath(repository);
    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      await fs.writeFile(file, body);
    } catch (error) {
      this.logger.warn(`Could not cache index of ${repository.name} at ${file}: ${errorMessage(error)}`);
    }
  }
}
