import * as path from 'path';
import * as fs from 'fs/promises';
import type { Game, GameFilter, GameSortOrder } from '../models/game';
import type { InterpreterCheck, Repository, SyncError } from '../models/repository';
import { NotFoundError, SubprocessError, toGameManagerError } from '../models/errors';
import type { Configuration } from '../config/configuration';
import { expandInterpreterCommand } from '../config/configuration';
import type { Logger } from '../util/logger';
import { createConsoleLogger } from '../util/logger';
import { Catalog, filterGames, findLanguages, resolveByKeyword, sortGames } from './catalog';
import { GameLayout } from './gameLayout';
import { GameInstaller } from './gameInstaller';
import type { InstallMetadata } from './gameLayout';
import { GameRunner } from './gameRunner';
import { InterpreterFinder } from './interpreterFinder';
import { RepositorySynchronizer } from './repositorySynchronizer';
import type { FetchFunction } from './http';

/**
 * Receives download progress together with the declared archive size
 */
export type ProgressSink = (bytesTransferred: number, totalBytes: number) => void;

export interface GameManagerOptions {
  /** Directory the application runs from */
  appDir: string;
  logger?: Logger;
  fetch?: FetchFunction;
  finder?: InterpreterFinder;
}

interface Snapshot {
  catalog: Catalog;
  layout: GameLayout;
}

/**
 * Ties repositories, catalog, installs and the interpreter to one configuration.
 *
 * The catalog is held as an immutable snapshot; a sync builds a complete new
 * snapshot and swaps it in, so readers keep whatever snapshot they started with.
 */
export class GameManager {
  public readonly finder: InterpreterFinder;
  public readonly synchronizer: RepositorySynchronizer;
  public readonly installer: GameInstaller;
  public readonly runner: GameRunner;

  private readonly appDir: string;
  private readonly logger: Logger;
  private snapshot: Snapshot;
  private published = false;

  constructor(public config: Configuration, options: GameManagerOptions) {
    this.appDir = options.appDir;
    this.logger = options.logger ?? createConsoleLogger('manager');
    this.finder = options.finder ?? new InterpreterFinder({ appDir: options.appDir }, this.logger);
    this.synchronizer = new RepositorySynchronizer(
      {
        cacheDir: path.join(config.dataPath, 'repositories'),
        timeoutMs: config.syncTimeoutMs,
        fetch: options.fetch
      },
      this.logger
    );
    this.installer = new GameInstaller(this.logger, {
      fetch: options.fetch,
      downloadTimeoutMs: config.downloadTimeoutMs
    });
    this.runner = new GameRunner(() => this.resolveInterpreter(), this.logger);
    this.snapshot = this.createSnapshot(Catalog.empty());
  }

  get catalog(): Catalog {
    return this.snapshot.catalog;
  }

  get layout(): GameLayout {
    return this.snapshot.layout;
  }

  public getRepositories(): readonly Repository[] {
    return this.config.repositories;
  }

  /**
   * Whether listing can work without syncing first
   */
  public async hasAnySyncedData(): Promise<boolean> {
    return this.published || this.synchronizer.hasCachedData(this.config.repositories);
  }

  /**
   * Sync every repository and publish the merged catalog. When every
   * repository fails the previous catalog stays in place.
   */
  public async updateRepositories(): Promise<SyncError[]> {
    const repositories = this.config.repositories;
    const { catalog, errors } = await this.synchronizer.syncAll(repositories);
    if (repositories.length > 0 && errors.length === repositories.length) {
      this.logger.warn('No repository could be updated, keeping the previous catalog');
      return errors;
    }
    await this.publish(catalog);
    return errors;
  }

  /**
   * Publish the catalog stored by the last sync of a previous run
   */
  public async loadCachedCatalog(): Promise<void> {
    const { catalog } = await this.synchronizer.loadCached(this.config.repositories);
    await this.publish(catalog);
  }

  /**
   * All games with freshly checked install status
   */
  public async getSortedGames(by: GameSortOrder = 'publishedAtDesc'): Promise<Game[]> {
    const { catalog, layout } = await this.currentSnapshot();
    await layout.refreshInstallStatus(catalog.games);
    return sortGames(catalog.games, by);
  }

  public async findGames(filter: GameFilter, by: GameSortOrder = 'publishedAtDesc'): Promise<Game[]> {
    return filterGames(await this.getSortedGames(by), filter);
  }

  /**
   * Game a user refers to by keyword (see resolveByKeyword)
   */
  public async resolveGame(keyword: string): Promise<Game> {
    return resolveByKeyword(await this.findGames({ keyword }, 'title'), keyword);
  }

  public async findLanguages(): Promise<string[]> {
    return findLanguages((await this.currentSnapshot()).catalog.games);
  }

  public async installGame(game: Game, onProgress?: ProgressSink): Promise<string> {
    return this.installer.install(game, this.layout, (bytes) => onProgress?.(bytes, game.sizeBytes));
  }

  public async removeGame(game: Game): Promise<void> {
    await this.installer.remove(game, this.layout);
  }

  public async runGame(game: Game): Promise<void> {
    game.installed = await this.layout.isInstalled(game);
    await this.runner.run(game, this.layout);
  }

  /**
   * Cached icon of an installed game, if one was fetched
   */
  public async getGameImage(game: Game): Promise<string | undefined> {
    const gameDir = game.imageUrl ? await this.layout.installedDir(game) : undefined;
    if (!gameDir) {
      return undefined;
    }
    const iconPath = this.layout.iconPath(game, gameDir);
    return (await this.fileExists(iconPath)) ? iconPath : undefined;
  }

  public async getInstallMetadata(game: Game): Promise<InstallMetadata | undefined> {
    return this.installer.readInstallMetadata(game, this.layout);
  }

  /**
   * Configured interpreter command, expanded against the application directory
   */
  public interpreterCommand(): string {
    return expandInterpreterCommand(this.config.interpreterCommand, this.appDir);
  }

  /**
   * Switch to another interpreter; persisting the change is up to the caller
   */
  public useInterpreter(command: string): Configuration {
    this.config = { ...this.config, interpreterCommand: command };
    return this.config;
  }

  public isBuiltinInterpreterCommand(): boolean {
    const command = this.interpreterCommand();
    return command.length > 0 && this.finder.isBuiltin(command);
  }

  /**
   * Configured interpreter, or the first one found on the host
   */
  public async resolveInterpreter(): Promise<string | undefined> {
    return this.interpreterCommand() || this.finder.find();
  }

  /**
   * Verify an interpreter. `builtin` tells a broken bundled interpreter apart
   * from a broken configured one.
   */
  public async checkInterpreter(command: string = this.interpreterCommand()): Promise<InterpreterCheck> {
    if (!command) {
      return { commandPath: command, builtin: false, error: new NotFoundError('No interpreter is configured') };
    }
    const builtin = this.finder.isBuiltin(command);
    try {
      return { commandPath: command, builtin, version: await this.finder.check(command) };
    } catch (error) {
      return {
        commandPath: command,
        builtin,
        error: toGameManagerError(
          error,
          (message, cause) => new SubprocessError(message, command, 'failed', undefined, { cause })
        )
      };
    }
  }

  private async currentSnapshot(): Promise<Snapshot> {
    if (!this.published && (await this.synchronizer.hasCachedData(this.config.repositories))) {
      await this.loadCachedCatalog();
    }
    return this.snapshot;
  }

  private async publish(catalog: Catalog): Promise<void> {
    const next = this.createSnapshot(catalog);
    await next.layout.refreshInstallStatus(catalog.games);
    this.snapshot = next;
    this.published = true;
  }

  private createSnapshot(catalog: Catalog): Snapshot {
    return {
      catalog,
      layout: GameLayout.forCatalog(this.config.gamesPath, path.join(this.config.dataPath, 'images'), catalog)
    };
  }

  private async fileExists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }
}
