import * as path from 'path';
import * as fs from 'fs/promises';
import { createWriteStream } from 'fs';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import AdmZip from 'adm-zip';
import { FetchError } from 'node-fetch';
import type { Game, ProgressCallback } from '../models/game';
import {
  FilesystemError,
  ParseError,
  errorMessage,
  isErrnoException,
  toGameManagerError
} from '../models/errors';
import type { Logger } from '../util/logger';
import { ENTRY_FILES, INSTALL_METADATA_FILE, readInstallMetadata } from './gameLayout';
import type { GameLayout, InstallMetadata } from './gameLayout';
import { defaultFetch, fetchOk, toNetworkError } from './http';
import type { FetchFunction } from './http';

const ICON_TIMEOUT_MS = 10_000;

export interface InstallerOptions {
  fetch?: FetchFunction;
  /** 0 disables the timeout */
  downloadTimeoutMs?: number;
}

const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * Errors from local streams carry the path they failed on
 */
const isLocalFileError = (error: unknown): error is NodeJS.ErrnoException =>
  isErrnoException(error) && !(error instanceof FetchError) && typeof error.path === 'string';

/**
 * Handles installing and removing games in the games directory
 */
export class GameInstaller {
  private readonly fetchFn: FetchFunction;
  private readonly downloadTimeoutMs: number;

  constructor(private readonly logger: Logger, options: InstallerOptions = {}) {
    this.fetchFn = options.fetch ?? defaultFetch;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 0;
  }

  /**
   * Download, unpack and move a game into its install directory.
   *
   * Progress is reported with the cumulative byte count once per received
   * chunk. The value that reaches `game.sizeBytes` is only reported once the
   * game is installed, so a failed install never reports completion.
   *
   * @returns the install directory
   */
  public async install(game: Game, layout: GameLayout, onProgress?: ProgressCallback): Promise<string> {
    const localPath = layout.gameDir(game);
    const existing = (await layout.installedDir(game)) ?? ((await pathExists(localPath)) ? localPath : undefined);
    if (existing) {
      throw new FilesystemError(`Game ${game.name} is already installed at ${existing}`, existing);
    }

    await this.ensureDirectory(layout.gamesRoot);
    const workspace = await this.createWorkspace(layout.gamesRoot);
    let moved = false;
    let reported = 0;

    try {
      const archivePath = path.join(workspace, 'package.zip');
      this.logger.info(`Downloading ${game.name} from ${game.downloadUrl}`);
      const transferred = await this.download(game, archivePath, (bytes) => {
        reported = bytes;
        onProgress?.(bytes);
      });
      if (game.sizeBytes > 0 && transferred !== game.sizeBytes) {
        this.logger.warn(`${game.name}: downloaded ${transferred} bytes, index declares ${game.sizeBytes}`);
      }

      const gameRoot = await this.extract(archivePath, path.join(workspace, 'unpacked'));
      await this.saveInstallMetadata(game, gameRoot);
      await this.move(gameRoot, localPath);
      moved = true;

      game.installed = true;
      if (transferred > reported) {
        onProgress?.(transferred);
      }
    } catch (error) {
      if (moved) {
        await this.removeQuietly(localPath);
      }
      game.installed = false;
      throw toGameManagerError(error, (message, cause) => new FilesystemError(message, localPath, { cause }));
    } finally {
      await this.removeQuietly(workspace);
    }

    await this.fetchIcon(game, layout);
    this.logger.info(`Installed ${game.name} into ${localPath}`);
    return localPath;
  }

  /**
   * Delete the install directory and cached icon. Removing a game that is
   * not installed succeeds.
   */
  public async remove(game: Game, layout: GameLayout): Promise<void> {
    const localPath = (await layout.installedDir(game)) ?? layout.gameDir(game);
    try {
      await fs.rm(localPath, { recursive: true, force: true });
      await fs.rm(layout.iconPath(game, localPath), { force: true });
    } catch (error) {
      throw new FilesystemError(`Failed to remove ${game.name}: ${errorMessage(error)}`, localPath, { cause: error });
    }
    game.installed = false;
    this.logger.info(`Removed ${game.name} from ${localPath}`);
  }

  /**
   * Metadata written by install, undefined for games installed by hand
   */
  public async readInstallMetadata(game: Game, layout: GameLayout): Promise<InstallMetadata | undefined> {
    const gameDir = await layout.installedDir(game);
    return gameDir ? readInstallMetadata(gameDir) : undefined;
  }

  /**
   * Stream the archive to disk
   *
   * @returns the number of bytes received
   */
  private async download(game: Game, archivePath: string, report: ProgressCallback): Promise<number> {
    const response = await fetchOk(this.fetchFn, game.downloadUrl, this.downloadTimeoutMs);
    let transferred = 0;

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        if (chunk.length > 0) {
          transferred += chunk.length;
          if (transferred < game.sizeBytes) {
            report(transferred);
          }
        }
        callback(null, chunk);
      }
    });

    try {
      await pipeline(response.body, counter, createWriteStream(archivePath));
    } catch (error) {
      if (isLocalFileError(error)) {
        throw new FilesystemError(`Failed to write ${archivePath}: ${error.message}`, archivePath, { cause: error });
      }
      throw toNetworkError(error, game.downloadUrl);
    }
    return transferred;
  }

  /**
   * Unpack the archive and locate the directory holding the entry script
   */
  private async extract(archivePath: string, destination: string): Promise<string> {
    let zip: AdmZip;
    let entryCount: number;
    try {
      zip = new AdmZip(archivePath);
      entryCount = zip.getEntries().length;
    } catch (error) {
      throw new ParseError(`Corrupt game archive: ${errorMessage(error)}`, { cause: error });
    }
    if (entryCount === 0) {
      throw new ParseError('Game archive is empty');
    }

    try {
      zip.extractAllTo(destination, true);
    } catch (error) {
      if (isLocalFileError(error)) {
        throw new FilesystemError(`Failed to unpack into ${destination}: ${error.message}`, destination, {
          cause: error
        });
      }
      throw new ParseError(`Corrupt game archive: ${errorMessage(error)}`, { cause: error });
    }

    const gameRoot = await this.findGameRoot(destination);
    if (!gameRoot) {
      throw new ParseError(`Game archive has no ${ENTRY_FILES.join(' or ')}`);
    }
    return gameRoot;
  }

  /**
   * Archives either hold the game files directly or one directory with them
   */
  private async findGameRoot(destination: string): Promise<string | undefined> {
    if (await this.hasEntryFile(destination)) {
      return destination;
    }
    const entries = await fs.readdir(destination, { withFileTypes: true });
    if (entries.length === 1 && entries[0].isDirectory()) {
      const nested = path.join(destination, entries[0].name);
      if (await this.hasEntryFile(nested)) {
        return nested;
      }
    }
    return undefined;
  }

  private async hasEntryFile(dir: string): Promise<boolean> {
    for (const entry of ENTRY_FILES) {
      if (await pathExists(path.join(dir, entry))) {
        return true;
      }
    }
    return false;
  }

  private async saveInstallMetadata(game: Game, gameRoot: string): Promise<void> {
    const metadata: InstallMetadata = {
      name: game.name,
      repositoryName: game.repositoryName,
      version: game.version,
      installedAt: new Date().toISOString()
    };
    await fs.writeFile(path.join(gameRoot, INSTALL_METADATA_FILE), JSON.stringify(metadata, null, 2));
  }

  private async move(source: string, target: string): Promise<void> {
    try {
      await fs.rename(source, target);
    } catch (error) {
      throw new FilesystemError(`Failed to move game into ${target}: ${errorMessage(error)}`, target, {
        cause: error
      });
    }
  }

  /**
   * Icons are optional: failures are logged, never thrown
   */
  private async fetchIcon(game: Game, layout: GameLayout): Promise<void> {
    if (!game.imageUrl) {
      return;
    }
    const iconPath = layout.iconPath(game);
    try {
      const response = await fetchOk(this.fetchFn, game.imageUrl, ICON_TIMEOUT_MS);
      const content = await response.buffer();
      await this.ensureDirectory(layout.imagesRoot);
      await fs.writeFile(iconPath, content);
    } catch (error) {
      this.logger.warn(`Could not fetch icon of ${game.name}: ${errorMessage(error)}`);
    }
  }

  private async ensureDirectory(dir: string): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FilesystemError(`Failed to create ${dir}: ${errorMessage(error)}`, dir, { cause: error });
    }
  }

  private async createWorkspace(gamesRoot: string): Promise<string> {
    try {
      return await fs.mkdtemp(path.join(gamesRoot, '.download-'));
    } catch (error) {
      throw new FilesystemError(`Failed to create a download directory in ${gamesRoot}`, gamesRoot, {
        cause: error
      });
    }
  }

  private async removeQuietly(target: string): Promise<void> {
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Could not clean up ${target}: ${errorMessage(error)}`);
    }
  }
}
