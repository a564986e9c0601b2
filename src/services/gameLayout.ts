import * as path from 'path';
import * as fs from 'fs/promises';
import { z } from 'zod';
import type { Game } from '../models/game';
import { encodeFileName } from '../util/fileNames';
import type { Catalog } from './catalog';

/** Entry scripts the interpreter looks for in a game directory */
export const ENTRY_FILES = ['main3.lua', 'main.lua'];

export const INSTALL_METADATA_FILE = '.questshelf.json';

const DEFAULT_ICON_EXTENSION = '.png';

const installMetadataSchema = z.object({
  name: z.string(),
  repositoryName: z.string(),
  version: z.string().default(''),
  installedAt: z.string().default('')
});

/**
 * Written next to the game files on install
 */
export type InstallMetadata = z.infer<typeof installMetadataSchema>;

type GameIdentity = Pick<Game, 'name' | 'repositoryName'>;

const isDirectory = async (target: string): Promise<boolean> => {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
};

const iconExtension = (imageUrl: string): string => {
  let pathname: string;
  try {
    pathname = new URL(imageUrl).pathname;
  } catch {
    return DEFAULT_ICON_EXTENSION;
  }
  const extension = path.posix.extname(pathname).toLowerCase();
  return /^\.[a-z0-9]{1,5}$/.test(extension) ? extension : DEFAULT_ICON_EXTENSION;
};

/**
 * Metadata stored in `gameDir`; undefined when missing or unreadable
 */
export const readInstallMetadata = async (gameDir: string): Promise<InstallMetadata | undefined> => {
  let content: string;
  try {
    content = await fs.readFile(path.join(gameDir, INSTALL_METADATA_FILE), 'utf-8');
  } catch {
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return undefined;
  }
  const result = installMetadataSchema.safeParse(raw);
  return result.success ? result.data : undefined;
};

/**
 * Where installed games and their icons live on disk
 */
export class GameLayout {
  constructor(
    public readonly gamesRoot: string,
    public readonly imagesRoot: string,
    private readonly collidingNames: ReadonlySet<string> = new Set()
  ) {}

  /**
   * Layout for a catalog snapshot: games whose name appears in several
   * repositories get the repository name in their directory.
   */
  public static forCatalog(gamesRoot: string, imagesRoot: string, catalog: Catalog): GameLayout {
    return new GameLayout(gamesRoot, imagesRoot, catalog.collidingNames());
  }

  public dirName(game: GameIdentity): string {
    const name = encodeFileName(game.name);
    return this.collidingNames.has(game.name) ? `${name}@${encodeFileName(game.repositoryName)}` : name;
  }

  /**
   * Directory a new install goes to
   */
  public gameDir(game: GameIdentity): string {
    return path.join(this.gamesRoot, this.dirName(game));
  }

  /**
   * Directory the game is installed in, if any. A game installed before its
   * name started colliding still sits in the plain `name` directory; it is
   * found there when its metadata names the same repository.
   */
  public async installedDir(game: GameIdentity): Promise<string | undefined> {
    const keyed = this.gameDir(game);
    if (await isDirectory(keyed)) {
      return keyed;
    }
    if (!this.collidingNames.has(game.name)) {
      return undefined;
    }
    const plain = path.join(this.gamesRoot, encodeFileName(game.name));
    if (!(await isDirectory(plain))) {
      return undefined;
    }
    const metadata = await readInstallMetadata(plain);
    return metadata?.repositoryName === game.repositoryName ? plain : undefined;
  }

  /**
   * Cached icon location, named after the install directory. The extension
   * follows the icon URL.
   */
  public iconPath(game: Pick<Game, 'name' | 'repositoryName' | 'imageUrl'>, gameDir = this.gameDir(game)): string {
    return path.join(this.imagesRoot, `${path.basename(gameDir)}${iconExtension(game.imageUrl)}`);
  }

  public async isInstalled(game: GameIdentity): Promise<boolean> {
    return (await this.installedDir(game)) !== undefined;
  }

  /**
   * Re-derive the installed flag of every game from the filesystem
   */
  public async refreshInstallStatus(games: readonly Game[]): Promise<void> {
    await Promise.all(
      games.map(async (game) => {
        game.installed = await this.isInstalled(game);
      })
    );
  }
}
