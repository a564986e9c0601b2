import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs/promises';
import { z } from 'zod';
import type { Repository } from '../models/repository';
import { FilesystemError, ParseError, errorMessage, isErrnoException } from '../models/errors';

export const DEFAULT_SYNC_TIMEOUT_MS = 30_000;
export const CONFIG_FILE_NAME = 'config.json';

const repositorySchema = z.object({
  name: z.string().min(1),
  url: z.string().url()
});

const configFileSchema = z.object({
  interpreterCommand: z.string().default(''),
  language: z.string().default('en'),
  dataPath: z.string().default(''),
  gamesPath: z.string().default(''),
  repositories: z.array(repositorySchema).default([]),
  syncTimeoutMs: z.number().int().positive().default(DEFAULT_SYNC_TIMEOUT_MS),
  downloadTimeoutMs: z.number().int().nonnegative().default(0)
});

/**
 * Settings the manager runs with
 */
export interface Configuration {
  /** Interpreter to launch games with, empty until detected or chosen */
  interpreterCommand: string;
  language: string;
  /** Root of cached indexes, icons and (by default) games */
  dataPath: string;
  /** Directory holding one subdirectory per installed game */
  gamesPath: string;
  repositories: Repository[];
  syncTimeoutMs: number;
  /** 0 disables the download timeout */
  downloadTimeoutMs: number;
}

export const defaultDataPath = (): string => path.join(os.homedir(), '.questshelf');

/**
 * Validates raw settings and fills in defaults
 */
export const resolveConfiguration = (input: unknown = {}): Configuration => {
  const result = configFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  const dataPath = parsed.dataPath || defaultDataPath();
  return {
    ...parsed,
    dataPath,
    gamesPath: parsed.gamesPath || path.join(dataPath, 'games')
  };
};

/**
 * Resolves a relative command such as `./instead/sdl-instead` against the
 * application directory. Bare names and absolute paths are kept.
 */
export const expandInterpreterCommand = (command: string, appDir: string): string => {
  const trimmed = command.trim();
  if (!trimmed || path.isAbsolute(trimmed)) {
    return trimmed;
  }
  if (trimmed.includes('/') || trimmed.includes(path.sep)) {
    return path.resolve(appDir, trimmed);
  }
  return trimmed;
};

/**
 * Location of the config file, overridable with QUESTSHELF_CONFIG
 */
export const defaultConfigPath = (env: NodeJS.ProcessEnv = process.env): string =>
  env.QUESTSHELF_CONFIG || path.join(defaultDataPath(), CONFIG_FILE_NAME);

/**
 * Loads and saves the configuration as a JSON file
 */
export class ConfigStore {
  constructor(public readonly filePath: string = defaultConfigPath()) {}

  /**
   * Read the config file; a missing file yields the defaults
   */
  public async load(): Promise<Configuration> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return resolveConfiguration({});
      }
      throw new FilesystemError(`Failed to read ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ParseError(`Config file ${this.filePath} is not valid JSON`, { cause: error });
    }
    return resolveConfiguration(raw);
  }

  public async save(config: Configuration): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(config, null, 2));
    } catch (error) {
      throw new FilesystemError(`Failed to write ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error
      });
    }
  }
}
