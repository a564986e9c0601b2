import * as path from 'path';
import * as fs from 'fs/promises';
import { spawn } from 'child_process';
import type { InterpreterCandidate } from '../models/repository';
import { SubprocessError, errorMessage, isErrnoException } from '../models/errors';
import type { Logger } from '../util/logger';

export const VERSION_FLAG = '-version';

const CHECK_TIMEOUT_MS = 10_000;

interface PlatformLayout {
  binaryName: string;
  builtinRelativePath: string;
  knownPaths: string[];
}

const UNIX_LAYOUT: PlatformLayout = {
  binaryName: 'sdl-instead',
  builtinRelativePath: 'instead/sdl-instead',
  knownPaths: ['/usr/local/bin/sdl-instead', '/usr/bin/sdl-instead', '/usr/games/sdl-instead']
};

const PLATFORM_LAYOUTS: Partial<Record<NodeJS.Platform, PlatformLayout>> = {
  linux: UNIX_LAYOUT,
  freebsd: UNIX_LAYOUT,
  darwin: {
    binaryName: 'sdl-instead',
    builtinRelativePath: 'instead/Instead.app/Contents/MacOS/sdl-instead',
    knownPaths: [
      '/Applications/Instead.app/Contents/MacOS/sdl-instead',
      '/opt/homebrew/bin/sdl-instead',
      '/usr/local/bin/sdl-instead'
    ]
  },
  win32: {
    binaryName: 'sdl-instead.exe',
    builtinRelativePath: 'instead\\sdl-instead.exe',
    knownPaths: ['C:\\Program Files\\INSTEAD\\sdl-instead.exe', 'C:\\Program Files (x86)\\INSTEAD\\sdl-instead.exe']
  }
};

export interface InterpreterFinderOptions {
  /** Directory the application is installed in; the built-in interpreter lives below it */
  appDir: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  /** Replaces the platform's well-known install locations */
  knownPaths?: string[];
  checkTimeoutMs?: number;
}

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * Locates the interpreter on the host and verifies candidates by running them
 */
export class InterpreterFinder {
  private readonly appDir: string;
  private readonly layout: PlatformLayout;
  private readonly paths: path.PlatformPath;
  private readonly env: NodeJS.ProcessEnv;
  private readonly checkTimeoutMs: number;

  constructor(options: InterpreterFinderOptions, private readonly logger: Logger) {
    const platform = options.platform ?? process.platform;
    const layout = PLATFORM_LAYOUTS[platform] ?? UNIX_LAYOUT;

    this.appDir = options.appDir;
    this.layout = options.knownPaths ? { ...layout, knownPaths: options.knownPaths } : layout;
    this.paths = platform === 'win32' ? path.win32 : path.posix;
    this.env = options.env ?? process.env;
    this.checkTimeoutMs = options.checkTimeoutMs ?? CHECK_TIMEOUT_MS;
  }

  /**
   * Path of the interpreter bundled with the application
   */
  public builtinPath(): string {
    return this.paths.join(this.appDir, this.layout.builtinRelativePath);
  }

  public async hasBuiltin(): Promise<boolean> {
    return exists(this.builtinPath());
  }

  /**
   * The bundled interpreter, or undefined when the application ships none
   */
  public async findBuiltin(): Promise<string | undefined> {
    return (await this.hasBuiltin()) ? this.builtinPath() : undefined;
  }

  public isBuiltin(commandPath: string): boolean {
    return this.paths.resolve(commandPath) === this.paths.resolve(this.builtinPath());
  }

  /**
   * Ordered probe list: built-in, well-known locations, then PATH
   */
  public candidatePaths(): string[] {
    const pathDirs = (this.env.PATH ?? this.env.Path ?? '')
      .split(this.paths.delimiter)
      .filter((dir) => dir.length > 0)
      .map((dir) => this.paths.join(dir, this.layout.binaryName));

    return [...new Set([this.builtinPath(), ...this.layout.knownPaths, ...pathDirs])];
  }

  /**
   * First candidate present on the filesystem. Nothing found is a normal
   * outcome and yields undefined.
   */
  public async find(): Promise<string | undefined> {
    for (const candidate of this.candidatePaths()) {
      if (await exists(candidate)) {
        this.logger.debug(`Interpreter candidate found: ${candidate}`);
        return candidate;
      }
    }
    this.logger.debug('No interpreter candidate found');
    return undefined;
  }

  /**
   * Run `<commandPath> -version` and return its trimmed output
   */
  public async check(commandPath: string): Promise<string> {
    const output = await this.runForOutput(commandPath, [VERSION_FLAG]);
    const version = output.replace(/[\r\n]/g, '').trim();
    if (!version) {
      throw new SubprocessError(`${commandPath} reported no version`, commandPath, 'failed', 0);
    }
    return version;
  }

  /**
   * Find an interpreter and verify it. A candidate that fails the check is
   * still returned, without a verified version.
   */
  public async detect(): Promise<InterpreterCandidate | undefined> {
    const commandPath = await this.find();
    if (!commandPath) {
      return undefined;
    }
    try {
      return { commandPath, verifiedVersion: await this.check(commandPath) };
    } catch (error) {
      this.logger.warn(`Interpreter at ${commandPath} failed its check: ${errorMessage(error)}`);
      return { commandPath };
    }
  }

  private runForOutput(command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      const child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'ignore'],
        timeout: this.checkTimeoutMs,
        windowsHide: true
      });

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.once('error', (error) => {
        const missing = isErrnoException(error) && error.code === 'ENOENT';
        reject(
          new SubprocessError(
            missing ? `${command} does not exist` : `Failed to start ${command}: ${error.message}`,
            command,
            missing ? 'not-found' : 'failed',
            undefined,
            { cause: error }
          )
        );
      });
      child.once('close', (code, signal) => {
        if (code === 0) {
          resolve(Buffer.concat(chunks).toString('utf-8'));
          return;
        }
        const status = signal ? `was killed by ${signal}` : `exited with code ${code}`;
        reject(new SubprocessError(`${command} ${status}`, command, 'failed', code ?? undefined));
      });
    });
  }
}
