import { spawn } from 'child_process';
import type { Game } from '../models/game';
import { NotFoundError, SubprocessError, isErrnoException } from '../models/errors';
import type { Logger } from '../util/logger';
import type { GameLayout } from './gameLayout';

/**
 * Supplies the interpreter command to launch games with
 */
export type InterpreterResolver = () => Promise<string | undefined>;

/**
 * Launches installed games through the interpreter
 */
export class GameRunner {
  constructor(private readonly resolveInterpreter: InterpreterResolver, private readonly logger: Logger) {}

  /**
   * Start the interpreter for `game` without waiting for it to exit.
   * Resolves once the process has spawned.
   */
  public async run(game: Game, layout: GameLayout): Promise<void> {
    if (!game.installed) {
      throw new NotFoundError(`Game ${game.name} is not installed`);
    }

    const command = await this.resolveInterpreter();
    if (!command) {
      throw new NotFoundError('No interpreter is configured or detected');
    }

    const gameDir = (await layout.installedDir(game)) ?? layout.gameDir(game);
    await this.launch(command, [gameDir]);
    this.logger.info(`Started ${game.name} with ${command}`);
  }

  private launch(command: string, args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' });

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
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}
