#!/usr/bin/env node
import * as path from 'path';
import chalk from 'chalk';
import type { Game, GameFilter } from './models/game';
import { GameManagerError, NotFoundError, errorMessage } from './models/errors';
import { ConfigStore } from './config/configuration';
import { GameManager } from './services/gameManager';
import { createConsoleLogger } from './util/logger';
import { formatDate, formatPercents, formatSize } from './util/formatters';

export const VERSION = '0.3.0';

const fmt = {
  title: chalk.bold,
  name: chalk.cyan,
  repo: chalk.magenta,
  lang: chalk.yellow,
  installed: chalk.green,
  url: chalk.underline.blue,
  muted: chalk.gray,
  error: chalk.red
};

/**
 * Command line split into command, positional keyword and --options
 */
export interface ParsedArgs {
  command: string;
  keyword?: string;
  options: Map<string, string | true>;
}

export const parseArgs = (argv: readonly string[]): ParsedArgs => {
  const options = new Map<string, string | true>();
  const positional: string[] = [];

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const [key, ...rest] = arg.slice(2).split('=');
      options.set(key.toLowerCase(), rest.length > 0 ? rest.join('=') : true);
    } else {
      positional.push(arg);
    }
  }

  return { command: (positional[0] ?? '').toLowerCase(), keyword: positional[1], options };
};

/**
 * Filters given as --repo=, --lang= and --installed
 */
export const filterFromArgs = (args: ParsedArgs): GameFilter => {
  const stringOption = (...names: string[]) => {
    for (const name of names) {
      const value = args.options.get(name);
      if (typeof value === 'string' && value) {
        return value;
      }
    }
    return undefined;
  };

  return {
    repositoryName: stringOption('repo', 'repository'),
    language: stringOption('lang'),
    onlyInstalled: args.options.has('installed')
  };
};

const printGames = (games: readonly Game[]) => {
  for (const game of games) {
    const installed = game.installed ? fmt.installed(' [installed]') : '';
    console.log(
      `${fmt.title(game.title)}, ${fmt.name(game.name)}, ${fmt.repo(game.repositoryName)} ` +
        `${fmt.lang(`[${game.languages.join(', ')}]`)}${installed}`
    );
  }
};

const requireKeyword = (args: ParsedArgs): string => {
  if (!args.keyword) {
    throw new NotFoundError(`Command "${args.command}" needs a game keyword`);
  }
  return args.keyword;
};

/**
 * Runs commands against one manager and its config store
 */
class Cli {
  constructor(private manager: GameManager, private readonly store: ConfigStore) {}

  async execute(args: ParsedArgs): Promise<void> {
    switch (args.command) {
      case 'update':
        return this.update();
      case 'list':
        return this.list(args);
      case 'search':
        return this.search(args);
      case 'show':
        return this.show(args);
      case 'install':
        return this.install(args);
      case 'run':
        return this.run(args);
      case 'remove':
        return this.remove(args);
      case 'findinterpreter':
        return this.findInterpreter();
      case 'checkinterpreter':
        return this.checkInterpreter();
      case 'repositories':
        return this.repositories();
      case 'langs':
        return this.langs();
      case 'configpath':
        console.log(this.store.filePath);
        return;
      case 'version':
        console.log(VERSION);
        return;
      default:
        printHelp();
        process.exitCode = 1;
    }
  }

  private async update(): Promise<void> {
    console.log('Updating repositories...');
    const errors = await this.manager.updateRepositories();
    if (errors.length > 0) {
      console.log(fmt.error('There are errors:'));
      for (const { repository, cause } of errors) {
        console.log(`${fmt.repo(repository.name)}: ${cause.message}`);
      }
    }
    console.log('Repositories have been updated.');
  }

  private async ensureSynced(): Promise<void> {
    if (!(await this.manager.hasAnySyncedData())) {
      await this.update();
    }
  }

  private async list(args: ParsedArgs): Promise<void> {
    await this.ensureSynced();
    printGames(await this.manager.findGames(filterFromArgs(args)));
  }

  private async search(args: ParsedArgs): Promise<void> {
    const keyword = requireKeyword(args);
    await this.ensureSynced();
    printGames(await this.manager.findGames({ ...filterFromArgs(args), keyword }, 'title'));
  }

  private async show(args: ParsedArgs): Promise<void> {
    const game = await this.manager.resolveGame(requireKeyword(args));
    const installed = game.installed ? fmt.installed(' [installed]') : '';

    console.log(`${fmt.title(game.title)} (${fmt.name(game.name)}) ${formatSize(game.sizeBytes)}${installed}`);
    console.log(`Version: ${game.version || '-'}`);
    if (game.installed) {
      const metadata = await this.manager.getInstallMetadata(game);
      if (metadata?.version && metadata.version !== game.version) {
        console.log(`Installed version: ${metadata.version}`);
      }
    }
    if (game.languages.length > 0) {
      console.log(`Languages: ${fmt.lang(game.languages.join(', '))}`);
    }
    console.log(`Repository: ${fmt.repo(game.repositoryName)}`);
    console.log(`Published: ${formatDate(game.publishedAt)}`);
    if (game.descriptionUrl) {
      console.log(`More: ${fmt.url(game.descriptionUrl)}`);
    }
    const image = await this.manager.getGameImage(game);
    if (image) {
      console.log(`Image: ${fmt.muted(image)}`);
    }
    if (game.description) {
      console.log(`\n${chalk.bold('Description')}:\n${game.description}`);
    }
  }

  private async install(args: ParsedArgs): Promise<void> {
    await this.ensureInterpreter();
    const game = await this.manager.resolveGame(requireKeyword(args));
    const label = `Downloading and installing game ${fmt.name(game.title)}...`;

    process.stdout.write(label);
    await this.manager.installGame(game, (bytes, total) => {
      process.stdout.write(`\r${label} ${fmt.installed(formatPercents(bytes, total))}`);
    });
    console.log(`\nGame ${fmt.name(game.title)} has been installed.`);
  }

  private async run(args: ParsedArgs): Promise<void> {
    await this.ensureInterpreter();
    const game = await this.manager.resolveGame(requireKeyword(args));
    if (!game.installed) {
      console.log(`Game ${fmt.name(game.title)} isn't installed.`);
      console.log(`Please install it first:\nquestshelf install ${game.name}`);
      process.exitCode = 1;
      return;
    }
    await this.manager.runGame(game);
    console.log(`Running ${fmt.name(game.title)}...`);
  }

  private async remove(args: ParsedArgs): Promise<void> {
    const game = await this.manager.resolveGame(requireKeyword(args));
    console.log(`Removing game ${fmt.name(game.title)}...`);
    await this.manager.removeGame(game);
    console.log(`Game ${fmt.name(game.title)} has been removed.`);
  }

  private async findInterpreter(): Promise<void> {
    const candidate = await this.manager.finder.detect();
    if (!candidate) {
      console.log(`Interpreter has not been found. Set "interpreterCommand" in ${this.store.filePath}`);
      return;
    }

    const version = candidate.verifiedVersion ? ` (${candidate.verifiedVersion})` : fmt.error(' (check failed)');
    console.log(`Interpreter has been found: ${candidate.commandPath}${version}`);
    await this.store.save(this.manager.useInterpreter(candidate.commandPath));
    console.log('Path has been saved.');
  }

  private async checkInterpreter(): Promise<void> {
    const result = await this.manager.checkInterpreter();
    if (!result.error) {
      console.log(`Interpreter ${result.version ?? ''} works: ${result.commandPath}`);
      return;
    }
    if (result.builtin) {
      console.log(fmt.error(`Built-in interpreter check failed: ${result.error.message}`));
    } else {
      console.log(fmt.error(`Configured interpreter check failed: ${result.error.message}`));
    }
    process.exitCode = 1;
  }

  private repositories(): void {
    for (const repository of this.manager.getRepositories()) {
      console.log(`${fmt.repo(repository.name)} (${repository.url})`);
    }
  }

  private async langs(): Promise<void> {
    await this.ensureSynced();
    for (const lang of await this.manager.findLanguages()) {
      console.log(fmt.lang(lang));
    }
  }

  private async ensureInterpreter(): Promise<void> {
    if (!this.manager.interpreterCommand()) {
      await this.findInterpreter();
    }
  }
}

function printHelp(): void {
  const command = (name: string, usage: string, description: string) =>
    `${chalk.cyan.bold(name)}${chalk.cyan(usage)}\n    ${description}\n`;

  console.log(
    `${chalk.bold('questshelf')} ${VERSION}: INSTEAD games manager\n\n` +
      `${chalk.cyan.bold('Usage')}:\n    questshelf [command] [keyword]\n\n` +
      `${chalk.cyan.bold('Commands')}:\n` +
      command('update', '', "Update game repositories") +
      command('list', ' --repo=[name] --lang=[lang] --installed', 'Print games, newest first') +
      command('search', ' [keyword] --repo=[name] --lang=[lang] --installed', 'Search games by name and title') +
      command('show', ' [keyword]', 'Show information about a game') +
      command('install', ' [keyword]', 'Install a game') +
      command('run', ' [keyword]', 'Run an installed game') +
      command('remove', ' [keyword]', 'Remove an installed game') +
      command('findInterpreter', '', 'Find the interpreter and save its path to the config') +
      command('checkInterpreter', '', 'Check the configured interpreter') +
      command('repositories', '', 'Print configured repositories') +
      command('langs', '', 'Print available game languages') +
      command('configPath', '', 'Print the config file path') +
      command('version', '', 'Print the application version')
  );
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const logger = createConsoleLogger('questshelf', process.env.QUESTSHELF_DEBUG === '1' ? 'debug' : 'warn');
  const store = new ConfigStore();

  try {
    const config = await store.load();
    const manager = new GameManager(config, { appDir: path.resolve(__dirname, '..'), logger });
    await new Cli(manager, store).execute(parseArgs(argv));
  } catch (error) {
    const message = error instanceof GameManagerError ? error.message : `Unexpected error: ${errorMessage(error)}`;
    console.error(fmt.error(message));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
