import * as assert from 'assert';
import * as path from 'path';
import * as fs from 'fs/promises';
import {
  ConfigStore,
  DEFAULT_SYNC_TIMEOUT_MS,
  defaultConfigPath,
  defaultDataPath,
  expandInterpreterCommand,
  resolveConfiguration
} from '../../config/configuration';
import { FilesystemError, ParseError } from '../../models/errors';
import { createTempDir, removeDir } from '../helpers';

suite('Configuration Test Suite', () => {
  test('Empty input resolves to defaults', () => {
    const config = resolveConfiguration({});

    assert.strictEqual(config.interpreterCommand, '');
    assert.strictEqual(config.language, 'en');
    assert.strictEqual(config.dataPath, defaultDataPath());
    assert.strictEqual(config.gamesPath, path.join(defaultDataPath(), 'games'));
    assert.deepStrictEqual(config.repositories, []);
    assert.strictEqual(config.syncTimeoutMs, DEFAULT_SYNC_TIMEOUT_MS);
    assert.strictEqual(config.downloadTimeoutMs, 0);
  });

  test('Games directory follows a custom data path', () => {
    const config = resolveConfiguration({ dataPath: '/srv/shelf' });

    assert.strictEqual(config.gamesPath, path.join('/srv/shelf', 'games'));
  });

  test('Explicit games directory is kept', () => {
    const config = resolveConfiguration({ dataPath: '/srv/shelf', gamesPath: '/mnt/games' });

    assert.strictEqual(config.gamesPath, '/mnt/games');
  });

  test('Invalid settings name the offending fields', () => {
    assert.throws(
      () => resolveConfiguration({ syncTimeoutMs: -5, repositories: [{ name: '', url: 'https://repo.test/' }] }),
      (error: unknown) =>
        error instanceof ParseError &&
        error.message.startsWith('Invalid configuration: ') &&
        error.message.includes('repositories.0.name') &&
        error.message.includes('syncTimeoutMs')
    );
  });

  test('Relative interpreter commands resolve against the application directory', () => {
    assert.strictEqual(
      expandInterpreterCommand('instead/sdl-instead', '/opt/questshelf'),
      path.resolve('/opt/questshelf', 'instead/sdl-instead')
    );
    assert.strictEqual(expandInterpreterCommand('  /usr/bin/sdl-instead ', '/opt/questshelf'), '/usr/bin/sdl-instead');
    assert.strictEqual(expandInterpreterCommand('sdl-instead', '/opt/questshelf'), 'sdl-instead');
    assert.strictEqual(expandInterpreterCommand('   ', '/opt/questshelf'), '');
  });

  test('Config path can be overridden from the environment', () => {
    assert.strictEqual(defaultConfigPath({ QUESTSHELF_CONFIG: '/tmp/custom.json' }), '/tmp/custom.json');
    assert.strictEqual(defaultConfigPath({}), path.join(defaultDataPath(), 'config.json'));
  });

  suite('ConfigStore', () => {
    let root: string;

    setup(async () => {
      root = await createTempDir();
    });

    teardown(async () => {
      await removeDir(root);
    });

    test('Missing file yields defaults', async () => {
      const config = await new ConfigStore(path.join(root, 'config.json')).load();

      assert.strictEqual(config.interpreterCommand, '');
      assert.deepStrictEqual(config.repositories, []);
    });

    test('Saved configuration loads back', async () => {
      const store = new ConfigStore(path.join(root, 'nested', 'config.json'));
      const config = resolveConfiguration({
        dataPath: root,
        interpreterCommand: '/usr/bin/sdl-instead',
        repositories: [{ name: 'main', url: 'https://repo.test/index.json' }]
      });

      await store.save(config);

      assert.deepStrictEqual(await store.load(), config);
    });

    test('Malformed JSON is a parse error', async () => {
      const filePath = path.join(root, 'config.json');
      await fs.writeFile(filePath, '{ "language": ');

      await assert.rejects(
        new ConfigStore(filePath).load(),
        (error: unknown) => error instanceof ParseError && error.message === `Config file ${filePath} is not valid JSON`
      );
    });

    test('Unreadable path is a filesystem error', async () => {
      await assert.rejects(new ConfigStore(root).load(), FilesystemError);
    });
  });
});
