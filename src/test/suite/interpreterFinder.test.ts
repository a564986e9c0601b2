import * as assert from 'assert';
import * as path from 'path';
import * as fs from 'fs/promises';
import { InterpreterFinder } from '../../services/interpreterFinder';
import { SubprocessError } from '../../models/errors';
import { silentLogger } from '../../util/logger';
import { createTempDir, removeDir, writeScript } from '../helpers';

suite('InterpreterFinder Test Suite', () => {
  let root: string;

  setup(async () => {
    root = await createTempDir();
  });

  teardown(async () => {
    await removeDir(root);
  });

  test('Candidates are built-in, known paths, then PATH without duplicates', () => {
    const finder = new InterpreterFinder(
      {
        appDir: '/opt/questshelf',
        platform: 'linux',
        knownPaths: ['/usr/bin/sdl-instead'],
        env: { PATH: '/usr/local/bin:/usr/bin::/home/user/bin' }
      },
      silentLogger
    );

    assert.deepStrictEqual(finder.candidatePaths(), [
      '/opt/questshelf/instead/sdl-instead',
      '/usr/bin/sdl-instead',
      '/usr/local/bin/sdl-instead',
      '/home/user/bin/sdl-instead'
    ]);
  });

  test('Windows layout uses the executable name and Path', () => {
    const finder = new InterpreterFinder(
      { appDir: 'C:\\Games\\questshelf', platform: 'win32', knownPaths: [], env: { Path: 'C:\\Tools;D:\\Bin' } },
      silentLogger
    );

    assert.strictEqual(finder.builtinPath(), 'C:\\Games\\questshelf\\instead\\sdl-instead.exe');
    assert.deepStrictEqual(finder.candidatePaths(), [
      'C:\\Games\\questshelf\\instead\\sdl-instead.exe',
      'C:\\Tools\\sdl-instead.exe',
      'D:\\Bin\\sdl-instead.exe'
    ]);
  });

  test('Nothing found yields undefined', async () => {
    const emptyDir = path.join(root, 'empty');
    await fs.mkdir(emptyDir);
    const finder = new InterpreterFinder(
      { appDir: root, platform: 'linux', knownPaths: [], env: { PATH: emptyDir } },
      silentLogger
    );

    assert.strictEqual(await finder.find(), undefined);
    assert.strictEqual(await finder.findBuiltin(), undefined);
    assert.strictEqual(await finder.hasBuiltin(), false);
    assert.strictEqual(await finder.detect(), undefined);
  });

  test('Built-in interpreter wins over known paths and PATH', async () => {
    const builtin = path.join(root, 'instead', 'sdl-instead');
    const known = path.join(root, 'known', 'sdl-instead');
    const onPath = path.join(root, 'bin', 'sdl-instead');
    for (const file of [builtin, known, onPath]) {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, '');
    }

    const finder = new InterpreterFinder(
      { appDir: root, platform: 'linux', knownPaths: [known], env: { PATH: path.dirname(onPath) } },
      silentLogger
    );

    assert.strictEqual(await finder.find(), builtin);
    assert.strictEqual(await finder.findBuiltin(), builtin);
    assert.strictEqual(finder.isBuiltin(builtin), true);
    assert.strictEqual(finder.isBuiltin(known), false);

    await fs.rm(builtin);
    assert.strictEqual(await finder.find(), known);

    await fs.rm(known);
    assert.strictEqual(await finder.find(), onPath);
  });

  test('Missing command is reported as not found', async () => {
    const finder = new InterpreterFinder({ appDir: root }, silentLogger);
    const command = path.join(root, 'nonexistent');

    await assert.rejects(
      finder.check(command),
      (error: unknown) =>
        error instanceof SubprocessError &&
        error.reason === 'not-found' &&
        error.message === `${command} does not exist`
    );
  });

  suite('Version checks', () => {
    test('Version output is stripped of line breaks', async () => {
      const script = await writeScript(path.join(root, 'sdl-instead'), 'printf "3.5.2\\r\\n"');
      const finder = new InterpreterFinder({ appDir: root }, silentLogger);

      assert.strictEqual(await finder.check(script), '3.5.2');
    });

    test('Non-zero exit is a failed check with the exit code', async () => {
      const script = await writeScript(path.join(root, 'broken'), 'exit 3');
      const finder = new InterpreterFinder({ appDir: root }, silentLogger);

      await assert.rejects(
        finder.check(script),
        (error: unknown) =>
          error instanceof SubprocessError &&
          error.reason === 'failed' &&
          error.exitCode === 3 &&
          error.message === `${script} exited with code 3`
      );
    });

    test('Empty output is a failed check', async () => {
      const script = await writeScript(path.join(root, 'silent'), 'exit 0');
      const finder = new InterpreterFinder({ appDir: root }, silentLogger);

      await assert.rejects(
        finder.check(script),
        (error: unknown) => error instanceof SubprocessError && error.exitCode === 0
      );
    });

    test('Detect returns the found interpreter with its version', async () => {
      const builtin = await writeScript(path.join(root, 'instead', 'sdl-instead'), 'echo 3.4.1');
      const finder = new InterpreterFinder({ appDir: root, platform: 'linux', knownPaths: [] }, silentLogger);

      assert.deepStrictEqual(await finder.detect(), { commandPath: builtin, verifiedVersion: '3.4.1' });
    });

    test('Detect keeps a candidate that fails its check', async () => {
      const builtin = await writeScript(path.join(root, 'instead', 'sdl-instead'), 'exit 1');
      const finder = new InterpreterFinder({ appDir: root, platform: 'linux', knownPaths: [] }, silentLogger);

      assert.deepStrictEqual(await finder.detect(), { commandPath: builtin });
    });
  });
});
