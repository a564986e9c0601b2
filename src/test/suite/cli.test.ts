import * as assert from 'assert';
import { filterFromArgs, parseArgs } from '../../cli';

suite('CLI Test Suite', () => {
  test('Command, keyword and options are separated', () => {
    const args = parseArgs(['Install', 'galaxy', '--Repo=main', '--installed']);

    assert.strictEqual(args.command, 'install');
    assert.strictEqual(args.keyword, 'galaxy');
    assert.strictEqual(args.options.get('repo'), 'main');
    assert.strictEqual(args.options.get('installed'), true);
  });

  test('Option values may contain equals signs', () => {
    const args = parseArgs(['list', '--lang=a=b']);

    assert.strictEqual(args.options.get('lang'), 'a=b');
    assert.strictEqual(args.keyword, undefined);
  });

  test('No arguments give an empty command', () => {
    assert.strictEqual(parseArgs([]).command, '');
  });

  test('Filters come from repo, lang and installed options', () => {
    assert.deepStrictEqual(filterFromArgs(parseArgs(['list', '--repository=extra', '--lang=ru', '--installed'])), {
      repositoryName: 'extra',
      language: 'ru',
      onlyInstalled: true
    });
    assert.deepStrictEqual(filterFromArgs(parseArgs(['list', '--repo', '--lang='])), {
      repositoryName: undefined,
      language: undefined,
      onlyInstalled: false
    });
  });
});
