import { after, test } from 'node:test';
import assert from 'node:assert/strict';
import { CommanderError } from 'commander';
import { parseCliOptions } from '../cli/index.js';
import { runRelaunch, type RunFlags } from '../cli/commands/run-cmd.js';
import { EXIT_CODES, SpawnError } from '../utils/errors.js';
import { log, LogLevel } from '../utils/logger.js';
import { FakeSupervisor, settle, silentLogger } from './helpers/fakes.js';
import { createTempRepo } from './helpers/test-repo.js';

const silentEnv = { RELAUNCH_LOG_LEVEL: 'silent' };
const noFlags: RunFlags = { dump: false, verbose: false, quiet: false };

after(() => {
  log.setQuiet(false);
  log.setLevel(LogLevel.INFO);
});

test('collects repeatable options and passes arguments after the script through', () => {
  const { cli, flags } = parseCliOptions(['-w', 'src', '-w', 'lib', '-e', 'js,ts', '-i', 'dist', 'app.js', '--port', '3000', '--once']);

  assert.deepStrictEqual(cli.watch, ['src', 'lib']);
  assert.equal(cli.ext, 'js,ts');
  assert.deepStrictEqual(cli.ignore, ['dist']);
  assert.equal(cli.script, 'app.js');
  assert.deepStrictEqual(cli.args, ['--port', '3000', '--once']);
  assert.equal(cli.once, undefined);
  assert.deepStrictEqual(flags, noFlags);
});

test('leaves options that were not given undefined', () => {
  const { cli } = parseCliOptions(['app.js']);

  assert.equal(cli.stdin, undefined);
  assert.equal(cli.restartable, undefined);
  assert.equal(cli.delay, undefined);
  assert.equal(cli.restartOnCrash, undefined);
  assert.deepStrictEqual(cli.args, []);
});

test('negated flags switch stdin handling off', () => {
  const { cli } = parseCliOptions(['--no-stdin', '--no-restartable', '--once', 'server.js']);

  assert.equal(cli.stdin, false);
  assert.equal(cli.restartable, false);
  assert.equal(cli.once, true);
  assert.equal(cli.script, 'server.js');
});

test('reads value options as given', () => {
  const { cli, flags } = parseCliOptions([
    '--restartable', 'reload',
    '-x', 'python3 -u',
    '-d', '250',
    '-s', 'SIGINT',
    '--kill-timeout', '500',
    '--restart-on-crash',
    '-L',
    '--union',
    '--config', 'dev.json',
    '--dump',
    '--verbose',
    '-q',
  ]);

  assert.equal(cli.restartable, 'reload');
  assert.equal(cli.exec, 'python3 -u');
  assert.equal(cli.delay, '250');
  assert.equal(cli.signal, 'SIGINT');
  assert.equal(cli.killTimeout, '500');
  assert.equal(cli.restartOnCrash, true);
  assert.equal(cli.legacyWatch, true);
  assert.equal(cli.union, true);
  assert.equal(cli.config, 'dev.json');
  assert.equal(cli.script, undefined);
  assert.deepStrictEqual(flags, { dump: true, verbose: true, quiet: true });
});

test('an unknown option is a usage error', () => {
  assert.throws(
    () => parseCliOptions(['--bogus']),
    (error: unknown) => error instanceof CommanderError && error.code === 'commander.unknownOption'
  );
});

test('a configuration error exits with 78 before anything starts', async () => {
  const repo = await createTempRepo();
  const supervisor = new FakeSupervisor();
  try {
    const code = await runRelaunch({ cli: {}, flags: noFlags }, repo.root, silentEnv, { supervisor });

    assert.equal(code, EXIT_CODES.CONFIG);
    assert.deepStrictEqual(supervisor.calls, []);
  } finally {
    await repo.cleanup();
  }
});

test('--once returns the child exit code', async () => {
  const repo = await createTempRepo({ 'app.js': '' });
  const supervisor = new FakeSupervisor();
  try {
    const running = runRelaunch({ cli: { script: 'app.js', once: true }, flags: noFlags }, repo.root, silentEnv, {
      supervisor,
      stdin: null,
      logger: silentLogger(),
    });
    await settle();
    supervisor.latest().exit({ code: 7, signal: null });

    assert.equal(await running, 7);
  } finally {
    await repo.cleanup();
  }
});

test('a failed first spawn exits with 127', async () => {
  const repo = await createTempRepo({ 'app.js': '' });
  const supervisor = new FakeSupervisor();
  supervisor.startFailures.push(new SpawnError('node app.js', 'ENOENT'));
  try {
    const code = await runRelaunch({ cli: { script: 'app.js', once: true }, flags: noFlags }, repo.root, silentEnv, {
      supervisor,
      stdin: null,
      logger: silentLogger(),
    });

    assert.equal(code, EXIT_CODES.SPAWN);
  } finally {
    await repo.cleanup();
  }
});
