import test from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough } from 'stream';
import { setTimeout as delay } from 'timers/promises';
import type { WatchConfig } from '../config/types.js';
import { startRelaunch } from '../core/RelaunchService.js';
import { ProcessSupervisor } from '../supervisor/ProcessSupervisor.js';
import { SpawnError } from '../utils/errors.js';
import type { FileWatcherOptions } from '../watcher/FileWatcher.js';
import {
  createWatchConfig,
  FakeSupervisor,
  FakeWatcher,
  ManualScheduler,
  settle,
  silentLogger,
  waitFor,
} from './helpers/fakes.js';

function setup(overrides: Partial<WatchConfig> = {}, stdin: PassThrough | null = null) {
  const supervisor = new FakeSupervisor();
  const watcher = new FakeWatcher();
  const scheduler = new ManualScheduler();
  const watcherOptions: FileWatcherOptions[] = [];
  const handle = startRelaunch(createWatchConfig(overrides), {
    supervisor,
    createWatcher: (options) => {
      watcherOptions.push(options);
      return watcher;
    },
    scheduler,
    stdin,
    logger: silentLogger(),
  });
  return { supervisor, watcher, scheduler, handle, watcherOptions };
}

test('a burst of relevant changes restarts the child once', async () => {
  const { supervisor, watcher, scheduler, handle } = setup();
  await handle.ready;
  await settle();

  watcher.emit({ path: '/project/src/a.js', kind: 'modified' });
  watcher.emit({ path: '/project/src/b.js', kind: 'created' });
  await settle();
  scheduler.advance(99);
  await settle();
  assert.deepStrictEqual(supervisor.calls, ['start', 'forward:1000']);

  scheduler.advance(1);
  await settle();
  assert.deepStrictEqual(supervisor.calls, ['start', 'forward:1000', 'stop:1000', 'start', 'forward:1001']);

  handle.shutdown();
  assert.equal(await handle.done, 0);
  assert.equal(watcher.closed, true);
});

test('irrelevant changes never reach the debouncer', async () => {
  const { supervisor, watcher, scheduler, handle } = setup();
  await settle();

  watcher.emit({ path: '/project/README.md', kind: 'modified' });
  watcher.emit({ path: '/project/node_modules/lib/index.js', kind: 'modified' });
  watcher.emit({ path: '/project/.git/index.js', kind: 'modified' });
  watcher.emit({ path: '/elsewhere/app.js', kind: 'modified' });
  await settle();

  assert.equal(scheduler.pending(), 0);
  scheduler.advance(1000);
  await settle();
  assert.deepStrictEqual(supervisor.calls, ['start', 'forward:1000']);

  handle.shutdown();
  await handle.done;
});

test('a rename away from a watched extension still restarts', async () => {
  const { supervisor, watcher, scheduler, handle } = setup();
  await settle();

  watcher.emit({ path: '/project/src/notes.txt', kind: 'renamed', previousPath: '/project/src/notes.js' });
  await settle();
  scheduler.advance(100);
  await settle();

  assert.equal(supervisor.children.length, 2);

  handle.shutdown();
  await handle.done;
});

test('the watcher subscribes to the configured roots with the ignore rules', async () => {
  const { watcherOptions, handle } = setup({ watchPaths: ['/project/src'], polling: true });
  await settle();

  assert.equal(watcherOptions.length, 1);
  const options = watcherOptions[0];
  assert.deepStrictEqual(options?.watchPaths, ['/project/src']);
  assert.equal(options?.polling, true);
  assert.equal(options?.ignored?.('/project/src/node_modules/lib'), true);
  assert.equal(options?.ignored?.('/project/src/lib'), false);

  handle.shutdown();
  await handle.done;
});

test('stdin restarts on the token and forwards everything else', async () => {
  const stdin = new PassThrough();
  const { supervisor, handle } = setup({}, stdin);
  await settle();

  stdin.write('rs\n');
  await settle();
  assert.deepStrictEqual(supervisor.calls, ['start', 'forward:1000', 'stop:1000', 'start', 'forward:1001']);

  stdin.write('hello\n');
  await settle();
  assert.deepStrictEqual(
    supervisor.inputs.map((chunk) => chunk.toString()),
    ['hello\n']
  );

  handle.shutdown();
  await handle.done;

  stdin.write('rs\n');
  await settle();
  assert.equal(supervisor.children.length, 2);
});

test('shutdown drops a pending change and closes the watcher', async () => {
  const { supervisor, watcher, scheduler, handle } = setup();
  await settle();

  watcher.emit({ path: '/project/app.js', kind: 'modified' });
  await settle();
  assert.equal(scheduler.pending(), 1);

  handle.shutdown();

  assert.equal(scheduler.pending(), 0);
  assert.equal(await handle.done, 0);
  assert.equal(watcher.closed, true);
  assert.deepStrictEqual(supervisor.calls, ['start', 'forward:1000', 'stop:1000']);
});

test('once mode runs without a watcher and returns the child exit code', async () => {
  const { supervisor, watcherOptions, handle } = setup({ once: true });
  await settle();

  supervisor.latest().exit({ code: 5, signal: null });

  assert.equal(await handle.done, 5);
  assert.equal(watcherOptions.length, 0);
});

test('a failed first spawn rejects and still tears down the watcher', async () => {
  const supervisor = new FakeSupervisor();
  supervisor.startFailures.push(new SpawnError('node app.js', 'ENOENT'));
  const watcher = new FakeWatcher();

  const handle = startRelaunch(createWatchConfig(), {
    supervisor,
    createWatcher: () => watcher,
    scheduler: new ManualScheduler(),
    stdin: null,
    logger: silentLogger(),
  });

  await assert.rejects(handle.done, (error: unknown) => error instanceof SpawnError);
  assert.equal(watcher.closed, true);
});

test('only php edits under src restart a php project, once per burst', async () => {
  const { supervisor, watcher, scheduler, handle } = setup({
    watchPaths: ['/project/src'],
    extensions: ['php'],
    executable: 'php',
    script: 'src/app.php',
  });
  await settle();

  watcher.emit({ path: '/project/src/app.php', kind: 'modified' });
  scheduler.advance(40);
  watcher.emit({ path: '/project/src/app.php', kind: 'modified' });
  watcher.emit({ path: '/project/src/app.yaml', kind: 'modified' });
  watcher.emit({ path: '/project/src/.git/HEAD', kind: 'modified' });
  await settle();
  scheduler.advance(100);
  await settle();

  assert.deepStrictEqual(supervisor.calls, ['start', 'forward:1000', 'stop:1000', 'start', 'forward:1001']);

  watcher.emit({ path: '/project/src/app.yaml', kind: 'modified' });
  await settle();
  scheduler.advance(1000);
  await settle();
  assert.equal(supervisor.children.length, 2);

  handle.shutdown();
  assert.equal(await handle.done, 0);
});

test('shutdown kills a child that ignores the stop signal and spawns nothing after', async () => {
  const watcher = new FakeWatcher();
  const supervisor = new ProcessSupervisor({
    stdout: new PassThrough(),
    stderr: new PassThrough(),
    logger: silentLogger(),
  });
  const handle = startRelaunch(
    createWatchConfig({
      cwd: process.cwd(),
      executable: process.execPath,
      execArgs: ['-e', "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)"],
      script: null,
      killTimeoutMs: 200,
      forwardStdin: false,
    }),
    { supervisor, createWatcher: () => watcher, stdin: null, logger: silentLogger() }
  );

  await waitFor(() => handle.controller.getState() === 'running');
  // give the child time to install its SIGTERM handler
  await delay(300);
  handle.shutdown();
  watcher.emit({ path: '/project/app.js', kind: 'modified' });

  assert.equal(await handle.done, 0);
  assert.equal(handle.controller.getState(), 'stopped');
  assert.equal(handle.controller.getCurrentPid(), null);
});
