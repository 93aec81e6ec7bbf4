import test from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough } from 'stream';
import type { LaunchCommand } from '../config/types.js';
import { ProcessSupervisor } from '../supervisor/ProcessSupervisor.js';
import { SpawnError } from '../utils/errors.js';
import { LogLevel } from '../utils/logger.js';
import { createCapturedLogger, silentLogger, waitFor } from './helpers/fakes.js';

function nodeCommand(source: string): LaunchCommand {
  return { executable: process.execPath, args: ['-e', source], cwd: process.cwd(), env: process.env };
}

function collect(stream: PassThrough): () => string {
  let text = '';
  stream.on('data', (chunk: Buffer) => {
    text += chunk.toString('utf8');
  });
  return () => text;
}

test('starts a child, forwards its output and reports the exit', async () => {
  const stdout = new PassThrough();
  const output = collect(stdout);
  const supervisor = new ProcessSupervisor({ stdout, stderr: new PassThrough(), logger: silentLogger() });

  const handle = await supervisor.start(nodeCommand("process.stdout.write('hello'); process.exit(4)"));
  supervisor.forward(handle);

  assert.ok(handle.pid > 0);
  assert.deepStrictEqual(await handle.exited, { code: 4, signal: null });
  assert.equal(handle.alive, false);
  await waitFor(() => output() === 'hello');
});

test('a missing executable is a spawn error naming the command', async () => {
  const supervisor = new ProcessSupervisor({ logger: silentLogger() });
  const missing: LaunchCommand = {
    executable: '/nonexistent/relaunch-missing-binary',
    args: ['app.js'],
    cwd: process.cwd(),
    env: process.env,
  };

  await assert.rejects(
    supervisor.start(missing),
    (error: unknown) =>
      error instanceof SpawnError &&
      error.osCode === 'ENOENT' &&
      error.message === 'failed to start "/nonexistent/relaunch-missing-binary app.js": executable not found (ENOENT)'
  );
});

test('stop sends the configured signal and waits for the exit', async () => {
  const supervisor = new ProcessSupervisor({ logger: silentLogger() });
  const handle = await supervisor.start(nodeCommand('setInterval(() => {}, 1000)'));

  const status = await supervisor.stop(handle, 2000, 'SIGTERM');

  assert.deepStrictEqual(status, { code: null, signal: 'SIGTERM' });
  assert.equal(handle.alive, false);
});

test('stop escalates to SIGKILL when the child ignores the signal', async () => {
  const stdout = new PassThrough();
  const output = collect(stdout);
  const { logger, stderr } = createCapturedLogger(LogLevel.WARN);
  const supervisor = new ProcessSupervisor({ stdout, stderr: new PassThrough(), logger });
  const handle = await supervisor.start(
    nodeCommand("process.on('SIGTERM', () => {}); process.stdout.write('ready'); setInterval(() => {}, 1000)")
  );
  supervisor.forward(handle);
  await waitFor(() => output() === 'ready');

  const status = await supervisor.stop(handle, 200);

  assert.deepStrictEqual(status, { code: null, signal: 'SIGKILL' });
  assert.equal(stderr.length, 1);
  assert.ok(stderr[0]?.startsWith(`[relaunch] Child ${handle.pid} did not exit within 200ms, sending SIGKILL`));
});

test('stopping a finished child returns its recorded status', async () => {
  const supervisor = new ProcessSupervisor({ logger: silentLogger() });
  const handle = await supervisor.start(nodeCommand('process.exit(0)'));
  await handle.exited;

  assert.deepStrictEqual(await supervisor.stop(handle, 100), { code: 0, signal: null });
});

test('input reaches the current child while it runs', async () => {
  const stdout = new PassThrough();
  const output = collect(stdout);
  const supervisor = new ProcessSupervisor({
    stdout,
    stderr: new PassThrough(),
    forwardStdin: true,
    logger: silentLogger(),
  });
  const handle = await supervisor.start(
    nodeCommand("process.stdin.on('data', (d) => { process.stdout.write(String(d).toUpperCase()); process.exit(0); })")
  );
  supervisor.forward(handle);

  assert.equal(supervisor.input('ping\n'), true);
  await handle.exited;
  await waitFor(() => output() === 'PING\n');

  assert.equal(supervisor.input('late\n'), false);
});

test('input is dropped when stdin forwarding is off', async () => {
  const supervisor = new ProcessSupervisor({ stdout: new PassThrough(), stderr: new PassThrough(), logger: silentLogger() });
  const handle = await supervisor.start(nodeCommand('setInterval(() => {}, 1000)'));
  supervisor.forward(handle);

  assert.equal(supervisor.input('ignored\n'), false);

  await supervisor.stop(handle, 2000);
});
