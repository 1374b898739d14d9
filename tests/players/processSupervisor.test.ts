import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { ConfigStore } from '../../src/application/config/configStore';
import { ProcessSupervisor } from '../../src/application/players/processSupervisor';
import type { NowPlayingPort } from '../../src/ports/NowPlayingPort';
import { ManualClock } from '../fakes/clock';
import { MemoryStorage } from '../fakes/memoryStorage';
import { FakeProcessPort } from '../fakes/processPort';
import { makeProviderRegistry } from '../fakes/providers';

const PATH = 'players.json';

class RecordingNowPlaying implements NowPlayingPort {
  public readonly events: string[] = [];

  public attach(name: string, url: string): void {
    this.events.push(`attach ${name} ${url}`);
  }

  public async detach(name: string): Promise<void> {
    this.events.push(`detach ${name}`);
  }
}

const makeSupervisor = async () => {
  const storage = new MemoryStorage().seed(PATH, {
    Kitchen: { provider: 'squeezelite', device: 'hw:1,0', mac_address: '02:00:00:00:00:01' },
    Den: { provider: 'sendspin', device: 'default', client_id: 'den-1', server_url: 'ws://music.local:8927' },
  });
  const { registry } = makeProviderRegistry();
  const config = new ConfigStore(storage, registry, PATH);
  await config.load();
  const processes = new FakeProcessPort();
  const nowPlaying = new RecordingNowPlaying();
  const clock = new ManualClock(5_000);
  const supervisor = new ProcessSupervisor({
    config,
    registry,
    processes,
    clock,
    logDir: '/var/log/players',
    nowPlaying,
    timings: { startupGraceMs: 20, stopTimeoutMs: 20, killTimeoutMs: 20 },
  });
  return { supervisor, processes, nowPlaying };
};

test('start registers a handle for a surviving process', async () => {
  const { supervisor, processes } = await makeSupervisor();
  const result = await supervisor.start('Kitchen');
  assert.deepEqual(result, { ok: true, message: "Player 'Kitchen' started" });
  assert.equal(supervisor.isRunning('Kitchen'), true);
  assert.deepEqual(supervisor.getHandle('Kitchen'), {
    name: 'Kitchen',
    pid: 1000,
    pgid: 1000,
    command: processes.last().command,
    startedAt: 5_000,
    viaFallback: false,
  });
  assert.equal(processes.last().command[processes.last().command.indexOf('-f') + 1], '/var/log/players/Kitchen.log');
});

test('starting an unknown player fails without spawning', async () => {
  const { supervisor, processes } = await makeSupervisor();
  const result = await supervisor.start('Ghost');
  assert.equal(result.message, "Player 'Ghost' not found");
  assert.equal(processes.spawned.length, 0);
});

test('concurrent starts spawn once', async () => {
  const { supervisor, processes } = await makeSupervisor();
  const [first, second] = await Promise.all([supervisor.start('Kitchen'), supervisor.start('Kitchen')]);
  assert.equal(first.ok, true);
  assert.deepEqual(
    [second.ok, second.message],
    [false, "Player 'Kitchen' is already starting"],
  );
  assert.equal(processes.spawned.length, 1);

  const third = await supervisor.start('Kitchen');
  assert.equal(third.message, "Player 'Kitchen' is already running");
});

test('squeezelite retries on the null device when the primary dies', async () => {
  const { supervisor, processes } = await makeSupervisor();
  processes.script({ exitImmediately: true, errorOutput: 'ALSA: cannot open hw:1,0' });
  const result = await supervisor.start('Kitchen');
  assert.deepEqual(result, {
    ok: true,
    message: "Player 'Kitchen' started with null device (audio device 'hw:1,0' not available)",
  });
  assert.equal(processes.spawned.length, 2);
  const fallback = processes.spawned[1].command;
  assert.equal(fallback[fallback.indexOf('-o') + 1], 'null');
  assert.equal(supervisor.getHandle('Kitchen')?.viaFallback, true);
});

test('both launches failing reports both errors', async () => {
  const { supervisor, processes } = await makeSupervisor();
  processes.script(
    { exitImmediately: true, errorOutput: 'device busy' },
    { exitImmediately: true, errorOutput: '' },
  );
  const result = await supervisor.start('Kitchen');
  assert.equal(result.ok, false);
  assert.equal(
    result.message,
    "Player 'Kitchen' failed to start. Primary error: device busy. Fallback error: process exited immediately",
  );
  if (!result.ok) {
    assert.equal(result.error.code, 'device_open_failed');
  }
  assert.equal(supervisor.isRunning('Kitchen'), false);
});

test('sendspin has no fallback launch', async () => {
  const { supervisor, processes } = await makeSupervisor();
  processes.script({ exitImmediately: true, errorOutput: 'no server' });
  const result = await supervisor.start('Den');
  assert.equal(result.message, "Player 'Den' failed to start: no server");
  assert.equal(processes.spawned.length, 1);
});

test('missing backend binary is reported by name', async () => {
  const { supervisor, processes } = await makeSupervisor();
  processes.script({ failure: { kind: 'binary_not_found', message: 'spawn sendspin ENOENT' } });
  const result = await supervisor.start('Den');
  assert.equal(result.message, 'sendspin binary not found - is it installed and on PATH?');
  assert.equal(processes.spawned.length, 1);
  assert.equal(await supervisor.start('Den').then((retry) => retry.ok), true);
});

test('stop terminates the process group', async () => {
  const { supervisor, processes } = await makeSupervisor();
  await supervisor.start('Kitchen');
  const result = await supervisor.stop('Kitchen');
  assert.deepEqual(result, { ok: true, message: "Player 'Kitchen' stopped" });
  assert.deepEqual(processes.last().signals, ['SIGTERM']);
  assert.equal(supervisor.isRunning('Kitchen'), false);
  assert.equal(supervisor.getHandle('Kitchen'), null);
});

test('stop escalates to SIGKILL when SIGTERM is ignored', async () => {
  const { supervisor, processes } = await makeSupervisor();
  processes.script({ ignore: ['SIGTERM'] });
  await supervisor.start('Kitchen');
  const result = await supervisor.stop('Kitchen');
  assert.deepEqual(result, { ok: true, message: "Player 'Kitchen' force stopped" });
  assert.deepEqual(processes.last().signals, ['SIGTERM', 'SIGKILL']);
  assert.equal(supervisor.isRunning('Kitchen'), false);
});

test('force stop succeeds and drops the handle when SIGKILL is not honoured in time', async () => {
  const { supervisor, processes } = await makeSupervisor();
  processes.script({ ignore: ['SIGTERM', 'SIGKILL'] });
  await supervisor.start('Kitchen');
  const result = await supervisor.stop('Kitchen');
  assert.deepEqual(result, { ok: true, message: "Player 'Kitchen' force stopped" });
  assert.deepEqual(processes.last().signals, ['SIGTERM', 'SIGKILL']);
  assert.equal(processes.last().exited(), false);
  assert.equal(supervisor.getHandle('Kitchen'), null);
  assert.equal(supervisor.isRunning('Kitchen'), false);
});

test('stopping a player that is not running fails', async () => {
  const { supervisor } = await makeSupervisor();
  assert.equal((await supervisor.stop('Kitchen')).message, "Player 'Kitchen' not running");
});

test('a process that exited on its own is pruned', async () => {
  const { supervisor, processes } = await makeSupervisor();
  await supervisor.start('Kitchen');
  processes.last().exit();
  assert.equal((await supervisor.stop('Kitchen')).message, "Player 'Kitchen' was not running");

  await supervisor.start('Kitchen');
  processes.last().exit();
  assert.deepEqual(supervisor.getAllStatuses(), { Kitchen: false, Den: false });
  assert.equal(supervisor.getHandle('Kitchen'), null);
  assert.equal((await supervisor.start('Kitchen')).ok, true);
  assert.equal(processes.spawned.length, 3);
});

test('now-playing feeds follow sendspin players with a server URL', async () => {
  const { supervisor, nowPlaying } = await makeSupervisor();
  await supervisor.start('Den');
  await supervisor.start('Kitchen');
  await supervisor.stop('Den');
  assert.deepEqual(nowPlaying.events, ['attach Den ws://music.local:8927', 'detach Den']);
});

test('stopAll stops every running player', async () => {
  const { supervisor, processes } = await makeSupervisor();
  await supervisor.start('Kitchen');
  await supervisor.start('Den');
  assert.equal(supervisor.runningCount(), 2);
  assert.equal(await supervisor.stopAll(), 2);
  assert.equal(supervisor.runningCount(), 0);
  assert.deepEqual(
    processes.spawned.map((process) => process.exited()),
    [true, true],
  );
});
