import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { PlayerNotFoundError, ValidationError } from '../../src/domain/players/errors';
import { completed } from '../fakes/commandPort';
import { PLAYERS_PATH, makeTestContext } from '../fakes/appContext';

test('player list carries running flags', async () => {
  const { context } = await makeTestContext();
  const { players } = context;
  await players.startPlayer('Office');
  assert.deepEqual(
    players.listPlayers().map((player) => [player.name, player.provider, player.running]),
    [
      ['Kitchen', 'squeezelite', false],
      ['Den', 'sendspin', false],
      ['Office', 'squeezelite', true],
    ],
  );
  assert.deepEqual(players.getAllStatuses(), { Kitchen: false, Den: false, Office: true });
  await context.supervisor.stopAll();
});

test('updating a stopped player only saves', async () => {
  const { context, processes } = await makeTestContext();
  const result = await context.players.updatePlayer('Office', { volume: 40 });
  assert.equal(result.message, 'Player updated successfully');
  assert.equal(result.config.volume, 40);
  assert.equal(processes.spawned.length, 0);
});

test('updating a running player restarts it with the new config', async () => {
  const { context, processes } = await makeTestContext();
  await context.players.startPlayer('Office');
  const result = await context.players.updatePlayer('Office', { server_ip: 'lms.local' });
  assert.equal(result.message, 'Player updated and restarted successfully');
  assert.equal(processes.spawned.length, 2);
  assert.deepEqual(processes.spawned[0].signals, ['SIGTERM']);
  assert.ok(processes.spawned[1].command.includes('lms.local'));
  assert.equal(context.supervisor.isRunning('Office'), true);
  await context.supervisor.stopAll();
});

test('rename of a running player restarts it under the new name', async () => {
  const { context } = await makeTestContext();
  await context.players.startPlayer('Office');
  const result = await context.players.updatePlayer('Office', { name: 'Study' });
  assert.equal(result.message, 'Player updated and restarted successfully');
  assert.deepEqual(context.players.getAllStatuses(), { Kitchen: false, Den: false, Study: true });
  await context.supervisor.stopAll();
});

test('a failed restart after update is reported, not thrown', async () => {
  const { context, processes } = await makeTestContext();
  await context.players.startPlayer('Kitchen');
  processes.script(
    { exitImmediately: true, errorOutput: 'device busy' },
    { exitImmediately: true, errorOutput: 'no null output' },
  );
  const result = await context.players.updatePlayer('Kitchen', { volume: 10 });
  assert.equal(
    result.message,
    "Player updated successfully, but failed to restart: Player 'Kitchen' failed to start. Primary error: device busy. Fallback error: no null output",
  );
  assert.equal(context.store.getPlayer('Kitchen')?.volume, 10);
});

test('a rejected update restarts the player with its old config', async () => {
  const { context, processes } = await makeTestContext();
  await context.players.startPlayer('Office');
  await assert.rejects(context.players.updatePlayer('Office', { volume: 500 }), ValidationError);
  assert.equal(context.supervisor.isRunning('Office'), true);
  assert.equal(processes.spawned.length, 2);
  assert.equal(context.store.getPlayer('Office')?.volume, 75);
  await context.supervisor.stopAll();
});

test('delete stops a running player first', async () => {
  const { context, processes, storage } = await makeTestContext();
  await context.players.startPlayer('Office');
  const result = await context.players.deletePlayer('Office');
  assert.deepEqual(result, { ok: true, message: "Player 'Office' deleted" });
  assert.equal(processes.last().exited(), true);
  const onDisk = storage.read(PLAYERS_PATH);
  assert.ok(onDisk !== null && typeof onDisk === 'object');
  assert.deepEqual(Object.keys(onDisk), ['Kitchen', 'Den']);
  await assert.rejects(context.players.deletePlayer('Office'), PlayerNotFoundError);
});

test('status includes the process handle while running', async () => {
  const { context } = await makeTestContext();
  assert.throws(() => context.players.getStatus('Ghost'), PlayerNotFoundError);
  assert.deepEqual(context.players.getStatus('Office'), { name: 'Office', running: false, handle: null });
  await context.players.startPlayer('Office');
  const status = context.players.getStatus('Office');
  assert.equal(status.running, true);
  assert.equal(status.handle?.pid, 1000);
  await context.supervisor.stopAll();
});

test('volume is applied to the mixer and then remembered', async () => {
  const { context, commands } = await makeTestContext();
  commands.respond('amixer -c 1 sset Master 40%', completed(''));
  const result = await context.players.setPlayerVolume('Kitchen', 40);
  assert.deepEqual(result, { ok: true, message: 'Volume set to 40% (Master)' });
  assert.equal(context.store.getPlayer('Kitchen')?.volume, 40);
});

test('a volume the mixer rejects is not remembered', async () => {
  const { context } = await makeTestContext();
  const result = await context.players.setPlayerVolume('Kitchen', 40);
  assert.equal(result.ok, false);
  assert.equal(result.message, 'Audio mixer control not available');
  assert.equal(context.store.getPlayer('Kitchen')?.volume, 75);
  assert.equal((await context.players.setPlayerVolume('Ghost', 40)).message, "Player 'Ghost' not found");
});

test('a volume that cannot be saved is reported', async () => {
  const { context, storage } = await makeTestContext();
  storage.failWrites = true;
  const result = await context.players.setPlayerVolume('Office', 30);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, 'persist_failed');
  }
});

test('player volume reads go through the provider', async () => {
  const { context, commands } = await makeTestContext();
  commands.respond('amixer -c 1 sget Master', completed('  Mono: Playback 20 [33%]'));
  assert.equal(await context.players.getPlayerVolume('Kitchen'), 33);
  assert.equal(await context.players.getPlayerVolume('Office'), 75);
});

test('now playing is only offered by players with a metadata feed', async () => {
  const { context, connector } = await makeTestContext();
  assert.equal(await context.players.getNowPlaying('Kitchen'), null);
  const nowPlaying = await context.players.getNowPlaying('Den');
  assert.ok(nowPlaying);
  assert.equal(nowPlaying.metadata.isPlaying, false);
  assert.equal(nowPlaying.stale, false);
  assert.equal(nowPlaying.progressPercent, 0);
  assert.deepEqual(connector.urls, ['ws://music.local:8927']);
  await context.metadata.stopAll();
});

test('now playing staleness follows the configured threshold', async () => {
  const { context, clock } = await makeTestContext((config) => {
    config.metadata.staleThresholdMs = 1_000;
  });
  assert.equal((await context.players.getNowPlaying('Den'))?.stale, false);
  clock.advance(2_000);
  assert.equal((await context.players.getNowPlaying('Den'))?.stale, true);
  await context.metadata.stopAll();
});

test('restore starts configured players that are not running', async () => {
  const { context, processes } = await makeTestContext();
  await context.players.startPlayer('Office');
  const restored = await context.players.restorePlayers(['Ghost', 'Office', 'Kitchen']);
  assert.deepEqual(restored, ['Kitchen']);
  assert.equal(processes.spawned.length, 2);
  await context.supervisor.stopAll();
});

test('autostart skips disabled players', async () => {
  const { context } = await makeTestContext();
  assert.deepEqual(await context.players.autostartPlayers(), ['Kitchen']);
  assert.deepEqual(await context.players.autostartPlayers(), []);
  await context.supervisor.stopAll();
});

test('providers and devices are listed', async () => {
  const { context, commands } = await makeTestContext();
  commands.install('squeezelite');
  assert.deepEqual(
    (await context.players.getProviders()).map((provider) => provider.type),
    ['squeezelite'],
  );
  assert.deepEqual(
    (await context.players.getDevices()).map((device) => device.id),
    ['null', 'default', 'dmix'],
  );
  assert.deepEqual(await context.players.getMixerControls('null'), ['Master', 'PCM']);
});
