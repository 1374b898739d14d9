import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { AudioController } from '../../src/adapters/audio/audioController';
import { FakeCommandPort, completed } from '../fakes/commandPort';

test('device list puts fallback devices before hardware', async () => {
  const commands = new FakeCommandPort().respond(
    'aplay -l',
    completed('card 1: USB [USB Audio], device 0: USB Audio [USB Audio]\n'),
  );
  const devices = await new AudioController(commands).listDevices();
  assert.deepEqual(
    devices.map((device) => device.id),
    ['null', 'default', 'dmix', 'hw:1,0'],
  );
  assert.equal(devices[3].name, 'USB (hw:1,0)');
});

test('device list falls back when aplay is missing', async () => {
  const devices = await new AudioController(new FakeCommandPort()).listDevices();
  assert.deepEqual(
    devices.map((device) => device.id),
    ['null', 'default', 'dmix'],
  );
});

test('mixer controls of virtual devices use defaults without running amixer', async () => {
  const commands = new FakeCommandPort();
  const controls = await new AudioController(commands).listMixerControls('default');
  assert.deepEqual(controls, ['Master', 'PCM']);
  assert.deepEqual(commands.calls, []);
});

test('mixer controls come from amixer scontrols for hardware cards', async () => {
  const commands = new FakeCommandPort().respond(
    'amixer -c 1 scontrols',
    completed("Simple mixer control 'Speaker',0\nSimple mixer control 'Mic',0\n"),
  );
  const controls = await new AudioController(commands).listMixerControls('hw:1,0');
  assert.deepEqual(controls, ['Speaker', 'Mic']);
});

test('volume read tries controls in order', async () => {
  const commands = new FakeCommandPort()
    .respond('amixer -c 0 sget Master', completed('', 1, "Unable to find simple control 'Master',0"))
    .respond('amixer -c 0 sget PCM', completed('  Mono: Playback 150 [59%] [-10.00dB]'));
  const volume = await new AudioController(commands).getVolume('hw:0,0');
  assert.equal(volume, 59);
  assert.deepEqual(commands.calls, ['amixer -c 0 sget Master', 'amixer -c 0 sget PCM']);
});

test('volume read reports the default for virtual devices and missing amixer', async () => {
  const controller = new AudioController(new FakeCommandPort());
  assert.equal(await controller.getVolume('null'), 75);
  assert.equal(await controller.getVolume('hw:0,0'), 75);
});

test('volume write rejects out-of-range values before touching the mixer', async () => {
  const commands = new FakeCommandPort();
  const result = await new AudioController(commands).setVolume('hw:0,0', 101);
  assert.equal(result.ok, false);
  assert.equal(result.message, 'Volume must be between 0 and 100');
  assert.deepEqual(commands.calls, []);
});

test('volume write on a virtual device succeeds without hardware', async () => {
  const result = await new AudioController(new FakeCommandPort()).setVolume('dmix', 30);
  assert.deepEqual(result, { ok: true, message: 'Volume set to 30% (virtual device)' });
});

test('volume write uses the first control amixer accepts', async () => {
  const commands = new FakeCommandPort()
    .respond('amixer -c 2 sset Master 45%', completed('', 1, 'no such control'))
    .respond('amixer -c 2 sset PCM 45%', completed('', 1, 'no such control'))
    .respond('amixer -c 2 sset Speaker 45%', completed("Simple mixer control 'Speaker',0"));
  const result = await new AudioController(commands).setVolume('plughw:2,0', 45);
  assert.deepEqual(result, { ok: true, message: 'Volume set to 45% (Speaker)' });
});

test('volume write fails when no control accepts it', async () => {
  const commands = new FakeCommandPort();
  for (const control of ['Master', 'PCM', 'Speaker', 'Headphone', 'Digital']) {
    commands.respond(`amixer -c 0 sset ${control} 10%`, completed('', 1, 'no such control'));
  }
  const result = await new AudioController(commands).setVolume('hw:0,0', 10);
  assert.equal(result.ok, false);
  assert.equal(result.message, 'No working volume controls found for device hw:0,0: no such control');
  if (!result.ok) {
    assert.equal(result.error.code, 'mixer_unavailable');
  }
});

test('volume write fails when amixer is missing', async () => {
  const result = await new AudioController(new FakeCommandPort()).setVolume('hw:0,0', 10);
  assert.equal(result.ok, false);
  assert.equal(result.message, 'Audio mixer control not available');
});
