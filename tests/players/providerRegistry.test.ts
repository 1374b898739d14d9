import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { ProviderNotFoundError } from '../../src/domain/players/errors';
import { FakeCommandPort } from '../fakes/commandPort';
import { makeProviderRegistry } from '../fakes/providers';

const makeRegistry = (commands = new FakeCommandPort()) => makeProviderRegistry(commands).registry;

test('registry resolves providers by the provider field', () => {
  const registry = makeRegistry();
  assert.equal(registry.getForPlayer({ provider: 'sendspin', name: 'Den' }).type, 'sendspin');
  assert.equal(registry.getForPlayer({ name: 'Den' }).type, 'squeezelite');
  assert.equal(registry.get('snapcast'), null);
  assert.equal(registry.has('sendspin'), true);
  assert.equal(registry.getOrDefault(null)?.type, 'squeezelite');
});

test('registry rejects unknown provider types', () => {
  const registry = makeRegistry();
  assert.throws(() => registry.getForPlayer({ provider: 'snapcast' }), ProviderNotFoundError);
  assert.deepEqual(registry.validatePlayerConfig({ provider: 'snapcast', name: 'Den' }), [
    { field: 'provider', message: 'Unknown provider type: snapcast' },
  ]);
  assert.deepEqual(registry.preparePlayerConfig({ provider: 'snapcast' }), { provider: 'snapcast' });
});

test('registry lists providers in registration order', async () => {
  const registry = makeRegistry(new FakeCommandPort().install('sendspin'));
  assert.deepEqual(await registry.listProviders(), ['squeezelite', 'sendspin']);
  assert.deepEqual(await registry.listProviders(true), ['sendspin']);
});

test('default available provider falls back to the first installed one', async () => {
  assert.equal(await makeRegistry(new FakeCommandPort().install('sendspin')).getDefaultAvailableProvider(), 'sendspin');
  assert.equal(
    await makeRegistry(new FakeCommandPort().install('sendspin', 'squeezelite')).getDefaultAvailableProvider(),
    'squeezelite',
  );
  assert.equal(await makeRegistry().getDefaultAvailableProvider(), null);
});

test('provider info reports availability', async () => {
  const registry = makeRegistry(new FakeCommandPort().install('squeezelite'));
  assert.deepEqual(await registry.getProviderInfo(), [
    { type: 'squeezelite', displayName: 'Squeezelite', binary: 'squeezelite', available: true },
  ]);
  assert.deepEqual(
    (await registry.getProviderInfo(false)).map((info) => [info.type, info.available]),
    [
      ['squeezelite', true],
      ['sendspin', false],
    ],
  );
});
