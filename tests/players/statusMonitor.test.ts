import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { RunningStateStore } from '../../src/application/players/runningStateStore';
import { StatusMonitor, type StatusSnapshot } from '../../src/application/players/statusMonitor';
import { ManualClock } from '../fakes/clock';
import { MemoryStorage } from '../fakes/memoryStorage';

const makeMonitor = (intervalMs = 60_000) => {
  let statuses: StatusSnapshot = { Kitchen: true, Den: false };
  const storage = new MemoryStorage();
  const state = new RunningStateStore(storage, 'state.json', new ManualClock());
  const monitor = new StatusMonitor({ getAllStatuses: () => statuses }, state, intervalMs);
  return {
    monitor,
    storage,
    set: (next: StatusSnapshot) => {
      statuses = next;
    },
  };
};

test('listeners hear only changed snapshots', async () => {
  const { monitor, storage, set } = makeMonitor();
  const seen: StatusSnapshot[] = [];
  monitor.onChange((statuses) => seen.push(statuses));

  await monitor.poll();
  await monitor.poll();
  set({ Kitchen: false, Den: false });
  await monitor.poll();

  assert.deepEqual(seen, [
    { Kitchen: true, Den: false },
    { Kitchen: false, Den: false },
  ]);
  assert.equal(storage.writes, 2);
});

test('each change is written to the running-state file', async () => {
  const { monitor, storage } = makeMonitor();
  await monitor.poll();
  const saved = storage.read('state.json');
  assert.ok(saved !== null && typeof saved === 'object');
  assert.deepEqual(
    Object.entries(saved).filter(([key]) => key !== 'timestamp'),
    [
      ['runningPlayers', ['Kitchen']],
      ['totalPlayers', 2],
    ],
  );
});

test('a failing listener does not stop the others', async () => {
  const { monitor } = makeMonitor();
  let calls = 0;
  monitor.onChange(() => {
    throw new Error('listener broke');
  });
  const unsubscribe = monitor.onChange(() => {
    calls += 1;
  });
  await monitor.poll();
  unsubscribe();
  assert.equal(calls, 1);
});

test('the interval polls until stopped', async () => {
  const { monitor, set } = makeMonitor(5);
  const seen: StatusSnapshot[] = [];
  monitor.onChange((statuses) => seen.push(statuses));
  monitor.start();
  await new Promise((resolve) => setTimeout(resolve, 60));
  set({ Kitchen: true, Den: true });
  await new Promise((resolve) => setTimeout(resolve, 60));
  await monitor.stop();
  const count = seen.length;
  await new Promise((resolve) => setTimeout(resolve, 20));
  assert.equal(count, 2);
  assert.equal(seen.length, 2);
});
