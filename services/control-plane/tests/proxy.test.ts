import assert from 'node:assert/strict';
import test from 'node:test';

import { RUNNER_EVENT_CAPACITY, RunnerEventProxy, RunnerProxyStoppedError, synthesizeRunnerEvent } from '../src';
import { silentLogger } from './helpers';

function createProxy() {
  let clock = 0;
  return new RunnerEventProxy({ logger: silentLogger, now: () => ++clock });
}

test('synthesizes an echo result for each activity', () => {
  assert.deepEqual(synthesizeRunnerEvent({ flow: 'welcome', tenant: 'acme', payload: { text: 'hi' } }, 10), {
    timestampMs: 10,
    flow: 'welcome',
    tenant: 'acme',
    team: null,
    user: null,
    payload: { text: 'hi' },
    result: { flow: 'welcome', echo: { text: 'hi' }, status: 'ok' }
  });
});

test('keeps only the most recent events once the ring is full', async () => {
  const proxy = createProxy();
  for (let index = 0; index <= RUNNER_EVENT_CAPACITY; index += 1) {
    proxy.submit({ kind: 'emit-activity', activity: { flow: `flow-${index}` } });
  }
  await proxy.whenIdle();

  const events = proxy.events();
  assert.equal(events.length, 100);
  assert.equal(events[0]?.flow, 'flow-1');
  assert.equal(events.at(-1)?.flow, 'flow-100');
});

test('applies commands in submission order', async () => {
  const proxy = createProxy();
  const recorded = await Promise.all(
    ['a', 'b', 'c', 'd'].map((flow) => proxy.emitActivity({ flow }))
  );

  assert.deepEqual(
    recorded.map((event) => [event.flow, event.timestampMs]),
    [
      ['a', 1],
      ['b', 2],
      ['c', 3],
      ['d', 4]
    ]
  );

  proxy.submit({
    kind: 'reload-index',
    index: [{ id: 'acme', name: null, kind: null, path: '/packs/acme' }],
    defaults: { tenant: 'acme', team: null }
  });
  await proxy.clearEvents();
  const after = await proxy.emitActivity({ flow: 'e' });

  assert.deepEqual(proxy.index(), {
    entries: [{ id: 'acme', name: null, kind: null, path: '/packs/acme' }],
    defaults: { tenant: 'acme', team: null },
    reloadedAtEpochMs: 5
  });
  assert.equal(after.timestampMs, 6);
  assert.deepEqual(
    proxy.events().map((event) => event.flow),
    ['e']
  );
});

test('submit does not apply commands synchronously', async () => {
  const proxy = createProxy();
  proxy.submit({ kind: 'emit-activity', activity: { flow: 'later' } });
  assert.equal(proxy.events().length, 0);
  await proxy.whenIdle();
  assert.equal(proxy.events().length, 1);
});

test('readers receive copies', async () => {
  const proxy = createProxy();
  await proxy.emitActivity({ flow: 'welcome', payload: { n: 1 } });

  const [event] = proxy.events();
  assert.ok(event);
  event.flow = 'mutated';
  assert.equal(proxy.events()[0]?.flow, 'welcome');
});

test('submissions after stop are dropped', async () => {
  const proxy = createProxy();
  proxy.submit({ kind: 'emit', message: 'before stop' });
  proxy.submit({ kind: 'emit-activity', activity: { flow: 'queued' } });
  await proxy.stop();

  assert.equal(proxy.events().length, 1);
  assert.equal(proxy.submit({ kind: 'emit', message: 'after stop' }), false);
  await assert.rejects(proxy.emitActivity({ flow: 'late' }), RunnerProxyStoppedError);
});
