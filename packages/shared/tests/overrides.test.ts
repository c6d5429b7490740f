import assert from 'node:assert/strict';
import { test } from 'node:test';

import { buildOverrideKeys, resolveConfigOverrides, resolveOverrides, type IndexedEntry } from '../src';

function entry(id: string): IndexedEntry {
  return { id, name: null, kind: 'pack', path: `/packs/${id.replace(/:/g, '-')}` };
}

const e1 = entry('acme');
const e2 = entry('acme:ops');
const e3 = entry('acme:ops:bob');
const globalEntry = entry('global');
const entries = [e1, e2, e3, globalEntry];

test('builds candidate keys from most to least specific', () => {
  assert.deepEqual(buildOverrideKeys({ tenant: 'acme', team: 'ops', user: 'bob' }), [
    'acme:ops:bob',
    'acme:ops',
    'acme'
  ]);
  assert.deepEqual(buildOverrideKeys({ tenant: 'acme', user: 'bob' }), ['acme']);
  assert.deepEqual(buildOverrideKeys({ team: 'ops' }), []);
});

test('resolves every matching level in specificity order', () => {
  const resolution = resolveOverrides(entries, { tenant: 'acme', team: 'ops', user: 'bob' });
  assert.deepEqual(resolution.matched, [e3, e2, e1]);
  assert.deepEqual(resolution.matchedKeys, ['acme:ops:bob', 'acme:ops', 'acme']);
  assert.deepEqual(resolution.missingKeys, []);
});

test('partial matches report the missing keys', () => {
  const resolution = resolveOverrides(entries, { tenant: 'acme', team: 'ops', user: 'carol' });
  assert.deepEqual(resolution.matched, [e2, e1]);
  assert.deepEqual(resolution.missingKeys, ['acme:ops:carol']);
});

test('a total miss returns the unfiltered set', () => {
  const resolution = resolveOverrides(entries, { tenant: 'other' });
  assert.deepEqual(resolution.matched, entries);
  assert.deepEqual(resolution.matchedKeys, []);
  assert.deepEqual(resolution.missingKeys, ['other']);
});

test('no selectors returns every entry with empty key lists', () => {
  const resolution = resolveOverrides(entries, {});
  assert.deepEqual(resolution.matched, entries);
  assert.deepEqual(resolution.matchedKeys, []);
  assert.deepEqual(resolution.missingKeys, []);
});

test('config overrides layer from least to most specific', () => {
  const result = resolveConfigOverrides(
    { timeoutMs: 1000, region: 'eu' },
    [
      { id: 'acme', value: { timeoutMs: 2000, region: 'us' } },
      { id: 'acme:ops', value: { timeoutMs: 3000 } }
    ],
    { tenant: 'acme', team: 'ops' }
  );
  assert.deepEqual(result.value, { timeoutMs: 3000, region: 'us' });
  assert.deepEqual(result.appliedKeys, ['acme:ops', 'acme']);
  assert.deepEqual(result.missingKeys, []);
});

test('config overrides keep the base on a total miss', () => {
  const result = resolveConfigOverrides({ timeoutMs: 1000 }, [{ id: 'acme', value: { timeoutMs: 1 } }], {
    tenant: 'other'
  });
  assert.deepEqual(result.value, { timeoutMs: 1000 });
  assert.deepEqual(result.missingKeys, ['other']);
});
