import assert from 'node:assert/strict';
import { test } from 'node:test';

import { isJsonObject, jsonEquals, mergeJson, normalizeStringValue, parseJsonOrString, type JsonValue } from '../src';

test('mergeJson unions nested objects with right-hand precedence', () => {
  assert.deepEqual(mergeJson({ a: 1, b: { x: 1 } }, { b: { y: 2 } }), { a: 1, b: { x: 1, y: 2 } });
});

test('mergeJson replaces objects with scalars and arrays', () => {
  assert.deepEqual(mergeJson({ b: { x: 1 } }, { b: 5 }), { b: 5 });
  assert.deepEqual(mergeJson({ list: [1, 2, 3] }, { list: [4] }), { list: [4] });
  assert.deepEqual(mergeJson({ b: { x: 1 } }, { b: null }), { b: null });
});

test('mergeJson keeps a parsed __proto__ key as data', () => {
  const overlay: JsonValue = JSON.parse('{"__proto__": {"polluted": true}, "a": 1}');
  const merged = mergeJson({ a: 0 }, overlay);

  assert.ok(isJsonObject(merged));
  assert.equal(Object.getPrototypeOf(merged), Object.prototype);
  assert.deepEqual(Object.keys(merged), ['a', '__proto__']);
  assert.equal(merged.a, 1);
  assert.equal('polluted' in merged, false);
  assert.equal('polluted' in {}, false);
});

test('mergeJson does not mutate its inputs', () => {
  const base = { nested: { keep: true } };
  const merged = mergeJson(base, { nested: { added: 1 } });
  assert.deepEqual(base, { nested: { keep: true } });
  assert.deepEqual(merged, { nested: { keep: true, added: 1 } });
});

test('jsonEquals compares documents structurally', () => {
  assert.equal(jsonEquals({ msg: 'hello', n: [1, 2] }, { n: [1, 2], msg: 'hello' }), true);
  assert.equal(jsonEquals({ msg: 'hello' }, { msg: 'bye' }), false);
  assert.equal(jsonEquals('1', 1), false);
});

test('parseJsonOrString falls back to the raw text', () => {
  assert.deepEqual(parseJsonOrString('{"msg":"hello"}'), { msg: 'hello' });
  assert.equal(parseJsonOrString('42'), 42);
  assert.equal(parseJsonOrString('not json'), 'not json');
});

test('normalizeStringValue trims and drops blanks', () => {
  assert.equal(normalizeStringValue('  acme '), 'acme');
  assert.equal(normalizeStringValue('   '), null);
  assert.equal(normalizeStringValue(12), null);
});
