import test from 'node:test';
import assert from 'node:assert/strict';

import { hashEncounter, encounterToJson } from '../src/encounter/serializer.js';
import {
  hashCanonicalJson,
  hashCanonicalJsonString,
  writeCanonicalJson,
} from '../src/serialization/canonicalJson.js';
import { encounter, entity, segment, staticScript } from './support/builders.js';

test('canonical JSON sorts keys and normalizes -0 and undefined', () => {
  const json = writeCanonicalJson({
    beta: 2,
    alpha: {
      gamma: -0,
      delta: [1, undefined, -0],
      skipped: undefined,
    },
  });
  assert.equal(json, '{"alpha":{"delta":[1,null,0],"gamma":0},"beta":2}');
});

test('canonical JSON flattens maps into sorted objects', () => {
  const json = writeCanonicalJson(
    new Map<string, number>([
      ['b', 1],
      ['a', 2],
    ]),
  );
  assert.equal(json, '{"a":2,"b":1}');
});

test('canonical JSON keeps map entries with non-string keys', () => {
  const json = writeCanonicalJson(
    new Map<number, string>([
      [2, 'two'],
      [10, 'ten'],
    ]),
  );
  assert.equal(json, '{"10":"ten","2":"two"}');
  assert.equal(writeCanonicalJson({ 2: 'two', 10: 'ten' }), json);
});

test('canonical JSON indents nested values', () => {
  assert.equal(writeCanonicalJson({ b: 1, a: [1] }, { indent: 2 }), '{\n  "a": [\n    1\n  ],\n  "b": 1\n}');
});

test('canonical JSON rejects non-finite numbers', () => {
  assert.throws(() => writeCanonicalJson({ value: Number.NaN }), TypeError);
  assert.throws(() => writeCanonicalJson([Number.POSITIVE_INFINITY]), TypeError);
});

test('canonical hashing ignores key order', () => {
  const left = hashCanonicalJson({ a: 1, b: { c: [1, 2] } });
  const right = hashCanonicalJson({ b: { c: [1, 2] }, a: 1 });
  assert.equal(left.json, right.json);
  assert.equal(left.hash, right.hash);
  assert.match(left.hash, /^[0-9a-f]{64}$/);
  assert.equal(hashCanonicalJsonString(left.json), left.hash);
  assert.notEqual(hashCanonicalJson({ a: 2, b: { c: [1, 2] } }).hash, left.hash);
});

const buildSample = (name: string, order: 'forward' | 'reverse') => {
  const entities = [entity('mt'), entity('boss', 'boss')];
  return {
    ...encounter(
      'Pull',
      [segment('Pull', { keyframes: [{ id: 'end', time: 10 }] })],
      order === 'forward' ? entities : [...entities].reverse(),
      [staticScript('mt', 'Pull', 0, 10, { x: 0, y: 1 }), staticScript('boss', 'Pull', 0, 10, { x: 0, y: 0 })],
    ),
    metadata: { name },
  };
};

test('encounter hash ignores metadata and authoring order', () => {
  const first = buildSample('First', 'forward');
  const second = buildSample('Second', 'reverse');
  assert.equal(hashEncounter(first), hashEncounter(second));
  assert.notEqual(encounterToJson(first), encounterToJson(second));

  const moved = {
    ...first,
    scripts: [staticScript('mt', 'Pull', 0, 10, { x: 0, y: 2 }), first.scripts[1]],
  };
  assert.notEqual(hashEncounter(moved), hashEncounter(first));
});
