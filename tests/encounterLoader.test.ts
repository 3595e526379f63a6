import test from 'node:test';
import assert from 'node:assert/strict';

import { loadEncounter, loadEncounterFromFile, loadEncounterFromJson } from '../src/encounter/loader.js';
import { encounterToJson } from '../src/encounter/serializer.js';
import { AmbiguousPlacementError, EncounterValidationError, UnknownVariationError } from '../src/errors.js';
import { FIXTURE_PATH, readFixture } from './support/builders.js';

const replaceOnce = (text: string, search: string, replacement: string) => {
  assert.equal(text.split(search).length, 2, `fixture should contain ${search} exactly once`);
  return text.replace(search, replacement);
};

test('the sample encounter loads into a playable session', async () => {
  const result = loadEncounterFromJson(await readFixture(), 'sample');
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  const { session } = result;
  assert.equal(result.sourceName, 'sample');
  assert.equal(session.graph.duration(session.graph.rootId), 30);
  assert.deepEqual(
    session.graph.allInstances().map((path) => path.map((step) => step.segmentId).join('/')),
    ['Pull', 'Pull/DogSnakeChoice', 'Pull/Resolve'],
  );
  assert.match(session.hash, /^[0-9a-f]{64}$/);
  assert.equal(session.metadata.name, 'Sample Trial');
  assert.deepEqual(result.issues.filter((issue) => issue.severity === 'error'), []);
  assert.equal(session.registry.isFrozen, true);
});

test('loading from a file names the source after the file', async () => {
  const result = await loadEncounterFromFile(FIXTURE_PATH);
  assert.equal(result.kind, 'success');
  assert.equal(result.sourceName, 'sample-encounter.json');
});

test('a reference to an undeclared variation fails the whole load', async () => {
  const json = replaceOnce(
    await readFixture(),
    '"variations": [{ "variationId": "Order", "mode": "reads" }]',
    '"variations": [{ "variationId": "Tether", "mode": "reads" }]',
  );
  const result = loadEncounterFromJson(json);
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.ok(result.error instanceof UnknownVariationError);
  assert.equal(result.error.variationId, 'Tether');
  assert.equal(result.error.segmentId, 'Resolve');
  assert.equal(result.message, 'Segment "Resolve" references unregistered variation "Tether"');
});

test('two placements with the same offset and duration are ambiguous', async () => {
  const placement = '{ "segmentId": "Resolve", "offset": 20 }';
  const json = replaceOnce(await readFixture(), placement, `${placement}, ${placement}`);
  const result = loadEncounterFromJson(json);
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.ok(result.error instanceof AmbiguousPlacementError);
  assert.equal(result.error.segmentId, 'Pull');
  assert.deepEqual(result.error.placements, [1, 2]);
});

test('duplicate variation declarations are rejected by the schema', async () => {
  const declaration = '{ "id": "Order", "domain": { "kind": "finite", "values": ["Dog", "Snake"] } }';
  const json = replaceOnce(await readFixture(), declaration, `${declaration}, ${declaration}`);
  const result = loadEncounterFromJson(json);
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.ok(result.error instanceof EncounterValidationError);
  assert.deepEqual(
    result.issues?.map((issue) => [issue.code, issue.path]),
    [['variation/duplicate', ['variations', 1]]],
  );
});

test('malformed payloads report issues instead of throwing', () => {
  const notAnObject = loadEncounter(42);
  assert.equal(notAnObject.kind, 'error');
  assert.equal(notAnObject.message, 'Encounter root must be an object');
  assert.equal(notAnObject.issues?.[0]?.code, 'encounter/type');

  const badJson = loadEncounterFromJson('{ "version": 1,', 'broken.json');
  assert.equal(badJson.kind, 'error');
  assert.equal(badJson.issues, undefined);
  assert.equal(badJson.sourceName, 'broken.json');

  const wrongVersion = loadEncounter({ version: 2, metadata: { name: 'Old' }, root: 'A', segments: [{ id: 'A' }] });
  assert.equal(wrongVersion.kind, 'error');
  assert.deepEqual(
    wrongVersion.issues?.map((issue) => issue.code),
    ['encounter/version'],
  );
});

test('warnings do not stop a load', async () => {
  const json = replaceOnce(await readFixture(), '{ "id": "cast", "time": 0 }', '{ "id": "cast", "time": -1 }');
  const result = loadEncounterFromJson(json);
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  const negative = result.issues.filter((issue) => issue.code === 'time/negative');
  assert.equal(negative.length, 1);
  assert.equal(negative[0].severity, 'warning');
  assert.deepEqual(negative[0].path, ['segments', 1, 'keyframes', 0, 'time']);
});

test('a minimal payload gets defaults filled in', () => {
  const result = loadEncounter({ version: 1, root: 'A', segments: [{ id: 'A', keyframes: [{ id: 'end', time: 4 }] }] });
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  assert.equal(result.session.metadata.name, 'Untitled encounter');
  assert.equal(result.session.graph.root.visibility, 'major');
  assert.equal(result.session.graph.duration('A'), 4);
  assert.deepEqual(
    result.issues.map((issue) => issue.code),
    ['metadata/type'],
  );
});

test('serialising and reloading keeps the content hash', async () => {
  const first = loadEncounterFromJson(await readFixture());
  assert.equal(first.kind, 'success');
  if (first.kind !== 'success') return;
  const second = loadEncounterFromJson(encounterToJson(first.encounter));
  assert.equal(second.kind, 'success');
  if (second.kind !== 'success') return;
  assert.equal(second.session.hash, first.session.hash);
  assert.equal(encounterToJson(second.encounter), encounterToJson(first.encounter));
});
