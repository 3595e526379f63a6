import test from 'node:test';
import assert from 'node:assert/strict';

import { OutsideLifetimeError, UnknownScriptError } from '../src/errors.js';
import { SourceWorld } from '../src/world/sourceWorld.js';
import { entity, staticScript } from './support/builders.js';

const buildWorld = () =>
  new SourceWorld(
    [entity('boss', 'boss'), entity('mt'), entity('orb', 'marker'), entity('dog', 'boss')],
    [
      {
        entityId: 'orb',
        segmentId: 'Phase',
        spawn: 1,
        despawn: 5,
        position: {
          interpolation: 'linear',
          keyframes: [
            { time: 3, value: { x: 10, y: 0 } },
            { time: 1, value: { x: 0, y: 0 } },
          ],
        },
        rotation: { interpolation: 'linear', keyframes: [{ time: 1, value: 0 }, { time: 5, value: Math.PI }] },
        visual: [
          { time: 1, value: 'charging' },
          { time: 2, value: 'active' },
        ],
      },
      staticScript('boss', 'Phase', 0, 10, { x: 0, y: 0 }),
      staticScript('mt', 'Phase', 0, 10, { x: 0, y: -3 }),
      staticScript('dog', 'Phase', 2, 4, { x: 0, y: 8 }, { condition: { variationId: 'Order', equals: 'Dog' } }),
    ],
  );

test('sample interpolates position linearly and steps visuals', () => {
  const world = buildWorld();
  const state = world.sample('orb', 'Phase', 2);
  assert.deepEqual(state.position, { x: 5, y: 0 });
  assert.equal(state.visual, 'active');
  assert.equal(state.rotation, Math.PI / 4);

  const early = world.sample('orb', 'Phase', 1.5);
  assert.equal(early.visual, 'charging');
  assert.deepEqual(early.position, { x: 2.5, y: 0 });

  assert.deepEqual(world.sample('orb', 'Phase', 4).position, { x: 10, y: 0 });
});

test('step tracks hold their previous keyframe', () => {
  const world = new SourceWorld(
    [entity('p1')],
    [
      {
        entityId: 'p1',
        segmentId: 'Phase',
        spawn: 0,
        despawn: 10,
        position: {
          keyframes: [
            { time: 0, value: { x: 0, y: 0 } },
            { time: 4, value: { x: 4, y: 4 } },
          ],
        },
      },
    ],
  );
  assert.deepEqual(world.sample('p1', 'Phase', 3.9).position, { x: 0, y: 0 });
  assert.deepEqual(world.sample('p1', 'Phase', 4).position, { x: 4, y: 4 });
  assert.equal(world.sample('p1', 'Phase', 5).visual, 'default');
});

test('sample rejects times outside the lifetime and unknown scripts', () => {
  const world = buildWorld();
  assert.throws(
    () => world.sample('orb', 'Phase', 5),
    (error: unknown) => {
      assert.ok(error instanceof OutsideLifetimeError);
      assert.deepEqual(error.window, [1, 5]);
      return true;
    },
  );
  assert.throws(() => world.sample('orb', 'Phase', 0.5), OutsideLifetimeError);
  assert.throws(() => world.sample('orb', 'Other', 2), UnknownScriptError);
  assert.throws(() => world.script('ghost', 'Phase'), UnknownScriptError);
  assert.deepEqual(world.spawnWindow('orb', 'Phase'), { start: 1, end: 5 });
});

test('entitiesActiveDuring uses half-open intervals and instants', () => {
  const world = buildWorld();
  assert.deepEqual([...world.entitiesActiveDuring('Phase', 0, 0)].sort(), ['boss', 'mt']);
  assert.deepEqual([...world.entitiesActiveDuring('Phase', 0, 1)].sort(), ['boss', 'mt']);
  assert.deepEqual([...world.entitiesActiveDuring('Phase', 1, 1)].sort(), ['boss', 'mt', 'orb']);
  assert.deepEqual([...world.entitiesActiveDuring('Phase', 5, 5)].sort(), ['boss', 'mt']);
  assert.deepEqual([...world.entitiesActiveDuring('Phase', 4.5, 6)].sort(), ['boss', 'mt', 'orb']);
  assert.deepEqual([...world.entitiesActiveDuring('Missing', 0, 10)], []);
});

test('conditional scripts follow the variation lookup', () => {
  const world = buildWorld();
  const withDog = world.entitiesActiveDuring('Phase', 3, 3, (id) => (id === 'Order' ? 'Dog' : undefined));
  const withSnake = world.entitiesActiveDuring('Phase', 3, 3, (id) => (id === 'Order' ? 'Snake' : undefined));
  const unresolved = world.entitiesActiveDuring('Phase', 3, 3, () => undefined);
  const unfiltered = world.entitiesActiveDuring('Phase', 3, 3);
  assert.equal(withDog.has('dog'), true);
  assert.equal(withSnake.has('dog'), false);
  assert.equal(unresolved.has('dog'), false);
  assert.equal(unfiltered.has('dog'), true);
});

test('setScript replaces the script for the same entity and segment', () => {
  const world = buildWorld();
  world.setScript(staticScript('mt', 'Phase', 2, 3, { x: 1, y: 1 }));
  assert.deepEqual(world.spawnWindow('mt', 'Phase'), { start: 2, end: 3 });
  assert.equal(world.scriptsFor('Phase').length, 4);
  assert.equal(world.removeScript('mt', 'Phase'), true);
  assert.equal(world.removeScript('mt', 'Phase'), false);
  assert.equal(world.findScript('mt', 'Phase'), undefined);
});

test('validate reports broken scripts and motion cycles', () => {
  const world = new SourceWorld(
    [entity('a', 'marker'), entity('b', 'marker')],
    [
      staticScript('a', 'Phase', 0, 5, { x: 0, y: 0 }, { motion: { kind: 'chase', target: 'b', speed: 1 } }),
      staticScript('b', 'Phase', 0, 5, { x: 1, y: 0 }, { motion: { kind: 'chase', target: 'a', speed: 0 } }),
      staticScript('ghost', 'Phase', 3, 3, { x: 0, y: 0 }),
      staticScript('a', 'Elsewhere', 0, 1, { x: 0, y: 0 }),
    ],
  );
  const codes = world.validate(new Set(['Phase'])).map((issue) => issue.code);
  assert.deepEqual(codes.sort(), [
    'motion/cycle',
    'motion/speed',
    'script/empty-lifetime',
    'script/unknown-entity',
    'script/unknown-segment',
  ]);
  assert.deepEqual(buildWorld().validate(new Set(['Phase'])), []);
});
