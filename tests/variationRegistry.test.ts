import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  DuplicateVariationError,
  InvalidVariationValueError,
  UnknownVariationError,
  UnresolvableVariationError,
  VariationRegistryLockedError,
} from '../src/errors.js';
import { VariationRegistry } from '../src/variation/registry.js';
import { deriveVariationSeed, sampleUniform } from '../src/variation/sampling.js';
import type { VariationDomain } from '../src/variation/types.js';

const HASH = 'ab'.repeat(32);
const ORDER = { kind: 'finite', values: ['Dog', 'Snake'] } as const;

test('registering the same variation twice fails', () => {
  const registry = new VariationRegistry();
  registry.register('Order', ORDER);
  assert.throws(() => registry.register('Order', ORDER), DuplicateVariationError);
  assert.throws(() => registry.register('Empty', { kind: 'finite', values: [] }), RangeError);
  assert.throws(() => registry.register('Bad', ORDER, 'Cat'), InvalidVariationValueError);
});

test('planning mode prefers pins, then defaults, then samples', () => {
  const registry = new VariationRegistry({ mode: 'planning', seed: 7, encounterHash: HASH });
  registry.register('Pinned', ORDER, 'Dog');
  registry.register('Defaulted', ORDER, 'Snake');
  registry.register('Sampled', ORDER);
  registry.pin('Pinned', 'Snake');

  assert.equal(registry.resolve('Pinned', { resolvedBy: 'Pull#0' }), 'Snake');
  assert.equal(registry.resolve('Defaulted'), 'Snake');
  const sampled = registry.resolve('Sampled');
  assert.ok(sampled === 'Dog' || sampled === 'Snake');

  assert.deepEqual(
    registry.resolutions().map((resolution) => [resolution.variationId, resolution.source, resolution.sequence]),
    [
      ['Pinned', 'pinned', 0],
      ['Defaulted', 'default', 1],
      ['Sampled', 'sampled', 2],
    ],
  );
  assert.equal(registry.resolution('Pinned')?.resolvedBy, 'Pull#0');
});

test('resolution is idempotent until reset', () => {
  const registry = new VariationRegistry({ mode: 'simulation', seed: 3, encounterHash: HASH });
  registry.register('Order', ORDER);
  const first = registry.resolve('Order');
  for (let i = 0; i < 5; i++) {
    assert.equal(registry.resolve('Order'), first);
  }
  assert.equal(registry.resolutions().length, 1);
  registry.reset('Order');
  assert.equal(registry.peek('Order'), undefined);
  assert.equal(registry.resolutions().length, 0);
  // Sampling depends only on the hash, id and seed, so the same value comes back.
  assert.equal(registry.resolve('Order'), first);
});

test('sampling does not depend on resolution order', () => {
  const values = ['a', 'b', 'c', 'd', 'e'];
  const domain: VariationDomain = { kind: 'finite', values };
  fc.assert(
    fc.property(fc.integer({ min: 0, max: 0xffffffff }), (seed) => {
      const forward = new VariationRegistry({ mode: 'simulation', seed, encounterHash: HASH });
      const backward = new VariationRegistry({ mode: 'simulation', seed, encounterHash: HASH });
      for (const registry of [forward, backward]) {
        registry.register('X', domain);
        registry.register('Y', domain);
      }
      const x = forward.resolve('X');
      const y = forward.resolve('Y');
      assert.equal(backward.resolve('Y'), y);
      assert.equal(backward.resolve('X'), x);
      assert.ok(values.includes(x));
    }),
    { numRuns: 50 },
  );
});

test('simulation mode samples even when a default exists', () => {
  const seed = deriveVariationSeed(HASH, 'Order', 11);
  const expected = sampleUniform(ORDER.values, seed);
  const registry = new VariationRegistry({ mode: 'simulation', seed: 11, encounterHash: HASH });
  registry.register('Order', ORDER, 'Dog');
  registry.pin('Order', 'Dog');
  assert.equal(registry.resolve('Order'), expected);
  assert.equal(registry.resolution('Order')?.source, 'sampled');
});

test('symbolic variations resolve to their default or fail', () => {
  const registry = new VariationRegistry();
  registry.register('Tether', { kind: 'symbolic', description: 'who gets the tether' }, 'north');
  registry.register('Spread', { kind: 'symbolic' });
  assert.equal(registry.resolve('Tether'), 'north');
  assert.throws(() => registry.resolve('Spread'), UnresolvableVariationError);
  registry.pin('Spread', 'clockwise');
  assert.equal(registry.resolve('Spread'), 'clockwise');
});

test('references to symbolic variations need a value to resolve to', () => {
  const registry = new VariationRegistry();
  registry.register('Spread', { kind: 'symbolic' });
  const references = [{ variationId: 'Spread', segmentId: 'Resolve' }];
  assert.equal(registry.isResolvable('Spread'), false);
  assert.throws(() => registry.validateReferences(references), UnresolvableVariationError);
  registry.pin('Spread', 'clockwise');
  assert.equal(registry.isResolvable('Spread'), true);
  registry.validateReferences(references);

  const simulation = new VariationRegistry({ mode: 'simulation' });
  simulation.register('Spread', { kind: 'symbolic' });
  simulation.pin('Spread', 'clockwise');
  assert.equal(simulation.isResolvable('Spread'), false);
});

test('a frozen registry rejects authoring operations but still resolves', () => {
  const registry = VariationRegistry.fromDeclarations([{ id: 'Order', domain: ORDER, default: 'Dog' }]);
  registry.freeze();
  assert.throws(() => registry.pin('Order', 'Snake'), VariationRegistryLockedError);
  assert.throws(() => registry.reset(), VariationRegistryLockedError);
  assert.throws(() => registry.register('Other', ORDER), VariationRegistryLockedError);
  assert.equal(registry.resolve('Order'), 'Dog');
  registry.thaw();
  registry.reset();
  registry.pin('Order', 'Snake');
  assert.equal(registry.resolve('Order'), 'Snake');
});

test('unknown variations and invalid pins are reported', () => {
  const registry = VariationRegistry.fromDeclarations([{ id: 'Order', domain: ORDER }]);
  assert.throws(() => registry.pin('Order', 'Cat'), InvalidVariationValueError);
  assert.throws(() => registry.resolve('Missing'), UnknownVariationError);
  assert.throws(
    () =>
      registry.validateReferences([
        { variationId: 'Order', segmentId: 'DogSnakeChoice' },
        { variationId: 'Tether', segmentId: 'Resolve' },
      ]),
    (error: unknown) => {
      assert.ok(error instanceof UnknownVariationError);
      assert.equal(error.variationId, 'Tether');
      assert.equal(error.segmentId, 'Resolve');
      return true;
    },
  );
});
