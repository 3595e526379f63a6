import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  AmbiguousPlacementError,
  OutOfRangeError,
  SegmentCycleError,
  UnknownSegmentError,
} from '../src/errors.js';
import { SegmentGraph } from '../src/timeline/graph.js';
import { instanceKey } from '../src/timeline/instance.js';
import { effectiveSnapshots } from '../src/timeline/normalize.js';
import type { Segment } from '../src/timeline/types.js';
import { segment } from './support/builders.js';

const pullGraph = () =>
  new SegmentGraph(
    [
      segment('Pull', {
        keyframes: [{ id: 'enrage', time: 30 }],
        children: [{ segmentId: 'DogSnakeChoice', offset: 10 }],
      }),
      segment('DogSnakeChoice', { keyframes: [{ id: 'end', time: 5 }] }),
    ],
    'Pull',
  );

test('duration is the max of own keyframes and child placements', () => {
  const shape = fc.array(
    fc.record({
      ends: fc.array(fc.integer({ min: 0, max: 40 }), { maxLength: 3 }),
      children: fc.array(
        fc.record({ target: fc.nat({ max: 20 }), offset: fc.integer({ min: 0, max: 50 }) }),
        { maxLength: 3 },
      ),
    }),
    { minLength: 1, maxLength: 6 },
  );
  fc.assert(
    fc.property(shape, (specs) => {
      const count = specs.length;
      // Children only point at later segments, so the graph is acyclic.
      const childLists = specs.map((spec, index) =>
        index === count - 1
          ? []
          : spec.children.map((child) => ({
              segmentId: `S${index + 1 + (child.target % (count - index - 1))}`,
              offset: child.offset,
            })),
      );
      const segments = specs.map((spec, index) =>
        segment(`S${index}`, {
          keyframes: spec.ends.map((time, k) => ({ id: `k${k}`, time })),
          children: childLists[index].map((child, k) => ({ ...child, repeat: k })),
        }),
      );
      const reference = (index: number): number => {
        let end = Math.max(0, ...specs[index].ends);
        for (const child of childLists[index]) {
          end = Math.max(end, child.offset + reference(Number(child.segmentId.slice(1))));
        }
        return end;
      };
      const graph = new SegmentGraph(segments, 'S0');
      specs.forEach((_, index) => {
        assert.equal(graph.duration(`S${index}`), reference(index));
      });
    }),
    { numRuns: 200 },
  );
});

test('resolve maps a timestamp onto the active instance path', () => {
  const graph = pullGraph();
  assert.equal(graph.duration('Pull'), 30);

  const inside = graph.resolve(12);
  assert.equal(inside.key, 'Pull#0/DogSnakeChoice#0');
  assert.equal(inside.localTime, 2);
  assert.deepEqual(inside.localTimes, [12, 2]);
  assert.equal(inside.path[1].start, 10);

  assert.equal(graph.resolve(15).key, 'Pull#0');
  assert.equal(graph.resolve(10).key, 'Pull#0/DogSnakeChoice#0');
  assert.equal(graph.resolve(30).key, 'Pull#0');
});

test('resolve rejects timestamps outside the timeline', () => {
  const graph = pullGraph();
  assert.throws(() => graph.resolve(30.5), OutOfRangeError);
  assert.throws(() => graph.resolve(-1), (error: unknown) => {
    assert.ok(error instanceof OutOfRangeError);
    assert.deepEqual(error.range, [0, 30]);
    assert.equal(error.requested, -1);
    return true;
  });
});

test('repeated placements get distinct instance keys in timeline order', () => {
  const graph = new SegmentGraph(
    [
      segment('Phase', {
        children: [
          { segmentId: 'Add', offset: 10 },
          { segmentId: 'Add', offset: 0 },
          { segmentId: 'Add', offset: 20, repeat: 5 },
        ],
      }),
      segment('Add', { keyframes: [{ id: 'end', time: 4 }] }),
    ],
    'Phase',
  );
  const instances = graph.instancesOf('Add');
  assert.deepEqual(instances.map(instanceKey), ['Phase#0/Add#0', 'Phase#0/Add#1', 'Phase#0/Add#5']);
  assert.deepEqual(
    instances.map((path) => path[path.length - 1].start),
    [0, 10, 20],
  );
  assert.equal(graph.resolve(21).key, 'Phase#0/Add#5');
  assert.deepEqual(graph.validate(), []);
});

test('overlapping placements prefer the earliest, then the longest', () => {
  const graph = new SegmentGraph(
    [
      segment('Root', {
        children: [
          { segmentId: 'Short', offset: 0 },
          { segmentId: 'Long', offset: 0 },
          { segmentId: 'Late', offset: 5 },
        ],
      }),
      segment('Short', { keyframes: [{ id: 'end', time: 4 }] }),
      segment('Long', { keyframes: [{ id: 'end', time: 8 }] }),
      segment('Late', { keyframes: [{ id: 'end', time: 10 }] }),
    ],
    'Root',
  );
  assert.equal(graph.resolve(2).key, 'Root#0/Long#0');
  assert.equal(graph.resolve(7).key, 'Root#0/Long#0');
  assert.equal(graph.resolve(9).key, 'Root#0/Late#0');
  const issues = graph.validate();
  assert.ok(issues.length > 0);
  assert.ok(issues.every((issue) => issue.code === 'placement/overlap' && issue.severity === 'warning'));
  assert.doesNotThrow(() => graph.assertValid());
});

test('identical placement windows are rejected as ambiguous', () => {
  const graph = new SegmentGraph(
    [
      segment('Root', {
        children: [
          { segmentId: 'Left', offset: 3 },
          { segmentId: 'Right', offset: 3 },
        ],
      }),
      segment('Left', { keyframes: [{ id: 'end', time: 5 }] }),
      segment('Right', { keyframes: [{ id: 'end', time: 5 }] }),
    ],
    'Root',
  );
  const [issue] = graph.validate();
  assert.equal(issue.code, 'placement/ambiguous');
  assert.ok(issue.error instanceof AmbiguousPlacementError);
  assert.equal(issue.error.segmentId, 'Root');
  assert.deepEqual(issue.error.placements, [0, 1]);
  assert.throws(() => graph.assertValid(), AmbiguousPlacementError);
});

test('cycles and unknown children are structural errors', () => {
  const cyclic = new SegmentGraph(
    [
      segment('A', { children: [{ segmentId: 'B', offset: 1 }] }),
      segment('B', { children: [{ segmentId: 'A', offset: 1 }] }),
    ],
    'A',
  );
  assert.ok(cyclic.validate().some((issue) => issue.code === 'segment/cycle'));
  assert.throws(() => cyclic.duration('A'), SegmentCycleError);

  const dangling = new SegmentGraph([segment('A', { children: [{ segmentId: 'Missing', offset: 0 }] })], 'A');
  const [issue] = dangling.validate();
  assert.equal(issue.code, 'segment/unknown');
  assert.throws(() => dangling.assertValid(), (error: unknown) => {
    assert.ok(error instanceof UnknownSegmentError);
    assert.equal(error.segmentId, 'Missing');
    assert.equal(error.parentId, 'A');
    return true;
  });
});

test('upsert invalidates cached durations of the segment and its ancestors', () => {
  const graph = new SegmentGraph(
    [
      segment('Root', { children: [{ segmentId: 'Mid', offset: 1 }] }),
      segment('Mid', { children: [{ segmentId: 'Leaf', offset: 1 }] }),
      segment('Leaf', { keyframes: [{ id: 'end', time: 3 }] }),
    ],
    'Root',
  );
  assert.equal(graph.duration('Root'), 5);
  graph.upsert(segment('Leaf', { keyframes: [{ id: 'end', time: 8 }] }));
  assert.equal(graph.duration('Leaf'), 8);
  assert.equal(graph.duration('Mid'), 9);
  assert.equal(graph.duration('Root'), 10);
  assert.ok(graph.isAncestor('Root', 'Leaf'));
  assert.ok(!graph.isAncestor('Leaf', 'Root'));
});

test('stratframes without an explicit snapshot act as their own snapshot', () => {
  const withSelf: Segment = segment('S', {
    stratframes: [
      { id: 'plan', time: 3 },
      { id: 'anchored', time: 4, snapshotId: 'snap' },
    ],
    snapshots: [{ id: 'snap', time: 1, label: 'Bait' }],
  });
  const snapshots = effectiveSnapshots(withSelf);
  assert.deepEqual(
    snapshots.map((snapshot) => [snapshot.id, snapshot.time, snapshot.self]),
    [
      ['snap', 1, false],
      ['plan', 3, true],
    ],
  );
});

test('rerooting plans a segment on its own clock', () => {
  const graph = pullGraph().rerooted('DogSnakeChoice');
  assert.equal(graph.duration(graph.rootId), 5);
  assert.equal(graph.resolve(2).key, 'DogSnakeChoice#0');
});
