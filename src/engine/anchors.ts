import type { SegmentGraph } from '../timeline/graph.js';
import { instanceKey, type InstancePath } from '../timeline/instance.js';
import { effectiveSnapshots } from '../timeline/normalize.js';
import { TIME_EPSILON, type Seconds } from '../timeline/time.js';
import type { EffectiveSnapshot } from '../timeline/types.js';

/** A snapshot placed on the global clock through one specific instance. */
export type Anchor = {
  instanceKey: string;
  path: InstancePath;
  snapshot: EffectiveSnapshot;
  global: Seconds;
  depth: number;
};

export const INIT_SNAPSHOT_ID = '@init';

export const anchorId = (anchor: Anchor): string => `${anchor.instanceKey}|${anchor.snapshot.id}`;

/**
 * Snapshots of every instance on `path` (the instance itself and its ancestors).
 * `rootInit` is the state produced by the root's initialization routine, exposed
 * as an implicit snapshot at time 0.
 */
export const collectAnchors = (
  graph: SegmentGraph,
  path: InstancePath,
  rootInit?: EffectiveSnapshot,
): Anchor[] => {
  const anchors: Anchor[] = [];
  path.forEach((step, depth) => {
    const prefix = path.slice(0, depth + 1);
    const key = instanceKey(prefix);
    const snapshots = effectiveSnapshots(graph.get(step.segmentId));
    if (depth === 0 && rootInit) {
      snapshots.unshift(rootInit);
    }
    for (const snapshot of snapshots) {
      anchors.push({ instanceKey: key, path: prefix, snapshot, global: step.start + snapshot.time, depth });
    }
  });
  return anchors;
};

const later = (candidate: Anchor, best: Anchor | undefined) =>
  !best ||
  candidate.global > best.global + TIME_EPSILON ||
  (Math.abs(candidate.global - best.global) <= TIME_EPSILON && candidate.depth > best.depth);

/** Latest anchor at or before `time`; the innermost one wins a tie. */
export const nearestAnchor = (anchors: readonly Anchor[], time: Seconds): Anchor | undefined => {
  let best: Anchor | undefined;
  for (const anchor of anchors) {
    if (anchor.global <= time + TIME_EPSILON && later(anchor, best)) {
      best = anchor;
    }
  }
  return best;
};

/** Latest anchor strictly before `time`. */
export const previousAnchor = (anchors: readonly Anchor[], time: Seconds): Anchor | undefined => {
  let best: Anchor | undefined;
  for (const anchor of anchors) {
    if (anchor.global < time - TIME_EPSILON && later(anchor, best)) {
      best = anchor;
    }
  }
  return best;
};

export const labeledAnchor = (
  anchors: readonly Anchor[],
  label: string,
  time: Seconds,
): Anchor | undefined =>
  nearestAnchor(
    anchors.filter((anchor) => anchor.snapshot.label === label),
    time,
  );
