import { sanitizeTime } from './time.js';
import type {
  EffectiveSnapshot,
  Keyframe,
  Segment,
  SegmentPlacement,
  Snapshot,
  Stratframe,
} from './types.js';

const byTimeThenId = <T extends { time: number; id: string }>(a: T, b: T) =>
  a.time - b.time || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const normalizeKeyframes = (keyframes: Keyframe[]): Keyframe[] =>
  keyframes
    .map((entry) => ({ ...entry, time: sanitizeTime(entry.time) }))
    .sort(byTimeThenId);

const normalizeStratframes = (stratframes: Stratframe[]): Stratframe[] =>
  stratframes
    .map((entry) => ({
      ...entry,
      time: sanitizeTime(entry.time),
      positions: entry.positions ? { ...entry.positions } : undefined,
    }))
    .sort(byTimeThenId);

const normalizeSnapshots = (snapshots: Snapshot[]): Snapshot[] =>
  snapshots
    .map((entry) => ({ ...entry, time: sanitizeTime(entry.time) }))
    .sort(byTimeThenId);

// Placement order is kept stable for equal offsets so repeat ordinals do not shift.
const normalizePlacements = (children: SegmentPlacement[]): SegmentPlacement[] =>
  children
    .map((child) => ({ ...child, offset: sanitizeTime(child.offset) }))
    .map((child, index) => ({ child, index }))
    .sort((a, b) => a.child.offset - b.child.offset || a.index - b.index)
    .map(({ child }) => child);

export const normalizeSegment = (segment: Segment): Segment => ({
  id: segment.id,
  name: segment.name,
  visibility: segment.visibility,
  children: normalizePlacements(segment.children),
  keyframes: normalizeKeyframes(segment.keyframes),
  stratframes: normalizeStratframes(segment.stratframes),
  snapshots: normalizeSnapshots(segment.snapshots),
  variations: segment.variations.map((binding) => ({ ...binding })),
  init: segment.init,
});

/** Latest authored instant of any keyframe role in the segment itself. */
export const ownKeyframeEnd = (segment: Segment): number => {
  let end = 0;
  for (const entry of segment.keyframes) end = Math.max(end, entry.time);
  for (const entry of segment.stratframes) end = Math.max(end, entry.time);
  for (const entry of segment.snapshots) end = Math.max(end, entry.time);
  return end;
};

export const effectiveSnapshots = (segment: Segment): EffectiveSnapshot[] => {
  const result: EffectiveSnapshot[] = segment.snapshots.map((snapshot) => ({
    ...snapshot,
    self: false,
  }));
  for (const stratframe of segment.stratframes) {
    if (stratframe.snapshotId !== undefined) {
      continue;
    }
    result.push({
      id: stratframe.id,
      time: stratframe.time,
      label: stratframe.label,
      self: true,
      stratframeId: stratframe.id,
    });
  }
  return result.sort(byTimeThenId);
};

export const createSegment = (
  id: string,
  fields: Partial<Omit<Segment, 'id'>> = {},
): Segment =>
  normalizeSegment({
    id,
    name: fields.name ?? id,
    visibility: fields.visibility ?? 'major',
    children: fields.children ?? [],
    keyframes: fields.keyframes ?? [],
    stratframes: fields.stratframes ?? [],
    snapshots: fields.snapshots ?? [],
    variations: fields.variations ?? [],
    init: fields.init,
  });
