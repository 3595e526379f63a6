import type { Seconds } from './time.js';

export type Vec2 = {
  x: number;
  y: number;
};

export type SegmentVisibility = 'major' | 'minor';

export type SegmentPlacement = {
  segmentId: string;
  offset: Seconds;
  /** Distinguishes repeated placements of the same segment under one parent. */
  repeat?: number;
};

export type Keyframe = {
  id: string;
  time: Seconds;
  label?: string;
};

export type Stratframe = {
  id: string;
  time: Seconds;
  label?: string;
  /** Explicit snapshot this stratframe animates from; absent means it is its own snapshot. */
  snapshotId?: string;
  /** Default plan: where each player stands at this stratframe. */
  positions?: Record<string, Vec2>;
};

export type RecordedState = {
  position?: Vec2;
  rotation?: number;
  visual?: string;
};

export type Snapshot = {
  id: string;
  time: Seconds;
  label?: string;
  /** Authored state that overrides whatever the anchor computation produces. */
  state?: Record<string, RecordedState>;
};

export type VariationBindingMode = 'decides' | 'reads';

export type VariationBinding = {
  variationId: string;
  mode: VariationBindingMode;
};

export type Segment = {
  id: string;
  name: string;
  visibility: SegmentVisibility;
  children: SegmentPlacement[];
  keyframes: Keyframe[];
  stratframes: Stratframe[];
  snapshots: Snapshot[];
  variations: VariationBinding[];
  /** Initialization routine used when this segment is planned on its own. */
  init?: string;
};

export type EffectiveSnapshot = Snapshot & {
  /** True when the snapshot is a stratframe standing in for itself. */
  self: boolean;
  stratframeId?: string;
};
