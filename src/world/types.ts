import type { Seconds } from '../timeline/time.js';
import type { Vec2 } from '../timeline/types.js';
import type { Job, Waymark } from './jobs.js';

export type EntityKind = 'boss' | 'marker' | 'telegraph' | 'player' | 'waymark';

export type SourceEntity = {
  id: string;
  kind: EntityKind;
  name: string;
  job?: Job;
  waymark?: Waymark;
};

export type Interpolation = 'step' | 'linear';

export type PropertyKeyframe<T> = {
  time: Seconds;
  value: T;
};

export type PropertyTrack<T> = {
  interpolation?: Interpolation;
  keyframes: PropertyKeyframe<T>[];
};

export type PropertyState = {
  position: Vec2;
  rotation: number;
  visual: string;
};

/**
 * Position-affecting behaviour that depends on where other entities (usually
 * players) are, and therefore has to be replayed from a snapshot.
 */
export type MotionRule =
  | { kind: 'chase'; target: string; speed: number }
  | { kind: 'bait'; target: string; snapshot?: string; offset?: Vec2 };

export type ScriptCondition = {
  variationId: string;
  equals: string;
};

export type EntityScript = {
  entityId: string;
  segmentId: string;
  spawn: Seconds;
  despawn: Seconds;
  position?: PropertyTrack<Vec2>;
  rotation?: PropertyTrack<number>;
  /** Visual state changes are always stepped. */
  visual?: PropertyKeyframe<string>[];
  motion?: MotionRule;
  condition?: ScriptCondition;
};

export type SpawnWindow = {
  start: Seconds;
  end: Seconds;
};
