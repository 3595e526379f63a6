import type { Seconds } from './time.js';

/** One hop of an instance path: which placement was taken and where it starts globally. */
export type InstanceStep = {
  readonly segmentId: string;
  /** Index into the parent's normalized placement list; -1 for the timeline root. */
  readonly placementIndex: number;
  readonly repeat: number;
  readonly start: Seconds;
};

export type InstancePath = readonly InstanceStep[];

export const stepKey = (step: InstanceStep): string => `${step.segmentId}#${step.repeat}`;

/** Stable, readable identity of a segment instance, e.g. `Pull#0/DogSnakeChoice#0`. */
export const instanceKey = (path: InstancePath): string => path.map(stepKey).join('/');

export const leafOf = (path: InstancePath): InstanceStep => {
  if (path.length === 0) {
    throw new RangeError('Instance path is empty');
  }
  return path[path.length - 1];
};
