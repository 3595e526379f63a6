import type { Vec2 } from '../timeline/types.js';
import type { EntityScript, PropertyKeyframe, PropertyState, PropertyTrack } from './types.js';

export const DEFAULT_VISUAL = 'default';

export const ORIGIN: Vec2 = Object.freeze({ x: 0, y: 0 });

const findSurroundingKeyframes = <T>(
  keyframes: readonly PropertyKeyframe<T>[],
  time: number,
): { prev: PropertyKeyframe<T>; next: PropertyKeyframe<T> } | null => {
  if (keyframes.length === 0) {
    return null;
  }
  if (time <= keyframes[0].time) {
    return { prev: keyframes[0], next: keyframes[0] };
  }
  const last = keyframes[keyframes.length - 1];
  if (time >= last.time) {
    return { prev: last, next: last };
  }
  let prev = keyframes[0];
  for (let i = 1; i < keyframes.length; i++) {
    const current = keyframes[i];
    if (current.time === time) {
      return { prev: current, next: current };
    }
    if (current.time > time) {
      return { prev, next: current };
    }
    prev = current;
  }
  return { prev: last, next: last };
};

export const lerp = (a: number, b: number, t: number) => a + (b - a) * t;

export const lerpVec = (a: Vec2, b: Vec2, t: number): Vec2 => ({
  x: lerp(a.x, b.x, t),
  y: lerp(a.y, b.y, t),
});

export const evaluateTrack = <T>(
  track: PropertyTrack<T> | undefined,
  time: number,
  mix: (a: T, b: T, t: number) => T,
): T | undefined => {
  if (!track) {
    return undefined;
  }
  const surrounding = findSurroundingKeyframes(track.keyframes, time);
  if (!surrounding) {
    return undefined;
  }
  const { prev, next } = surrounding;
  if (prev === next || (track.interpolation ?? 'step') === 'step') {
    return prev.value;
  }
  const span = next.time - prev.time;
  if (span <= 0) {
    return prev.value;
  }
  return mix(prev.value, next.value, (time - prev.time) / span);
};

export const evaluateSteps = <T>(keyframes: readonly PropertyKeyframe<T>[] | undefined, time: number) =>
  keyframes ? findSurroundingKeyframes(keyframes, time)?.prev.value : undefined;

/** Scripted state at a local time; lifetime checks are the caller's job. */
export const evaluateScript = (script: EntityScript, localTime: number): PropertyState => {
  const position = evaluateTrack(script.position, localTime, lerpVec) ?? ORIGIN;
  return {
    position: { x: position.x, y: position.y },
    rotation: evaluateTrack(script.rotation, localTime, lerp) ?? 0,
    visual: evaluateSteps(script.visual, localTime) ?? DEFAULT_VISUAL,
  };
};

const sortKeyframes = <T>(keyframes: PropertyKeyframe<T>[]): PropertyKeyframe<T>[] => {
  const sorted = keyframes
    .map((entry) => ({ time: Math.max(0, entry.time), value: entry.value }))
    .sort((a, b) => a.time - b.time);
  const deduped: PropertyKeyframe<T>[] = [];
  for (const entry of sorted) {
    const last = deduped[deduped.length - 1];
    if (last && last.time === entry.time) {
      deduped[deduped.length - 1] = entry;
    } else {
      deduped.push(entry);
    }
  }
  return deduped;
};

export const normalizeScript = (script: EntityScript): EntityScript => ({
  ...script,
  position: script.position
    ? {
        interpolation: script.position.interpolation ?? 'step',
        keyframes: sortKeyframes(script.position.keyframes),
      }
    : undefined,
  rotation: script.rotation
    ? {
        interpolation: script.rotation.interpolation ?? 'step',
        keyframes: sortKeyframes(script.rotation.keyframes),
      }
    : undefined,
  visual: script.visual ? sortKeyframes(script.visual) : undefined,
});
