/** Seconds on some segment's local clock, or on the timeline's global clock. */
export type Seconds = number;

export const TIME_EPSILON = 1e-6;

export const timeEquals = (a: Seconds, b: Seconds): boolean => Math.abs(a - b) <= TIME_EPSILON;

export const clampTime = (time: Seconds, min: Seconds, max: Seconds): Seconds =>
  Math.max(min, Math.min(max, time));

/** Half-open containment: `start <= time < end`. */
export const isWithin = (time: Seconds, start: Seconds, end: Seconds): boolean =>
  time >= start && time < end;

export const sanitizeTime = (time: Seconds): Seconds => {
  if (!Number.isFinite(time) || time < 0) {
    return 0;
  }
  return time;
};
