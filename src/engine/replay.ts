import { TIME_EPSILON, type Seconds } from '../timeline/time.js';
import type { Vec2 } from '../timeline/types.js';
import type { MotionRule, PropertyState } from '../world/types.js';

export type ActiveMover = {
  entityId: string;
  rule: MotionRule;
  /** Scripted state at the frame time; used on spawn and for non-positional properties. */
  scripted: PropertyState;
};

export type ReplayFrame = {
  /** States of entities that do not replay (scripted or planned). */
  fixed: ReadonlyMap<string, PropertyState>;
  /** Replaying entities alive at the frame time, targets before followers. */
  movers: readonly ActiveMover[];
};

export type ReplayRequest = {
  from: Seconds;
  to: Seconds;
  /** Steps per second. */
  rate: number;
  /**
   * Time the step grid is fixed to (usually the anchor); steps land on
   * `origin + k / rate`, with the last one clamped to `to`. Defaults to `from`.
   */
  origin?: Seconds;
  /** Grid index `from` sits on, when resuming a replay. */
  step?: number;
  /** Longest span replayed by this call; the remainder is left for a continuation. */
  maxSpan?: number;
  /** Mover states at `from`. */
  start: ReadonlyMap<string, PropertyState>;
  /** Locked bait position (target position at the relevant snapshot), if any. */
  baitLock: (mover: ActiveMover) => Vec2 | undefined;
  frameAt: (time: Seconds) => ReplayFrame;
};

export type ReplayResult = {
  states: Map<string, PropertyState>;
  reached: Seconds;
  /** Grid index of `reached`; resuming from here continues on the same grid. */
  step: number;
  complete: boolean;
  steps: number;
};

const copyState = (state: PropertyState): PropertyState => ({
  position: { x: state.position.x, y: state.position.y },
  rotation: state.rotation,
  visual: state.visual,
});

const stepChase = (
  current: PropertyState,
  target: Vec2,
  speed: number,
  dt: number,
  scripted: PropertyState,
): PropertyState => {
  const dx = target.x - current.position.x;
  const dy = target.y - current.position.y;
  const distance = Math.hypot(dx, dy);
  if (distance <= 0 || dt <= 0) {
    return { position: { ...current.position }, rotation: current.rotation, visual: scripted.visual };
  }
  const travel = Math.min(distance, speed * dt);
  return {
    position: {
      x: current.position.x + (dx / distance) * travel,
      y: current.position.y + (dy / distance) * travel,
    },
    rotation: Math.atan2(dy, dx),
    visual: scripted.visual,
  };
};

/** A bait holds its locked position plus offset; without a lock it follows its script. */
export const baitState = (mover: ActiveMover, locked: Vec2 | undefined): PropertyState => {
  const offset = mover.rule.kind === 'bait' ? mover.rule.offset ?? { x: 0, y: 0 } : { x: 0, y: 0 };
  return {
    position: locked
      ? { x: locked.x + offset.x, y: locked.y + offset.y }
      : { ...mover.scripted.position },
    rotation: mover.scripted.rotation,
    visual: mover.scripted.visual,
  };
};

const advance = (
  previous: ReadonlyMap<string, PropertyState>,
  frame: ReplayFrame,
  baitLock: ReplayRequest['baitLock'],
  dt: number,
): Map<string, PropertyState> => {
  const next = new Map<string, PropertyState>();
  const positionOf = (id: string): Vec2 | undefined =>
    next.get(id)?.position ?? frame.fixed.get(id)?.position;
  for (const mover of frame.movers) {
    const current = previous.get(mover.entityId) ?? mover.scripted;
    if (mover.rule.kind === 'chase') {
      const target = positionOf(mover.rule.target);
      next.set(
        mover.entityId,
        target
          ? stepChase(current, target, mover.rule.speed, dt, mover.scripted)
          : { ...copyState(current), visual: mover.scripted.visual },
      );
      continue;
    }
    next.set(mover.entityId, baitState(mover, baitLock(mover)));
  }
  return next;
};

/**
 * Fast-forwards position-dependent motion from a snapshot state. Pure: the same
 * request always yields the same states, and nothing is emitted while stepping.
 * Splitting a replay with `maxSpan` and resuming from the returned `step` ends
 * in the same states as one uncapped call.
 */
export const replayMotion = (request: ReplayRequest): ReplayResult => {
  const { from, to, rate } = request;
  const origin = request.origin ?? from;
  const limit = from + Math.min(Math.max(0, to - from), request.maxSpan ?? Number.POSITIVE_INFINITY);
  let states = new Map<string, PropertyState>();
  for (const [id, state] of request.start) {
    states.set(id, copyState(state));
  }
  if (to - from <= TIME_EPSILON) {
    states = advance(states, request.frameAt(to), request.baitLock, 0);
    return { states, reached: to, step: request.step ?? 0, complete: true, steps: 0 };
  }
  let index = request.step ?? Math.floor((from - origin) * rate + TIME_EPSILON);
  let reached = from;
  let steps = 0;
  while (reached !== to) {
    const grid = origin + (index + 1) / rate;
    const time = grid >= to - TIME_EPSILON ? to : grid;
    // at least one step per call
    if (steps > 0 && time > limit + TIME_EPSILON) break;
    states = advance(states, request.frameAt(time), request.baitLock, time - reached);
    reached = time;
    index++;
    steps++;
  }
  return { states, reached, step: index, complete: reached === to, steps };
};
