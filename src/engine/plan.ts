import type { Seconds } from '../timeline/time.js';
import type { Segment, Vec2 } from '../timeline/types.js';
import { lerpVec } from '../world/evaluate.js';

type Positions = Record<string, Vec2>;

/**
 * Per-instance strat overrides. A segment's stratframes carry the default plan;
 * an override replaces one entity's position at one stratframe of one instance
 * and never leaks into other instances of the same segment.
 */
export class StratBook {
  private readonly overrides = new Map<string, Map<string, Positions>>();

  set(instanceKey: string, stratframeId: string, entityId: string, position: Vec2): void {
    let byStratframe = this.overrides.get(instanceKey);
    if (!byStratframe) {
      byStratframe = new Map();
      this.overrides.set(instanceKey, byStratframe);
    }
    const positions = byStratframe.get(stratframeId) ?? {};
    positions[entityId] = { x: position.x, y: position.y };
    byStratframe.set(stratframeId, positions);
  }

  clear(instanceKey: string, stratframeId?: string, entityId?: string): void {
    const byStratframe = this.overrides.get(instanceKey);
    if (!byStratframe) return;
    if (stratframeId === undefined) {
      this.overrides.delete(instanceKey);
    } else if (entityId === undefined) {
      byStratframe.delete(stratframeId);
    } else {
      delete byStratframe.get(stratframeId)?.[entityId];
    }
  }

  get(instanceKey: string, stratframeId: string): Readonly<Positions> | undefined {
    return this.overrides.get(instanceKey)?.get(stratframeId);
  }
}

type Waypoint = {
  time: Seconds;
  position: Vec2;
};

export const planWaypoints = (
  segment: Segment,
  instanceKey: string,
  entityId: string,
  book: StratBook,
): Waypoint[] => {
  const waypoints: Waypoint[] = [];
  for (const stratframe of segment.stratframes) {
    const position =
      book.get(instanceKey, stratframe.id)?.[entityId] ?? stratframe.positions?.[entityId];
    if (position) {
      waypoints.push({ time: stratframe.time, position });
    }
  }
  return waypoints;
};

/**
 * Planned position at a local time. Before the first waypoint the entity walks
 * from `start` (its scripted position at spawn); after the last it holds.
 */
export const planPosition = (
  waypoints: readonly Waypoint[],
  localTime: Seconds,
  start?: Waypoint,
): Vec2 | undefined => {
  if (waypoints.length === 0) {
    return undefined;
  }
  const first = waypoints[0];
  if (localTime <= first.time) {
    if (!start || start.time >= first.time) {
      return { ...first.position };
    }
    if (localTime <= start.time) {
      return { ...start.position };
    }
    return lerpVec(start.position, first.position, (localTime - start.time) / (first.time - start.time));
  }
  for (let i = 1; i < waypoints.length; i++) {
    const next = waypoints[i];
    if (localTime <= next.time) {
      const prev = waypoints[i - 1];
      const span = next.time - prev.time;
      return span > 0
        ? lerpVec(prev.position, next.position, (localTime - prev.time) / span)
        : { ...next.position };
    }
  }
  return { ...waypoints[waypoints.length - 1].position };
};
