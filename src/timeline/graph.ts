import {
  AmbiguousPlacementError,
  OutOfRangeError,
  SegmentCycleError,
  StratlineError,
  UnknownSegmentError,
  type ValidationIssue,
} from '../errors.js';
import { instanceKey, type InstancePath, type InstanceStep } from './instance.js';
import { normalizeSegment, ownKeyframeEnd } from './normalize.js';
import { clampTime, TIME_EPSILON, type Seconds } from './time.js';
import type { Segment } from './types.js';

export type ResolvedTimestamp = {
  path: InstancePath;
  key: string;
  /** Local time within the innermost instance. */
  localTime: Seconds;
  /** Local time within each instance of `path`, root first. */
  localTimes: Seconds[];
};

/** Repeat index of every placement: explicit `repeat`, else the ordinal among same-id siblings. */
export const placementRepeats = (segment: Segment): number[] => {
  const seen = new Map<string, number>();
  return segment.children.map((child) => {
    const ordinal = seen.get(child.segmentId) ?? 0;
    seen.set(child.segmentId, ordinal + 1);
    return child.repeat ?? ordinal;
  });
};

/**
 * Arena of segment definitions addressed by id. Instances are never materialized
 * as objects; they are paths of placements from the timeline root.
 */
export class SegmentGraph {
  private readonly segments = new Map<string, Segment>();
  private readonly durations = new Map<string, Seconds>();
  private instanceCache: InstancePath[] | null = null;

  constructor(
    segments: Iterable<Segment>,
    readonly rootId: string,
  ) {
    for (const segment of segments) {
      this.segments.set(segment.id, normalizeSegment(segment));
    }
  }

  /** Same arena, different timeline root (planning a segment on its own). */
  rerooted(rootId: string): SegmentGraph {
    if (!this.segments.has(rootId)) {
      throw new UnknownSegmentError(rootId);
    }
    return new SegmentGraph(this.segments.values(), rootId);
  }

  has(id: string): boolean {
    return this.segments.has(id);
  }

  get(id: string): Segment {
    const segment = this.segments.get(id);
    if (!segment) {
      throw new UnknownSegmentError(id);
    }
    return segment;
  }

  get root(): Segment {
    return this.get(this.rootId);
  }

  list(): Segment[] {
    return Array.from(this.segments.values());
  }

  /** Authoring-time only. Invalidates cached durations of the segment and everything above it. */
  upsert(segment: Segment): void {
    this.segments.set(segment.id, normalizeSegment(segment));
    this.invalidate(segment.id);
  }

  parentsOf(id: string): string[] {
    const result: string[] = [];
    for (const segment of this.segments.values()) {
      if (segment.children.some((child) => child.segmentId === id)) {
        result.push(segment.id);
      }
    }
    return result;
  }

  private invalidate(id: string) {
    this.instanceCache = null;
    const pending = [id];
    const visited = new Set<string>();
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      this.durations.delete(current);
      pending.push(...this.parentsOf(current));
    }
  }

  duration(id: string): Seconds {
    return this.computeDuration(id, []);
  }

  private computeDuration(id: string, stack: string[]): Seconds {
    const cached = this.durations.get(id);
    if (cached !== undefined) {
      return cached;
    }
    if (stack.includes(id)) {
      throw new SegmentCycleError([...stack.slice(stack.indexOf(id)), id]);
    }
    const segment = this.segments.get(id);
    if (!segment) {
      throw new UnknownSegmentError(id, stack[stack.length - 1]);
    }
    let end = ownKeyframeEnd(segment);
    stack.push(id);
    for (const child of segment.children) {
      end = Math.max(end, child.offset + this.computeDuration(child.segmentId, stack));
    }
    stack.pop();
    this.durations.set(id, end);
    return end;
  }

  /**
   * Maps a global timestamp onto the chain of active instances. Child windows are
   * half-open; among overlapping placements the earliest offset wins, then the longest.
   */
  resolve(timestamp: Seconds): ResolvedTimestamp {
    const total = this.duration(this.rootId);
    if (!Number.isFinite(timestamp) || timestamp < -TIME_EPSILON || timestamp > total + TIME_EPSILON) {
      throw new OutOfRangeError(timestamp, [0, total]);
    }
    let local = clampTime(timestamp, 0, total);
    let segment = this.root;
    const path: InstanceStep[] = [{ segmentId: segment.id, placementIndex: -1, repeat: 0, start: 0 }];
    const localTimes: Seconds[] = [local];
    for (;;) {
      const repeats = placementRepeats(segment);
      let chosen = -1;
      let chosenDuration = -1;
      segment.children.forEach((child, index) => {
        const childDuration = this.duration(child.segmentId);
        const childLocal = local - child.offset;
        if (childDuration <= 0 || childLocal < 0 || childLocal >= childDuration) {
          return;
        }
        if (
          chosen === -1 ||
          child.offset < segment.children[chosen].offset ||
          (child.offset === segment.children[chosen].offset && childDuration > chosenDuration)
        ) {
          chosen = index;
          chosenDuration = childDuration;
        }
      });
      if (chosen === -1) {
        break;
      }
      const placement = segment.children[chosen];
      const parentStart = path[path.length - 1].start;
      path.push({
        segmentId: placement.segmentId,
        placementIndex: chosen,
        repeat: repeats[chosen],
        start: parentStart + placement.offset,
      });
      local -= placement.offset;
      localTimes.push(local);
      segment = this.get(placement.segmentId);
    }
    return { path, key: instanceKey(path), localTime: local, localTimes };
  }

  /** Every instance reachable from the root, in timeline order (start time, then depth). */
  allInstances(): InstancePath[] {
    if (this.instanceCache) {
      return this.instanceCache;
    }
    const result: InstancePath[] = [];
    const visit = (path: InstanceStep[]) => {
      result.push(path);
      const segment = this.get(path[path.length - 1].segmentId);
      const repeats = placementRepeats(segment);
      const parentStart = path[path.length - 1].start;
      segment.children.forEach((child, index) => {
        if (path.some((step) => step.segmentId === child.segmentId)) {
          throw new SegmentCycleError([...path.map((step) => step.segmentId), child.segmentId]);
        }
        visit([
          ...path,
          {
            segmentId: child.segmentId,
            placementIndex: index,
            repeat: repeats[index],
            start: parentStart + child.offset,
          },
        ]);
      });
    };
    visit([{ segmentId: this.rootId, placementIndex: -1, repeat: 0, start: 0 }]);
    const ordered = result
      .map((path, order) => ({ path, order }))
      .sort(
        (a, b) =>
          a.path[a.path.length - 1].start - b.path[b.path.length - 1].start ||
          a.path.length - b.path.length ||
          a.order - b.order,
      )
      .map(({ path }) => path);
    this.instanceCache = ordered;
    return ordered;
  }

  instancesOf(segmentId: string): InstancePath[] {
    this.get(segmentId);
    return this.allInstances().filter((path) => path[path.length - 1].segmentId === segmentId);
  }

  findInstance(key: string): InstancePath | undefined {
    return this.allInstances().find((path) => instanceKey(path) === key);
  }

  /** True when segment `ancestorId` transitively places `id`. */
  isAncestor(ancestorId: string, id: string): boolean {
    const pending = [...this.get(ancestorId).children.map((child) => child.segmentId)];
    const visited = new Set<string>();
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || visited.has(current)) continue;
      if (current === id) return true;
      visited.add(current);
      const segment = this.segments.get(current);
      if (segment) pending.push(...segment.children.map((child) => child.segmentId));
    }
    return false;
  }

  validate(): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    if (!this.segments.has(this.rootId)) {
      issues.push({
        code: 'segment/unknown',
        message: `Timeline root "${this.rootId}" is not defined`,
        path: ['root'],
        severity: 'error',
        error: new UnknownSegmentError(this.rootId),
      });
      return issues;
    }
    let structural = false;
    for (const segment of this.segments.values()) {
      segment.children.forEach((child, index) => {
        if (!this.segments.has(child.segmentId)) {
          structural = true;
          issues.push({
            code: 'segment/unknown',
            message: `Segment "${segment.id}" places unknown segment "${child.segmentId}"`,
            path: ['segments', segment.id, 'children', index],
            severity: 'error',
            error: new UnknownSegmentError(child.segmentId, segment.id),
          });
        }
      });
      this.validateLocalMarkers(segment, issues);
    }
    const cycle = this.findCycle();
    if (cycle) {
      structural = true;
      issues.push({
        code: 'segment/cycle',
        message: `Segment placements form a cycle: ${cycle.join(' -> ')}`,
        path: ['segments', cycle[0]],
        severity: 'error',
        error: new SegmentCycleError(cycle),
      });
    }
    if (!structural) {
      for (const segment of this.segments.values()) {
        this.validatePlacements(segment, issues);
      }
    }
    return issues;
  }

  /** Throws the first structural error found by `validate`. */
  assertValid(): void {
    const failure = this.validate().find((issue) => issue.severity === 'error');
    if (failure) {
      throw failure.error ?? new StratlineError('segment/invalid', failure.message);
    }
  }

  private validateLocalMarkers(segment: Segment, issues: ValidationIssue[]) {
    const ids = new Set<string>();
    const markers = [...segment.keyframes, ...segment.stratframes, ...segment.snapshots];
    for (const marker of markers) {
      if (ids.has(marker.id)) {
        issues.push({
          code: 'keyframe/duplicate-id',
          message: `Segment "${segment.id}" uses keyframe id "${marker.id}" more than once`,
          path: ['segments', segment.id, marker.id],
          severity: 'error',
        });
      }
      ids.add(marker.id);
    }
    const snapshotIds = new Set(segment.snapshots.map((snapshot) => snapshot.id));
    for (const stratframe of segment.stratframes) {
      if (stratframe.snapshotId !== undefined && !snapshotIds.has(stratframe.snapshotId)) {
        issues.push({
          code: 'stratframe/unknown-snapshot',
          message: `Stratframe "${stratframe.id}" in "${segment.id}" refers to unknown snapshot "${stratframe.snapshotId}"`,
          path: ['segments', segment.id, 'stratframes', stratframe.id],
          severity: 'error',
        });
      }
    }
  }

  private validatePlacements(segment: Segment, issues: ValidationIssue[]) {
    const repeats = placementRepeats(segment);
    const seen = new Map<string, number>();
    const windows = segment.children.map((child) => ({
      start: child.offset,
      end: child.offset + this.duration(child.segmentId),
    }));
    segment.children.forEach((child, index) => {
      const key = `${child.segmentId}#${repeats[index]}`;
      const previous = seen.get(key);
      if (previous !== undefined) {
        issues.push({
          code: 'placement/duplicate-repeat',
          message: `Segment "${segment.id}" places "${child.segmentId}" twice with repeat index ${repeats[index]}`,
          path: ['segments', segment.id, 'children', index],
          severity: 'error',
        });
      }
      seen.set(key, index);
      for (let other = 0; other < index; other++) {
        const a = windows[other];
        const b = windows[index];
        const overlaps = a.start < b.end && b.start < a.end;
        if (!overlaps) continue;
        if (a.start === b.start && a.end === b.end) {
          issues.push({
            code: 'placement/ambiguous',
            message: `Segment "${segment.id}" has placements ${other} and ${index} with identical offset and duration`,
            path: ['segments', segment.id, 'children', index],
            severity: 'error',
            error: new AmbiguousPlacementError(segment.id, [other, index]),
          });
        } else {
          issues.push({
            code: 'placement/overlap',
            message: `Placements ${other} and ${index} of "${segment.id}" overlap; the earlier, then longer, one wins`,
            path: ['segments', segment.id, 'children', index],
            severity: 'warning',
          });
        }
      }
    });
  }

  private findCycle(): string[] | null {
    const state = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];
    const visit = (id: string): string[] | null => {
      const mark = state.get(id);
      if (mark === 'done') return null;
      if (mark === 'visiting') return [...stack.slice(stack.indexOf(id)), id];
      const segment = this.segments.get(id);
      if (!segment) return null;
      state.set(id, 'visiting');
      stack.push(id);
      for (const child of segment.children) {
        const found = visit(child.segmentId);
        if (found) return found;
      }
      stack.pop();
      state.set(id, 'done');
      return null;
    };
    for (const id of this.segments.keys()) {
      const found = visit(id);
      if (found) return found;
    }
    return null;
  }
}
