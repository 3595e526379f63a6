import { OutOfRangeError, PlaybackStateError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { nullPresenter, type ScenePresenter } from '../scene/presenter.js';
import { SceneProjection } from '../scene/projection.js';
import type { SegmentGraph } from '../timeline/graph.js';
import { instanceKey, leafOf } from '../timeline/instance.js';
import { clampTime, TIME_EPSILON, type Seconds } from '../timeline/time.js';
import type { Segment, Vec2 } from '../timeline/types.js';
import type { VariationRegistry } from '../variation/registry.js';
import type { VariationDomain, VariationResolution } from '../variation/types.js';
import type { SourceWorld } from '../world/sourceWorld.js';
import type { EntityScript, SourceEntity } from '../world/types.js';
import { anchorId } from './anchors.js';
import {
  SceneEvaluator,
  type ReplayContinuation,
  type ReplaySummary,
  type SeekWarning,
} from './evaluator.js';
import { StratBook } from './plan.js';
import { assertSessionSound, type TimelineSession } from './session.js';

export type ManagerMode = 'playback' | 'authoring' | 'disposed';

export type TimelineManagerOptions = {
  presenter?: ScenePresenter;
  logger?: Logger;
};

export type SeekReport = {
  requested: Seconds;
  /** Timestamp actually applied (after clamping). */
  timestamp: Seconds;
  clamped: boolean;
  instanceKey: string;
  localTime: Seconds;
  spawned: string[];
  despawned: string[];
  updated: string[];
  /** Snapshot the frame was anchored to, as `instanceKey|snapshotId`. */
  anchor?: string;
  exact: boolean;
  replay?: ReplaySummary;
  resolved: VariationResolution[];
  warnings: SeekWarning[];
};

/** Edits go through the session's methods; the views below are for reading. */
export type AuthoringSession = {
  readonly graph: Omit<SegmentGraph, 'upsert'>;
  readonly world: Omit<SourceWorld, 'define' | 'setScript' | 'removeScript'>;
  readonly registry: Omit<VariationRegistry, 'register' | 'pin' | 'unpin' | 'reset' | 'freeze' | 'thaw'>;
  /** False once `endAuthoring` succeeds; every edit then throws `PlaybackStateError`. */
  readonly open: boolean;
  upsertSegment(segment: Segment): void;
  defineEntity(entity: SourceEntity): void;
  setScript(script: EntityScript): void;
  removeScript(entityId: string, segmentId: string): boolean;
  registerVariation(id: string, domain: VariationDomain, defaultValue?: string): void;
  pinVariation(id: string, value: string): void;
  unpinVariation(id: string): void;
  resetVariations(id?: string): void;
};

const decidesFirst = (a: { mode: string }, b: { mode: string }) =>
  a.mode === b.mode ? 0 : a.mode === 'decides' ? -1 : 1;

/**
 * Drives the scene projection from a single global timestamp. Seeks resolve
 * variations in timeline order, diff the live entity set against what the new
 * timestamp needs, evaluate states (replaying from snapshots where motion
 * depends on players), and only then emit commands to the presenter.
 */
export class TimelineManager {
  readonly projection: SceneProjection;
  readonly strats = new StratBook();
  private readonly logger: Logger;
  private readonly evaluator: SceneEvaluator;
  private current: Seconds | null = null;
  private pending: Seconds | null = null;
  private continuation: ReplayContinuation | undefined;
  private dirty = false;
  private state: ManagerMode = 'playback';
  private authoring: object | undefined;

  constructor(
    private readonly session: TimelineSession,
    options: TimelineManagerOptions = {},
  ) {
    this.projection = new SceneProjection(options.presenter ?? nullPresenter);
    this.logger = options.logger ?? createSilentLogger();
    this.evaluator = new SceneEvaluator(session, this.strats);
    session.registry.freeze();
  }

  get mode(): ManagerMode {
    return this.state;
  }

  /** Last applied timestamp, or null before the first seek. */
  get timestamp(): Seconds | null {
    return this.current;
  }

  get duration(): Seconds {
    return this.session.graph.duration(this.session.graph.rootId);
  }

  get pendingReplay(): boolean {
    return this.continuation !== undefined;
  }

  get registry(): VariationRegistry {
    return this.session.registry;
  }

  private assertPlayback(operation: string) {
    if (this.state === 'authoring') {
      throw new PlaybackStateError(`Cannot ${operation} while authoring; call endAuthoring() first`);
    }
    if (this.state === 'disposed') {
      throw new PlaybackStateError(`Cannot ${operation} on a disposed timeline manager`);
    }
  }

  /** Resolves the variations of every instance that has started by `time`, in timeline order. */
  private resolveVariationsUpTo(time: Seconds): VariationResolution[] {
    const { graph, world, registry } = this.session;
    const before = registry.resolutions().length;
    for (const path of graph.allInstances()) {
      const step = leafOf(path);
      if (step.start > time + TIME_EPSILON) break;
      const key = instanceKey(path);
      const segment = graph.get(step.segmentId);
      for (const binding of [...segment.variations].sort(decidesFirst)) {
        registry.resolve(binding.variationId, { resolvedBy: key });
      }
      for (const script of world.scriptsFor(step.segmentId)) {
        if (script.condition) {
          registry.resolve(script.condition.variationId, { resolvedBy: key });
        }
      }
    }
    return registry.resolutions().slice(before);
  }

  /**
   * Moves the projection to `time` in one step, replaying as far as needed.
   * Out-of-range timestamps are clamped and reported, never thrown.
   */
  seek(time: Seconds): SeekReport {
    this.assertPlayback('seek');
    this.pending = null;
    this.continuation = undefined;
    return this.apply(time, Number.POSITIVE_INFINITY);
  }

  /** Queues a seek for the next `tick`; only the latest request survives. */
  requestSeek(time: Seconds): void {
    this.assertPlayback('request a seek');
    this.pending = time;
  }

  /**
   * Host frame hook. Applies the latest requested seek, or continues an
   * unfinished replay, with at most `maxReplaySpan` seconds of replay.
   * Returns null when there was nothing to do.
   */
  tick(): SeekReport | null {
    this.assertPlayback('tick');
    const budget = this.session.config.maxReplaySpan;
    if (this.pending !== null) {
      const target = this.pending;
      this.pending = null;
      return this.apply(target, budget);
    }
    if (this.continuation) {
      return this.apply(this.continuation.target, budget);
    }
    if (this.dirty && this.current !== null) {
      return this.apply(this.current, budget);
    }
    return null;
  }

  private apply(requested: Seconds, maxSpan: number): SeekReport {
    const duration = this.duration;
    const warnings: SeekWarning[] = [];
    let timestamp = requested;
    if (!Number.isFinite(requested) || requested < 0 || requested > duration) {
      timestamp = Number.isNaN(requested) ? 0 : clampTime(requested, 0, duration);
      const error = new OutOfRangeError(requested, [0, duration]);
      warnings.push({ kind: 'out-of-range', message: `${error.message}; clamped to ${timestamp}s`, error });
    }

    const resolved = this.resolveVariationsUpTo(timestamp);
    for (const resolution of resolved) {
      this.logger.debug(
        `resolved ${resolution.variationId} = ${resolution.value} (${resolution.source}${
          resolution.resolvedBy ? ` via ${resolution.resolvedBy}` : ''
        })`,
      );
    }

    const continuation =
      this.continuation && this.continuation.target === timestamp ? this.continuation : undefined;
    const frame = this.evaluator.evaluate(timestamp, maxSpan, continuation);
    warnings.push(...frame.warnings);

    const diff = this.projection.diff(new Set(frame.entities.keys()));
    for (const entityId of diff.toDespawn) {
      this.projection.despawn(entityId);
    }
    const updated: string[] = [];
    for (const entityId of diff.toSpawn) {
      const entry = frame.entities.get(entityId);
      if (entry) this.projection.put(entityId, entry.instanceKey, entry.state);
    }
    for (const entityId of diff.remaining) {
      const entry = frame.entities.get(entityId);
      if (entry && this.projection.put(entityId, entry.instanceKey, entry.state)) {
        updated.push(entityId);
      }
    }

    this.current = timestamp;
    this.continuation = frame.continuation;
    this.dirty = false;
    for (const warning of warnings) {
      this.logger.warn(warning.message);
    }
    return {
      requested,
      timestamp,
      clamped: timestamp !== requested,
      instanceKey: frame.resolved.key,
      localTime: frame.resolved.localTime,
      spawned: diff.toSpawn,
      despawned: diff.toDespawn,
      updated,
      anchor: frame.anchor ? anchorId(frame.anchor) : undefined,
      exact: frame.exact,
      replay: frame.replay,
      resolved,
      warnings,
    };
  }

  /** Current value of a variation, if it has been resolved this session. */
  variationValue(id: string): string | undefined {
    return this.session.registry.peek(id);
  }

  private assertStratframe(key: string, stratframeId: string) {
    const path = this.session.graph.findInstance(key);
    if (!path) {
      throw new RangeError(`Unknown segment instance "${key}"`);
    }
    const segment = this.session.graph.get(leafOf(path).segmentId);
    if (!segment.stratframes.some((stratframe) => stratframe.id === stratframeId)) {
      throw new RangeError(`Segment "${segment.id}" has no stratframe "${stratframeId}"`);
    }
  }

  /** Plans a position for one instance only; other instances of the segment keep their plan. */
  setStratOverride(key: string, stratframeId: string, entityId: string, position: Vec2): void {
    this.assertStratframe(key, stratframeId);
    this.strats.set(key, stratframeId, entityId, position);
    this.markDirty();
  }

  clearStratOverride(key: string, stratframeId?: string, entityId?: string): void {
    this.strats.clear(key, stratframeId, entityId);
    this.markDirty();
  }

  private markDirty() {
    this.evaluator.invalidate();
    this.continuation = undefined;
    this.dirty = true;
  }

  /**
   * Tears down the projection and opens the graph, world and registry for
   * edits. Playback calls are rejected until `endAuthoring`.
   */
  beginAuthoring(): AuthoringSession {
    this.assertPlayback('begin authoring');
    this.projection.clear();
    this.pending = null;
    this.continuation = undefined;
    this.state = 'authoring';
    const token = {};
    this.authoring = token;
    const { graph, world, registry } = this.session;
    registry.thaw();
    const isOpen = () => this.state === 'authoring' && this.authoring === token;
    const edit =
      <A extends unknown[], R>(operation: string, fn: (...args: A) => R) =>
      (...args: A): R => {
        if (!isOpen()) {
          throw new PlaybackStateError(`Cannot ${operation} after the authoring session has ended`);
        }
        return fn(...args);
      };
    return {
      graph,
      world,
      registry,
      get open() {
        return isOpen();
      },
      upsertSegment: edit('upsert a segment', (segment: Segment) => graph.upsert(segment)),
      defineEntity: edit('define an entity', (entity: SourceEntity) => world.define(entity)),
      setScript: edit('set a script', (script: EntityScript) => world.setScript(script)),
      removeScript: edit('remove a script', (entityId: string, segmentId: string) => world.removeScript(entityId, segmentId)),
      registerVariation: edit(
        'register a variation',
        (id: string, domain: VariationDomain, defaultValue?: string) => registry.register(id, domain, defaultValue),
      ),
      pinVariation: edit('pin a variation', (id: string, value: string) => registry.pin(id, value)),
      unpinVariation: edit('unpin a variation', (id: string) => registry.unpin(id)),
      resetVariations: edit('reset variations', (id?: string) => registry.reset(id)),
    };
  }

  /** Revalidates the edited timeline and returns to playback; the next tick re-seeks. */
  endAuthoring(): void {
    if (this.state !== 'authoring') {
      throw new PlaybackStateError('endAuthoring() called outside an authoring session');
    }
    assertSessionSound(this.session);
    this.session.registry.freeze();
    this.authoring = undefined;
    this.state = 'playback';
    this.markDirty();
  }

  dispose(): void {
    if (this.state === 'disposed') return;
    this.projection.clear();
    this.pending = null;
    this.continuation = undefined;
    this.authoring = undefined;
    this.state = 'disposed';
  }
}
