import { OutsideLifetimeError, UnknownScriptError, type StratlineError } from '../errors.js';
import type { ResolvedTimestamp } from '../timeline/graph.js';
import { instanceKey } from '../timeline/instance.js';
import { clampTime, timeEquals, type Seconds } from '../timeline/time.js';
import type { RecordedState, Vec2 } from '../timeline/types.js';
import { evaluateScript } from '../world/evaluate.js';
import type { EntityScript, MotionRule, PropertyState } from '../world/types.js';
import {
  anchorId,
  collectAnchors,
  labeledAnchor,
  nearestAnchor,
  previousAnchor,
  type Anchor,
} from './anchors.js';
import { planPosition, planWaypoints, type StratBook } from './plan.js';
import { baitState, replayMotion, type ActiveMover, type ReplayFrame } from './replay.js';
import type { TimelineSession } from './session.js';

export type SeekWarningKind = 'out-of-range' | 'outside-lifetime' | 'no-script' | 'replay-pending';

export type SeekWarning = {
  kind: SeekWarningKind;
  message: string;
  entityId?: string;
  error?: StratlineError;
};

/** The script driving one live entity: the innermost active instance that animates it. */
export type ActiveBinding = {
  entityId: string;
  depth: number;
  instanceKey: string;
  segmentId: string;
  localTime: Seconds;
  script: EntityScript;
};

export type FrameDetail = {
  time: Seconds;
  resolved: ResolvedTimestamp;
  bindings: Map<string, ActiveBinding>;
  fixed: Map<string, PropertyState>;
  movers: ActiveMover[];
  skipped: SeekWarning[];
};

/** Unfinished replay carried into the next tick. */
export type ReplayContinuation = {
  anchorId: string;
  target: Seconds;
  reached: Seconds;
  /** Grid index of `reached`, counted from the anchor. */
  step: number;
  states: ReadonlyMap<string, PropertyState>;
  revision: number;
};

export type ReplaySummary = {
  from: Seconds;
  to: Seconds;
  reached: Seconds;
  complete: boolean;
  steps: number;
};

export type EvaluatedEntity = {
  instanceKey: string;
  state: PropertyState;
};

export type FrameResult = {
  time: Seconds;
  resolved: ResolvedTimestamp;
  entities: Map<string, EvaluatedEntity>;
  anchor?: Anchor;
  /** True when `time` is exactly the driving anchor's instant. */
  exact: boolean;
  replay?: ReplaySummary;
  continuation?: ReplayContinuation;
  warnings: SeekWarning[];
};

type BaitRule = Extract<MotionRule, { kind: 'bait' }>;

type Lock =
  | { kind: 'locked'; position: Vec2 }
  | { kind: 'unanchored' }
  | { kind: 'missing'; reference: Anchor };

type SelfAnchor = {
  anchor: Anchor;
  states: ReadonlyMap<string, PropertyState>;
};

const byId = (a: ActiveMover, b: ActiveMover) =>
  a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0;

/** Movers ordered so that every motion target comes before the entities following it. */
export const orderMovers = (movers: readonly ActiveMover[]): ActiveMover[] => {
  const index = new Map(movers.map((mover) => [mover.entityId, mover]));
  const ordered: ActiveMover[] = [];
  const visited = new Set<string>();
  const visit = (mover: ActiveMover) => {
    if (visited.has(mover.entityId)) return;
    visited.add(mover.entityId);
    const target = index.get(mover.rule.target);
    if (target) visit(target);
    ordered.push(mover);
  };
  [...movers].sort(byId).forEach(visit);
  return ordered;
};

const applyRecorded = (state: PropertyState, recorded: RecordedState): PropertyState => ({
  position: recorded.position ? { x: recorded.position.x, y: recorded.position.y } : state.position,
  rotation: recorded.rotation ?? state.rotation,
  visual: recorded.visual ?? state.visual,
});

const skipWarning = (entityId: string, error: OutsideLifetimeError | UnknownScriptError, prefix = ''): SeekWarning => ({
  kind: error instanceof OutsideLifetimeError ? 'outside-lifetime' : 'no-script',
  message: `${prefix}${error.message}`,
  entityId,
  error,
});

/**
 * Computes entity states for a timestamp: scripted and planned entities are
 * sampled directly, position-dependent movers are replayed from the nearest
 * snapshot anchor. Nothing here touches the scene; results are applied by the
 * timeline manager.
 */
export class SceneEvaluator {
  private readonly anchorStates = new Map<string, ReadonlyMap<string, PropertyState>>();
  private resolutionCount = 0;
  private revisionCounter = 0;

  constructor(
    private readonly session: TimelineSession,
    private readonly book: StratBook,
  ) {}

  get revision(): number {
    return this.revisionCounter;
  }

  /** Drops memoized anchor states; call after plans or authored content change. */
  invalidate(): void {
    this.anchorStates.clear();
    this.revisionCounter++;
  }

  private syncResolutions() {
    const count = this.session.registry.resolutions().length;
    if (count !== this.resolutionCount) {
      this.resolutionCount = count;
      this.invalidate();
    }
  }

  activeAt(resolved: ResolvedTimestamp): Map<string, ActiveBinding> {
    const { world, registry } = this.session;
    const lookup = (id: string) => registry.peek(id);
    const bindings = new Map<string, ActiveBinding>();
    resolved.path.forEach((step, depth) => {
      const localTime = resolved.localTimes[depth];
      const key = instanceKey(resolved.path.slice(0, depth + 1));
      for (const entityId of world.entitiesActiveDuring(step.segmentId, localTime, localTime, lookup)) {
        bindings.set(entityId, {
          entityId,
          depth,
          instanceKey: key,
          segmentId: step.segmentId,
          localTime,
          script: world.script(entityId, step.segmentId),
        });
      }
    });
    return bindings;
  }

  private baseState(binding: ActiveBinding): PropertyState {
    const scripted = this.session.world.sample(binding.entityId, binding.segmentId, binding.localTime);
    const segment = this.session.graph.get(binding.segmentId);
    const waypoints = planWaypoints(segment, binding.instanceKey, binding.entityId, this.book);
    if (waypoints.length === 0) {
      return scripted;
    }
    const spawn = binding.script.spawn;
    const planned = planPosition(waypoints, binding.localTime, {
      time: spawn,
      position: evaluateScript(binding.script, spawn).position,
    });
    return planned ? { ...scripted, position: planned } : scripted;
  }

  frameDetail(time: Seconds): FrameDetail {
    const { graph } = this.session;
    const resolved = graph.resolve(clampTime(time, 0, graph.duration(graph.rootId)));
    const bindings = this.activeAt(resolved);
    const fixed = new Map<string, PropertyState>();
    const movers: ActiveMover[] = [];
    const skipped: SeekWarning[] = [];
    for (const binding of bindings.values()) {
      try {
        const state = this.baseState(binding);
        if (binding.script.motion) {
          movers.push({ entityId: binding.entityId, rule: binding.script.motion, scripted: state });
        } else {
          fixed.set(binding.entityId, state);
        }
      } catch (error) {
        if (error instanceof OutsideLifetimeError || error instanceof UnknownScriptError) {
          bindings.delete(binding.entityId);
          skipped.push(skipWarning(binding.entityId, error));
          continue;
        }
        throw error;
      }
    }
    return { time, resolved, bindings, fixed, movers: orderMovers(movers), skipped };
  }

  frameAt(time: Seconds): ReplayFrame {
    const { fixed, movers } = this.frameDetail(time);
    return { fixed, movers };
  }

  private lockFor(
    rule: BaitRule,
    driving: Anchor | undefined,
    candidates: readonly Anchor[],
    self?: SelfAnchor,
  ): Lock {
    if (!driving) {
      return { kind: 'unanchored' };
    }
    const reference =
      rule.snapshot !== undefined ? labeledAnchor(candidates, rule.snapshot, driving.global) : driving;
    if (!reference) {
      return { kind: 'unanchored' };
    }
    const source =
      self && anchorId(self.anchor) === anchorId(reference) ? self.states : this.anchorState(reference);
    const target = source.get(rule.target);
    return target ? { kind: 'locked', position: target.position } : { kind: 'missing', reference };
  }

  private baitLock(driving: Anchor | undefined, candidates: readonly Anchor[]) {
    return (mover: ActiveMover): Vec2 | undefined => {
      if (mover.rule.kind !== 'bait') return undefined;
      const lock = this.lockFor(mover.rule, driving, candidates);
      return lock.kind === 'locked' ? lock.position : undefined;
    };
  }

  private missingTarget(mover: ActiveMover, rule: BaitRule, reference: Anchor): SeekWarning {
    const { world } = this.session;
    const prefix = `Skipping "${mover.entityId}": bait target unavailable at snapshot "${reference.snapshot.id}". `;
    for (let depth = reference.path.length - 1; depth >= 0; depth--) {
      const step = reference.path[depth];
      const script = world.findScript(rule.target, step.segmentId);
      if (script) {
        const error = new OutsideLifetimeError(rule.target, step.segmentId, reference.global - step.start, [
          script.spawn,
          script.despawn,
        ]);
        return skipWarning(mover.entityId, error, prefix);
      }
    }
    const leaf = reference.path[reference.path.length - 1];
    return skipWarning(mover.entityId, new UnknownScriptError(rule.target, leaf.segmentId), prefix);
  }

  /**
   * State of every entity live at an anchor's instant, with chase motion replayed
   * from the previous anchor and the snapshot's recorded state applied on top.
   */
  anchorState(anchor: Anchor): ReadonlyMap<string, PropertyState> {
    const id = anchorId(anchor);
    const cached = this.anchorStates.get(id);
    if (cached) {
      return cached;
    }
    const { graph, config, rootInit } = this.session;
    const frame = this.frameDetail(anchor.global);
    const states = new Map(frame.fixed);
    const candidates = collectAnchors(graph, anchor.path, rootInit);
    const previous = previousAnchor(candidates, anchor.global);
    let replayed: ReadonlyMap<string, PropertyState> | undefined;
    if (previous && frame.movers.some((mover) => mover.rule.kind === 'chase')) {
      replayed = replayMotion({
        from: previous.global,
        to: anchor.global,
        rate: config.replayRate,
        start: this.anchorState(previous),
        baitLock: this.baitLock(previous, collectAnchors(graph, previous.path, rootInit)),
        frameAt: (time) => this.frameAt(time),
      }).states;
    }
    for (const mover of frame.movers) {
      if (mover.rule.kind === 'chase') {
        states.set(mover.entityId, replayed?.get(mover.entityId) ?? mover.scripted);
        continue;
      }
      const lock = this.lockFor(mover.rule, anchor, candidates, { anchor, states });
      if (lock.kind !== 'missing') {
        states.set(mover.entityId, baitState(mover, lock.kind === 'locked' ? lock.position : undefined));
      }
    }
    for (const [entityId, recorded] of Object.entries(anchor.snapshot.state ?? {})) {
      const current = states.get(entityId);
      if (current) {
        states.set(entityId, applyRecorded(current, recorded));
      }
    }
    this.anchorStates.set(id, states);
    return states;
  }

  /**
   * Evaluates the scene at `time`. At most `maxSpan` seconds of replay are
   * computed; an unfinished replay is returned as a continuation that a later
   * call for the same target picks up.
   */
  evaluate(
    time: Seconds,
    maxSpan: number = Number.POSITIVE_INFINITY,
    continuation?: ReplayContinuation,
  ): FrameResult {
    this.syncResolutions();
    const { graph, config, rootInit } = this.session;
    const frame = this.frameDetail(time);
    const candidates = collectAnchors(graph, frame.resolved.path, rootInit);
    const anchor = nearestAnchor(candidates, time);
    const warnings = [...frame.skipped];
    const states = new Map(frame.fixed);
    const exact = anchor !== undefined && timeEquals(anchor.global, time);
    let replay: ReplaySummary | undefined;
    let next: ReplayContinuation | undefined;

    if (anchor && exact) {
      const anchored = this.anchorState(anchor);
      for (const entityId of frame.bindings.keys()) {
        const state = anchored.get(entityId);
        if (state) states.set(entityId, state);
      }
    } else if (anchor && frame.movers.some((mover) => mover.rule.kind === 'chase')) {
      const id = anchorId(anchor);
      const resume =
        continuation &&
        continuation.anchorId === id &&
        timeEquals(continuation.target, time) &&
        continuation.revision === this.revisionCounter
          ? continuation
          : undefined;
      const from = resume ? resume.reached : anchor.global;
      const result = replayMotion({
        from,
        to: time,
        rate: config.replayRate,
        origin: anchor.global,
        step: resume ? resume.step : 0,
        maxSpan,
        start: resume ? resume.states : this.anchorState(anchor),
        baitLock: this.baitLock(anchor, candidates),
        frameAt: (at) => this.frameAt(at),
      });
      replay = { from, to: time, reached: result.reached, complete: result.complete, steps: result.steps };
      if (!result.complete) {
        next = {
          anchorId: id,
          target: time,
          reached: result.reached,
          step: result.step,
          states: result.states,
          revision: this.revisionCounter,
        };
        warnings.push({
          kind: 'replay-pending',
          message: `Replay from snapshot "${anchor.snapshot.id}" reached ${result.reached}s of ${time}s; continuing next tick`,
        });
      }
      for (const mover of frame.movers) {
        if (mover.rule.kind === 'chase') {
          states.set(mover.entityId, result.states.get(mover.entityId) ?? mover.scripted);
        }
      }
    } else {
      for (const mover of frame.movers) {
        if (mover.rule.kind === 'chase') states.set(mover.entityId, mover.scripted);
      }
    }

    for (const mover of frame.movers) {
      if (mover.rule.kind !== 'bait') continue;
      const lock = this.lockFor(mover.rule, anchor, candidates, anchor && exact ? { anchor, states } : undefined);
      if (lock.kind === 'missing') {
        states.delete(mover.entityId);
        warnings.push(this.missingTarget(mover, mover.rule, lock.reference));
      } else if (!exact) {
        states.set(mover.entityId, baitState(mover, lock.kind === 'locked' ? lock.position : undefined));
      }
    }

    const entities = new Map<string, EvaluatedEntity>();
    for (const [entityId, binding] of frame.bindings) {
      const state = states.get(entityId);
      if (state) entities.set(entityId, { instanceKey: binding.instanceKey, state });
    }
    return {
      time,
      resolved: frame.resolved,
      entities,
      anchor,
      exact,
      replay,
      continuation: next,
      warnings,
    };
  }
}
