import { OutsideLifetimeError, UnknownScriptError, type ValidationIssue } from '../errors.js';
import { isWithin, type Seconds } from '../timeline/time.js';
import type { VariationLookup } from '../variation/types.js';
import { evaluateScript, normalizeScript } from './evaluate.js';
import type { EntityScript, PropertyState, SourceEntity, SpawnWindow } from './types.js';

const intersects = (script: EntityScript, t0: Seconds, t1: Seconds) =>
  t1 > t0 ? script.spawn < t1 && script.despawn > t0 : script.spawn <= t0 && t0 < script.despawn;

/**
 * Authoritative catalog of placeable entities and their per-segment scripts.
 * Scripts are authored once per segment and shared by every instance of it.
 */
export class SourceWorld {
  private readonly entities = new Map<string, SourceEntity>();
  private readonly scripts = new Map<string, Map<string, EntityScript>>();

  constructor(entities: Iterable<SourceEntity> = [], scripts: Iterable<EntityScript> = []) {
    for (const entity of entities) this.define(entity);
    for (const script of scripts) this.setScript(script);
  }

  define(entity: SourceEntity): void {
    this.entities.set(entity.id, { ...entity });
  }

  setScript(script: EntityScript): void {
    let bySegment = this.scripts.get(script.segmentId);
    if (!bySegment) {
      bySegment = new Map();
      this.scripts.set(script.segmentId, bySegment);
    }
    bySegment.set(script.entityId, normalizeScript(script));
  }

  removeScript(entityId: string, segmentId: string): boolean {
    return this.scripts.get(segmentId)?.delete(entityId) ?? false;
  }

  entity(id: string): SourceEntity | undefined {
    return this.entities.get(id);
  }

  listEntities(): SourceEntity[] {
    return Array.from(this.entities.values());
  }

  script(entityId: string, segmentId: string): EntityScript {
    const script = this.scripts.get(segmentId)?.get(entityId);
    if (!script) {
      throw new UnknownScriptError(entityId, segmentId);
    }
    return script;
  }

  findScript(entityId: string, segmentId: string): EntityScript | undefined {
    return this.scripts.get(segmentId)?.get(entityId);
  }

  scriptsFor(segmentId: string): EntityScript[] {
    return Array.from(this.scripts.get(segmentId)?.values() ?? []);
  }

  allScripts(): EntityScript[] {
    return Array.from(this.scripts.values()).flatMap((bySegment) => Array.from(bySegment.values()));
  }

  spawnWindow(entityId: string, segmentId: string): SpawnWindow {
    const script = this.script(entityId, segmentId);
    return { start: script.spawn, end: script.despawn };
  }

  sample(entityId: string, segmentId: string, localTime: Seconds): PropertyState {
    const script = this.script(entityId, segmentId);
    if (!isWithin(localTime, script.spawn, script.despawn)) {
      throw new OutsideLifetimeError(entityId, segmentId, localTime, [script.spawn, script.despawn]);
    }
    return evaluateScript(script, localTime);
  }

  /**
   * Entities whose lifetime intersects `[t0, t1)`; an empty interval (`t0 === t1`)
   * asks for the entities alive at the instant `t0`. When `variations` is given,
   * conditional scripts only count if their variation currently has the expected value.
   */
  entitiesActiveDuring(
    segmentId: string,
    t0: Seconds,
    t1: Seconds,
    variations?: VariationLookup,
  ): Set<string> {
    const result = new Set<string>();
    for (const script of this.scriptsFor(segmentId)) {
      if (!intersects(script, t0, t1)) continue;
      if (script.condition && variations) {
        if (variations(script.condition.variationId) !== script.condition.equals) continue;
      }
      result.add(script.entityId);
    }
    return result;
  }

  validate(segmentIds?: ReadonlySet<string>): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const script of this.allScripts()) {
      const path = ['scripts', script.segmentId, script.entityId] as const;
      if (!this.entities.has(script.entityId)) {
        issues.push({
          code: 'script/unknown-entity',
          message: `Script in "${script.segmentId}" animates unknown entity "${script.entityId}"`,
          path,
          severity: 'error',
        });
      }
      if (segmentIds && !segmentIds.has(script.segmentId)) {
        issues.push({
          code: 'script/unknown-segment',
          message: `Script for "${script.entityId}" targets unknown segment "${script.segmentId}"`,
          path,
          severity: 'error',
        });
      }
      if (!(script.despawn > script.spawn)) {
        issues.push({
          code: 'script/empty-lifetime',
          message: `Entity "${script.entityId}" despawns at or before it spawns in "${script.segmentId}"`,
          path,
          severity: 'error',
        });
      }
      if (script.motion) {
        if (!this.entities.has(script.motion.target)) {
          issues.push({
            code: 'motion/unknown-target',
            message: `Entity "${script.entityId}" follows unknown entity "${script.motion.target}"`,
            path: [...path, 'motion'],
            severity: 'error',
          });
        }
        if (script.motion.kind === 'chase' && !(script.motion.speed > 0)) {
          issues.push({
            code: 'motion/speed',
            message: `Chase speed for "${script.entityId}" must be positive`,
            path: [...path, 'motion', 'speed'],
            severity: 'error',
          });
        }
      }
    }
    const cycle = this.findMotionCycle();
    if (cycle) {
      issues.push({
        code: 'motion/cycle',
        message: `Motion targets form a cycle: ${cycle.join(' -> ')}`,
        path: ['scripts'],
        severity: 'error',
      });
    }
    return issues;
  }

  private findMotionCycle(): string[] | null {
    const edges = new Map<string, Set<string>>();
    for (const script of this.allScripts()) {
      if (!script.motion) continue;
      const targets = edges.get(script.entityId) ?? new Set<string>();
      targets.add(script.motion.target);
      edges.set(script.entityId, targets);
    }
    const state = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];
    const visit = (id: string): string[] | null => {
      if (state.get(id) === 'done') return null;
      if (state.get(id) === 'visiting') return [...stack.slice(stack.indexOf(id)), id];
      state.set(id, 'visiting');
      stack.push(id);
      for (const target of edges.get(id) ?? []) {
        const found = visit(target);
        if (found) return found;
      }
      stack.pop();
      state.set(id, 'done');
      return null;
    };
    for (const id of edges.keys()) {
      const found = visit(id);
      if (found) return found;
    }
    return null;
  }
}
