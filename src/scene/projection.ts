import { hashCanonicalJson } from '../serialization/canonicalJson.js';
import type { PropertyState } from '../world/types.js';
import type { ScenePresenter } from './presenter.js';

export type LiveEntity = {
  entityId: string;
  /** Instance whose script currently drives the entity. */
  instanceKey: string;
  state: PropertyState;
};

export type ProjectionDiff = {
  toSpawn: string[];
  toDespawn: string[];
  remaining: string[];
};

const sameState = (a: PropertyState, b: PropertyState) =>
  a.position.x === b.position.x &&
  a.position.y === b.position.y &&
  a.rotation === b.rotation &&
  a.visual === b.visual;

/**
 * Live set of spawned entities for the current timestamp. Only the timeline
 * manager writes to it; every write is mirrored to the presenter.
 */
export class SceneProjection {
  private readonly live = new Map<string, LiveEntity>();

  constructor(private readonly presenter: ScenePresenter) {}

  has(entityId: string): boolean {
    return this.live.has(entityId);
  }

  get(entityId: string): LiveEntity | undefined {
    return this.live.get(entityId);
  }

  ids(): string[] {
    return Array.from(this.live.keys()).sort();
  }

  entries(): LiveEntity[] {
    return this.ids().map((id) => this.live.get(id)).filter((entry): entry is LiveEntity => entry !== undefined);
  }

  get size(): number {
    return this.live.size;
  }

  diff(active: ReadonlySet<string>): ProjectionDiff {
    const toSpawn = Array.from(active).filter((id) => !this.live.has(id)).sort();
    const toDespawn = this.ids().filter((id) => !active.has(id));
    const remaining = this.ids().filter((id) => active.has(id));
    return { toSpawn, toDespawn, remaining };
  }

  despawn(entityId: string): void {
    if (this.live.delete(entityId)) {
      this.presenter.despawn(entityId);
    }
  }

  /** Spawns the entity if needed, otherwise updates it; returns whether anything was emitted. */
  put(entityId: string, instanceKey: string, state: PropertyState): boolean {
    const current = this.live.get(entityId);
    const copy: PropertyState = {
      position: { x: state.position.x, y: state.position.y },
      rotation: state.rotation,
      visual: state.visual,
    };
    this.live.set(entityId, { entityId, instanceKey, state: copy });
    if (!current) {
      this.presenter.spawn(entityId, copy);
      return true;
    }
    if (sameState(current.state, copy)) {
      return false;
    }
    this.presenter.setState(entityId, copy);
    return true;
  }

  clear(): void {
    for (const id of this.ids()) {
      this.despawn(id);
    }
  }

  snapshot(): Record<string, LiveEntity> {
    const result: Record<string, LiveEntity> = {};
    for (const entry of this.entries()) {
      result[entry.entityId] = {
        entityId: entry.entityId,
        instanceKey: entry.instanceKey,
        state: { ...entry.state, position: { ...entry.state.position } },
      };
    }
    return result;
  }

  /** blake3 hash of the canonical projection; equal projections hash equally. */
  fingerprint(): string {
    return hashCanonicalJson(this.snapshot()).hash;
  }
}
