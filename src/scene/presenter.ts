import type { PropertyState } from '../world/types.js';

/** Host presentation layer. Commands must be applied as given, without retiming. */
export interface ScenePresenter {
  spawn(entityId: string, state: PropertyState): void;
  despawn(entityId: string): void;
  setState(entityId: string, state: PropertyState): void;
}

export type SceneCommand =
  | { kind: 'spawn'; entityId: string; state: PropertyState }
  | { kind: 'despawn'; entityId: string }
  | { kind: 'set-state'; entityId: string; state: PropertyState };

export class RecordingPresenter implements ScenePresenter {
  readonly commands: SceneCommand[] = [];

  spawn(entityId: string, state: PropertyState): void {
    this.commands.push({ kind: 'spawn', entityId, state });
  }

  despawn(entityId: string): void {
    this.commands.push({ kind: 'despawn', entityId });
  }

  setState(entityId: string, state: PropertyState): void {
    this.commands.push({ kind: 'set-state', entityId, state });
  }

  clear(): void {
    this.commands.length = 0;
  }
}

export const nullPresenter: ScenePresenter = {
  spawn: () => {},
  despawn: () => {},
  setState: () => {},
};
