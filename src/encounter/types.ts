import type { Segment, Vec2 } from '../timeline/types.js';
import type { VariationDeclaration } from '../variation/types.js';
import type { EntityScript, SourceEntity } from '../world/types.js';

export type ArenaShape =
  | { kind: 'rect'; width: number; height: number }
  | { kind: 'circle'; radius: number };

/** Backdrop of a fight, measured in yalms with the origin at the arena centre. */
export interface ArenaInfo {
  readonly name: string;
  readonly shortName?: string;
  readonly mapId?: number;
  readonly size: Vec2;
  readonly shape: ArenaShape;
}

export interface EncounterMetadata {
  readonly name: string;
  readonly description?: string;
  readonly author?: string;
  readonly createdAt?: string;
  readonly updatedAt?: string;
  readonly tags?: string[];
  readonly arena?: ArenaInfo;
}

export interface EncounterDocument {
  readonly version: 1;
  readonly metadata: EncounterMetadata;
  /** Segment id of the timeline root. */
  readonly root: string;
  readonly segments: Segment[];
  readonly entities: SourceEntity[];
  readonly scripts: EntityScript[];
  readonly variations: VariationDeclaration[];
}
