import { hashCanonicalJson, writeCanonicalJson } from '../serialization/canonicalJson.js';
import { normalizeSegment } from '../timeline/normalize.js';
import { normalizeScript } from '../world/evaluate.js';
import type { EncounterDocument } from './types.js';

const byId = <T extends { id: string }>(a: T, b: T) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

/** Stable form used for hashing: definitions sorted by id, keyframes sorted by time. */
export const canonicalizeEncounter = (encounter: EncounterDocument): EncounterDocument => ({
  version: 1,
  metadata: { ...encounter.metadata },
  root: encounter.root,
  segments: encounter.segments.map(normalizeSegment).sort(byId),
  entities: [...encounter.entities].sort(byId),
  scripts: encounter.scripts
    .map(normalizeScript)
    .sort((a, b) =>
      a.segmentId === b.segmentId
        ? a.entityId < b.entityId
          ? -1
          : a.entityId > b.entityId
            ? 1
            : 0
        : a.segmentId < b.segmentId
          ? -1
          : 1,
    ),
  variations: [...encounter.variations].sort(byId),
});

export const encounterToJson = (encounter: EncounterDocument, indent = 2): string =>
  writeCanonicalJson(canonicalizeEncounter(encounter), { indent });

/** blake3 hash of the canonical encounter, independent of authoring order and metadata. */
export const hashEncounter = (encounter: EncounterDocument): string => {
  const { metadata: _metadata, ...content } = canonicalizeEncounter(encounter);
  return hashCanonicalJson(content).hash;
};
