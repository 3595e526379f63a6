import { EncounterValidationError, type ValidationIssue } from '../errors.js';
import type {
  Keyframe,
  RecordedState,
  Segment,
  SegmentPlacement,
  Snapshot,
  Stratframe,
  VariationBinding,
  Vec2,
} from '../timeline/types.js';
import type { VariationDeclaration, VariationDomain } from '../variation/types.js';
import { isJob, isWaymark } from '../world/jobs.js';
import type {
  EntityKind,
  EntityScript,
  Interpolation,
  MotionRule,
  PropertyKeyframe,
  PropertyTrack,
  ScriptCondition,
  SourceEntity,
} from '../world/types.js';
import type { ArenaInfo, ArenaShape, EncounterDocument, EncounterMetadata } from './types.js';

export type EncounterValidationResult = {
  encounter: EncounterDocument;
  issues: ValidationIssue[];
};

type Path = readonly (string | number)[];

const ENTITY_KINDS: readonly EntityKind[] = ['boss', 'marker', 'telegraph', 'player', 'waymark'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);
const asNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const toPath = (...parts: (string | number)[]): Path => parts;

const pushIssue = (
  issues: ValidationIssue[],
  code: string,
  message: string,
  path: Path,
  severity: ValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const asArray = (value: unknown, issues: ValidationIssue[], path: Path, label: string): unknown[] => {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    pushIssue(issues, 'encounter/type', `${label} must be an array`, path);
    return [];
  }
  return value;
};

const normaliseTime = (value: unknown, issues: ValidationIssue[], path: Path): number | null => {
  const time = asNumber(value);
  if (time === null) {
    pushIssue(issues, 'time/type', 'Time must be a finite number of seconds', path);
    return null;
  }
  if (time < 0) {
    pushIssue(issues, 'time/negative', 'Negative time clamped to 0', path, 'warning');
    return 0;
  }
  return time;
};

const normaliseVec = (value: unknown, issues: ValidationIssue[], path: Path): Vec2 | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'vector/type', 'Position must be an object with x and y', path);
    return null;
  }
  const x = asNumber(value.x);
  const y = asNumber(value.y);
  if (x === null || y === null) {
    pushIssue(issues, 'vector/components', 'Position must have numeric x and y', path);
    return null;
  }
  return { x, y };
};

const normaliseId = (value: unknown, issues: ValidationIssue[], path: Path, label: string): string | null => {
  const id = asString(value);
  if (!id || id.trim().length === 0) {
    pushIssue(issues, 'id/missing', `${label} must have a non-empty id`, path);
    return null;
  }
  return id;
};

const normaliseArena = (value: unknown, issues: ValidationIssue[], path: Path): ArenaInfo | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'arena/type', 'Arena must be an object', path, 'warning');
    return undefined;
  }
  const size = normaliseVec(value.size, issues, [...path, 'size']);
  let shape: ArenaShape | null = null;
  if (isRecord(value.shape)) {
    const kind = asString(value.shape.kind);
    if (kind === 'rect') {
      const width = asNumber(value.shape.width);
      const height = asNumber(value.shape.height);
      if (width !== null && height !== null) shape = { kind, width, height };
    } else if (kind === 'circle') {
      const radius = asNumber(value.shape.radius);
      if (radius !== null) shape = { kind, radius };
    }
  }
  if (!shape) {
    pushIssue(issues, 'arena/shape', 'Arena shape must be a rect or circle', [...path, 'shape']);
  }
  if (!size || !shape) {
    return undefined;
  }
  const mapId = asNumber(value.mapId) ?? undefined;
  return {
    name: asString(value.name) ?? 'Arena',
    shortName: asString(value.shortName) ?? undefined,
    mapId,
    size,
    shape,
  };
};

const normaliseMetadata = (value: unknown, issues: ValidationIssue[], path: Path): EncounterMetadata => {
  if (!isRecord(value)) {
    pushIssue(issues, 'metadata/type', 'Metadata must be an object', path, 'warning');
    return { name: 'Untitled encounter' };
  }
  const name = asString(value.name);
  if (!name) {
    pushIssue(issues, 'metadata/name', 'Metadata name missing; defaulting to "Untitled encounter"', [...path, 'name'], 'warning');
  }
  const tags = Array.isArray(value.tags)
    ? value.tags.filter((tag): tag is string => typeof tag === 'string')
    : undefined;
  return {
    name: name ?? 'Untitled encounter',
    description: asString(value.description) ?? undefined,
    author: asString(value.author) ?? undefined,
    createdAt: asString(value.createdAt) ?? undefined,
    updatedAt: asString(value.updatedAt) ?? undefined,
    tags,
    arena: normaliseArena(value.arena, issues, [...path, 'arena']),
  };
};

const normalisePlacement = (
  value: unknown,
  issues: ValidationIssue[],
  path: Path,
): SegmentPlacement | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'placement/type', 'Placement must be an object', path);
    return null;
  }
  const segmentId = normaliseId(value.segmentId, issues, [...path, 'segmentId'], 'Placement');
  const offset = normaliseTime(value.offset, issues, [...path, 'offset']);
  if (segmentId === null || offset === null) {
    return null;
  }
  if (value.repeat === undefined) {
    return { segmentId, offset };
  }
  const repeat = asNumber(value.repeat);
  if (repeat === null || !Number.isInteger(repeat) || repeat < 0) {
    pushIssue(issues, 'placement/repeat', 'Repeat index must be a non-negative integer', [...path, 'repeat']);
    return null;
  }
  return { segmentId, offset, repeat };
};

const normaliseMarker = (
  value: unknown,
  issues: ValidationIssue[],
  path: Path,
  label: string,
): Keyframe | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'keyframe/type', `${label} must be an object`, path);
    return null;
  }
  const id = normaliseId(value.id, issues, [...path, 'id'], label);
  const time = normaliseTime(value.time, issues, [...path, 'time']);
  if (id === null || time === null) {
    return null;
  }
  const markerLabel = asString(value.label) ?? undefined;
  return markerLabel === undefined ? { id, time } : { id, time, label: markerLabel };
};

const normalisePositions = (
  value: unknown,
  issues: ValidationIssue[],
  path: Path,
): Record<string, Vec2> | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'stratframe/positions', 'Stratframe positions must map entity ids to positions', path);
    return undefined;
  }
  const positions: Record<string, Vec2> = {};
  for (const [entityId, entry] of Object.entries(value)) {
    const position = normaliseVec(entry, issues, [...path, entityId]);
    if (position) positions[entityId] = position;
  }
  return positions;
};

const normaliseStratframe = (value: unknown, issues: ValidationIssue[], path: Path): Stratframe | null => {
  const marker = normaliseMarker(value, issues, path, 'Stratframe');
  if (!marker || !isRecord(value)) {
    return null;
  }
  const stratframe: Stratframe = { ...marker };
  const snapshotId = asString(value.snapshotId);
  if (snapshotId !== null) stratframe.snapshotId = snapshotId;
  const positions = normalisePositions(value.positions, issues, [...path, 'positions']);
  if (positions) stratframe.positions = positions;
  return stratframe;
};

const normaliseRecordedState = (value: unknown, issues: ValidationIssue[], path: Path): RecordedState | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'snapshot/state', 'Recorded state must be an object', path);
    return null;
  }
  const state: RecordedState = {};
  if (value.position !== undefined) {
    const position = normaliseVec(value.position, issues, [...path, 'position']);
    if (position) state.position = position;
  }
  const rotation = asNumber(value.rotation);
  if (rotation !== null) state.rotation = rotation;
  const visual = asString(value.visual);
  if (visual !== null) state.visual = visual;
  return state;
};

const normaliseSnapshot = (value: unknown, issues: ValidationIssue[], path: Path): Snapshot | null => {
  const marker = normaliseMarker(value, issues, path, 'Snapshot');
  if (!marker || !isRecord(value)) {
    return null;
  }
  const snapshot: Snapshot = { ...marker };
  if (value.state !== undefined) {
    if (!isRecord(value.state)) {
      pushIssue(issues, 'snapshot/state', 'Snapshot state must map entity ids to recorded state', [...path, 'state']);
    } else {
      const state: Record<string, RecordedState> = {};
      for (const [entityId, entry] of Object.entries(value.state)) {
        const recorded = normaliseRecordedState(entry, issues, [...path, 'state', entityId]);
        if (recorded) state[entityId] = recorded;
      }
      snapshot.state = state;
    }
  }
  return snapshot;
};

const normaliseBinding = (value: unknown, issues: ValidationIssue[], path: Path): VariationBinding | null => {
  if (typeof value === 'string') {
    return { variationId: value, mode: 'reads' };
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'variation/binding', 'Variation binding must be an id or { variationId, mode }', path);
    return null;
  }
  const variationId = normaliseId(value.variationId, issues, [...path, 'variationId'], 'Variation binding');
  if (variationId === null) {
    return null;
  }
  const mode = asString(value.mode);
  if (mode !== null && mode !== 'decides' && mode !== 'reads') {
    pushIssue(issues, 'variation/binding-mode', `Unknown binding mode "${mode}"; treating as "reads"`, [...path, 'mode'], 'warning');
  }
  return { variationId, mode: mode === 'decides' ? 'decides' : 'reads' };
};

const collect = <T>(
  value: unknown,
  issues: ValidationIssue[],
  path: Path,
  label: string,
  normalise: (entry: unknown, issues: ValidationIssue[], path: Path) => T | null,
): T[] => {
  const result: T[] = [];
  asArray(value, issues, path, label).forEach((entry, index) => {
    const normalised = normalise(entry, issues, [...path, index]);
    if (normalised !== null) result.push(normalised);
  });
  return result;
};

const normaliseSegment = (value: unknown, issues: ValidationIssue[], path: Path): Segment | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'segment/type', 'Segment must be an object', path);
    return null;
  }
  const id = normaliseId(value.id, issues, [...path, 'id'], 'Segment');
  if (id === null) {
    return null;
  }
  const visibility = asString(value.visibility);
  if (visibility !== null && visibility !== 'major' && visibility !== 'minor') {
    pushIssue(issues, 'segment/visibility', `Unknown visibility "${visibility}"; using "major"`, [...path, 'visibility'], 'warning');
  }
  const segment: Segment = {
    id,
    name: asString(value.name) ?? id,
    visibility: visibility === 'minor' ? 'minor' : 'major',
    children: collect(value.children, issues, [...path, 'children'], 'Segment children', normalisePlacement),
    keyframes: collect(value.keyframes, issues, [...path, 'keyframes'], 'Keyframes', (entry, list, at) =>
      normaliseMarker(entry, list, at, 'Keyframe'),
    ),
    stratframes: collect(value.stratframes, issues, [...path, 'stratframes'], 'Stratframes', normaliseStratframe),
    snapshots: collect(value.snapshots, issues, [...path, 'snapshots'], 'Snapshots', normaliseSnapshot),
    variations: collect(value.variations, issues, [...path, 'variations'], 'Variation bindings', normaliseBinding),
  };
  const init = asString(value.init);
  if (init !== null) segment.init = init;
  return segment;
};

const normaliseEntity = (value: unknown, issues: ValidationIssue[], path: Path): SourceEntity | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'entity/type', 'Entity must be an object', path);
    return null;
  }
  const id = normaliseId(value.id, issues, [...path, 'id'], 'Entity');
  const kind = ENTITY_KINDS.find((candidate) => candidate === value.kind);
  if (!kind) {
    pushIssue(issues, 'entity/kind', `Entity kind must be one of ${ENTITY_KINDS.join(', ')}`, [...path, 'kind']);
  }
  if (id === null || !kind) {
    return null;
  }
  const entity: SourceEntity = { id, kind, name: asString(value.name) ?? id };
  if (value.job !== undefined) {
    if (isJob(value.job)) {
      entity.job = value.job;
    } else {
      pushIssue(issues, 'entity/job', `Unknown job "${String(value.job)}"`, [...path, 'job'], 'warning');
    }
  }
  if (value.waymark !== undefined) {
    if (isWaymark(value.waymark)) {
      entity.waymark = value.waymark;
    } else {
      pushIssue(issues, 'entity/waymark', `Unknown waymark "${String(value.waymark)}"`, [...path, 'waymark'], 'warning');
    }
  }
  return entity;
};

const normaliseInterpolation = (value: unknown, issues: ValidationIssue[], path: Path): Interpolation => {
  if (value === undefined || value === 'step' || value === 'linear') {
    return value ?? 'step';
  }
  pushIssue(issues, 'track/interpolation', 'Interpolation must be "step" or "linear"; using "step"', path, 'warning');
  return 'step';
};

const normaliseTrack = <T>(
  value: unknown,
  issues: ValidationIssue[],
  path: Path,
  normaliseValue: (entry: unknown, issues: ValidationIssue[], path: Path) => T | null,
): PropertyTrack<T> | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'track/type', 'Property track must be an object', path);
    return undefined;
  }
  return {
    interpolation: normaliseInterpolation(value.interpolation, issues, [...path, 'interpolation']),
    keyframes: normalisePropertyKeyframes(value.keyframes, issues, [...path, 'keyframes'], normaliseValue),
  };
};

const normalisePropertyKeyframes = <T>(
  value: unknown,
  issues: ValidationIssue[],
  path: Path,
  normaliseValue: (entry: unknown, issues: ValidationIssue[], path: Path) => T | null,
): PropertyKeyframe<T>[] =>
  collect(value, issues, path, 'Property keyframes', (entry, list, at) => {
    if (!isRecord(entry)) {
      pushIssue(list, 'track/keyframe', 'Property keyframe must be an object', at);
      return null;
    }
    const time = normaliseTime(entry.time, list, [...at, 'time']);
    const normalised = normaliseValue(entry.value, list, [...at, 'value']);
    return time === null || normalised === null ? null : { time, value: normalised };
  });

const normaliseRotation = (value: unknown, issues: ValidationIssue[], path: Path): number | null => {
  const rotation = asNumber(value);
  if (rotation === null) pushIssue(issues, 'track/rotation', 'Rotation must be a number of radians', path);
  return rotation;
};

const normaliseVisual = (value: unknown, issues: ValidationIssue[], path: Path): string | null => {
  const visual = asString(value);
  if (visual === null) pushIssue(issues, 'track/visual', 'Visual state must be a string', path);
  return visual;
};

const normaliseMotion = (value: unknown, issues: ValidationIssue[], path: Path): MotionRule | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'motion/type', 'Motion rule must be an object', path);
    return undefined;
  }
  const target = normaliseId(value.target, issues, [...path, 'target'], 'Motion target');
  if (target === null) {
    return undefined;
  }
  if (value.kind === 'chase') {
    const speed = asNumber(value.speed);
    if (speed === null) {
      pushIssue(issues, 'motion/speed', 'Chase motion must set a numeric speed', [...path, 'speed']);
      return undefined;
    }
    return { kind: 'chase', target, speed };
  }
  if (value.kind === 'bait') {
    const rule: Extract<MotionRule, { kind: 'bait' }> = { kind: 'bait', target };
    const snapshot = asString(value.snapshot);
    if (snapshot !== null) rule.snapshot = snapshot;
    if (value.offset !== undefined) {
      const offset = normaliseVec(value.offset, issues, [...path, 'offset']);
      if (offset) rule.offset = offset;
    }
    return rule;
  }
  pushIssue(issues, 'motion/kind', 'Motion kind must be "chase" or "bait"', [...path, 'kind']);
  return undefined;
};

const normaliseCondition = (value: unknown, issues: ValidationIssue[], path: Path): ScriptCondition | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const variationId = isRecord(value) ? asString(value.variationId) : null;
  const equals = isRecord(value) ? asString(value.equals) : null;
  if (variationId === null || equals === null) {
    pushIssue(issues, 'script/condition', 'Script condition must be { variationId, equals }', path);
    return undefined;
  }
  return { variationId, equals };
};

const normaliseScript = (value: unknown, issues: ValidationIssue[], path: Path): EntityScript | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'script/type', 'Script must be an object', path);
    return null;
  }
  const entityId = normaliseId(value.entityId, issues, [...path, 'entityId'], 'Script entity');
  const segmentId = normaliseId(value.segmentId, issues, [...path, 'segmentId'], 'Script segment');
  const spawn = normaliseTime(value.spawn, issues, [...path, 'spawn']);
  const despawn = normaliseTime(value.despawn, issues, [...path, 'despawn']);
  if (entityId === null || segmentId === null || spawn === null || despawn === null) {
    return null;
  }
  const script: EntityScript = { entityId, segmentId, spawn, despawn };
  const position = normaliseTrack(value.position, issues, [...path, 'position'], normaliseVec);
  if (position) script.position = position;
  const rotation = normaliseTrack(value.rotation, issues, [...path, 'rotation'], normaliseRotation);
  if (rotation) script.rotation = rotation;
  if (value.visual !== undefined) {
    script.visual = normalisePropertyKeyframes(value.visual, issues, [...path, 'visual'], normaliseVisual);
  }
  const motion = normaliseMotion(value.motion, issues, [...path, 'motion']);
  if (motion) script.motion = motion;
  const condition = normaliseCondition(value.condition, issues, [...path, 'condition']);
  if (condition) script.condition = condition;
  return script;
};

const normaliseDomain = (value: unknown, issues: ValidationIssue[], path: Path): VariationDomain | null => {
  if (Array.isArray(value)) {
    return normaliseDomain({ kind: 'finite', values: value }, issues, path);
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'variation/domain', 'Variation domain must be an object or an array of values', path);
    return null;
  }
  if (value.kind === 'symbolic') {
    const description = asString(value.description);
    return description === null ? { kind: 'symbolic' } : { kind: 'symbolic', description };
  }
  if (value.kind !== 'finite' || !Array.isArray(value.values)) {
    pushIssue(issues, 'variation/domain', 'Variation domain must be finite (with values[]) or symbolic', path);
    return null;
  }
  const values = value.values.filter((entry): entry is string => typeof entry === 'string');
  if (values.length !== value.values.length) {
    pushIssue(issues, 'variation/domain-values', 'Finite domain values must be strings', [...path, 'values']);
  }
  if (new Set(values).size !== values.length) {
    pushIssue(issues, 'variation/domain-values', 'Finite domain values must be unique', [...path, 'values']);
  }
  if (values.length === 0) {
    pushIssue(issues, 'variation/empty-domain', 'Finite domain must list at least one value', [...path, 'values']);
    return null;
  }
  return { kind: 'finite', values: Array.from(new Set(values)) };
};

const normaliseVariation = (value: unknown, issues: ValidationIssue[], path: Path): VariationDeclaration | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'variation/type', 'Variation must be an object', path);
    return null;
  }
  const id = normaliseId(value.id, issues, [...path, 'id'], 'Variation');
  const domain = normaliseDomain(value.domain, issues, [...path, 'domain']);
  if (id === null || domain === null) {
    return null;
  }
  const declaration: VariationDeclaration = { id, domain };
  for (const field of ['default', 'pinned'] as const) {
    const entry = value[field];
    if (entry === undefined) continue;
    const chosen = asString(entry);
    if (chosen === null || (domain.kind === 'finite' && !domain.values.includes(chosen))) {
      pushIssue(issues, 'variation/invalid-value', `Variation "${id}" ${field} value is not in its domain`, [...path, field]);
      continue;
    }
    declaration[field] = chosen;
  }
  return declaration;
};

const verifyUnique = (
  ids: readonly string[],
  issues: ValidationIssue[],
  path: Path,
  code: string,
  label: string,
) => {
  const seen = new Set<string>();
  ids.forEach((id, index) => {
    if (seen.has(id)) {
      pushIssue(issues, code, `${label} "${id}" is defined more than once`, [...path, index]);
    }
    seen.add(id);
  });
};

const verifyReferences = (encounter: EncounterDocument, issues: ValidationIssue[]) => {
  verifyUnique(encounter.segments.map((segment) => segment.id), issues, toPath('segments'), 'segment/duplicate', 'Segment');
  verifyUnique(encounter.entities.map((entity) => entity.id), issues, toPath('entities'), 'entity/duplicate', 'Entity');
  verifyUnique(
    encounter.variations.map((variation) => variation.id),
    issues,
    toPath('variations'),
    'variation/duplicate',
    'Variation',
  );
  verifyUnique(
    encounter.scripts.map((script) => `${script.segmentId}/${script.entityId}`),
    issues,
    toPath('scripts'),
    'script/duplicate',
    'Script',
  );
  if (!encounter.segments.some((segment) => segment.id === encounter.root)) {
    pushIssue(issues, 'segment/unknown', `Timeline root "${encounter.root}" is not defined`, toPath('root'));
  }
};

/**
 * Normalises an untyped encounter payload. Problems are collected as issues;
 * the call throws `EncounterValidationError` if any of them is an error.
 */
export function validateEncounter(payload: unknown): EncounterValidationResult {
  const issues: ValidationIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'encounter/type', 'Encounter root must be an object', toPath());
    throw new EncounterValidationError('Encounter root must be an object', issues);
  }

  if (payload.version !== 1) {
    pushIssue(issues, 'encounter/version', 'Encounter must declare version 1', toPath('version'));
  }
  const root = asString(payload.root);
  if (!root) {
    pushIssue(issues, 'encounter/root', 'Encounter must name its root segment', toPath('root'));
  }

  const encounter: EncounterDocument = {
    version: 1,
    metadata: normaliseMetadata(payload.metadata, issues, toPath('metadata')),
    root: root ?? '',
    segments: collect(payload.segments, issues, toPath('segments'), 'Segments', normaliseSegment),
    entities: collect(payload.entities, issues, toPath('entities'), 'Entities', normaliseEntity),
    scripts: collect(payload.scripts, issues, toPath('scripts'), 'Scripts', normaliseScript),
    variations: collect(payload.variations, issues, toPath('variations'), 'Variations', normaliseVariation),
  };

  if (root) {
    verifyReferences(encounter, issues);
  }

  if (issues.some((issue) => issue.severity === 'error')) {
    throw new EncounterValidationError('Encounter validation failed', issues);
  }

  return {
    encounter,
    issues,
  };
}
