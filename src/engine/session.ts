import { resolveEngineConfig, type EngineConfig } from '../config/engineConfig.js';
import { hashEncounter } from '../encounter/serializer.js';
import type { EncounterDocument, EncounterMetadata } from '../encounter/types.js';
import {
  DuplicateVariationError,
  EncounterValidationError,
  InvalidVariationValueError,
  UnknownVariationError,
  UnresolvableVariationError,
  type ValidationIssue,
} from '../errors.js';
import { SegmentGraph } from '../timeline/graph.js';
import type { EffectiveSnapshot, RecordedState, Segment } from '../timeline/types.js';
import { VariationRegistry } from '../variation/registry.js';
import type { VariationDeclaration, VariationReference } from '../variation/types.js';
import { SourceWorld } from '../world/sourceWorld.js';
import { INIT_SNAPSHOT_ID } from './anchors.js';

export type InitializerContext = {
  segment: Segment;
  world: SourceWorld;
  variations: VariationRegistry;
};

export type InitializerResult = {
  /** Entity state at time 0 of the planned segment. */
  state?: Record<string, RecordedState>;
  /** Planning choices to pin before playback starts. */
  pins?: Record<string, string>;
};

/** Sets up a segment that is planned on its own, without the fight leading into it. */
export type SegmentInitializer = (context: InitializerContext) => InitializerResult;

export type SessionOptions = {
  config?: Partial<EngineConfig>;
  /** Plan from this segment instead of the encounter root. */
  root?: string;
  initializers?: Readonly<Record<string, SegmentInitializer>>;
  /** Planning choices applied on top of the declarations' own pins. */
  pins?: Readonly<Record<string, string>>;
};

export type TimelineSession = {
  metadata: EncounterMetadata;
  hash: string;
  config: EngineConfig;
  graph: SegmentGraph;
  world: SourceWorld;
  registry: VariationRegistry;
  /** Initialization routine that produced `rootInit`. */
  initializer?: string;
  rootInit?: EffectiveSnapshot;
};

export const collectVariationReferences = (
  graph: SegmentGraph,
  world: SourceWorld,
): VariationReference[] => {
  const references: VariationReference[] = [];
  for (const segment of graph.list()) {
    for (const binding of segment.variations) {
      references.push({ variationId: binding.variationId, segmentId: segment.id });
    }
  }
  for (const script of world.allScripts()) {
    if (script.condition) {
      references.push({ variationId: script.condition.variationId, segmentId: script.segmentId });
    }
  }
  return references;
};

const inspectDeclaration = (declaration: VariationDeclaration, index: number): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];
  const { domain } = declaration;
  if (domain.kind === 'finite' && domain.values.length === 0) {
    issues.push({
      code: 'variation/empty-domain',
      message: `Variation "${declaration.id}" has an empty finite domain`,
      path: ['variations', index, 'domain'],
      severity: 'error',
    });
    return issues;
  }
  for (const field of ['default', 'pinned'] as const) {
    const value = declaration[field];
    if (value !== undefined && domain.kind === 'finite' && !domain.values.includes(value)) {
      issues.push({
        code: 'variation/invalid-value',
        message: `Variation "${declaration.id}" ${field} value "${value}" is not in its domain`,
        path: ['variations', index, field],
        severity: 'error',
        error: new InvalidVariationValueError(declaration.id, value),
      });
    }
  }
  return issues;
};

/** Structural issues of the encounter as a timeline rooted at `options.root` (or its own root). */
export const inspectEncounter = (
  encounter: EncounterDocument,
  options: SessionOptions = {},
): ValidationIssue[] => {
  const graph = new SegmentGraph(encounter.segments, options.root ?? encounter.root);
  const issues = graph.validate();
  const world = new SourceWorld(encounter.entities, encounter.scripts);
  issues.push(...world.validate(new Set(graph.list().map((segment) => segment.id))));

  const mode = resolveEngineConfig(options.config).variationMode;
  const declared = new Map<string, VariationDeclaration>();
  encounter.variations.forEach((declaration, index) => {
    issues.push(...inspectDeclaration(declaration, index));
    if (declared.has(declaration.id)) {
      issues.push({
        code: 'variation/duplicate',
        message: `Variation "${declaration.id}" is declared more than once`,
        path: ['variations', index],
        severity: 'error',
        error: new DuplicateVariationError(declaration.id),
      });
    }
    declared.set(declaration.id, declaration);
  });
  for (const [variationId, value] of Object.entries(options.pins ?? {})) {
    const declaration = declared.get(variationId);
    if (!declaration) {
      issues.push({
        code: 'variation/unknown',
        message: `Cannot pin unregistered variation "${variationId}"`,
        path: ['pins', variationId],
        severity: 'error',
        error: new UnknownVariationError(variationId),
      });
    } else if (declaration.domain.kind === 'finite' && !declaration.domain.values.includes(value)) {
      issues.push({
        code: 'variation/invalid-value',
        message: `Cannot pin "${variationId}" to "${value}": not in its domain`,
        path: ['pins', variationId],
        severity: 'error',
        error: new InvalidVariationValueError(variationId, value),
      });
    }
  }
  const checked = new Set<string>();
  for (const reference of collectVariationReferences(graph, world)) {
    const declaration = declared.get(reference.variationId);
    if (!declaration) {
      issues.push({
        code: 'variation/unknown',
        message: `Segment "${reference.segmentId}" references unregistered variation "${reference.variationId}"`,
        path: ['segments', reference.segmentId, 'variations', reference.variationId],
        severity: 'error',
        error: new UnknownVariationError(reference.variationId, reference.segmentId),
      });
      continue;
    }
    if (checked.has(declaration.id)) continue;
    checked.add(declaration.id);
    const pinnable =
      mode === 'planning' && (declaration.pinned !== undefined || options.pins?.[declaration.id] !== undefined);
    if (declaration.domain.kind === 'symbolic' && declaration.default === undefined && !pinnable) {
      issues.push({
        code: 'variation/unresolvable',
        message: `Variation "${declaration.id}" is symbolic and has no value to resolve to`,
        path: ['variations', declaration.id],
        severity: 'error',
        error: new UnresolvableVariationError(declaration.id),
      });
    }
  }

  if (graph.has(graph.rootId)) {
    const init = graph.root.init;
    if (init !== undefined && !options.initializers?.[init]) {
      issues.push({
        code: 'segment/unknown-initializer',
        message: `Segment "${graph.rootId}" uses initialization routine "${init}", which is not provided`,
        path: ['segments', graph.rootId, 'init'],
        severity: 'error',
      });
    }
  }
  return issues;
};

/**
 * Validates the encounter and builds everything playback needs. Nothing is
 * returned unless the whole encounter is sound; the first structural error is thrown.
 */
export const createTimelineSession = (
  encounter: EncounterDocument,
  options: SessionOptions = {},
): TimelineSession => {
  const issues = inspectEncounter(encounter, options);
  const failure = issues.find((issue) => issue.severity === 'error');
  if (failure) {
    throw failure.error ?? new EncounterValidationError(failure.message, issues);
  }
  const config = resolveEngineConfig(options.config);
  const hash = hashEncounter(encounter);
  const graph = new SegmentGraph(encounter.segments, options.root ?? encounter.root);
  const world = new SourceWorld(encounter.entities, encounter.scripts);
  const registry = VariationRegistry.fromDeclarations(encounter.variations, {
    mode: config.variationMode,
    seed: config.seed,
    encounterHash: hash,
  });
  for (const [variationId, value] of Object.entries(options.pins ?? {})) {
    registry.pin(variationId, value);
  }
  registry.validateReferences(collectVariationReferences(graph, world));

  let rootInit: EffectiveSnapshot | undefined;
  const init = graph.root.init;
  const initializer = init !== undefined ? options.initializers?.[init] : undefined;
  if (initializer) {
    const result = initializer({ segment: graph.root, world, variations: registry });
    for (const [variationId, value] of Object.entries(result.pins ?? {})) {
      registry.pin(variationId, value);
    }
    rootInit = {
      id: INIT_SNAPSHOT_ID,
      time: 0,
      label: 'init',
      state: result.state,
      self: false,
    };
  }
  registry.freeze();
  return {
    metadata: encounter.metadata,
    hash,
    config,
    graph,
    world,
    registry,
    initializer: rootInit ? init : undefined,
    rootInit,
  };
};

/**
 * Re-runs the load-time checks against a session edited in place: graph and
 * world structure, variation references and resolvability, and the root's
 * initialization routine, which cannot change after load.
 */
export const assertSessionSound = (
  session: Pick<TimelineSession, 'graph' | 'world' | 'registry' | 'initializer'>,
) => {
  session.graph.assertValid();
  const { init } = session.graph.root;
  if (init !== session.initializer) {
    const issue: ValidationIssue = {
      code: 'segment/unknown-initializer',
      message:
        init === undefined
          ? `Segment "${session.graph.rootId}" no longer uses initialization routine "${session.initializer}"`
          : `Segment "${session.graph.rootId}" uses initialization routine "${init}", which is not provided`,
      path: ['segments', session.graph.rootId, 'init'],
      severity: 'error',
    };
    throw new EncounterValidationError(issue.message, [issue]);
  }
  const worldIssues = session.world
    .validate(new Set(session.graph.list().map((segment) => segment.id)))
    .filter((issue) => issue.severity === 'error');
  if (worldIssues.length > 0) {
    throw new EncounterValidationError(worldIssues[0].message, worldIssues);
  }
  session.registry.validateReferences(collectVariationReferences(session.graph, session.world));
};
