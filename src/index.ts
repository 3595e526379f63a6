export * from './errors.js';
export * from './config/engineConfig.js';
export * from './logging/logger.js';
export * from './serialization/canonicalJson.js';

export * from './timeline/time.js';
export * from './timeline/types.js';
export * from './timeline/instance.js';
export { createSegment, effectiveSnapshots, normalizeSegment, ownKeyframeEnd } from './timeline/normalize.js';
export { SegmentGraph, placementRepeats, type ResolvedTimestamp } from './timeline/graph.js';

export * from './variation/types.js';
export { VariationRegistry, type ResolveContext, type VariationRegistryOptions } from './variation/registry.js';
export { deriveVariationSeed, mulberry32, sampleUniform } from './variation/sampling.js';

export * from './world/types.js';
export * from './world/jobs.js';
export { evaluateScript, evaluateTrack } from './world/evaluate.js';
export { SourceWorld } from './world/sourceWorld.js';

export * from './scene/presenter.js';
export * from './scene/projection.js';

export * from './engine/anchors.js';
export { StratBook } from './engine/plan.js';
export { replayMotion, type ActiveMover, type ReplayFrame, type ReplayRequest, type ReplayResult } from './engine/replay.js';
export {
  SceneEvaluator,
  type FrameResult,
  type ReplayContinuation,
  type SeekWarning,
  type SeekWarningKind,
} from './engine/evaluator.js';
export * from './engine/session.js';
export * from './engine/timelineManager.js';

export * from './encounter/types.js';
export { validateEncounter, type EncounterValidationResult } from './encounter/schema.js';
export * from './encounter/loader.js';
export { canonicalizeEncounter, encounterToJson, hashEncounter } from './encounter/serializer.js';
