import type { Seconds } from './timeline/time.js';

export type StratlineErrorCode =
  | 'variation/unknown'
  | 'variation/duplicate'
  | 'variation/invalid-value'
  | 'variation/unresolvable'
  | 'variation/locked'
  | 'placement/ambiguous'
  | 'segment/unknown'
  | 'segment/cycle'
  | 'segment/invalid'
  | 'seek/out-of-range'
  | 'entity/outside-lifetime'
  | 'entity/no-script'
  | 'engine/state'
  | 'encounter/invalid';

export type IssueSeverity = 'error' | 'warning';

export type ValidationIssue = {
  code: string;
  message: string;
  path: readonly (string | number)[];
  severity: IssueSeverity;
  /** Typed error raised when this issue aborts a load. */
  error?: StratlineError;
};

export class StratlineError extends Error {
  constructor(
    readonly code: StratlineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'StratlineError';
  }
}

export class UnknownVariationError extends StratlineError {
  constructor(
    readonly variationId: string,
    readonly segmentId?: string,
  ) {
    super(
      'variation/unknown',
      segmentId
        ? `Segment "${segmentId}" references unregistered variation "${variationId}"`
        : `Variation "${variationId}" is not registered`,
    );
    this.name = 'UnknownVariationError';
  }
}

export class DuplicateVariationError extends StratlineError {
  constructor(readonly variationId: string) {
    super('variation/duplicate', `Variation "${variationId}" is already registered`);
    this.name = 'DuplicateVariationError';
  }
}

export class InvalidVariationValueError extends StratlineError {
  constructor(
    readonly variationId: string,
    readonly value: string,
  ) {
    super(
      'variation/invalid-value',
      `Value "${value}" is not in the domain of variation "${variationId}"`,
    );
    this.name = 'InvalidVariationValueError';
  }
}

export class UnresolvableVariationError extends StratlineError {
  constructor(readonly variationId: string) {
    super(
      'variation/unresolvable',
      `Variation "${variationId}" has a symbolic domain and no pinned or default value`,
    );
    this.name = 'UnresolvableVariationError';
  }
}

export class VariationRegistryLockedError extends StratlineError {
  constructor(operation: string) {
    super('variation/locked', `Cannot ${operation} while playback is active`);
    this.name = 'VariationRegistryLockedError';
  }
}

export class AmbiguousPlacementError extends StratlineError {
  constructor(
    readonly segmentId: string,
    readonly placements: readonly [number, number],
  ) {
    super(
      'placement/ambiguous',
      `Segment "${segmentId}" has placements ${placements[0]} and ${placements[1]} with identical offset and duration`,
    );
    this.name = 'AmbiguousPlacementError';
  }
}

export class UnknownSegmentError extends StratlineError {
  constructor(
    readonly segmentId: string,
    readonly parentId?: string,
  ) {
    super(
      'segment/unknown',
      parentId
        ? `Segment "${parentId}" places unknown segment "${segmentId}"`
        : `Unknown segment "${segmentId}"`,
    );
    this.name = 'UnknownSegmentError';
  }
}

export class SegmentCycleError extends StratlineError {
  constructor(readonly cycle: readonly string[]) {
    super('segment/cycle', `Segment placements form a cycle: ${cycle.join(' -> ')}`);
    this.name = 'SegmentCycleError';
  }
}

export class OutOfRangeError extends StratlineError {
  constructor(
    readonly requested: Seconds,
    readonly range: readonly [Seconds, Seconds],
  ) {
    super(
      'seek/out-of-range',
      `Timestamp ${requested}s is outside the timeline [${range[0]}s, ${range[1]}s]`,
    );
    this.name = 'OutOfRangeError';
  }
}

export class OutsideLifetimeError extends StratlineError {
  constructor(
    readonly entityId: string,
    readonly segmentId: string,
    readonly localTime: Seconds,
    readonly window: readonly [Seconds, Seconds],
  ) {
    super(
      'entity/outside-lifetime',
      `Entity "${entityId}" sampled at ${localTime}s in "${segmentId}" outside its lifetime [${window[0]}s, ${window[1]}s)`,
    );
    this.name = 'OutsideLifetimeError';
  }
}

export class UnknownScriptError extends StratlineError {
  constructor(
    readonly entityId: string,
    readonly segmentId: string,
  ) {
    super('entity/no-script', `Entity "${entityId}" has no script in segment "${segmentId}"`);
    this.name = 'UnknownScriptError';
  }
}

export class PlaybackStateError extends StratlineError {
  constructor(message: string) {
    super('engine/state', message);
    this.name = 'PlaybackStateError';
  }
}

export class EncounterValidationError extends StratlineError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super('encounter/invalid', message);
    this.name = 'EncounterValidationError';
  }
}
