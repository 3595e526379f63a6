export type VariationMode = 'planning' | 'simulation';

export type EngineConfig = {
  /** Fast-forward steps per second used when replaying motion from a snapshot. */
  replayRate: number;
  /** Seconds of replay the manager will compute in one tick; the rest is caught up later. */
  maxReplaySpan: number;
  seed: number;
  variationMode: VariationMode;
};

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  replayRate: 30,
  maxReplaySpan: 20,
  seed: 1337,
  variationMode: 'planning',
});

const positiveOr = (value: number | undefined, fallback: number): number =>
  typeof value === 'number' && !Number.isNaN(value) && value > 0 ? value : fallback;

export const resolveEngineConfig = (overrides: Partial<EngineConfig> = {}): EngineConfig => {
  const replayRate = positiveOr(overrides.replayRate, DEFAULT_ENGINE_CONFIG.replayRate);
  return {
    replayRate: Number.isFinite(replayRate) ? replayRate : DEFAULT_ENGINE_CONFIG.replayRate,
    // Infinity is allowed here and disables the per-tick cap.
    maxReplaySpan: positiveOr(overrides.maxReplaySpan, DEFAULT_ENGINE_CONFIG.maxReplaySpan),
    seed:
      typeof overrides.seed === 'number' && Number.isFinite(overrides.seed)
        ? Math.floor(overrides.seed) >>> 0
        : DEFAULT_ENGINE_CONFIG.seed,
    variationMode:
      overrides.variationMode === 'simulation' || overrides.variationMode === 'planning'
        ? overrides.variationMode
        : DEFAULT_ENGINE_CONFIG.variationMode,
  };
};

type EnvSource = Readonly<Record<string, string | undefined>>;

/** Reads `STRATLINE_SEED`, `STRATLINE_MODE` and `STRATLINE_MAX_REPLAY_SPAN`. */
export const engineConfigFromEnv = (env: EnvSource): Partial<EngineConfig> => {
  const overrides: Partial<EngineConfig> = {};
  const seed = env.STRATLINE_SEED;
  if (seed !== undefined && seed.trim() !== '' && Number.isFinite(Number(seed))) {
    overrides.seed = Number(seed);
  }
  const mode = env.STRATLINE_MODE;
  if (mode === 'planning' || mode === 'simulation') {
    overrides.variationMode = mode;
  }
  const span = env.STRATLINE_MAX_REPLAY_SPAN;
  if (span !== undefined && span.trim() !== '' && !Number.isNaN(Number(span))) {
    overrides.maxReplaySpan = Number(span);
  }
  return overrides;
};
