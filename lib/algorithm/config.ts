import { InvalidSolverInputError } from './errors';

export interface ScoringWeights {
  gap: number; // Penalty per idle slot in a section's day
  balance: number; // Bonus multiplier for an even weekly spread
  earlyPenalty: number; // Penalty per session in an early slot
  latePenalty: number; // Penalty per session in a late slot
  roomDistance: number; // Penalty multiplier for far back-to-back rooms
}

export interface ScoringConfig {
  baseScore: number;
  weights: ScoringWeights;
  earlySlots: readonly string[];
  lateSlots: readonly string[];
  roomDistanceThreshold: number;
}

export interface ScoringOverrides {
  baseScore?: number;
  weights?: Partial<ScoringWeights>;
  earlySlots?: readonly string[];
  lateSlots?: readonly string[];
  roomDistanceThreshold?: number;
}

export interface SolverConfig {
  timeoutSeconds: number;
  progressInterval: number; // Decision steps between progress callbacks
  seed?: number; // Pin value ordering; omitted = Math.random
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze({
  baseScore: 1000,
  weights: Object.freeze({
    gap: 10,
    balance: 5,
    earlyPenalty: 3,
    latePenalty: 3,
    roomDistance: 8,
  }),
  earlySlots: Object.freeze(['TS0', 'TS4', 'TS8', 'TS12', 'TS16']), // 9:00 AM slots
  lateSlots: Object.freeze(['TS3', 'TS7', 'TS11', 'TS15', 'TS19']), // 2:15 PM slots
  roomDistanceThreshold: 2,
});

export const DEFAULT_SOLVER_CONFIG: SolverConfig = Object.freeze({
  timeoutSeconds: 300,
  progressInterval: 100,
});

function assertFiniteNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidSolverInputError(`${name} must be a non-negative number, got ${value}`);
  }
}

export function resolveScoringConfig(overrides: ScoringOverrides = {}): ScoringConfig {
  const weights: ScoringWeights = {
    ...DEFAULT_SCORING_CONFIG.weights,
    ...overrides.weights,
  };

  for (const [name, value] of Object.entries(weights)) {
    assertFiniteNonNegative(value, `weights.${name}`);
  }

  const config: ScoringConfig = {
    baseScore: overrides.baseScore ?? DEFAULT_SCORING_CONFIG.baseScore,
    weights,
    earlySlots: overrides.earlySlots ?? DEFAULT_SCORING_CONFIG.earlySlots,
    lateSlots: overrides.lateSlots ?? DEFAULT_SCORING_CONFIG.lateSlots,
    roomDistanceThreshold: overrides.roomDistanceThreshold ?? DEFAULT_SCORING_CONFIG.roomDistanceThreshold,
  };

  if (!Number.isFinite(config.baseScore)) {
    throw new InvalidSolverInputError(`baseScore must be finite, got ${config.baseScore}`);
  }
  assertFiniteNonNegative(config.roomDistanceThreshold, 'roomDistanceThreshold');

  return config;
}

export function resolveSolverConfig(overrides: Partial<SolverConfig> = {}): SolverConfig {
  const config: SolverConfig = {
    timeoutSeconds: overrides.timeoutSeconds ?? DEFAULT_SOLVER_CONFIG.timeoutSeconds,
    progressInterval: overrides.progressInterval ?? DEFAULT_SOLVER_CONFIG.progressInterval,
    seed: overrides.seed,
  };

  assertFiniteNonNegative(config.timeoutSeconds, 'timeoutSeconds');

  if (!Number.isInteger(config.progressInterval) || config.progressInterval < 1) {
    throw new InvalidSolverInputError(
      `progressInterval must be a positive integer, got ${config.progressInterval}`
    );
  }

  if (config.seed !== undefined && !Number.isFinite(config.seed)) {
    throw new InvalidSolverInputError(`seed must be a finite number, got ${config.seed}`);
  }

  return config;
}
