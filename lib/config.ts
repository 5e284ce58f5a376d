import { DEFAULT_SOLVER_CONFIG } from '@/lib/algorithm/config';
import { InvalidSolverInputError } from '@/lib/algorithm/errors';

export interface RuntimeConfig {
  mongodbUri?: string;
  timeoutSeconds: number;
  seed?: number;
  sectionIds: string[]; // Empty = every section
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidSolverInputError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read generation settings from the environment (populated by dotenv in scripts)
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const timeoutSeconds =
    parseNumber('TIMETABLE_TIMEOUT_SECONDS', env.TIMETABLE_TIMEOUT_SECONDS) ?? DEFAULT_SOLVER_CONFIG.timeoutSeconds;

  if (timeoutSeconds < 0) {
    throw new InvalidSolverInputError(`TIMETABLE_TIMEOUT_SECONDS cannot be negative, got ${timeoutSeconds}`);
  }

  const sectionIds = (env.TIMETABLE_SECTIONS ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);

  return {
    mongodbUri: env.MONGODB_URI || undefined,
    timeoutSeconds,
    seed: parseNumber('TIMETABLE_SEED', env.TIMETABLE_SEED),
    sectionIds,
  };
}
