import { describe, expect, it } from 'vitest';
import { loadRuntimeConfig } from '@/lib/config';
import { InvalidSolverInputError } from '@/lib/algorithm/errors';

describe('loadRuntimeConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({
      mongodbUri: undefined,
      timeoutSeconds: 300,
      seed: undefined,
      sectionIds: [],
    });
  });

  it('reads every setting', () => {
    const config = loadRuntimeConfig({
      MONGODB_URI: 'mongodb://localhost:27017/timetable-test',
      TIMETABLE_TIMEOUT_SECONDS: '30',
      TIMETABLE_SEED: '42',
      TIMETABLE_SECTIONS: ' S1_L1, ,S2_L1 ',
    });

    expect(config).toEqual({
      mongodbUri: 'mongodb://localhost:27017/timetable-test',
      timeoutSeconds: 30,
      seed: 42,
      sectionIds: ['S1_L1', 'S2_L1'],
    });
  });

  it('treats blank values as unset', () => {
    const config = loadRuntimeConfig({ MONGODB_URI: '', TIMETABLE_TIMEOUT_SECONDS: ' ', TIMETABLE_SEED: '' });

    expect(config.mongodbUri).toBeUndefined();
    expect(config.timeoutSeconds).toBe(300);
    expect(config.seed).toBeUndefined();
  });

  it('rejects bad numbers', () => {
    expect(() => loadRuntimeConfig({ TIMETABLE_TIMEOUT_SECONDS: 'abc' })).toThrow(
      'TIMETABLE_TIMEOUT_SECONDS must be a number, got "abc"'
    );
    expect(() => loadRuntimeConfig({ TIMETABLE_TIMEOUT_SECONDS: '-10' })).toThrow(InvalidSolverInputError);
    expect(() => loadRuntimeConfig({ TIMETABLE_SEED: 'seed' })).toThrow(InvalidSolverInputError);
  });
});
