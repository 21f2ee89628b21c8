import { describe, expect, it } from 'vitest';
import { readEnv } from '../api/_lib/env';
import { ConfigError } from '../api/_lib/errors';

describe('readEnv', () => {
  it('fills in engine defaults', () => {
    expect(readEnv({})).toEqual({
      NODE_ENV: 'development',
      SCORING_MODE: 'presence',
      COMPILE_MODE: 'collect-all',
      MAX_INPUT_CHARS: 20000,
      TRANSITION_MIN_SCORE: 1,
    });
  });

  it('coerces numbers and treats empty strings as unset', () => {
    const env = readEnv({ SCORING_MODE: 'frequency', MAX_INPUT_CHARS: '500', LOG_LEVEL: '', TRANSITION_MIN_SCORE: '0.5' });
    expect(env.SCORING_MODE).toBe('frequency');
    expect(env.MAX_INPUT_CHARS).toBe(500);
    expect(env.TRANSITION_MIN_SCORE).toBe(0.5);
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  it('rejects unknown modes with a config error naming the variable', () => {
    expect(() => readEnv({ COMPILE_MODE: 'lenient' })).toThrow(ConfigError);
    try {
      readEnv({ COMPILE_MODE: 'lenient', MAX_INPUT_CHARS: '-3' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.message).toBe('Invalid environment configuration');
      expect(error.issues.map(i => i.path)).toEqual(['COMPILE_MODE', 'MAX_INPUT_CHARS']);
    }
  });
});
