// api/_lib/env.ts - Environment configuration for the marker engine
import { z, ZodError } from 'zod';
import { ConfigError, formatZodError } from './errors';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().optional(),
  MARKERS_PATH: z.string().optional(),
  SCORING_MODE: z.enum(['presence', 'frequency']).default('presence'),
  COMPILE_MODE: z.enum(['collect-all', 'fail-fast']).default('collect-all'),
  MAX_INPUT_CHARS: z.coerce.number().int().positive().default(20000),
  TRANSITION_MIN_SCORE: z.coerce.number().finite().default(1),
});

export type EngineEnv = z.infer<typeof envSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): EngineEnv {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v !== '')
  );
  try {
    return envSchema.parse(cleaned);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError('Invalid environment configuration', formatZodError(error), { cause: error });
    }
    throw error;
  }
}

export const env = readEnv();

// Defaults handed to the engine when callers pass no explicit options
export const engineDefaults = {
  scoringMode: env.SCORING_MODE,
  compileMode: env.COMPILE_MODE,
  maxInputChars: env.MAX_INPUT_CHARS,
  transitionMinScore: env.TRANSITION_MIN_SCORE,
} as const;
