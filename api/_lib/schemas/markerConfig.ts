// api/_lib/schemas/markerConfig.ts
import { z } from 'zod';

/**
 * Raw marker configuration as authored (see data/spiral_markers.json).
 * Keys mirror the source document; the loader turns this into a typed MarkerSet.
 */

const markerStringSchema = z.string({ invalid_type_error: 'markers must be strings' })
  .min(1, 'markers must not be empty');

const markerListSchema = (field: string) => z.array(markerStringSchema, {
  required_error: `${field} is required`,
  invalid_type_error: `${field} must be a list of strings`,
});

export const polarityBlockSchema = (label: string) => z.object({
  weight: z.number({
    required_error: 'weight is required',
    invalid_type_error: 'weight must be numeric',
  }).finite('weight must be finite').describe('Signed weight added per firing marker'),
  tokens: markerListSchema('tokens').describe('Literal tokens, matched as whole words, case-insensitive'),
  patterns: markerListSchema('patterns').describe('Regex patterns; trailing "# comment" text is stripped'),
}, {
  required_error: `${label} block is required`,
  invalid_type_error: `${label} block must be a mapping`,
});

export const categoryBlockSchema = z.object({
  Positive: polarityBlockSchema('Positive'),
  Negative: polarityBlockSchema('Negative'),
}, { invalid_type_error: 'category must be a mapping' });

export const taxonomySchema = z.record(z.string(), categoryBlockSchema, {
  required_error: 'Spiral_Dynamics_Enhanced section is required',
  invalid_type_error: 'Spiral_Dynamics_Enhanced must be a mapping of categories',
}).describe('Category name → positive/negative polarity blocks, in tie-break order');

export const driftSectionSchema = z.record(
  z.string(),
  z.array(z.object({ patterns: markerListSchema('patterns') }), {
    invalid_type_error: 'drift group must be a list of {patterns: [...]} entries',
  }),
  { invalid_type_error: 'Semantic_Drift must be a mapping of groups' }
).describe('Named drift groups; entries are flattened into one ordered pattern list per group');

export const markerConfigSchema = z.object({
  version: z.string().optional(),
  Spiral_Dynamics_Enhanced: taxonomySchema,
  Semantic_Drift: driftSectionSchema.optional(),
}, { invalid_type_error: 'marker configuration must be a mapping' });

export type RawMarkerConfig = z.infer<typeof markerConfigSchema>;
export type RawPolarityBlock = z.infer<ReturnType<typeof polarityBlockSchema>>;
