import { z } from 'zod';

const OUTPUT_SCHEMA = z.enum(['line', 'json']).default('line');

// Commander hands numeric options over as strings
const MIN_CONFIDENCE_SCHEMA = z.coerce.number().min(0).max(1).optional();

// Evaluate command options schema
export const EVALUATE_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  output: OUTPUT_SCHEMA,
  config: z.string().optional(),
  goldDir: z.string().optional(),
  predDir: z.string().optional(),
  minConfidence: MIN_CONFIDENCE_SCHEMA,
  only: z.string().optional(),
  // --report <file> gives a path, --no-report gives false
  report: z.union([z.string(), z.boolean()]).optional(),
  showErrors: z.boolean().default(false),
});

// Compare command options schema
export const COMPARE_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  output: OUTPUT_SCHEMA,
  config: z.string().optional(),
  goldDir: z.string().optional(),
  minConfidence: MIN_CONFIDENCE_SCHEMA,
  only: z.string().optional(),
});

// Validate command options schema
export const VALIDATE_OPTIONS_SCHEMA = z.object({
  config: z.string().optional(),
  goldDir: z.string().optional(),
  model: z.string().optional(),
  predDir: z.string().optional(),
});

// Stats command options schema
export const STATS_OPTIONS_SCHEMA = z.object({
  output: OUTPUT_SCHEMA,
  config: z.string().optional(),
  goldDir: z.string().optional(),
  only: z.string().optional(),
});

// Inferred types
export type EvaluateOptions = z.infer<typeof EVALUATE_OPTIONS_SCHEMA>;
export type CompareOptions = z.infer<typeof COMPARE_OPTIONS_SCHEMA>;
export type ValidateOptions = z.infer<typeof VALIDATE_OPTIONS_SCHEMA>;
export type StatsOptions = z.infer<typeof STATS_OPTIONS_SCHEMA>;
