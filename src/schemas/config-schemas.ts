import { z } from 'zod';

// Per-model [section] overrides
export const MODEL_SECTION_SCHEMA = z.object({
  model: z.string().min(1),
  predictionsDir: z.string().min(1).optional(),
  minConfidence: z.number().min(0).max(1).optional(),
});

// Configuration file schema for .goldspan.ini validation
export const CONFIG_SCHEMA = z.object({
  configDir: z.string().min(1),
  goldDir: z.string().min(1),
  predictionsDir: z.string().min(1),
  outputDir: z.string().min(1),
  minConfidence: z.number().min(0).max(1).default(0),
  concurrency: z.number().int().positive().default(4),
  models: z.array(MODEL_SECTION_SCHEMA).default([]),
});

// Inferred types
export type ModelSection = z.infer<typeof MODEL_SECTION_SCHEMA>;
export type Config = z.infer<typeof CONFIG_SCHEMA>;
