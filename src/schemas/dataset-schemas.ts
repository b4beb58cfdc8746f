import { z } from 'zod';

// Integer snippet ids are written zero-padded ("7" -> "007")
export const SNIPPET_ID_SCHEMA = z
  .union([z.string().min(1), z.number().int().nonnegative()])
  .transform((id) => (typeof id === 'number' ? String(id).padStart(3, '0') : id));

// Offsets and type are only shape-checked here; span rules live in the evaluator
export const ENTITY_RECORD_SCHEMA = z.object({
  text: z.string().default(''),
  start: z.number(),
  end: z.number(),
  type: z.string(),
  confidence: z.number().optional(),
  notes: z.string().optional(),
  source: z.string().optional(),
});

export const GOLD_SNIPPET_SCHEMA = z.object({
  snippet_id: SNIPPET_ID_SCHEMA,
  text: z.string(),
  char_start: z.number().int().optional(),
  char_end: z.number().int().optional(),
  skipped: z.boolean().optional(),
  entities: z.array(ENTITY_RECORD_SCHEMA).default([]),
});

export const GOLD_DOCUMENT_SCHEMA = z.object({
  document_id: z.string().min(1),
  metadata: z.record(z.string(), z.unknown()).optional(),
  annotation_date: z.string().optional(),
  annotator: z.string().optional(),
  snippets: z.array(GOLD_SNIPPET_SCHEMA),
});

export const PREDICTED_SNIPPET_SCHEMA = z.object({
  snippet_id: SNIPPET_ID_SCHEMA,
  entities: z.array(ENTITY_RECORD_SCHEMA).default([]),
});

export const PREDICTION_DOCUMENT_SCHEMA = z.object({
  document_id: z.string().min(1),
  model: z.string().optional(),
  snippets: z.array(PREDICTED_SNIPPET_SCHEMA).default([]),
});

// Inferred types
export type EntityRecord = z.infer<typeof ENTITY_RECORD_SCHEMA>;
export type GoldSnippet = z.infer<typeof GOLD_SNIPPET_SCHEMA>;
export type GoldDocument = z.infer<typeof GOLD_DOCUMENT_SCHEMA>;
export type PredictedSnippet = z.infer<typeof PREDICTED_SNIPPET_SCHEMA>;
export type PredictionDocument = z.infer<typeof PREDICTION_DOCUMENT_SCHEMA>;
