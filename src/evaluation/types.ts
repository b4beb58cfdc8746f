import type { MatchCounts, Metrics } from '../scoring/metrics';

/**
 * Closed label set for entity spans.
 */
export const EntityType = {
  LOC: 'LOC',
  PER: 'PER',
  ORG: 'ORG',
  MISC: 'MISC',
} as const;

export type EntityTypeName = typeof EntityType[keyof typeof EntityType];

// Report order for per-type tables
export const ENTITY_TYPES: readonly EntityTypeName[] = [
  EntityType.LOC,
  EntityType.PER,
  EntityType.ORG,
  EntityType.MISC,
];

export const ENTITY_TYPE_DESCRIPTIONS: Record<EntityTypeName, string> = {
  LOC: 'Location (places, regions, natural features)',
  PER: 'Person (named individuals)',
  ORG: 'Organization (companies, government bodies)',
  MISC: 'Miscellaneous (indigenous groups, treaties, events)',
};

export function isEntityType(value: string): value is EntityTypeName {
  return ENTITY_TYPES.some((t) => t === value);
}

/**
 * Error categories recorded in the error list.
 */
export const ErrorKind = {
  FALSE_POSITIVE: 'false_positive',
  FALSE_NEGATIVE: 'false_negative',
  BOUNDARY_ERROR: 'boundary_error',
  TYPE_ERROR: 'type_error',
} as const;

export type ErrorKindName = typeof ErrorKind[keyof typeof ErrorKind];

/**
 * A span as it arrives from a data file, before offsets and type are checked.
 */
export interface RawSpan {
  text: string;
  start: number;
  end: number;
  type: string;
  confidence?: number | undefined;
}

/**
 * A validated `[start, end)` span tagged with an entity type.
 * `text` is for display only; matching uses offsets and type.
 */
export interface EntitySpan {
  text: string;
  start: number;
  end: number;
  type: EntityTypeName;
  confidence?: number | undefined;
}

export interface SnippetInput {
  documentId: string;
  snippetId: string;
  gold: readonly RawSpan[];
  predicted: readonly RawSpan[];
  // Length of the snippet text; when set, `end` may not exceed it
  textLength?: number | undefined;
}

export interface SpanError {
  documentId: string;
  snippetId: string;
  kind: ErrorKindName;
  gold?: EntitySpan | undefined;
  predicted?: EntitySpan | undefined;
}

export type TypeCounts = Record<EntityTypeName, MatchCounts>;

export interface SnippetEvaluation {
  documentId: string;
  snippetId: string;
  exact: TypeCounts;
  partial: TypeCounts;
  errors: SpanError[];
  // No gold and no predicted spans: metrics are not applicable
  empty: boolean;
}

export interface MetricPair {
  exact: Metrics;
  partial: Metrics;
}

export interface DocumentMetrics extends MetricPair {
  documentId: string;
}

export interface TypeMetrics extends MetricPair {
  type: EntityTypeName;
}

export interface SnippetMetrics extends MetricPair {
  documentId: string;
  snippetId: string;
}

export interface EmptyInputWarning {
  documentId: string;
  snippetId: string;
  kind: 'empty_input';
  message: string;
}

export interface EvaluationReport {
  model: string;
  perDocument: DocumentMetrics[];
  perType: TypeMetrics[];
  perSnippet: SnippetMetrics[];
  overall: MetricPair;
  errors: SpanError[];
  warnings: EmptyInputWarning[];
}
