import type { EntityTypeName } from '../evaluation/types';

export type ReviewPhase = 'presenting' | 'awaiting_decision' | 'recording' | 'done';

export interface DraftEntity {
  text: string;
  start: number;
  end: number;
  type: string;
  confidence?: number | undefined;
  notes?: string | undefined;
  source?: string | undefined;
}

export interface DraftSnippet {
  snippetId: string;
  text: string;
  entities: readonly DraftEntity[];
}

export interface ReviewedEntity {
  text: string;
  start: number;
  end: number;
  type: EntityTypeName;
  confidence: 1;
  reviewed: true;
  notes?: string | undefined;
  source?: string | undefined;
}

export interface ReviewedSnippet {
  snippetId: string;
  text: string;
  entities: ReviewedEntity[];
}

export type ReviewDecision =
  | { kind: 'accept' }
  | { kind: 'reject' }
  | { kind: 'modify'; type: EntityTypeName; notes?: string | undefined }
  | { kind: 'add'; start: number; end: number; type: EntityTypeName; notes?: string | undefined }
  | { kind: 'finish_snippet' }
  | { kind: 'skip_snippet' }
  | { kind: 'quit' };

export type ReviewEvent =
  | { type: 'present' }
  | { type: 'decide'; decision: ReviewDecision }
  | { type: 'record' };

export interface ReviewState {
  phase: ReviewPhase;
  documentId: string;
  snippets: readonly DraftSnippet[];
  snippetIndex: number;
  // Next draft entity to decide; equal to the entity count once all are decided
  entityIndex: number;
  current: ReviewedEntity[];
  pending: ReviewDecision | null;
  reviewed: ReviewedSnippet[];
  aborted: boolean;
}
