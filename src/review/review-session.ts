import { ReviewTransitionError } from '../errors/index';
import { validateSpan } from '../evaluation/span-validator';
import type { EntitySpan } from '../evaluation/types';
import type { GoldDocument } from '../schemas/dataset-schemas';
import type {
  DraftEntity,
  DraftSnippet,
  ReviewDecision,
  ReviewEvent,
  ReviewState,
  ReviewedEntity,
} from './types';

export function startReview(documentId: string, snippets: readonly DraftSnippet[]): ReviewState {
  return {
    phase: snippets.length === 0 ? 'done' : 'presenting',
    documentId,
    snippets,
    snippetIndex: 0,
    entityIndex: 0,
    current: [],
    pending: null,
    reviewed: [],
    aborted: false,
  };
}

export function currentSnippet(state: ReviewState): DraftSnippet | null {
  if (state.phase === 'done') return null;
  return state.snippets[state.snippetIndex] ?? null;
}

/**
 * The draft entity awaiting a decision, or null once every draft entity of
 * the snippet has been decided (only `add` and `finish_snippet` remain).
 */
export function currentEntity(state: ReviewState): DraftEntity | null {
  return currentSnippet(state)?.entities[state.entityIndex] ?? null;
}

function checkedSpan(state: ReviewState, snippet: DraftSnippet, span: DraftEntity): EntitySpan {
  return validateSpan(
    span,
    { documentId: state.documentId, snippetId: snippet.snippetId, role: 'gold', spanIndex: state.current.length },
    snippet.text.length
  );
}

function reviewedEntity(span: EntitySpan, notes: string | undefined, source: string | undefined): ReviewedEntity {
  const entity: ReviewedEntity = {
    text: span.text,
    start: span.start,
    end: span.end,
    type: span.type,
    confidence: 1,
    reviewed: true,
  };
  if (notes) entity.notes = notes;
  if (source) entity.source = source;
  return entity;
}

function assertPhase(state: ReviewState, expected: ReviewState['phase'], event: ReviewEvent['type']): void {
  if (state.phase !== expected) {
    throw new ReviewTransitionError(`Cannot ${event} while ${state.phase}`, state.phase);
  }
}

/*
 * Rejects decisions that do not fit the cursor, and spans that would not
 * survive evaluation, before anything is recorded.
 */
function checkDecision(state: ReviewState, decision: ReviewDecision): void {
  const snippet = currentSnippet(state);
  const entity = currentEntity(state);
  if (!snippet) {
    throw new ReviewTransitionError('No snippet under review', state.phase);
  }

  switch (decision.kind) {
    case 'accept':
    case 'reject':
    case 'modify':
      if (!entity) {
        throw new ReviewTransitionError(`Cannot ${decision.kind}: every draft entity has been decided`, state.phase);
      }
      if (decision.kind === 'accept') checkedSpan(state, snippet, entity);
      if (decision.kind === 'modify') checkedSpan(state, snippet, { ...entity, type: decision.type });
      return;
    case 'add':
      if (entity) {
        throw new ReviewTransitionError('Cannot add entities before every draft entity is decided', state.phase);
      }
      checkedSpan(state, snippet, {
        text: snippet.text.slice(decision.start, decision.end),
        start: decision.start,
        end: decision.end,
        type: decision.type,
      });
      return;
    case 'finish_snippet':
      if (entity) {
        throw new ReviewTransitionError('Cannot finish snippet with undecided draft entities', state.phase);
      }
      return;
    case 'skip_snippet':
    case 'quit':
      return;
  }
}

function nextSnippet(state: ReviewState, reviewed: ReviewState['reviewed']): ReviewState {
  const snippetIndex = state.snippetIndex + 1;
  return {
    ...state,
    phase: snippetIndex >= state.snippets.length ? 'done' : 'presenting',
    snippetIndex,
    entityIndex: 0,
    current: [],
    pending: null,
    reviewed,
  };
}

function applyDecision(state: ReviewState, decision: ReviewDecision): ReviewState {
  const snippet = currentSnippet(state);
  const entity = currentEntity(state);
  if (!snippet) {
    throw new ReviewTransitionError('No snippet under review', state.phase);
  }
  const presenting = { ...state, phase: 'presenting' as const, pending: null };

  switch (decision.kind) {
    case 'accept':
    case 'modify': {
      if (!entity) throw new ReviewTransitionError(`Cannot ${decision.kind} without a draft entity`, state.phase);
      const type = decision.kind === 'modify' ? decision.type : entity.type;
      const notes = decision.kind === 'modify' && decision.notes ? decision.notes : entity.notes;
      const span = checkedSpan(state, snippet, { ...entity, type });
      return {
        ...presenting,
        entityIndex: state.entityIndex + 1,
        current: [...state.current, reviewedEntity(span, notes, entity.source)],
      };
    }
    case 'reject':
      return { ...presenting, entityIndex: state.entityIndex + 1 };
    case 'add': {
      const span = checkedSpan(state, snippet, {
        text: snippet.text.slice(decision.start, decision.end),
        start: decision.start,
        end: decision.end,
        type: decision.type,
      });
      return {
        ...presenting,
        current: [...state.current, reviewedEntity(span, decision.notes ?? 'Added during review', 'human_added')],
      };
    }
    case 'finish_snippet': {
      const entities = [...state.current].sort((a, b) => a.start - b.start);
      return nextSnippet(state, [...state.reviewed, { snippetId: snippet.snippetId, text: snippet.text, entities }]);
    }
    case 'skip_snippet':
      return nextSnippet(state, state.reviewed);
    case 'quit':
      return { ...state, phase: 'done', pending: null, reviewed: [], aborted: true };
  }
}

/**
 * Pure transition function of the review workflow:
 * presenting -> awaiting_decision -> recording -> presenting ... -> done.
 *
 * Throws ReviewTransitionError for an event the current phase does not
 * accept and InvalidSpanError for a span that would not pass evaluation.
 */
export function reviewReducer(state: ReviewState, event: ReviewEvent): ReviewState {
  switch (event.type) {
    case 'present':
      assertPhase(state, 'presenting', event.type);
      return { ...state, phase: 'awaiting_decision' };
    case 'decide':
      assertPhase(state, 'awaiting_decision', event.type);
      checkDecision(state, event.decision);
      return { ...state, phase: 'recording', pending: event.decision };
    case 'record':
      assertPhase(state, 'recording', event.type);
      if (!state.pending) {
        throw new ReviewTransitionError('Nothing to record', state.phase);
      }
      return applyDecision(state, state.pending);
  }
}

/**
 * Presents, decides and records in one step.
 */
export function decide(state: ReviewState, decision: ReviewDecision): ReviewState {
  const presented = state.phase === 'presenting' ? reviewReducer(state, { type: 'present' }) : state;
  const decided = reviewReducer(presented, { type: 'decide', decision });
  return reviewReducer(decided, { type: 'record' });
}

/**
 * Gold file record for a finished, non-aborted session.
 */
export function toGoldDocument(
  state: ReviewState,
  metadata: Record<string, unknown> = {},
  annotationDate: Date = new Date()
): GoldDocument {
  if (state.phase !== 'done' || state.aborted) {
    throw new ReviewTransitionError('Review session is not complete', state.phase);
  }

  return {
    document_id: state.documentId,
    metadata,
    annotation_date: annotationDate.toISOString(),
    annotator: 'human_reviewed',
    snippets: state.reviewed.map((snippet) => ({
      snippet_id: snippet.snippetId,
      text: snippet.text,
      entities: snippet.entities.map((e) => {
        const entity: GoldDocument['snippets'][number]['entities'][number] = {
          text: e.text,
          start: e.start,
          end: e.end,
          type: e.type,
          confidence: e.confidence,
        };
        if (e.notes) entity.notes = e.notes;
        if (e.source) entity.source = e.source;
        return entity;
      }),
    })),
  };
}
