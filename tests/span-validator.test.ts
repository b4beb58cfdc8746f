import { describe, it, expect } from 'vitest';
import { validateSpan, validateSpans, findInvalidSpans } from '../src/evaluation/span-validator';
import { InvalidSpanError, isInvalidSpanError, type SpanLocation } from '../src/errors/index';

const LOCATION: SpanLocation = { documentId: 'doc_a', snippetId: '001', role: 'gold', spanIndex: 0 };

function captureError(fn: () => unknown): InvalidSpanError {
  try {
    fn();
  } catch (e: unknown) {
    if (e instanceof InvalidSpanError) return e;
    throw e;
  }
  throw new Error('expected InvalidSpanError');
}

describe('validateSpan', () => {
  it('narrows a well-formed span and keeps its confidence', () => {
    const span = validateSpan({ text: 'Red River', start: 4, end: 13, type: 'LOC', confidence: 0.9 }, LOCATION, 20);
    expect(span).toEqual({ text: 'Red River', start: 4, end: 13, type: 'LOC', confidence: 0.9 });
  });

  it('omits confidence when the raw span has none', () => {
    const span = validateSpan({ text: 'Ana', start: 0, end: 3, type: 'PER' }, LOCATION);
    expect('confidence' in span).toBe(false);
  });

  it('rejects a zero-length span', () => {
    const err = captureError(() => validateSpan({ text: '', start: 5, end: 5, type: 'LOC' }, LOCATION));
    expect(err.message).toBe('Invalid gold span #0 in doc_a/001: start (5) must be less than end (5)');
    expect(err.field).toBe('end');
    expect(err.code).toBe('INVALID_SPAN');
  });

  it('rejects a negative start', () => {
    const err = captureError(() => validateSpan({ text: 'x', start: -1, end: 3, type: 'LOC' }, LOCATION));
    expect(err.message).toContain('start must be >= 0, got -1');
    expect(err.field).toBe('start');
  });

  it('rejects non-integer offsets', () => {
    const err = captureError(() => validateSpan({ text: 'x', start: 1.5, end: 3, type: 'LOC' }, LOCATION));
    expect(err.field).toBe('start');
    expect(err.message).toContain('start must be an integer, got 1.5');
  });

  it('rejects an end past the snippet text', () => {
    const err = captureError(() => validateSpan({ text: 'x', start: 8, end: 12, type: 'LOC' }, LOCATION, 10));
    expect(err.message).toContain('end (12) exceeds snippet length 10');
  });

  it('does not check the end bound without a text length', () => {
    expect(validateSpan({ text: 'x', start: 8, end: 12, type: 'LOC' }, LOCATION).end).toBe(12);
  });

  it('rejects a label outside the closed set', () => {
    const err = captureError(() => validateSpan({ text: 'x', start: 0, end: 1, type: 'GPE' }, LOCATION));
    expect(err.message).toContain('unknown entity type "GPE"');
    expect(err.field).toBe('type');
  });

  it('labels are case-sensitive', () => {
    expect(() => validateSpan({ text: 'x', start: 0, end: 1, type: 'loc' }, LOCATION)).toThrow(InvalidSpanError);
  });
});

describe('validateSpans', () => {
  it('reports the index of the offending span', () => {
    const spans = [
      { text: 'a', start: 0, end: 1, type: 'LOC' },
      { text: 'b', start: 3, end: 2, type: 'PER' },
    ];
    const err = captureError(() => validateSpans(spans, { documentId: 'doc_a', snippetId: '002', role: 'predicted' }));
    expect(err.spanIndex).toBe(1);
    expect(err.role).toBe('predicted');
    expect(err.snippetId).toBe('002');
  });
});

describe('findInvalidSpans', () => {
  it('collects every invalid span instead of stopping at the first', () => {
    const spans = [
      { text: 'a', start: 0, end: 0, type: 'LOC' },
      { text: 'b', start: 1, end: 2, type: 'PER' },
      { text: 'c', start: 2, end: 4, type: 'CITY' },
    ];
    const problems = findInvalidSpans(spans, { documentId: 'doc_a', snippetId: '003', role: 'gold' });
    expect(problems.map((p) => p.spanIndex)).toEqual([0, 2]);
    expect(problems.every(isInvalidSpanError)).toBe(true);
  });
});
