import { InvalidSpanError, type SpanLocation } from '../errors/index';
import { isEntityType, type EntitySpan, type RawSpan } from './types';

/**
 * Checks offsets and label of a single span and narrows it to an EntitySpan.
 * Throws InvalidSpanError on the first violated rule; nothing is repaired.
 */
export function validateSpan(raw: RawSpan, location: SpanLocation, textLength?: number): EntitySpan {
  const { start, end, type } = raw;

  if (!Number.isInteger(start)) {
    throw new InvalidSpanError(`start must be an integer, got ${start}`, location, 'start');
  }
  if (!Number.isInteger(end)) {
    throw new InvalidSpanError(`end must be an integer, got ${end}`, location, 'end');
  }
  if (start < 0) {
    throw new InvalidSpanError(`start must be >= 0, got ${start}`, location, 'start');
  }
  if (start >= end) {
    throw new InvalidSpanError(`start (${start}) must be less than end (${end})`, location, 'end');
  }
  if (textLength !== undefined && end > textLength) {
    throw new InvalidSpanError(`end (${end}) exceeds snippet length ${textLength}`, location, 'end');
  }
  if (!isEntityType(type)) {
    throw new InvalidSpanError(`unknown entity type "${type}"`, location, 'type');
  }

  const span: EntitySpan = { text: raw.text, start, end, type };
  if (raw.confidence !== undefined) {
    span.confidence = raw.confidence;
  }
  return span;
}

export function validateSpans(
  spans: readonly RawSpan[],
  location: Omit<SpanLocation, 'spanIndex'>,
  textLength?: number
): EntitySpan[] {
  return spans.map((raw, spanIndex) => validateSpan(raw, { ...location, spanIndex }, textLength));
}

/**
 * Collects every violation instead of stopping at the first one.
 */
export function findInvalidSpans(
  spans: readonly RawSpan[],
  location: Omit<SpanLocation, 'spanIndex'>,
  textLength?: number
): InvalidSpanError[] {
  const problems: InvalidSpanError[] = [];
  spans.forEach((raw, spanIndex) => {
    try {
      validateSpan(raw, { ...location, spanIndex }, textLength);
    } catch (e: unknown) {
      if (!(e instanceof InvalidSpanError)) throw e;
      problems.push(e);
    }
  });
  return problems;
}
