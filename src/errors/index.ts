// Base error class for all goldspan errors
export class GoldspanError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'GoldspanError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends GoldspanError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends GoldspanError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for unreadable data files and empty datasets
export class ProcessingError extends GoldspanError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

export type SpanRole = 'gold' | 'predicted';

export type InvalidSpanField = 'start' | 'end' | 'type';

export interface SpanLocation {
  documentId: string;
  snippetId: string;
  role: SpanRole;
  spanIndex: number;
}

// Structurally invalid span (bad offsets or an unknown entity type)
export class InvalidSpanError extends GoldspanError {
  public readonly documentId: string;
  public readonly snippetId: string;
  public readonly role: SpanRole;
  public readonly spanIndex: number;

  constructor(
    reason: string,
    location: SpanLocation,
    public readonly field: InvalidSpanField
  ) {
    super(
      `Invalid ${location.role} span #${location.spanIndex} in ${location.documentId}/${location.snippetId}: ${reason}`,
      'INVALID_SPAN'
    );
    this.name = 'InvalidSpanError';
    this.documentId = location.documentId;
    this.snippetId = location.snippetId;
    this.role = location.role;
    this.spanIndex = location.spanIndex;
  }
}

// Event not allowed in the current phase of a review session
export class ReviewTransitionError extends GoldspanError {
  constructor(message: string, public readonly phase: string) {
    super(message, 'REVIEW_TRANSITION');
    this.name = 'ReviewTransitionError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}

export function isInvalidSpanError(error: unknown): error is InvalidSpanError {
  return error instanceof InvalidSpanError;
}
