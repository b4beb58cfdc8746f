import type { ZodType, ZodTypeDef } from 'zod';
import {
  EVALUATE_OPTIONS_SCHEMA,
  COMPARE_OPTIONS_SCHEMA,
  VALIDATE_OPTIONS_SCHEMA,
  STATS_OPTIONS_SCHEMA,
  type EvaluateOptions,
  type CompareOptions,
  type ValidateOptions,
  type StatsOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseOptions<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown, command: string): T {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid ${command} options: ${e.message}`);
    }
    const err = handleUnknownError(e, `${command} option parsing`);
    throw new ValidationError(`${command} option parsing failed: ${err.message}`);
  }
}

export function parseEvaluateOptions(raw: unknown): EvaluateOptions {
  return parseOptions(EVALUATE_OPTIONS_SCHEMA, raw, 'evaluate');
}

export function parseCompareOptions(raw: unknown): CompareOptions {
  return parseOptions(COMPARE_OPTIONS_SCHEMA, raw, 'compare');
}

export function parseValidateOptions(raw: unknown): ValidateOptions {
  return parseOptions(VALIDATE_OPTIONS_SCHEMA, raw, 'validate');
}

export function parseStatsOptions(raw: unknown): StatsOptions {
  return parseOptions(STATS_OPTIONS_SCHEMA, raw, 'stats');
}
