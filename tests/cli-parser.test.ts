import { describe, it, expect } from 'vitest';
import {
  parseCompareOptions,
  parseEvaluateOptions,
  parseStatsOptions,
  parseValidateOptions,
} from '../src/boundaries/cli-parser';
import { ValidationError } from '../src/errors/index';

describe('command option parsing', () => {
  it('applies defaults to evaluate options', () => {
    expect(parseEvaluateOptions({})).toEqual({ verbose: false, output: 'line', showErrors: false });
  });

  it('coerces the confidence threshold given as a string', () => {
    expect(parseEvaluateOptions({ minConfidence: '0.35' }).minConfidence).toBe(0.35);
  });

  it('rejects a threshold outside 0..1', () => {
    expect(() => parseCompareOptions({ minConfidence: '2' })).toThrow(ValidationError);
  });

  it('rejects an unknown output format', () => {
    expect(() => parseStatsOptions({ output: 'xml' })).toThrow('Invalid stats options');
  });

  it('keeps --no-report as false', () => {
    expect(parseEvaluateOptions({ report: false }).report).toBe(false);
  });

  it('passes validate options through', () => {
    expect(parseValidateOptions({ model: 'spacy', goldDir: 'gold' })).toEqual({ model: 'spacy', goldDir: 'gold' });
  });
});
