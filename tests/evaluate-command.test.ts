import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { defaultReportPath, runEvaluate } from '../src/cli/evaluate-command';
import { runCompare } from '../src/cli/compare-command';
import { parseCompareOptions, parseEvaluateOptions } from '../src/boundaries/cli-parser';
import { JsonReportFormatter } from '../src/output/json-formatter';
import { TRADING_POST_GOLD, TRADING_POST_PRED, writeDataset } from './utils';

const FIXED_NOW = () => new Date('2026-01-02T03:04:05.000Z');

describe('runEvaluate', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'goldspan-eval-'));
    writeDataset(root, {
      gold: { trading_post: TRADING_POST_GOLD },
      predictions: { model_x: { trading_post: TRADING_POST_PRED } },
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('writes the JSON report to the default location', async () => {
    const run = await runEvaluate('model_x', parseEvaluateOptions({}), root, new JsonReportFormatter(FIXED_NOW));

    const expectedPath = path.join(root, 'evaluation', 'model_x_evaluation.json');
    expect(run.reportPath).toBe(expectedPath);
    expect(run.settings.predictionsDir).toBe(path.join(root, 'predictions', 'model_x'));

    const written: unknown = JSON.parse(readFileSync(expectedPath, 'utf-8'));
    expect(written).toMatchObject({
      model: 'model_x',
      overall: { exact: { tp: 2, fp: 2, fn: 2 } },
      metadata: { timestamp: '2026-01-02T03:04:05.000Z', documents: 1, snippets: 2 },
    });
  });

  it('writes to an explicit report path', async () => {
    const run = await runEvaluate('model_x', parseEvaluateOptions({ report: 'out/report.json' }), root);
    expect(run.reportPath).toBe(path.join(root, 'out', 'report.json'));
    expect(existsSync(path.join(root, 'out', 'report.json'))).toBe(true);
  });

  it('skips the report file when disabled', async () => {
    const run = await runEvaluate('model_x', parseEvaluateOptions({ report: false }), root);
    expect(run.reportPath).toBeNull();
    expect(existsSync(path.join(root, 'evaluation'))).toBe(false);
  });

  it('honours the config file and command-line threshold', async () => {
    writeFileSync(path.join(root, '.goldspan.ini'), 'OutputDir=results\nMinConfidence=0.9\n');

    const fromConfig = await runEvaluate('model_x', parseEvaluateOptions({}), root);
    expect(fromConfig.reportPath).toBe(path.join(root, 'results', 'model_x_evaluation.json'));
    // Ana Ruiz (0.95) and the unscored Acme Company survive 0.9
    expect(fromConfig.report.overall.exact).toMatchObject({ tp: 2, fp: 0, fn: 2 });

    const overridden = await runEvaluate('model_x', parseEvaluateOptions({ minConfidence: '0' }), root);
    expect(overridden.report.overall.exact).toMatchObject({ tp: 2, fp: 2, fn: 2 });
  });

  it('builds the default report path from the output directory', () => {
    expect(defaultReportPath('/tmp/eval', 'gliner')).toBe(path.join('/tmp/eval', 'gliner_evaluation.json'));
  });
});

describe('runCompare', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'goldspan-compare-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('summarizes each model and records the ones that fail', async () => {
    writeDataset(root, {
      gold: { trading_post: TRADING_POST_GOLD },
      predictions: {
        model_x: { trading_post: TRADING_POST_PRED },
        perfect: {
          trading_post: {
            document_id: 'trading_post',
            snippets: TRADING_POST_GOLD.snippets.map((s) => ({ snippet_id: s.snippet_id, entities: s.entities })),
          },
        },
      },
    });

    const run = await runCompare(['perfect', 'model_x', 'missing'], parseCompareOptions({}), root);

    expect(run.summaries.map((s) => s.model)).toEqual(['perfect', 'model_x']);
    expect(run.summaries[0]?.exact.f1).toBe(1);
    expect(run.summaries[1]?.errorCounts).toEqual({
      false_positive: 1,
      false_negative: 1,
      boundary_error: 1,
      type_error: 1,
    });
    expect(run.failures.map((f) => f.model)).toEqual(['missing']);
    expect(run.failures[0]?.error.message).toContain('Predictions directory not found');
  });
});
