import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { validateDataset } from '../src/cli/validate-command';
import { TRADING_POST_GOLD, writeDataset } from './utils';

const BAD_GOLD = {
  document_id: 'bad',
  snippets: [
    {
      snippet_id: '001',
      text: 'Ana met Lima.',
      entities: [
        { text: 'Ana', start: 0, end: 3, type: 'PER' },
        { text: 'Lima', start: 8, end: 8, type: 'LOC' },
        { text: 'met', start: 4, end: 7, type: 'VERB' },
      ],
    },
    {
      snippet_id: '001',
      text: 'Again.',
      entities: [{ text: 'Agn', start: 0, end: 5, type: 'MISC' }],
    },
  ],
};

const BAD_PRED = {
  document_id: 'trading_post',
  snippets: [
    { snippet_id: '002', entities: [{ text: 'Acme', start: 4, end: 40, type: 'ORG' }] },
    { snippet_id: '007', entities: [] },
  ],
};

describe('validateDataset', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'goldspan-validate-'));
    writeDataset(root, {
      gold: { bad: BAD_GOLD, trading_post: TRADING_POST_GOLD },
      predictions: { model_x: { trading_post: BAD_PRED } },
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists every invalid gold span', async () => {
    const result = await validateDataset(path.join(root, 'gold_standard'));

    expect(result.files.map((f) => path.basename(f.file))).toEqual(['bad_gold.json', 'trading_post_gold.json']);
    expect(result.files[0]?.errors).toEqual([
      'Invalid gold span #1 in bad/001: start (8) must be less than end (8)',
      'Invalid gold span #2 in bad/001: unknown entity type "VERB"',
    ]);
    expect(result.files[0]?.warnings).toEqual([
      'Duplicate snippet id 001',
      'bad/001 span #0: text "Agn" does not match snippet text "Again"',
    ]);
    expect(result.files[1]).toMatchObject({ errors: [], warnings: [] });
    expect(result.errorCount).toBe(2);
    expect(result.warningCount).toBe(2);
  });

  it('checks prediction files against the gold snippet text', async () => {
    const predictionsDir = path.join(root, 'predictions', 'model_x');
    const result = await validateDataset(path.join(root, 'gold_standard'), predictionsDir);

    expect(result.files.map((f) => path.basename(f.file))).toEqual([
      'bad_gold.json',
      'trading_post_gold.json',
      'trading_post_pred.json',
    ]);
    expect(result.files[0]?.warnings[2]).toBe(`No prediction file at ${path.join(predictionsDir, 'bad_pred.json')}`);
    expect(result.files[2]).toMatchObject({
      errors: ['Invalid predicted span #0 in trading_post/002: end (40) exceeds snippet length 29'],
      warnings: ['Snippet 007 has no gold counterpart'],
    });
    expect(result.errorCount).toBe(3);
    expect(result.warningCount).toBe(4);
  });
});
