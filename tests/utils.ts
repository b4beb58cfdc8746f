import { mkdirSync, writeFileSync } from 'fs';
import path from 'path';

export interface DatasetLayout {
  gold: Record<string, unknown>;
  predictions?: Record<string, Record<string, unknown>>;
}

/**
 * Writes `<root>/gold_standard/<id>_gold.json` and
 * `<root>/predictions/<model>/<id>_pred.json` for the given documents.
 */
export function writeDataset(root: string, layout: DatasetLayout): void {
  const goldDir = path.join(root, 'gold_standard');
  mkdirSync(goldDir, { recursive: true });
  for (const [id, doc] of Object.entries(layout.gold)) {
    writeFileSync(path.join(goldDir, `${id}_gold.json`), JSON.stringify(doc, null, 2));
  }

  for (const [model, docs] of Object.entries(layout.predictions ?? {})) {
    const predDir = path.join(root, 'predictions', model);
    mkdirSync(predDir, { recursive: true });
    for (const [id, doc] of Object.entries(docs)) {
      writeFileSync(path.join(predDir, `${id}_pred.json`), JSON.stringify(doc, null, 2));
    }
  }
}

// "Ana Ruiz left Fort Carlton for Lima." with two annotated snippets
export const TRADING_POST_GOLD = {
  document_id: 'trading_post',
  metadata: { title: 'Trading post journal', language: 'en' },
  annotator: 'test',
  snippets: [
    {
      snippet_id: 1,
      text: 'Ana Ruiz left Fort Carlton for Lima.',
      entities: [
        { text: 'Ana Ruiz', start: 0, end: 8, type: 'PER' },
        { text: 'Fort Carlton', start: 14, end: 26, type: 'LOC' },
        { text: 'Lima', start: 31, end: 35, type: 'LOC' },
      ],
    },
    {
      snippet_id: '002',
      text: 'The Acme Company bought furs.',
      entities: [{ text: 'Acme Company', start: 4, end: 16, type: 'ORG' }],
    },
    {
      snippet_id: '003',
      text: 'Illegible page.',
      skipped: true,
      entities: [{ text: 'page', start: 10, end: 14, type: 'MISC' }],
    },
  ],
};

export const TRADING_POST_PRED = {
  document_id: 'trading_post',
  model: 'model_x',
  snippets: [
    {
      snippet_id: '001',
      entities: [
        { text: 'Ana Ruiz', start: 0, end: 8, type: 'PER', confidence: 0.95 },
        { text: 'Carlton', start: 19, end: 26, type: 'LOC', confidence: 0.8 },
        { text: 'Lima', start: 31, end: 35, type: 'ORG', confidence: 0.4 },
      ],
    },
    {
      snippet_id: '002',
      entities: [{ text: 'Acme Company', start: 4, end: 16, type: 'ORG' }],
    },
  ],
};
