import fg from 'fast-glob';
import micromatch from 'micromatch';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import * as path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { ProcessingError, ValidationError, handleUnknownError } from '../errors/index';
import { GOLD_FILE_SUFFIX, PREDICTION_FILE_SUFFIX } from '../config/constants';
import {
  GOLD_DOCUMENT_SCHEMA,
  PREDICTION_DOCUMENT_SCHEMA,
  type EntityRecord,
  type GoldDocument,
  type PredictionDocument,
} from '../schemas/dataset-schemas';
import type { RawSpan, SnippetInput } from '../evaluation/types';

export interface LoaderWarning {
  documentId: string;
  snippetId?: string | undefined;
  message: string;
}

export interface GoldFile {
  // File stem without the _gold.json suffix
  documentId: string;
  path: string;
}

export interface PairingOptions {
  minConfidence?: number | undefined;
}

export interface PairedDocument {
  documentId: string;
  snippets: SnippetInput[];
  warnings: LoaderWarning[];
}

export function documentIdFromFile(filePath: string, suffix: string): string {
  const base = path.basename(filePath);
  return base.endsWith(suffix) ? base.slice(0, -suffix.length) : base;
}

export function predictionFileFor(predictionsDir: string, documentId: string): string {
  return path.join(predictionsDir, `${documentId}${PREDICTION_FILE_SUFFIX}`);
}

/**
 * Lists `*_gold.json` files sorted by name. `only` is a glob matched
 * against the document id.
 */
export async function findGoldFiles(goldDir: string, only?: string): Promise<GoldFile[]> {
  if (!existsSync(goldDir)) {
    throw new ProcessingError(`Gold standard directory not found: ${goldDir}`);
  }

  const found = await fg(`*${GOLD_FILE_SUFFIX}`, { cwd: goldDir, onlyFiles: true, dot: false });
  const files = found
    .sort()
    .map((name) => ({ documentId: documentIdFromFile(name, GOLD_FILE_SUFFIX), path: path.join(goldDir, name) }));

  if (!only) return files;
  return files.filter((file) => micromatch.isMatch(file.documentId, only));
}

async function readJsonFile<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>, label: string): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${label}`);
    throw new ProcessingError(`Failed to read ${label} ${filePath}: ${err.message}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${label} ${filePath}: ${issues}`);
  }
  return result.data;
}

export function loadGoldDocument(filePath: string): Promise<GoldDocument> {
  return readJsonFile(filePath, GOLD_DOCUMENT_SCHEMA, 'gold standard file');
}

export function loadPredictionDocument(filePath: string): Promise<PredictionDocument> {
  return readJsonFile(filePath, PREDICTION_DOCUMENT_SCHEMA, 'prediction file');
}

export function toRawSpan(entity: EntityRecord): RawSpan {
  const span: RawSpan = { text: entity.text, start: entity.start, end: entity.end, type: entity.type };
  if (entity.confidence !== undefined) {
    span.confidence = entity.confidence;
  }
  return span;
}

/**
 * Builds snippet inputs from one gold document and one model's predictions.
 *
 * Skipped gold snippets are dropped. Predicted entities below
 * `minConfidence` are dropped; entities without a confidence are kept.
 * Gold snippets without predictions are skipped with a warning.
 */
export function pairDocument(
  gold: GoldDocument,
  prediction: PredictionDocument,
  options: PairingOptions = {}
): PairedDocument {
  const documentId = gold.document_id;
  const minConfidence = options.minConfidence ?? 0;
  const warnings: LoaderWarning[] = [];
  const predictedById = new Map(prediction.snippets.map((snippet) => [snippet.snippet_id, snippet]));
  const goldIds = new Set(gold.snippets.map((snippet) => snippet.snippet_id));

  if (prediction.document_id !== documentId) {
    warnings.push({
      documentId,
      message: `Prediction file is labelled ${prediction.document_id}`,
    });
  }

  const snippets: SnippetInput[] = [];
  for (const snippet of gold.snippets) {
    if (snippet.skipped) continue;

    const predicted = predictedById.get(snippet.snippet_id);
    if (!predicted) {
      warnings.push({ documentId, snippetId: snippet.snippet_id, message: 'No predictions for snippet, skipping' });
      continue;
    }

    snippets.push({
      documentId,
      snippetId: snippet.snippet_id,
      gold: snippet.entities.map(toRawSpan),
      predicted: predicted.entities
        .filter((entity) => entity.confidence === undefined || entity.confidence >= minConfidence)
        .map(toRawSpan),
      textLength: snippet.text.length,
    });
  }

  for (const snippet of prediction.snippets) {
    if (!goldIds.has(snippet.snippet_id)) {
      warnings.push({
        documentId,
        snippetId: snippet.snippet_id,
        message: 'Predicted snippet has no gold counterpart, ignoring',
      });
    }
  }

  return { documentId, snippets, warnings };
}
