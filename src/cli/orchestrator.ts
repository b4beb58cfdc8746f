import { existsSync } from "fs";
import {
  findGoldFiles,
  loadGoldDocument,
  loadPredictionDocument,
  pairDocument,
  predictionFileFor,
  type LoaderWarning,
} from "../boundaries/dataset-loader";
import { ProcessingError } from "../errors/index";
import { buildEvaluationReport, evaluateSnippet, type SnippetEvaluation } from "../evaluation/index";
import { log } from "../output/logger";
import type { GoldSet, LoadedGoldDocument, ModelRunOptions, ModelRunResult } from "./types";

/*
 * Generic concurrency runner that executes workers in parallel up to a specified limit.
 * Preserves result order matching input order.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let i = 0;
  const workers = new Array(Math.max(1, Math.min(limit, items.length)))
    .fill(0)
    .map(async () => {
      while (true) {
        const idx = i++;
        if (idx >= items.length) break;
        const item = items[idx];
        if (item !== undefined) {
          results[idx] = await worker(item, idx);
        }
      }
    });
  await Promise.all(workers);
  return results;
}

/*
 * Loads every gold file once so several models can be scored against it.
 */
export async function loadGoldSet(goldDir: string, concurrency: number, only?: string): Promise<GoldSet> {
  const files = await findGoldFiles(goldDir, only);
  if (files.length === 0) {
    throw new ProcessingError(`No gold standard files found in ${goldDir}`);
  }

  const documents = await runWithConcurrency(files, concurrency, async (file) => ({
    fileId: file.documentId,
    path: file.path,
    document: await loadGoldDocument(file.path),
  }));
  return { goldDir, documents };
}

type DocumentOutcome =
  | { evaluated: true; evaluations: SnippetEvaluation[]; warnings: LoaderWarning[] }
  | { evaluated: false; warnings: LoaderWarning[] };

async function evaluateDocument(gold: LoadedGoldDocument, options: ModelRunOptions): Promise<DocumentOutcome> {
  const predFile = predictionFileFor(options.predictionsDir, gold.fileId);
  if (!existsSync(predFile)) {
    return {
      evaluated: false,
      warnings: [{ documentId: gold.document.document_id, message: "No predictions found, skipping" }],
    };
  }

  if (options.verbose) {
    log(`[goldspan] Evaluating ${gold.document.document_id}...`);
  }

  const prediction = await loadPredictionDocument(predFile);
  const paired = pairDocument(gold.document, prediction, { minConfidence: options.minConfidence });
  // Snippets are independent; an InvalidSpanError propagates and stops the run
  const evaluations = paired.snippets.map(evaluateSnippet);
  return { evaluated: true, evaluations, warnings: paired.warnings };
}

/**
 * Scores one model's prediction files against a loaded gold set.
 *
 * Documents are processed concurrently but results keep gold-file order,
 * so the report does not depend on completion order.
 */
export async function runModelEvaluation(goldSet: GoldSet, options: ModelRunOptions): Promise<ModelRunResult> {
  if (!existsSync(options.predictionsDir)) {
    throw new ProcessingError(`Predictions directory not found: ${options.predictionsDir}`);
  }

  const outcomes = await runWithConcurrency(goldSet.documents, options.concurrency, (gold) =>
    evaluateDocument(gold, options)
  );

  const evaluations: SnippetEvaluation[] = [];
  const warnings: LoaderWarning[] = [];
  let evaluatedDocuments = 0;
  for (const outcome of outcomes) {
    warnings.push(...outcome.warnings);
    if (outcome.evaluated) {
      evaluatedDocuments++;
      evaluations.push(...outcome.evaluations);
    }
  }

  if (evaluatedDocuments === 0) {
    throw new ProcessingError(`No documents were evaluated for model ${options.model}`);
  }

  return { report: buildEvaluationReport(options.model, evaluations), warnings };
}
