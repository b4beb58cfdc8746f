import { addCounts, computeMetrics, emptyCounts, sumCounts, type MatchCounts } from '../scoring/metrics';
import { emptyTypeCounts, evaluateSnippet } from './snippet-evaluator';
import {
  ENTITY_TYPES,
  type DocumentMetrics,
  type EmptyInputWarning,
  type ErrorKindName,
  type EvaluationReport,
  type MetricPair,
  type SnippetEvaluation,
  type SnippetInput,
  type TypeCounts,
  type TypeMetrics,
} from './types';

const EMPTY_INPUT_MESSAGE = 'No gold or predicted spans; metrics are not applicable';

function totalOf(counts: TypeCounts): MatchCounts {
  return sumCounts(ENTITY_TYPES.map((type) => counts[type]));
}

function addTypeCounts(a: TypeCounts, b: TypeCounts): TypeCounts {
  const sum = emptyTypeCounts();
  for (const type of ENTITY_TYPES) {
    sum[type] = addCounts(a[type], b[type]);
  }
  return sum;
}

function metricPair(exact: MatchCounts, partial: MatchCounts): MetricPair {
  return { exact: computeMetrics(exact), partial: computeMetrics(partial) };
}

function isUnused(counts: MatchCounts): boolean {
  return counts.tp === 0 && counts.fp === 0 && counts.fn === 0;
}

/**
 * Rolls per-snippet evaluations up into overall, per-type and per-document
 * metrics. All three granularities are sums of the same counts, so the
 * per-document totals always add up to the overall totals.
 *
 * Documents keep the order in which they first appear; types follow the
 * label-set order and are listed only when they have any counts.
 */
export function buildEvaluationReport(model: string, evaluations: readonly SnippetEvaluation[]): EvaluationReport {
  const byDocument = new Map<string, { exact: MatchCounts; partial: MatchCounts }>();
  let exactByType = emptyTypeCounts();
  let partialByType = emptyTypeCounts();
  const warnings: EmptyInputWarning[] = [];

  for (const evaluation of evaluations) {
    const doc = byDocument.get(evaluation.documentId) ?? { exact: emptyCounts(), partial: emptyCounts() };
    doc.exact = addCounts(doc.exact, totalOf(evaluation.exact));
    doc.partial = addCounts(doc.partial, totalOf(evaluation.partial));
    byDocument.set(evaluation.documentId, doc);

    exactByType = addTypeCounts(exactByType, evaluation.exact);
    partialByType = addTypeCounts(partialByType, evaluation.partial);

    if (evaluation.empty) {
      warnings.push({
        documentId: evaluation.documentId,
        snippetId: evaluation.snippetId,
        kind: 'empty_input',
        message: EMPTY_INPUT_MESSAGE,
      });
    }
  }

  const perDocument: DocumentMetrics[] = Array.from(byDocument.entries()).map(([documentId, counts]) => ({
    documentId,
    ...metricPair(counts.exact, counts.partial),
  }));

  const perType: TypeMetrics[] = ENTITY_TYPES
    .filter((type) => !isUnused(exactByType[type]) || !isUnused(partialByType[type]))
    .map((type) => ({ type, ...metricPair(exactByType[type], partialByType[type]) }));

  return {
    model,
    perDocument,
    perType,
    perSnippet: evaluations.map((evaluation) => ({
      documentId: evaluation.documentId,
      snippetId: evaluation.snippetId,
      ...metricPair(totalOf(evaluation.exact), totalOf(evaluation.partial)),
    })),
    overall: metricPair(totalOf(exactByType), totalOf(partialByType)),
    errors: evaluations.flatMap((evaluation) => evaluation.errors),
    warnings,
  };
}

/**
 * Evaluates every snippet of one model and builds its report.
 */
export function evaluateModel(model: string, snippets: readonly SnippetInput[]): EvaluationReport {
  return buildEvaluationReport(model, snippets.map(evaluateSnippet));
}

export interface ModelSummary extends MetricPair {
  model: string;
  documents: number;
  snippets: number;
  errorCounts: Record<ErrorKindName, number>;
}

export function summarizeReport(report: EvaluationReport): ModelSummary {
  const errorCounts: Record<ErrorKindName, number> = {
    false_positive: 0,
    false_negative: 0,
    boundary_error: 0,
    type_error: 0,
  };
  for (const error of report.errors) {
    errorCounts[error.kind]++;
  }
  return {
    model: report.model,
    documents: report.perDocument.length,
    snippets: report.perSnippet.length,
    exact: report.overall.exact,
    partial: report.overall.partial,
    errorCounts,
  };
}
