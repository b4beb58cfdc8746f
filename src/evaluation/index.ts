export * from './types';
export { validateSpan, validateSpans, findInvalidSpans } from './span-validator';
export {
  type SpanPredicate,
  type SpanPair,
  type Pairing,
  isExactMatch,
  isPartialMatch,
  hasSameOffsets,
  overlaps,
  pairGreedy,
} from './matcher';
export { evaluateSnippet, emptyTypeCounts } from './snippet-evaluator';
export { buildEvaluationReport, evaluateModel, summarizeReport, type ModelSummary } from './report-builder';
