import { PACKAGE_INFO } from '../config/package-info';
import type { EntitySpan, EvaluationReport, SpanError } from '../evaluation/types';
import type { ModelSummary } from '../evaluation/report-builder';
import type { Metrics } from '../scoring/metrics';

export interface JsonSpan {
  text: string;
  start: number;
  end: number;
  type: string;
  confidence?: number;
}

export interface JsonMetricPair {
  exact: Metrics;
  partial: Metrics;
}

export interface JsonError {
  document_id: string;
  snippet_id: string;
  kind: string;
  gold_span?: JsonSpan;
  pred_span?: JsonSpan;
}

export interface JsonReport {
  model: string;
  per_document: Array<{ document_id: string } & JsonMetricPair>;
  per_type: Array<{ type: string } & JsonMetricPair>;
  per_snippet: Array<{ document_id: string; snippet_id: string } & JsonMetricPair>;
  overall: JsonMetricPair;
  errors: JsonError[];
  warnings: Array<{ document_id: string; snippet_id: string; kind: string; message: string }>;
  metadata: {
    version: string;
    timestamp: string;
    documents: number;
    snippets: number;
  };
}

function toJsonSpan(span: EntitySpan): JsonSpan {
  const out: JsonSpan = { text: span.text, start: span.start, end: span.end, type: span.type };
  if (span.confidence !== undefined) out.confidence = span.confidence;
  return out;
}

function toJsonError(error: SpanError): JsonError {
  const out: JsonError = { document_id: error.documentId, snippet_id: error.snippetId, kind: error.kind };
  if (error.gold) out.gold_span = toJsonSpan(error.gold);
  if (error.predicted) out.pred_span = toJsonSpan(error.predicted);
  return out;
}

/**
 * Serializes evaluation reports with snake_case keys for the reporting layer.
 */
export class JsonReportFormatter {
  constructor(private readonly now: () => Date = () => new Date()) {}

  toJsonReport(report: EvaluationReport): JsonReport {
    return {
      model: report.model,
      per_document: report.perDocument.map((d) => ({ document_id: d.documentId, exact: d.exact, partial: d.partial })),
      per_type: report.perType.map((t) => ({ type: t.type, exact: t.exact, partial: t.partial })),
      per_snippet: report.perSnippet.map((s) => ({
        document_id: s.documentId,
        snippet_id: s.snippetId,
        exact: s.exact,
        partial: s.partial,
      })),
      overall: { exact: report.overall.exact, partial: report.overall.partial },
      errors: report.errors.map(toJsonError),
      warnings: report.warnings.map((w) => ({
        document_id: w.documentId,
        snippet_id: w.snippetId,
        kind: w.kind,
        message: w.message,
      })),
      metadata: {
        version: PACKAGE_INFO.version,
        timestamp: this.now().toISOString(),
        documents: report.perDocument.length,
        snippets: report.perSnippet.length,
      },
    };
  }

  toJson(report: EvaluationReport): string {
    return JSON.stringify(this.toJsonReport(report), null, 2);
  }

  summariesToJson(summaries: ModelSummary[]): string {
    return JSON.stringify(
      summaries.map((s) => ({
        model: s.model,
        documents: s.documents,
        snippets: s.snippets,
        exact: s.exact,
        partial: s.partial,
        errors: s.errorCounts,
      })),
      null,
      2
    );
  }
}
