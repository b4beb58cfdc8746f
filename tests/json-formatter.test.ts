import { describe, it, expect } from 'vitest';
import { JsonReportFormatter } from '../src/output/json-formatter';
import { evaluateModel, summarizeReport } from '../src/evaluation/report-builder';
import { PACKAGE_INFO } from '../src/config/package-info';

const report = evaluateModel('model_x', [
  {
    documentId: 'trading_post',
    snippetId: '001',
    gold: [{ text: 'Fort Carlton', start: 41, end: 53, type: 'LOC' }],
    predicted: [{ text: 'Carlton', start: 45, end: 52, type: 'LOC', confidence: 0.7 }],
  },
  { documentId: 'trading_post', snippetId: '002', gold: [], predicted: [] },
]);

describe('JsonReportFormatter', () => {
  const formatter = new JsonReportFormatter(() => new Date('2026-03-04T05:06:07.000Z'));

  it('uses snake_case keys for documents, snippets and errors', () => {
    const json = formatter.toJsonReport(report);

    expect(json.per_document.map((d) => d.document_id)).toEqual(['trading_post']);
    expect(json.per_snippet.map((s) => s.snippet_id)).toEqual(['001', '002']);
    expect(json.errors).toEqual([
      {
        document_id: 'trading_post',
        snippet_id: '001',
        kind: 'boundary_error',
        gold_span: { text: 'Fort Carlton', start: 41, end: 53, type: 'LOC' },
        pred_span: { text: 'Carlton', start: 45, end: 52, type: 'LOC', confidence: 0.7 },
      },
      {
        document_id: 'trading_post',
        snippet_id: '001',
        kind: 'false_negative',
        gold_span: { text: 'Fort Carlton', start: 41, end: 53, type: 'LOC' },
      },
      {
        document_id: 'trading_post',
        snippet_id: '001',
        kind: 'false_positive',
        pred_span: { text: 'Carlton', start: 45, end: 52, type: 'LOC', confidence: 0.7 },
      },
    ]);
    expect(json.warnings).toEqual([
      {
        document_id: 'trading_post',
        snippet_id: '002',
        kind: 'empty_input',
        message: 'No gold or predicted spans; metrics are not applicable',
      },
    ]);
  });

  it('stamps the report with version, time and sizes', () => {
    expect(formatter.toJsonReport(report).metadata).toEqual({
      version: PACKAGE_INFO.version,
      timestamp: '2026-03-04T05:06:07.000Z',
      documents: 1,
      snippets: 2,
    });
  });

  it('writes not-applicable metrics as null', () => {
    const parsed: unknown = JSON.parse(formatter.toJson(report));
    expect(parsed).toMatchObject({
      per_snippet: [
        { snippet_id: '001', exact: { precision: 0, recall: 0, f1: 0 }, partial: { precision: 1, recall: 1, f1: 1 } },
        { snippet_id: '002', exact: { precision: null, recall: null, f1: null } },
      ],
    });
  });

  it('serializes comparison summaries', () => {
    const parsed: unknown = JSON.parse(formatter.summariesToJson([summarizeReport(report)]));
    expect(parsed).toEqual([
      {
        model: 'model_x',
        documents: 1,
        snippets: 2,
        exact: { tp: 0, fp: 1, fn: 1, precision: 0, recall: 0, f1: 0 },
        partial: { tp: 1, fp: 0, fn: 0, precision: 1, recall: 1, f1: 1 },
        errors: { false_positive: 1, false_negative: 1, boundary_error: 1, type_error: 0 },
      },
    ]);
  });
});
