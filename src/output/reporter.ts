import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import type { EvaluationReport, SpanError, EntitySpan } from '../evaluation/types';
import type { ModelSummary } from '../evaluation/report-builder';
import type { Metrics } from '../scoring/metrics';
import type { LoaderWarning } from '../boundaries/dataset-loader';

const RULE_WIDTH = 80;

export function formatRatio(value: number | null): string {
  return value === null ? 'N/A' : value.toFixed(3);
}

function colorRatio(value: number | null): string {
  const text = formatRatio(value);
  if (value === null) return chalk.dim(text);
  if (value >= 0.8) return chalk.green(text);
  if (value >= 0.5) return chalk.yellow(text);
  return chalk.red(text);
}

/*
 * Pads on visible width so colored cells still line up.
 */
export function padCell(text: string, width: number): string {
  const visible = stripAnsi(text).length;
  return text + ' '.repeat(Math.max(0, width - visible));
}

export function formatRow(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => padCell(cell, widths[i] ?? 0)).join(' ').trimEnd();
}

export function formatSpan(span: EntitySpan): string {
  return `"${span.text}" [${span.start}, ${span.end}) ${span.type}`;
}

export function describeError(error: SpanError): string {
  switch (error.kind) {
    case 'boundary_error':
      return `predicted ${error.predicted ? formatSpan(error.predicted) : '?'} vs gold ${error.gold ? formatSpan(error.gold) : '?'}`;
    case 'type_error':
      return `${error.gold ? formatSpan(error.gold) : '?'} predicted as ${error.predicted?.type ?? '?'}`;
    case 'false_negative':
      return `missed ${error.gold ? formatSpan(error.gold) : '?'}`;
    case 'false_positive':
      return `spurious ${error.predicted ? formatSpan(error.predicted) : '?'}`;
  }
}

function errorLabel(kind: SpanError['kind']): string {
  switch (kind) {
    case 'false_positive':
      return chalk.red('false positive');
    case 'false_negative':
      return chalk.red('false negative');
    case 'boundary_error':
      return chalk.yellow('boundary');
    case 'type_error':
      return chalk.magenta('type');
  }
}

export function printFileHeader(fileRelPath: string) {
  const absPath = path.resolve(process.cwd(), fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  console.log(chalk.underline(link));
}

export function printReportHeader(model: string, goldDir: string, predictionsDir: string, documents: number) {
  console.log('');
  console.log('='.repeat(RULE_WIDTH));
  console.log(chalk.bold(`NER EVALUATION REPORT: ${model}`));
  console.log('='.repeat(RULE_WIDTH));
  console.log(`Gold standard: ${goldDir}`);
  console.log(`Predictions:   ${predictionsDir}`);
  console.log(`Documents:     ${documents}`);
}

function printMetricsBlock(title: string, m: Metrics) {
  console.log('');
  console.log(chalk.bold(`${title}:`));
  console.log(`  Precision: ${colorRatio(m.precision)}`);
  console.log(`  Recall:    ${colorRatio(m.recall)}`);
  console.log(`  F1 Score:  ${colorRatio(m.f1)}`);
  console.log(`  True Positives:  ${m.tp}`);
  console.log(`  False Positives: ${m.fp}`);
  console.log(`  False Negatives: ${m.fn}`);
}

export function printOverall(report: EvaluationReport) {
  printMetricsBlock('Overall Performance (Exact Match)', report.overall.exact);
  printMetricsBlock('Overall Performance (Partial Match)', report.overall.partial);
}

const TABLE_WIDTHS = [12, 10, 10, 10, 10, 6, 6, 6];
const TABLE_HEADER = ['', 'Precision', 'Recall', 'F1', 'Partial F1', 'TP', 'FP', 'FN'];

export function formatMetricsRow(label: string, exact: Metrics, partial: Metrics, labelWidth: number): string {
  const widths = [labelWidth, ...TABLE_WIDTHS.slice(1)];
  return formatRow(
    [
      label,
      colorRatio(exact.precision),
      colorRatio(exact.recall),
      colorRatio(exact.f1),
      colorRatio(partial.f1),
      String(exact.tp),
      String(exact.fp),
      String(exact.fn),
    ],
    widths
  );
}

function printTable(title: string, labelTitle: string, rows: Array<{ label: string; exact: Metrics; partial: Metrics }>) {
  const labelWidth = Math.max(TABLE_WIDTHS[0] ?? 12, labelTitle.length, ...rows.map((r) => r.label.length)) + 1;
  console.log('');
  console.log('-'.repeat(RULE_WIDTH));
  console.log(chalk.bold(title));
  console.log('-'.repeat(RULE_WIDTH));
  console.log(chalk.dim(formatRow([labelTitle, ...TABLE_HEADER.slice(1)], [labelWidth, ...TABLE_WIDTHS.slice(1)])));
  for (const row of rows) {
    console.log(formatMetricsRow(row.label, row.exact, row.partial, labelWidth));
  }
}

export function printTypeTable(report: EvaluationReport) {
  printTable(
    'Per-Entity-Type Performance:',
    'Type',
    report.perType.map((t) => ({ label: t.type, exact: t.exact, partial: t.partial }))
  );
}

export function printDocumentTable(report: EvaluationReport) {
  printTable(
    'Per-Document Performance:',
    'Document',
    report.perDocument.map((d) => ({ label: d.documentId, exact: d.exact, partial: d.partial }))
  );
}

export function printErrors(errors: SpanError[]) {
  if (errors.length === 0) return;
  console.log('');
  console.log(chalk.bold(`Errors (${errors.length}):`));
  let current = '';
  for (const error of errors) {
    const key = `${error.documentId}/${error.snippetId}`;
    if (key !== current) {
      console.log(`  ${chalk.cyan(key)}`);
      current = key;
    }
    console.log(`    ${padCell(errorLabel(error.kind), 16)}${describeError(error)}`);
  }
}

export function printWarnings(warnings: LoaderWarning[], report?: EvaluationReport) {
  const lines = warnings.map((w) => `${w.snippetId ? `${w.documentId}/${w.snippetId}` : w.documentId}: ${w.message}`);
  for (const w of report?.warnings ?? []) {
    lines.push(`${w.documentId}/${w.snippetId}: ${w.message}`);
  }
  if (lines.length === 0) return;
  console.log('');
  for (const line of lines) {
    console.log(`  ${chalk.yellow('warning')}  ${line}`);
  }
}

export function printGlobalSummary(report: EvaluationReport) {
  const errors = report.errors.length;
  const okMark = errors === 0 ? chalk.green('✓') : chalk.red('✖');
  const errTxt = errors === 1 ? '1 error' : `${errors} errors`;
  const docs = report.perDocument.length;
  const docTxt = docs === 1 ? '1 document' : `${docs} documents`;
  const snippets = report.perSnippet.length;
  const snipTxt = snippets === 1 ? '1 snippet' : `${snippets} snippets`;
  const coloredErr = errors > 0 ? chalk.red(errTxt) : chalk.green(errTxt);

  console.log('');
  console.log(`${okMark} ${coloredErr} in ${snipTxt} across ${docTxt}.`);
}

export function printComparisonTable(summaries: ModelSummary[]) {
  const labelWidth = Math.max(12, ...summaries.map((s) => s.model.length)) + 1;
  const widths = [labelWidth, 10, 10, 10, 10, 6, 6, 10, 6];
  console.log('');
  console.log(chalk.bold('Model Comparison:'));
  console.log(
    chalk.dim(formatRow(['Model', 'Precision', 'Recall', 'F1', 'Partial F1', 'FP', 'FN', 'Boundary', 'Type'], widths))
  );
  for (const s of summaries) {
    console.log(
      formatRow(
        [
          s.model,
          colorRatio(s.exact.precision),
          colorRatio(s.exact.recall),
          colorRatio(s.exact.f1),
          colorRatio(s.partial.f1),
          String(s.errorCounts.false_positive),
          String(s.errorCounts.false_negative),
          String(s.errorCounts.boundary_error),
          String(s.errorCounts.type_error),
        ],
        widths
      )
    );
  }
}

export function printValidationRow(level: 'error' | 'warning', message: string) {
  const label = level === 'error' ? chalk.red('error') : chalk.yellow('warning');
  console.log(`  ${label}  ${message}`);
}
