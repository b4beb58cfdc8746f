/**
 * Precision/recall/F1 over true positive, false positive and false negative counts.
 *
 * A ratio whose denominator is zero is not applicable and is `null`,
 * rendered as "N/A" by the reporters.
 */

export interface MatchCounts {
  tp: number;
  fp: number;
  fn: number;
}

export interface Metrics extends MatchCounts {
  precision: number | null;
  recall: number | null;
  f1: number | null;
}

export function emptyCounts(): MatchCounts {
  return { tp: 0, fp: 0, fn: 0 };
}

export function addCounts(a: MatchCounts, b: MatchCounts): MatchCounts {
  return { tp: a.tp + b.tp, fp: a.fp + b.fp, fn: a.fn + b.fn };
}

export function sumCounts(counts: Iterable<MatchCounts>): MatchCounts {
  let total = emptyCounts();
  for (const c of counts) {
    total = addCounts(total, c);
  }
  return total;
}

export function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

/**
 * F1 is not applicable only when neither precision nor recall is.
 * Otherwise a missing side counts as 0.
 */
export function f1Score(precision: number | null, recall: number | null): number | null {
  if (precision === null && recall === null) return null;
  const p = precision ?? 0;
  const r = recall ?? 0;
  return p + r === 0 ? 0 : (2 * p * r) / (p + r);
}

export function computeMetrics(counts: MatchCounts): Metrics {
  const precision = ratio(counts.tp, counts.tp + counts.fp);
  const recall = ratio(counts.tp, counts.tp + counts.fn);
  return {
    tp: counts.tp,
    fp: counts.fp,
    fn: counts.fn,
    precision,
    recall,
    f1: f1Score(precision, recall),
  };
}
