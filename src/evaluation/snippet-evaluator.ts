import { emptyCounts } from '../scoring/metrics';
import { validateSpans } from './span-validator';
import { hasSameOffsets, isExactMatch, isPartialMatch, pairGreedy, type Pairing } from './matcher';
import {
  ErrorKind,
  type EntitySpan,
  type SnippetEvaluation,
  type SnippetInput,
  type SpanError,
  type TypeCounts,
} from './types';

export function emptyTypeCounts(): TypeCounts {
  return { LOC: emptyCounts(), PER: emptyCounts(), ORG: emptyCounts(), MISC: emptyCounts() };
}

function tally(
  predicted: readonly EntitySpan[],
  gold: readonly EntitySpan[],
  pairedGold: readonly number[],
  unpairedPredicted: readonly number[],
  unpairedGold: readonly number[]
): TypeCounts {
  const counts = emptyTypeCounts();
  for (const goldIndex of pairedGold) {
    const g = gold[goldIndex];
    if (g) counts[g.type].tp++;
  }
  for (const predictedIndex of unpairedPredicted) {
    const p = predicted[predictedIndex];
    if (p) counts[p.type].fp++;
  }
  for (const goldIndex of unpairedGold) {
    const g = gold[goldIndex];
    if (g) counts[g.type].fn++;
  }
  return counts;
}

function pairedGold(pairing: Pairing): number[] {
  return pairing.pairs.map((pair) => pair.goldIndex);
}

/*
 * Builds the error list: boundary errors first (partial pairs that are not
 * exact, in predicted order), then type errors and false negatives (exact
 * misses, gold order), then the remaining false positives. A boundary pair's
 * spans are also exact misses and appear again further down.
 */
function classifyErrors(
  input: SnippetInput,
  predicted: readonly EntitySpan[],
  gold: readonly EntitySpan[],
  exact: Pairing,
  partial: Pairing
): SpanError[] {
  const { documentId, snippetId } = input;
  const errors: SpanError[] = [];

  for (const { predictedIndex, goldIndex } of partial.pairs) {
    const p = predicted[predictedIndex];
    const g = gold[goldIndex];
    if (!p || !g || isExactMatch(p, g)) continue;
    errors.push({ documentId, snippetId, kind: ErrorKind.BOUNDARY_ERROR, gold: g, predicted: p });
  }

  // Predictions explained as a type error are not also false positives
  const mistyped = new Set<number>();
  for (const goldIndex of exact.unpairedGold) {
    const g = gold[goldIndex];
    if (!g) continue;

    const match = predicted.findIndex(
      (p, predictedIndex) => !mistyped.has(predictedIndex) && hasSameOffsets(p, g) && p.type !== g.type
    );

    if (match === -1) {
      errors.push({ documentId, snippetId, kind: ErrorKind.FALSE_NEGATIVE, gold: g });
    } else {
      mistyped.add(match);
      errors.push({ documentId, snippetId, kind: ErrorKind.TYPE_ERROR, gold: g, predicted: predicted[match] });
    }
  }

  for (const predictedIndex of exact.unpairedPredicted) {
    if (mistyped.has(predictedIndex)) continue;
    errors.push({ documentId, snippetId, kind: ErrorKind.FALSE_POSITIVE, predicted: predicted[predictedIndex] });
  }

  return errors;
}

/**
 * Scores one snippet's predicted spans against its gold spans.
 *
 * Spans are validated first; an InvalidSpanError stops the evaluation of the
 * snippet. Exact and partial counts come from two independent greedy
 * pairings over the full span lists.
 */
export function evaluateSnippet(input: SnippetInput): SnippetEvaluation {
  const { documentId, snippetId, textLength } = input;
  const gold = validateSpans(input.gold, { documentId, snippetId, role: 'gold' }, textLength);
  const predicted = validateSpans(input.predicted, { documentId, snippetId, role: 'predicted' }, textLength);

  const exact = pairGreedy(predicted, gold, isExactMatch);
  const partial = pairGreedy(predicted, gold, isPartialMatch);

  return {
    documentId,
    snippetId,
    exact: tally(predicted, gold, pairedGold(exact), exact.unpairedPredicted, exact.unpairedGold),
    partial: tally(predicted, gold, pairedGold(partial), partial.unpairedPredicted, partial.unpairedGold),
    errors: classifyErrors(input, predicted, gold, exact, partial),
    empty: gold.length === 0 && predicted.length === 0,
  };
}
