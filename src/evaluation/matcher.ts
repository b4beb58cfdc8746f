import type { EntitySpan } from './types';

export type SpanPredicate = (predicted: EntitySpan, gold: EntitySpan) => boolean;

export interface SpanPair {
  predictedIndex: number;
  goldIndex: number;
}

export interface Pairing {
  pairs: SpanPair[];
  // Indices into the predicted/gold sequences, in input order
  unpairedPredicted: number[];
  unpairedGold: number[];
}

export function isExactMatch(predicted: EntitySpan, gold: EntitySpan): boolean {
  return predicted.start === gold.start && predicted.end === gold.end && predicted.type === gold.type;
}

export function hasSameOffsets(a: EntitySpan, b: EntitySpan): boolean {
  return a.start === b.start && a.end === b.end;
}

/*
 * Non-empty intersection of two half-open intervals. Ignores type.
 */
export function overlaps(a: EntitySpan, b: EntitySpan): boolean {
  return a.start < b.end && b.start < a.end;
}

export function isPartialMatch(predicted: EntitySpan, gold: EntitySpan): boolean {
  return predicted.type === gold.type && overlaps(predicted, gold);
}

/**
 * Greedy first-fit one-to-one pairing.
 *
 * Predicted spans are visited in input order; each takes the first gold
 * span not yet taken that satisfies the predicate.
 */
export function pairGreedy(
  predicted: readonly EntitySpan[],
  gold: readonly EntitySpan[],
  predicate: SpanPredicate
): Pairing {
  const remainingGold = gold.map((_, i) => i);
  const pairs: SpanPair[] = [];
  const unpairedPredicted: number[] = [];

  predicted.forEach((p, predictedIndex) => {
    const pos = remainingGold.findIndex((goldIndex) => {
      const g = gold[goldIndex];
      return g !== undefined && predicate(p, g);
    });
    const goldIndex = remainingGold[pos];
    if (pos === -1 || goldIndex === undefined) {
      unpairedPredicted.push(predictedIndex);
      return;
    }

    remainingGold.splice(pos, 1);
    pairs.push({ predictedIndex, goldIndex });
  });

  return { pairs, unpairedPredicted, unpairedGold: remainingGold };
}
