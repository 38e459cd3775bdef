/**
 * Recall@K and summary statistics.
 */

export interface RecallSummary {
  mean: number;
  /** Population standard deviation. */
  std: number;
  min: number;
  max: number;
}

/**
 * Fraction of ground-truth items found in the top k predictions.
 *
 * Empty ground truth scores 1.0. Duplicates on either side count once.
 */
export function calculateRecallAtK(
  predicted: readonly string[],
  groundTruth: readonly string[],
  k: number,
): number {
  if (groundTruth.length === 0) {
    return 1.0;
  }

  const topK = new Set(predicted.slice(0, Math.max(0, k)));
  const relevant = new Set(groundTruth);

  let hits = 0;
  for (const item of relevant) {
    if (topK.has(item)) hits++;
  }
  return hits / relevant.size;
}

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Mean, population std, min and max, each rounded to 4 decimals.
 *
 * Values are sorted before summation so the result does not depend on input
 * order. Returns null for an empty list.
 */
export function summarize(values: number[]): RecallSummary | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;

  let sum = 0;
  for (const v of sorted) sum += v;
  const mean = sum / n;

  let squares = 0;
  for (const v of sorted) squares += (v - mean) ** 2;
  const std = Math.sqrt(squares / n);

  return {
    mean: round4(mean),
    std: round4(std),
    min: round4(sorted[0]),
    max: round4(sorted[n - 1]),
  };
}
