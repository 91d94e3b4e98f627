import type { AveragePair, CrossoverEvent, CrossoverState } from './types';

// Relative tolerance for treating two averages as equal; means of the same
// prices over different windows can differ by an ulp.
const EQUALITY_TOLERANCE = 1e-9;

export function classify(pair: AveragePair | null): CrossoverState {
  if (!pair) return 'neutral';
  const diff = pair.short - pair.long;
  if (Math.abs(diff) <= EQUALITY_TOLERANCE * Math.max(Math.abs(pair.short), Math.abs(pair.long))) return 'neutral';
  return diff > 0 ? 'bullish' : 'bearish';
}

/**
 * A crossover is a change into a strict relation between consecutive cycles.
 * With no prior pair there is nothing to compare against, so no event fires;
 * equality never fires on its own.
 */
export function detectCrossover(
  current: AveragePair | null,
  prior: AveragePair | null,
): { state: CrossoverState; event: CrossoverEvent } {
  const state = classify(current);
  if (!current || !prior) return { state, event: 'none' };
  const prev = classify(prior);
  if (state === 'bullish' && prev !== 'bullish') return { state, event: 'bullish-crossover' };
  if (state === 'bearish' && prev !== 'bearish') return { state, event: 'bearish-crossover' };
  return { state, event: 'none' };
}
