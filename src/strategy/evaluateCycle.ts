import { isCrossoverError } from '../errors';
import { detectCrossover } from './crossover';
import { decide } from './decision';
import { assertValidSeries, computeAveragePair, dropLatest } from './movingAverage';
import type { AveragePair, CycleInput, CycleResult, PriceSeries, StrategyConfig } from './types';

/**
 * One evaluation cycle as a pure function of its inputs. Expected conditions
 * (warm-up, bad snapshot, unreadable position) come back on the result; only
 * programming errors are thrown.
 */
export function evaluateCycle(input: CycleInput): CycleResult {
  const { config, series, prior, position } = input;

  let averages: AveragePair;
  try {
    assertValidSeries(series, config.symbol);
    averages = computeAveragePair(series, config);
  } catch (err) {
    if (!isCrossoverError(err)) throw err;
    const code = err.code;
    if (code !== 'InsufficientData' && code !== 'InvalidPriceSeries') throw err;
    return {
      action: { type: 'noop' },
      averages: null,
      state: 'neutral',
      event: 'none',
      nextPosition: position,
      condition: code,
      detail: err.message,
    };
  }

  const { state, event } = detectCrossover(averages, prior);
  const decision = decide(event, position, config);
  return {
    action: decision.action,
    averages,
    state,
    event,
    nextPosition: decision.nextPosition,
    ...(decision.error ? { condition: 'UnknownPositionState' as const, detail: decision.error.message } : {}),
  };
}

/**
 * Pair the previous cycle would have produced: the averages of the series
 * without its newest point. Null when the snapshot is invalid or too short.
 */
export function derivePriorFromSeries(series: PriceSeries, config: StrategyConfig): AveragePair | null {
  try {
    assertValidSeries(series, config.symbol);
    return computeAveragePair(dropLatest(series), config);
  } catch (err) {
    if (isCrossoverError(err)) return null;
    throw err;
  }
}
