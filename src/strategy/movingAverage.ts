import { InsufficientDataError, InvalidConfigurationError, InvalidPriceSeriesError } from '../errors';
import type { AveragePair, MovingAverage, PriceSeries, StrategyConfig } from './types';

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Arithmetic mean of the `windowLength` most recent prices.
 * Throws InsufficientDataError when the series is shorter than the window.
 */
export function movingAverage(series: PriceSeries, windowLength: number): MovingAverage {
  if (!Number.isInteger(windowLength) || windowLength <= 0) {
    throw new InvalidConfigurationError([`window length must be a positive integer, got ${windowLength}`]);
  }
  const { points } = series;
  if (points.length < windowLength) {
    throw new InsufficientDataError(windowLength, points.length);
  }
  const value = mean(points.slice(-windowLength).map((p) => p.price));
  return { windowLength, value };
}

/** Both averages from the same snapshot; `series` is read once and not retained. */
export function computeAveragePair(series: PriceSeries, config: StrategyConfig): AveragePair {
  const required = Math.max(config.shortWindow, config.longWindow);
  if (series.points.length < required) {
    throw new InsufficientDataError(required, series.points.length);
  }
  return {
    short: movingAverage(series, config.shortWindow).value,
    long: movingAverage(series, config.longWindow).value,
  };
}

/**
 * Rejects snapshots that are not a single instrument's strictly increasing,
 * positive-priced history. Gaps in time are allowed.
 */
export function assertValidSeries(series: PriceSeries, symbol: string): void {
  if (series.symbol !== symbol) {
    throw new InvalidPriceSeriesError(`series is for ${series.symbol}, expected ${symbol}`);
  }
  let prevTs = Number.NEGATIVE_INFINITY;
  for (const [i, p] of series.points.entries()) {
    if (!Number.isFinite(p.price) || p.price <= 0) {
      throw new InvalidPriceSeriesError(`price at index ${i} is not a positive number: ${p.price}`);
    }
    if (!Number.isFinite(p.timestamp)) {
      throw new InvalidPriceSeriesError(`timestamp at index ${i} is not a number`);
    }
    if (p.timestamp <= prevTs) {
      throw new InvalidPriceSeriesError(`timestamps not strictly increasing at index ${i}`);
    }
    prevTs = p.timestamp;
  }
}

/** Series without its newest point, for deriving the previous cycle's pair. */
export function dropLatest(series: PriceSeries): PriceSeries {
  return { symbol: series.symbol, points: series.points.slice(0, -1) };
}
