import { UnknownPositionStateError } from '../errors';
import type { Action, CrossoverEvent, PositionState, StrategyConfig } from './types';

export type PositionPhase = 'flat' | 'holding';

export interface Decision {
  action: Action;
  nextPosition: PositionState | null;
  error?: UnknownPositionStateError;
}

const NOOP: Action = { type: 'noop' };

export function phaseOf(position: PositionState): PositionPhase {
  return position.quantity > 0 ? 'holding' : 'flat';
}

function checkPosition(position: PositionState | null, config: StrategyConfig): UnknownPositionStateError | null {
  if (!position) return new UnknownPositionStateError(`position for ${config.symbol} could not be read`);
  if (position.symbol !== config.symbol) {
    return new UnknownPositionStateError(`position is for ${position.symbol}, expected ${config.symbol}`);
  }
  if (!Number.isInteger(position.quantity) || position.quantity < 0) {
    return new UnknownPositionStateError(
      `position quantity ${position.quantity} for ${config.symbol} is not a whole long holding`,
    );
  }
  return null;
}

/**
 * Flat/holding state machine. Only flat + bullish buys and only holding + bearish
 * sells; everything else holds. An unreadable position never trades.
 */
export function decide(event: CrossoverEvent, position: PositionState | null, config: StrategyConfig): Decision {
  const error = checkPosition(position, config);
  if (error || !position) return { action: NOOP, nextPosition: position, error: error ?? undefined };

  const phase = phaseOf(position);
  if (phase === 'flat' && event === 'bullish-crossover') {
    return {
      action: { type: 'buy', symbol: config.symbol, quantity: config.tradeQuantity },
      nextPosition: { symbol: config.symbol, quantity: position.quantity + config.tradeQuantity },
    };
  }
  if (phase === 'holding' && event === 'bearish-crossover') {
    return {
      action: { type: 'sell', symbol: config.symbol, quantity: position.quantity },
      nextPosition: { symbol: config.symbol, quantity: 0 },
    };
  }
  return { action: NOOP, nextPosition: position };
}
