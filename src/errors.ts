import type { CycleCondition } from './strategy/types';

export type CrossoverErrorCode = CycleCondition | 'InvalidConfiguration';

export class CrossoverError extends Error {
  readonly code: CrossoverErrorCode;

  constructor(code: CrossoverErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InsufficientDataError extends CrossoverError {
  constructor(
    readonly required: number,
    readonly available: number,
  ) {
    super('InsufficientData', `need ${required} price points, have ${available}`);
  }
}

export class InvalidPriceSeriesError extends CrossoverError {
  constructor(message: string) {
    super('InvalidPriceSeries', message);
  }
}

export class UnknownPositionStateError extends CrossoverError {
  constructor(message: string) {
    super('UnknownPositionState', message);
  }
}

export class InvalidConfigurationError extends CrossoverError {
  constructor(readonly issues: string[]) {
    super('InvalidConfiguration', `Invalid configuration: ${issues.join('; ')}`);
  }
}

export function isCrossoverError(err: unknown): err is CrossoverError {
  return err instanceof CrossoverError;
}
