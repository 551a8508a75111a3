export type RebalanceErrorCode =
  | 'TRANSPORT'
  | 'STATE_UNREADABLE'
  | 'STALE_IDENTITY'
  | 'INSUFFICIENT_FUNDS'
  | 'CONFIG'
  | 'MARKET_CLOSED';

export class RebalanceError extends Error {
  public readonly code: RebalanceErrorCode;

  constructor(code: RebalanceErrorCode, message: string) {
    super(message);
    this.name = 'RebalanceError';
    this.code = code;
  }
}

/** Network-level failure (connection reset, DNS, request timeout). Retryable. */
export class TransportError extends RebalanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message);
    this.name = 'TransportError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class StateUnreadableError extends RebalanceError {
  public readonly operation: string;

  constructor(operation: string, detail: string) {
    super('STATE_UNREADABLE', `${operation} unreadable: ${detail}`);
    this.name = 'StateUnreadableError';
    this.operation = operation;
  }
}

export class StaleIdentityError extends RebalanceError {
  public readonly symbol: string;

  constructor(symbol: string, detail: string) {
    super('STALE_IDENTITY', `Broker rejected identity for ${symbol}: ${detail}`);
    this.name = 'StaleIdentityError';
    this.symbol = symbol;
  }
}

export class InsufficientFundsError extends RebalanceError {
  public readonly symbol: string;

  constructor(symbol: string, detail: string) {
    super('INSUFFICIENT_FUNDS', `Insufficient buying power for ${symbol}: ${detail}`);
    this.name = 'InsufficientFundsError';
    this.symbol = symbol;
  }
}

export class MarketClosedError extends RebalanceError {
  constructor(timeZone: string, weekday: string) {
    super('MARKET_CLOSED', `Not a trading day in ${timeZone} (${weekday}); live orders refused`);
    this.name = 'MarketClosedError';
  }
}

export class ConfigError extends RebalanceError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
