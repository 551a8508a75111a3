import Bottleneck from 'bottleneck';
import { TransportError } from '../core/errors';
import { BrokerResponse, Logger, RetryPolicy } from '../core/types';
import { abortReason, isRecord, sleep } from '../core/utils';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  jitter: 0.25,
  maxDelayMs: 60_000,
  retryableStatuses: [429, 500, 502, 503, 504]
};

export const DEFAULT_MIN_INTERVAL_MS = 1000;

// Order placement is throttled harder than reads.
export const DEFAULT_OPERATION_SETTINGS: Record<string, OperationSettings> = {
  place_order: { minIntervalMs: 3000 }
};

export interface OperationSettings {
  minIntervalMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
}

export interface InvokerClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  random(): number;
}

export interface ResilientInvokerOptions {
  policy?: Partial<RetryPolicy>;
  defaultMinIntervalMs?: number;
  operations?: Record<string, OperationSettings>;
  clock?: Partial<InvokerClock>;
  logger?: Logger;
}

export type InvokeResult =
  | { ok: true; operation: string; response: BrokerResponse; attempts: number }
  | { ok: false; operation: string; response?: BrokerResponse; error?: TransportError; attempts: number };

export interface OperationStats {
  calls: number;
  retries: number;
  failures: number;
  lastStatus?: number;
}

export const isSuccessStatus = (status: number) => status >= 200 && status < 300;

const headerValue = (headers: Record<string, string>, name: string): string | undefined => {
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  return key === undefined ? undefined : headers[key];
};

/** Retry-After as delta-seconds or an HTTP date, in milliseconds. */
export const parseRetryAfter = (value: string | undefined, nowMs: number): number | undefined => {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - nowMs);
};

export const describeFailure = (result: InvokeResult): string => {
  if (result.ok) return `HTTP ${result.response.status}`;
  if (result.response) return `HTTP ${result.response.status} ${result.response.text.slice(0, 200)}`.trim();
  if (result.error) return result.error.message;
  return 'no response';
};

export const INSUFFICIENT_FUNDS_CODES = ['ORDER_BUYING_POWER_NOT_ENOUGH'];
export const STALE_IDENTITY_CODES = ['INVALID_SYMBOL', 'INVALID_INSTRUMENT_ID'];

/** Broker error code from `{error_code}` / `{code}`, falling back to a known code in the raw text. */
export const brokerErrorCode = (result: InvokeResult): string | undefined => {
  const body = result.response?.body;
  if (isRecord(body)) {
    const code = body.error_code ?? body.code;
    if (typeof code === 'string' && code) return code.toUpperCase();
  }
  const text = result.response?.text ?? '';
  return [...INSUFFICIENT_FUNDS_CODES, ...STALE_IDENTITY_CODES].find((c) => text.includes(c));
};

export class ResilientInvoker {
  private policy: RetryPolicy;
  private defaultMinIntervalMs: number;
  private operations: Record<string, OperationSettings>;
  private clock: InvokerClock;
  private logger: Logger;
  private limiters = new Map<string, Bottleneck>();
  private stats = new Map<string, OperationStats>();

  constructor(options: ResilientInvokerOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.defaultMinIntervalMs = options.defaultMinIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    this.operations = { ...DEFAULT_OPERATION_SETTINGS, ...options.operations };
    this.clock = {
      now: options.clock?.now ?? (() => Date.now()),
      sleep: options.clock?.sleep ?? sleep,
      random: options.clock?.random ?? Math.random
    };
    this.logger = options.logger ?? console;
  }

  policyFor(operation: string): RetryPolicy {
    const override = this.operations[operation];
    return {
      ...this.policy,
      maxRetries: override?.maxRetries ?? this.policy.maxRetries,
      baseDelayMs: override?.baseDelayMs ?? this.policy.baseDelayMs
    };
  }

  minIntervalFor(operation: string): number {
    return this.operations[operation]?.minIntervalMs ?? this.defaultMinIntervalMs;
  }

  getStats(operation: string): OperationStats {
    return { ...(this.stats.get(operation) ?? { calls: 0, retries: 0, failures: 0 }) };
  }

  getAllStats(): Record<string, OperationStats> {
    return Object.fromEntries(Array.from(this.stats.entries()).map(([op, s]) => [op, { ...s }]));
  }

  backoffDelay(policy: RetryPolicy, attempt: number, response?: BrokerResponse): number {
    let delay = policy.baseDelayMs * 2 ** attempt;
    if (response) {
      const retryAfter = parseRetryAfter(headerValue(response.headers, 'retry-after'), this.clock.now());
      if (retryAfter !== undefined) delay = Math.max(delay, retryAfter);
    }
    const jittered = delay * (1 + (this.clock.random() * 2 - 1) * policy.jitter);
    return Math.min(Math.max(0, jittered), policy.maxDelayMs);
  }

  private statsFor(operation: string): OperationStats {
    let s = this.stats.get(operation);
    if (!s) {
      s = { calls: 0, retries: 0, failures: 0 };
      this.stats.set(operation, s);
    }
    return s;
  }

  /** One limiter per operation name; calls of the same operation never overlap. */
  limiterFor(operation: string): Bottleneck {
    let limiter = this.limiters.get(operation);
    if (!limiter) {
      limiter = new Bottleneck({ minTime: this.minIntervalFor(operation), maxConcurrent: 1 });
      this.limiters.set(operation, limiter);
    }
    return limiter;
  }

  private throttled(
    operation: string,
    call: () => Promise<BrokerResponse>,
    signal?: AbortSignal
  ): Promise<BrokerResponse> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));
    return this.limiterFor(operation).schedule(() => {
      if (signal?.aborted) return Promise.reject(abortReason(signal));
      return call();
    });
  }

  async invoke(
    operation: string,
    call: () => Promise<BrokerResponse>,
    opts: { signal?: AbortSignal } = {}
  ): Promise<InvokeResult> {
    const policy = this.policyFor(operation);
    const stats = this.statsFor(operation);
    let attempt = 0;
    for (;;) {
      stats.calls += 1;
      let response: BrokerResponse | undefined;
      let error: TransportError | undefined;
      try {
        response = await this.throttled(operation, call, opts.signal);
      } catch (err) {
        if (!(err instanceof TransportError)) throw err;
        error = err;
      }
      const attempts = attempt + 1;

      if (response) {
        stats.lastStatus = response.status;
        if (!policy.retryableStatuses.includes(response.status)) {
          if (isSuccessStatus(response.status)) {
            return { ok: true, operation, response, attempts };
          }
          stats.failures += 1;
          return { ok: false, operation, response, attempts };
        }
      }

      if (attempt >= policy.maxRetries) {
        stats.failures += 1;
        const result: InvokeResult = { ok: false, operation, response, error, attempts };
        this.logger.error(`${operation} failed after ${attempts} attempts: ${describeFailure(result)}`);
        return result;
      }

      const delay = this.backoffDelay(policy, attempt, response);
      stats.retries += 1;
      this.logger.warn(
        `${operation} retry ${attempt + 1}/${policy.maxRetries} in ${(delay / 1000).toFixed(2)}s (${
          response ? `HTTP ${response.status}` : error?.message ?? 'transport error'
        })`
      );
      await this.clock.sleep(delay, opts.signal);
      attempt += 1;
    }
  }
}
