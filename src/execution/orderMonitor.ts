import { BrokerApi } from '../broker/broker.types';
import { describeFailure, ResilientInvoker } from '../broker/resilientInvoker';
import { Logger, OpenOrder } from '../core/types';
import { isRecord, sleep as defaultSleep } from '../core/utils';

export type TerminalOrderStatus = 'FILLED' | 'CANCELLED' | 'REJECTED';
const TERMINAL: readonly string[] = ['FILLED', 'CANCELLED', 'REJECTED'];
const OPEN: readonly string[] = ['PENDING', 'PARTIALLY_FILLED'];

export interface MonitorOutcome {
  status: TerminalOrderStatus | 'TIMEOUT' | 'ABORTED';
  /** Last non-terminal status the broker reported, if any. */
  lastStatus?: string;
  polls: number;
}

const entriesOf = (body: unknown): unknown[] => {
  if (Array.isArray(body)) return body;
  if (isRecord(body) && Array.isArray(body.data)) return body.data;
  if (isRecord(body) && Array.isArray(body.orders)) return body.orders;
  return [];
};

/** Accepts `{status}`, `{data: {status}}`, or a list whose first entry carries it. */
export const readOrderStatus = (body: unknown): string | undefined => {
  const candidates: unknown[] = [body];
  if (isRecord(body) && isRecord(body.data)) candidates.push(body.data);
  candidates.push(...entriesOf(body).slice(0, 1));
  for (const c of candidates) {
    if (isRecord(c) && typeof c.status === 'string') return c.status.toUpperCase();
  }
  return undefined;
};

export const readOrderId = (body: unknown): string | undefined => {
  const source = isRecord(body) && isRecord(body.data) ? body.data : body;
  if (!isRecord(source)) return undefined;
  const id = source.order_id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
};

export const extractOpenOrders = (body: unknown): OpenOrder[] =>
  entriesOf(body).flatMap((entry) => {
    if (!isRecord(entry) || typeof entry.client_order_id !== 'string') return [];
    const status = typeof entry.status === 'string' ? entry.status.toUpperCase() : '';
    if (!OPEN.includes(status)) return [];
    return [
      {
        clientOrderId: entry.client_order_id,
        orderId: entry.order_id === undefined ? undefined : String(entry.order_id),
        symbol: typeof entry.symbol === 'string' ? entry.symbol : undefined,
        status
      }
    ];
  });

const isTerminal = (status: string | undefined): status is TerminalOrderStatus =>
  status !== undefined && TERMINAL.includes(status);

export interface OrderMonitorOptions {
  broker: BrokerApi;
  invoker: ResilientInvoker;
  pollIntervalMs: number;
  timeoutMs: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export class OrderMonitor {
  private broker: BrokerApi;
  private invoker: ResilientInvoker;
  private pollIntervalMs: number;
  private timeoutMs: number;
  private now: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private logger: Logger;

  constructor(options: OrderMonitorOptions) {
    this.broker = options.broker;
    this.invoker = options.invoker;
    this.pollIntervalMs = options.pollIntervalMs;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? console;
  }

  /**
   * Polls order detail until the broker reports a terminal status, the deadline
   * passes (TIMEOUT) or the signal fires (ABORTED). A timed-out order is not resubmitted.
   */
  async waitForTerminal(accountId: string, clientOrderId: string, signal?: AbortSignal): Promise<MonitorOutcome> {
    const deadline = this.now() + this.timeoutMs;
    let polls = 0;
    let lastStatus: string | undefined;
    for (;;) {
      if (signal?.aborted) return { status: 'ABORTED', lastStatus, polls };
      try {
        const result = await this.invoker.invoke(
          'get_order_detail',
          () => this.broker.getOrderDetail(accountId, clientOrderId),
          { signal }
        );
        polls += 1;
        if (result.ok) {
          const status = readOrderStatus(result.response.body);
          if (isTerminal(status)) return { status, lastStatus, polls };
          lastStatus = status ?? lastStatus;
        } else {
          this.logger.warn(`Order ${clientOrderId} detail unavailable: ${describeFailure(result)}`);
        }
        const remaining = deadline - this.now();
        if (remaining <= 0) return { status: 'TIMEOUT', lastStatus, polls };
        await this.sleep(Math.min(this.pollIntervalMs, remaining), signal);
      } catch (err) {
        if (signal?.aborted) return { status: 'ABORTED', lastStatus, polls };
        throw err;
      }
    }
  }
}
