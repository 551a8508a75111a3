import { StateUnreadableError } from '../core/errors';
import { AccountSnapshot, Balance, Logger, Position } from '../core/types';
import { isRecord } from '../core/utils';
import { BrokerApi } from './broker.types';
import { classifyBalancePayload, classifyPositionsPayload, normalizeBalances, normalizePositions } from './normalize';
import { describeFailure, ResilientInvoker } from './resilientInvoker';

export interface AccountStateReaderOptions {
  broker: BrokerApi;
  invoker: ResilientInvoker;
  accountId?: string;
  now?: () => number;
  logger?: Logger;
}

export class AccountStateReader {
  private broker: BrokerApi;
  private invoker: ResilientInvoker;
  private accountId?: string;
  private now: () => number;
  private logger: Logger;

  constructor(options: AccountStateReaderOptions) {
    this.broker = options.broker;
    this.invoker = options.invoker;
    this.accountId = options.accountId;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? console;
  }

  /** Configured account id, or the first CASH account the app is subscribed to. */
  async resolveAccountId(signal?: AbortSignal): Promise<string> {
    if (this.accountId) return this.accountId;
    const result = await this.invoker.invoke('list_accounts', () => this.broker.listAccounts(), { signal });
    if (!result.ok) throw new StateUnreadableError('list_accounts', describeFailure(result));
    const body = result.response.body;
    const accounts: unknown[] = Array.isArray(body) ? body : isRecord(body) && Array.isArray(body.data) ? body.data : [];
    const cash = accounts.find((a) => isRecord(a) && a.account_type === 'CASH');
    const id = isRecord(cash) ? cash.account_id : undefined;
    if (typeof id !== 'string' && typeof id !== 'number') {
      throw new StateUnreadableError('list_accounts', 'no CASH account found');
    }
    this.accountId = String(id);
    this.logger.log(`Using CASH account ${this.accountId}`);
    return this.accountId;
  }

  async getBalance(signal?: AbortSignal): Promise<Record<string, Balance>> {
    const accountId = await this.resolveAccountId(signal);
    const result = await this.invoker.invoke('get_account_balance', () => this.broker.getBalance(accountId), { signal });
    if (!result.ok) throw new StateUnreadableError('get_account_balance', describeFailure(result));
    const payload = classifyBalancePayload(result.response.body);
    if (payload.shape === 'unrecognized') {
      this.logger.warn(`Unrecognized balance payload: ${result.response.text.slice(0, 200)}`);
    }
    return normalizeBalances(payload);
  }

  async getPositions(signal?: AbortSignal): Promise<Position[]> {
    const accountId = await this.resolveAccountId(signal);
    const result = await this.invoker.invoke('get_account_position', () => this.broker.getPositions(accountId), {
      signal
    });
    if (!result.ok) throw new StateUnreadableError('get_account_position', describeFailure(result));
    const payload = classifyPositionsPayload(result.response.body);
    if (payload.shape === 'unrecognized' && result.response.text) {
      this.logger.warn(`Unrecognized positions payload: ${result.response.text.slice(0, 200)}`);
    }
    return normalizePositions(payload);
  }

  async getAvailableCash(currency: string, signal?: AbortSignal): Promise<number> {
    const balances = await this.getBalance(signal);
    return balances[currency]?.buyingPower ?? 0;
  }

  async snapshot(signal?: AbortSignal): Promise<AccountSnapshot> {
    const balances = await this.getBalance(signal);
    const positions = await this.getPositions(signal);
    return { balances, positions, readAt: new Date(this.now()).toISOString() };
  }
}

/** Buying power is the spendable figure; a currency the broker did not report has none. */
export const availableCash = (snapshot: AccountSnapshot, currency: string): number =>
  snapshot.balances[currency]?.buyingPower ?? 0;
