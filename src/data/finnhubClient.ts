import { errorMessage, TransportError } from '../core/errors';
import { BrokerResponse } from '../core/types';
import { isRecord, toNumber } from '../core/utils';

const FINNHUB_API = 'https://finnhub.io/api/v1';

export class FinnhubClient {
  private apiKey: string;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(apiKey: string, opts: { fetchImpl?: typeof fetch; timeoutMs?: number } = {}) {
    this.apiKey = apiKey;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 8000;
  }

  public async getQuote(symbol: string): Promise<BrokerResponse> {
    const url = new URL(`${FINNHUB_API}/quote`);
    url.searchParams.set('symbol', symbol);
    url.searchParams.set('token', this.apiKey);
    let resp: Response;
    let text: string;
    try {
      resp = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
      text = await resp.text();
    } catch (err) {
      throw new TransportError(`Finnhub quote ${symbol} failed: ${errorMessage(err)}`, { cause: err });
    }
    let body: unknown;
    try {
      body = text ? JSON.parse(text) : undefined;
    } catch {
      body = text;
    }
    const headers: Record<string, string> = {};
    resp.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    return { status: resp.status, headers, body, text };
  }
}

/** Finnhub quotes carry the current price in `c` and the previous close in `pc`. */
export const extractFinnhubPrice = (body: unknown): number | undefined => {
  if (!isRecord(body)) return undefined;
  const current = toNumber(body.c);
  if (current !== undefined && current > 0) return current;
  const prevClose = toNumber(body.pc);
  return prevClose !== undefined && prevClose > 0 ? prevClose : undefined;
};

export const getFinnhubClient = (apiKey: string | undefined): FinnhubClient | null => {
  if (!apiKey) return null;
  return new FinnhubClient(apiKey);
};
