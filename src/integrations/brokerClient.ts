import crypto from 'crypto';
import { errorMessage, TransportError } from '../core/errors';
import { BrokerResponse } from '../core/types';

export interface BrokerClientConfig {
  appKey: string;
  appSecret: string;
  baseUrl: string;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export type HttpMethod = 'GET' | 'POST';

const SIGNATURE_ALGORITHM = 'HMAC-SHA1';
const SIGNATURE_VERSION = '1.0';

const parseBody = (text: string): unknown => {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

export class BrokerClient {
  private config: Required<Omit<BrokerClientConfig, 'fetchImpl'>>;
  private fetchImpl: typeof fetch;

  constructor(config: BrokerClientConfig) {
    this.config = {
      appKey: config.appKey,
      appSecret: config.appSecret,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      requestTimeoutMs: config.requestTimeoutMs ?? 10_000
    };
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  /**
   * Signature over the request host+path, the sorted query and signing headers and,
   * when present, the MD5 of the body. Keyed with `${appSecret}&`.
   */
  sign(url: URL, headers: Record<string, string>, body?: string): string {
    const params: Record<string, string> = {};
    url.searchParams.forEach((v, k) => {
      params[k] = v;
    });
    for (const [k, v] of Object.entries(headers)) params[k.toLowerCase()] = v;
    const canonical = Object.keys(params)
      .sort()
      .map((k) => `${k}=${params[k]}`)
      .join('&');
    let toSign = `${url.host}${url.pathname}&${canonical}`;
    if (body) {
      toSign += `&${crypto.createHash('md5').update(body).digest('hex').toUpperCase()}`;
    }
    return crypto
      .createHmac('sha1', `${this.config.appSecret}&`)
      .update(encodeURIComponent(toSign))
      .digest('base64');
  }

  buildHeaders(url: URL, body?: string): Record<string, string> {
    const signing: Record<string, string> = {
      'x-app-key': this.config.appKey,
      'x-timestamp': new Date().toISOString().replace(/\.\d{3}Z$/, 'Z'),
      'x-signature-algorithm': SIGNATURE_ALGORITHM,
      'x-signature-version': SIGNATURE_VERSION,
      'x-signature-nonce': crypto.randomUUID().replace(/-/g, '')
    };
    return { ...signing, 'x-signature': this.sign(url, signing, body) };
  }

  public async signedFetch(
    pathName: string,
    method: HttpMethod = 'GET',
    opts?: { params?: Record<string, string>; body?: unknown }
  ): Promise<BrokerResponse> {
    const url = new URL(`${this.config.baseUrl}${pathName}`);
    for (const [k, v] of Object.entries(opts?.params ?? {})) url.searchParams.set(k, v);
    const body = opts?.body === undefined ? undefined : JSON.stringify(opts.body);
    const headers = this.buildHeaders(url, body);

    let resp: Response;
    try {
      resp = await this.fetchImpl(url.toString(), {
        method,
        headers: {
          ...headers,
          Accept: 'application/json',
          ...(body ? { 'Content-Type': 'application/json' } : {})
        },
        body,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs)
      });
    } catch (err) {
      throw new TransportError(`${method} ${url.pathname} failed: ${errorMessage(err)}`, { cause: err });
    }

    let text: string;
    try {
      text = await resp.text();
    } catch (err) {
      throw new TransportError(`${method} ${url.pathname} body read failed: ${errorMessage(err)}`, {
        cause: err
      });
    }
    const responseHeaders: Record<string, string> = {};
    resp.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });
    return { status: resp.status, headers: responseHeaders, body: parseBody(text), text };
  }
}
