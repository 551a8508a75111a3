import { TransportError } from '../src/core/errors';
import { BrokerClient } from '../src/integrations/brokerClient';

const makeClient = (fetchImpl: typeof fetch) =>
  new BrokerClient({ appKey: 'test-key', appSecret: 'test-secret', baseUrl: 'https://broker.test/', fetchImpl });

describe('BrokerClient', () => {
  it('sends signed requests and normalizes the response', async () => {
    const seen: { url: string; init?: RequestInit }[] = [];
    const client = makeClient(async (input, init) => {
      seen.push({ url: String(input), init });
      return new Response('{"items":[]}', { status: 200, headers: { 'Retry-After': '2' } });
    });

    const res = await client.signedFetch('/trade/place_order', 'POST', {
      params: { account_id: 'acct-1' },
      body: { symbol: 'AAPL' }
    });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ items: [] });
    expect(res.headers['retry-after']).toBe('2');
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe('https://broker.test/trade/place_order?account_id=acct-1');
    expect(seen[0].init?.method).toBe('POST');
    expect(seen[0].init?.body).toBe('{"symbol":"AAPL"}');
    const headers = seen[0].init?.headers;
    expect(headers).toMatchObject({
      'x-app-key': 'test-key',
      'x-signature-algorithm': 'HMAC-SHA1',
      'Content-Type': 'application/json'
    });
  });

  it('keeps non-JSON bodies as text', async () => {
    const client = makeClient(async () => new Response('Service Unavailable', { status: 503 }));
    const res = await client.signedFetch('/account/list');
    expect(res.status).toBe(503);
    expect(res.body).toBe('Service Unavailable');
  });

  it('signs deterministically and covers the body', () => {
    const client = makeClient(async () => new Response(''));
    const url = new URL('https://broker.test/quote?symbols=AAPL');
    const headers = { 'x-app-key': 'test-key', 'x-timestamp': '2026-01-05T15:00:00Z' };
    const plain = client.sign(url, headers);
    expect(client.sign(url, headers)).toBe(plain);
    expect(client.sign(url, headers, '{"a":1}')).not.toBe(plain);
  });

  it('wraps network failures in TransportError', async () => {
    const client = makeClient(async () => {
      throw new Error('ECONNRESET');
    });
    await expect(client.signedFetch('/account/list')).rejects.toThrow(TransportError);
    await expect(client.signedFetch('/account/list')).rejects.toThrow('GET /account/list failed: ECONNRESET');
  });
});
