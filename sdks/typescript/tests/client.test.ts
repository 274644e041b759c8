import { describe, expect, it, vi } from 'vitest';
import { LedgerApiError, LedgerClient, PRINCIPAL_HEADER } from '../src/client.js';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const createFetch = (handlers: Record<string, () => Promise<Response>>) => {
  return vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${url.toString()}`;
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler();
  });
};

const record = {
  assetId: 1,
  currentOwner: 'bob',
  creator: 'alice',
  aiModelId: 'M1',
  authenticityScore: 78,
  creationTimestamp: 100,
  lastVerified: 104,
  transferCount: 1,
  flagged: false,
};

describe('LedgerClient', () => {
  it('sends the caller principal with transfers', async () => {
    const fetchMock = createFetch({
      'POST https://ledger.test/assets/1/transfers': async () =>
        json({
          record,
          entry: {
            assetId: 1,
            transferIndex: 0,
            fromOwner: 'alice',
            toOwner: 'bob',
            timestamp: 104,
            price: 1000,
            verificationHash: 'H1',
          },
        }),
    });

    const client = new LedgerClient({ baseUrl: 'https://ledger.test/', principal: 'alice', fetchImpl: fetchMock });
    const receipt = await client.transferAsset(1, { newOwner: 'bob', price: 1000, verificationHash: 'H1' });

    expect(receipt.record.currentOwner).toBe('bob');
    expect(receipt.entry.transferIndex).toBe(0);
    expect(fetchMock).toHaveBeenCalledWith('https://ledger.test/assets/1/transfers', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', [PRINCIPAL_HEADER]: 'alice' },
      body: JSON.stringify({ newOwner: 'bob', price: 1000, verificationHash: 'H1' }),
    });
  });

  it('switches principal with as()', async () => {
    const fetchMock = createFetch({
      'POST https://ledger.test/verifiers': async () => json({ principal: 'vera', isAuthorized: true }, 201),
    });

    const client = new LedgerClient({ baseUrl: 'https://ledger.test', principal: 'alice', fetchImpl: fetchMock });
    await client.as('owner').authorizeVerifier('vera');

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', [PRINCIPAL_HEADER]: 'owner' });
  });

  it('surfaces ledger error codes', async () => {
    const fetchMock = createFetch({
      'POST https://ledger.test/assets/1/transfers': async () =>
        json(
          { statusCode: 409, error: 'TransferFailed', code: 104, message: 'recalculated authenticity 42 is below the minimum of 70' },
          409,
        ),
    });

    const client = new LedgerClient({ baseUrl: 'https://ledger.test', principal: 'alice', fetchImpl: fetchMock });
    const failure = client.transferAsset(1, { newOwner: 'bob', price: 1, verificationHash: 'H' });

    await expect(failure).rejects.toBeInstanceOf(LedgerApiError);
    await expect(failure).rejects.toMatchObject({ status: 409, code: 'TransferFailed' });
  });

  it('reports non-ledger failures without a code', async () => {
    const fetchMock = createFetch({
      'GET https://ledger.test/stats': async () => new Response('upstream unavailable', { status: 502 }),
    });

    const client = new LedgerClient({ baseUrl: 'https://ledger.test', fetchImpl: fetchMock });

    await expect(client.getCounters()).rejects.toThrow('GET /stats failed with 502: upstream unavailable');
    await expect(client.getCounters()).rejects.toMatchObject({ status: 502, code: undefined });
  });

  it('reads boolean lookups', async () => {
    const fetchMock = createFetch({
      'GET https://ledger.test/models/M%201/active': async () => json({ modelId: 'M 1', active: true }),
      'GET https://ledger.test/verifiers/vera': async () => json({ principal: 'vera', isAuthorized: false }),
    });

    const client = new LedgerClient({ baseUrl: 'https://ledger.test', fetchImpl: fetchMock });

    await expect(client.isActiveModel('M 1')).resolves.toBe(true);
    await expect(client.isAuthorizedVerifier('vera')).resolves.toBe(false);
  });

  it('requires a base url', () => {
    expect(() => new LedgerClient({ baseUrl: '' })).toThrow(/baseUrl is required/);
  });
});
