import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProviderError } from './errors.js';
import { HttpTableProvider } from './httpProvider.js';

describe('HttpTableProvider', () => {
  const originalFetch = global.fetch;
  const url = 'https://data.example.test/points.json';

  let provider: HttpTableProvider;

  beforeEach(() => {
    provider = new HttpTableProvider({
      id: 'points',
      name: 'Points data',
      location: url,
      recordsPath: 'elements'
    });
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('parses JSON records found under the records path', async () => {
    global.fetch = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ elements: [{ id: 1, total_points: 120 }, { id: 2, total_points: 98 }] }), {
        status: 200,
        headers: { 'content-type': 'application/json' }
      })
    );

    const table = await provider.fetchTable();

    expect(table.rowCount()).toBe(2);
    expect(table.column('total_points')).toEqual([120, 98]);
    expect(global.fetch).toHaveBeenCalledWith(
      url,
      expect.objectContaining({
        headers: {
          Accept: 'application/json, text/csv;q=0.9'
        }
      }) as RequestInit
    );
  });

  it('parses CSV when the response says text/csv', async () => {
    const csvProvider = new HttpTableProvider({
      id: 'forecast',
      name: 'Forecast data',
      location: 'https://data.example.test/forecast'
    });
    global.fetch = vi.fn().mockResolvedValue(
      new Response('player,xp\nSaka,6.1\n', {
        status: 200,
        headers: { 'content-type': 'text/csv; charset=utf-8' }
      })
    );

    const table = await csvProvider.fetchTable();

    expect(table.rows).toEqual([{ player: 'Saka', xp: 6.1 }]);
  });

  it('prefers the configured format over the content type', async () => {
    const csvProvider = new HttpTableProvider({
      id: 'forecast',
      name: 'Forecast data',
      location: 'https://data.example.test/forecast',
      format: 'csv'
    });
    global.fetch = vi.fn().mockResolvedValue(
      new Response('player,xp\nSaka,6.1\nPalmer,5.4\n', {
        status: 200,
        headers: { 'content-type': 'application/octet-stream' }
      })
    );

    const table = await csvProvider.fetchTable();

    expect(table.rowCount()).toBe(2);
  });

  it('returns an empty table when the endpoint has no records', async () => {
    global.fetch = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ elements: [] }), { status: 200 })
    );

    const table = await provider.fetchTable();

    expect(table.rowCount()).toBe(0);
  });

  it('rejects on a non-2xx response', async () => {
    global.fetch = vi.fn().mockResolvedValue(new Response('unavailable', { status: 503 }));

    await expect(provider.fetchTable()).rejects.toThrow(
      `points: request to ${url} returned HTTP 503`
    );
  });

  it('rejects with a ProviderError when the request fails', async () => {
    const networkError = new Error('Network error');
    global.fetch = vi.fn().mockRejectedValue(networkError);

    const error: unknown = await provider.fetchTable().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: `points: request to ${url} failed: Network error`,
      providerId: 'points',
      cause: networkError
    });
  });

  it('rejects when the payload is not valid JSON', async () => {
    global.fetch = vi.fn().mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(provider.fetchTable()).rejects.toThrow(/^points: could not parse JSON payload: /);
  });

  describe('timeout', () => {
    let slowProvider: HttpTableProvider;

    beforeEach(() => {
      slowProvider = new HttpTableProvider({
        id: 'points',
        name: 'Points data',
        location: url,
        timeoutMs: 50
      });
    });

    it('passes an abort signal to fetch and times out waiting for headers', async () => {
      const fetchMock = vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );
      global.fetch = fetchMock;

      const error: unknown = await slowProvider.fetchTable().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ message: `points: request to ${url} timed out after 50 ms` });
      expect(fetchMock).toHaveBeenCalledWith(
        url,
        expect.objectContaining({ signal: expect.any(AbortSignal) as AbortSignal }) as RequestInit
      );
    });

    it('times out when the body stalls after the headers', async () => {
      const stalledBody = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('[{"a":1}'));
        }
      });
      global.fetch = vi.fn().mockResolvedValue(
        new Response(stalledBody, { status: 200, headers: { 'content-type': 'application/json' } })
      );

      await expect(slowProvider.fetchTable()).rejects.toThrow(
        `points: request to ${url} timed out after 50 ms`
      );
    });
  });
});
