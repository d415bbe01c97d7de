import { describe, expect, it } from 'vitest';
import { HttpError, isNotFound, requestJson } from '../src/http.js';

function sequence(...responses: Array<() => Response>) {
  const urls: string[] = [];
  let i = 0;
  const fetcher: typeof fetch = async (url) => {
    urls.push(url.toString());
    const next = responses[Math.min(i++, responses.length - 1)];
    if (!next) throw new Error('no response configured');
    return next();
  };
  return { urls, fetcher };
}

describe('requestJson', () => {
  it('retries transient statuses with backoff', async () => {
    const { urls, fetcher } = sequence(
      () => new Response('busy', { status: 503 }),
      () => new Response('slow down', { status: 429, headers: { 'retry-after': '0' } }),
      () => new Response(JSON.stringify({ ok: true }), { status: 200 }),
    );

    const res = await requestJson<{ ok: boolean }>('https://api.example.com/x', { backoffMs: 1 }, fetcher);

    expect(res).toEqual({ ok: true });
    expect(urls).toHaveLength(3);
  });

  it('throws non-transient errors on the first attempt', async () => {
    const { urls, fetcher } = sequence(() => new Response('nope', { status: 404 }));

    const err = await requestJson('https://api.example.com/x', { backoffMs: 1 }, fetcher).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(isNotFound(err)).toBe(true);
    expect(err instanceof HttpError && err.responseText).toBe('nope');
    expect(urls).toHaveLength(1);
  });

  it('gives up after the configured retries', async () => {
    const { urls, fetcher } = sequence(() => new Response('down', { status: 500 }));
    await expect(requestJson('https://api.example.com/x', { retries: 2, backoffMs: 1 }, fetcher)).rejects.toThrow(
      'HTTP 500 for https://api.example.com/x',
    );
    expect(urls).toHaveLength(3);
  });

  it('retries network failures', async () => {
    let calls = 0;
    const fetcher: typeof fetch = async () => {
      calls++;
      if (calls === 1) throw new TypeError('fetch failed');
      return new Response(JSON.stringify([1, 2]), { status: 200 });
    };
    expect(await requestJson<number[]>('https://api.example.com/x', { backoffMs: 1 }, fetcher)).toEqual([1, 2]);
    expect(calls).toBe(2);
  });

  it('builds the query string and returns undefined for empty bodies', async () => {
    const { urls, fetcher } = sequence(() => new Response(null, { status: 204 }));
    const res = await requestJson('https://api.example.com/x', { query: { a: 1, b: undefined, c: true } }, fetcher);
    expect(res).toBeUndefined();
    expect(urls).toEqual(['https://api.example.com/x?a=1&c=true']);
  });
});
