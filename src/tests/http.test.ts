import { afterEach, describe, expect, it, vi } from 'vitest';
import { UpstreamError } from '@/lib/errors';
import { fetchWithRetry, getText } from '@/lib/http';

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

describe('fetchWithRetry', () => {
  it('waits between attempts', async () => {
    vi.useFakeTimers();
    const fn = vi.fn(async (_input: string | URL | Request) => new Response('busy', { status: 503 }));
    vi.stubGlobal('fetch', fn);

    const pending = fetchWithRetry('AWC', 'https://example.test/metar', {
      accept: 'text/plain',
      timeoutMs: 1000,
      retries: 1,
      retryDelayMs: 1000,
    });
    const settled = pending.catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);

    const err = await settled;
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toHaveProperty('message', 'AWC HTTP 503');
  });

  it('returns a client error without retrying', async () => {
    const fn = vi.fn(async (_input: string | URL | Request) => new Response('missing', { status: 404 }));
    vi.stubGlobal('fetch', fn);
    const r = await fetchWithRetry('NOAA', 'https://example.test/x', { accept: 'text/plain', timeoutMs: 1000, retries: 2 });
    expect(r.status).toBe(404);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('recovers when a retry succeeds', async () => {
    const fn = vi
      .fn(async (_input: string | URL | Request) => new Response('ok'))
      .mockRejectedValueOnce(new TypeError('fetch failed'));
    vi.stubGlobal('fetch', fn);
    await expect(getText('NOAA', 'https://example.test/x', { timeoutMs: 1000, retries: 1, retryDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
