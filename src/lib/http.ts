import { RETRY_DELAY_MS, USER_AGENT } from '@/config';
import { UpstreamError, errorMessage } from '@/lib/errors';
import type { Logger } from '@/lib/logger';

export interface FetchOptions {
  accept: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * GET with a per-attempt timeout. Network errors and 5xx are retried up to
 * `retries` more times, `retryDelayMs` apart; any other non-2xx is returned
 * to the caller at once.
 */
export async function fetchWithRetry(service: string, url: string, opts: FetchOptions): Promise<Response> {
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      const r = await fetch(url, {
        headers: { accept: opts.accept, 'user-agent': USER_AGENT },
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
      if (r.status < 500) return r;
      lastError = new UpstreamError(service, r.status);
    } catch (e) {
      lastError = e;
    }
    opts.logger?.warn(`${service} attempt ${attempt + 1} failed: ${errorMessage(lastError)}`);
    if (attempt < opts.retries) await sleep(opts.retryDelayMs ?? RETRY_DELAY_MS);
  }

  if (lastError instanceof UpstreamError) throw lastError;
  throw new UpstreamError(service, null, errorMessage(lastError));
}

export async function getJson(service: string, url: string, opts: Omit<FetchOptions, 'accept'>): Promise<unknown> {
  const r = await fetchWithRetry(service, url, { ...opts, accept: 'application/json' });
  if (!r.ok) throw new UpstreamError(service, r.status);
  const data: unknown = await r.json();
  return data;
}

export async function getText(service: string, url: string, opts: Omit<FetchOptions, 'accept'>): Promise<string> {
  const r = await fetchWithRetry(service, url, { ...opts, accept: 'text/plain' });
  if (!r.ok) throw new UpstreamError(service, r.status);
  return r.text();
}
