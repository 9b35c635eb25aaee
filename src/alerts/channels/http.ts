import { createLogger } from '../../utils/logger';
import { FetchFn, NotificationError } from './types';

const log = createLogger('notify-http');

export interface PostOptions {
  fetchImpl?: FetchFn;
  maxRetries?: number;
  timeoutMs?: number;
}

const MAX_BACKOFF_MS = 10_000;

/**
 * POST a JSON body, backing off on 429 like the chat APIs ask. Network
 * failures and non-2xx responses become NotificationError; the URL is never
 * put in the error since it may carry a token.
 */
export async function postJson(
  channel: string,
  url: string,
  body: unknown,
  opts: PostOptions = {},
): Promise<Response> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const maxRetries = opts.maxRetries ?? 2;
  const timeoutMs = opts.timeoutMs ?? 10_000;

  for (let attempt = 0; ; attempt++) {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new NotificationError(channel, `request failed: ${reason}`);
    }

    if (res.status === 429 && attempt < maxRetries) {
      const retryAfter = parseInt(res.headers.get('retry-after') || '2', 10);
      const backoffMs = Math.min((Number.isFinite(retryAfter) ? retryAfter : 2) * 1000, MAX_BACKOFF_MS);
      log.warn('Rate limited, backing off', { channel, backoffMs, attempt: attempt + 1 });
      await new Promise(r => setTimeout(r, backoffMs));
      continue;
    }

    if (!res.ok) {
      throw new NotificationError(channel, `HTTP ${res.status}`, res.status);
    }
    return res;
  }
}
