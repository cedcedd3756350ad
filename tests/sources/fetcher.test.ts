/**
 * Tests for the HTTP page fetcher
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { HttpPageFetcher, FetchError, isSoftBlocked, type RetrySleep } from '../../src/sources';
import type { Target } from '../../src/types';
import { SOFA_SEARCH } from '../helpers';

const target: Target = { url: SOFA_SEARCH, filterSpec: {} };

function respondWith(body: string, init: ResponseInit = {}, finalUrl?: string) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const response = new Response(body, init);
    if (finalUrl) {
      Object.defineProperty(response, 'url', { value: finalUrl });
    }
    return response;
  });
}

function hangUntilAborted() {
  return vi.fn(
    (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      })
  );
}

describe('HttpPageFetcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should return the page body', async () => {
    const fetchImpl = respondWith('<html>ok</html>');
    const fetcher = new HttpPageFetcher({ fetchImpl });

    await expect(fetcher.fetch(target)).resolves.toBe('<html>ok</html>');
    expect(fetchImpl).toHaveBeenCalledWith(SOFA_SEARCH, expect.anything());
  });

  it('should rotate user agents between requests', async () => {
    const fetchImpl = respondWith('');
    const fetcher = new HttpPageFetcher({ fetchImpl, userAgents: ['agent-a', 'agent-b'] });

    await fetcher.fetch(target);
    await fetcher.fetch(target);
    await fetcher.fetch(target);

    const agents = fetchImpl.mock.calls.map(([, init]) => new Headers(init?.headers).get('User-Agent'));
    expect(agents).toEqual(['agent-a', 'agent-b', 'agent-a']);
  });

  it('should reject non-2xx responses with the status', async () => {
    const fetcher = new HttpPageFetcher({
      fetchImpl: respondWith('nope', { status: 503 }),
      retry: { maxAttempts: 1 },
    });

    const error = await fetcher.fetch(target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 503, url: SOFA_SEARCH });
  });

  it('should flag a redirect to a login page as a soft block', async () => {
    const fetchImpl = respondWith('<html/>', {}, 'https://facebook.com/login/?next=x');
    const fetcher = new HttpPageFetcher({ fetchImpl });

    await expect(fetcher.fetch(target)).rejects.toThrow(
      'Potential soft block detected: redirected to https://facebook.com/login/?next=x'
    );
  });

  it('should accept a final URL whose query mentions a blocked word', async () => {
    const finalUrl = 'https://facebook.com/marketplace/nyc/search?query=checkpoint';
    const fetcher = new HttpPageFetcher({ fetchImpl: respondWith('<html>ok</html>', {}, finalUrl) });

    await expect(fetcher.fetch(target)).resolves.toBe('<html>ok</html>');
  });

  it('should time out a hanging request', async () => {
    const fetcher = new HttpPageFetcher({
      fetchImpl: hangUntilAborted(),
      timeoutMs: 20,
      retry: { maxAttempts: 1 },
    });

    await expect(fetcher.fetch(target)).rejects.toThrow(
      `Request to ${SOFA_SEARCH} failed: Timeout after 20ms`
    );
  });

  it('should stop when the caller aborts', async () => {
    const fetcher = new HttpPageFetcher({ fetchImpl: hangUntilAborted(), timeoutMs: 60_000 });
    const controller = new AbortController();

    const pending = fetcher.fetch(target, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow(`Request to ${SOFA_SEARCH} failed: aborted`);
  });
});

describe('HttpPageFetcher retries', () => {
  let sleep: Mock<RetrySleep>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    sleep = vi.fn<RetrySleep>(async () => {});
  });

  it('should retry a network failure and return the page', async () => {
    const fetchImpl = respondWith('<html>ok</html>');
    fetchImpl.mockRejectedValueOnce(new TypeError('fetch failed'));
    const fetcher = new HttpPageFetcher({ fetchImpl, sleep });

    await expect(fetcher.fetch(target)).resolves.toBe('<html>ok</html>');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500, undefined);
  });

  it('should back off on 503 until the attempts run out', async () => {
    const fetchImpl = respondWith('busy', { status: 503 });
    const fetcher = new HttpPageFetcher({ fetchImpl, sleep, retry: { maxAttempts: 3 } });

    await expect(fetcher.fetch(target)).rejects.toMatchObject({ status: 503, retryable: true });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 750]);
  });

  it('should not retry a client error', async () => {
    const fetchImpl = respondWith('gone', { status: 404 });
    const fetcher = new HttpPageFetcher({ fetchImpl, sleep });

    await expect(fetcher.fetch(target)).rejects.toMatchObject({ status: 404, retryable: false });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry a soft block', async () => {
    const fetchImpl = respondWith('<html/>', {}, 'https://facebook.com/checkpoint/123/');
    const fetcher = new HttpPageFetcher({ fetchImpl, sleep });

    await expect(fetcher.fetch(target)).rejects.toThrow('Potential soft block detected');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should give up once the elapsed budget is spent', async () => {
    let clock = 0;
    const fetchImpl = respondWith('busy', { status: 502 });
    const fetcher = new HttpPageFetcher({
      fetchImpl,
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
      retry: { maxAttempts: 10, initialDelayMs: 1_000, backoffMultiplier: 2, maxElapsedMs: 5_000 },
    });

    await expect(fetcher.fetch(target)).rejects.toMatchObject({ status: 502 });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(clock).toBe(3_000);
  });

  it('should not retry once the caller has aborted', async () => {
    const controller = new AbortController();
    const fetchImpl = respondWith('');
    fetchImpl.mockImplementationOnce(async () => {
      controller.abort();
      throw new TypeError('fetch failed');
    });
    const fetcher = new HttpPageFetcher({ fetchImpl, sleep });

    await expect(fetcher.fetch(target, { signal: controller.signal })).rejects.toThrow(
      `Request to ${SOFA_SEARCH} failed: fetch failed`
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should stop waiting when aborted during the backoff', async () => {
    const controller = new AbortController();
    const fetchImpl = respondWith('');
    fetchImpl.mockImplementationOnce(async () => {
      setTimeout(() => controller.abort(), 5);
      throw new TypeError('fetch failed');
    });
    const fetcher = new HttpPageFetcher({ fetchImpl });

    await expect(fetcher.fetch(target, { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});

describe('isSoftBlocked', () => {
  it('should detect login and checkpoint URLs case-insensitively', () => {
    expect(isSoftBlocked('https://facebook.com/LOGIN.php')).toBe(true);
    expect(isSoftBlocked('https://facebook.com/checkpoint/1')).toBe(true);
    expect(isSoftBlocked(SOFA_SEARCH)).toBe(false);
  });

  it('should only look at the path', () => {
    expect(isSoftBlocked('https://facebook.com/marketplace/nyc/search?query=checkpoint')).toBe(false);
    expect(isSoftBlocked('https://facebook.com/marketplace/nyc/search?query=login')).toBe(false);
  });

  it('should not flag a URL it cannot parse', () => {
    expect(isSoftBlocked('not a url')).toBe(false);
  });
});
