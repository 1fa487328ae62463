import { describe, expect, it, vi } from 'vitest';
import { BackendError } from '@/services/utils/errors';
import { LibreTranslateAdapter } from './LibreTranslateAdapter';

const ENDPOINT = 'http://translate.test/translate';
const PAIR = { source: 'en', target: 'nb' };

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const createAdapter = (fetchImpl: typeof fetch, overrides: { timeoutMs?: number; concurrency?: number } = {}) =>
  new LibreTranslateAdapter({
    url: ENDPOINT,
    apiKey: 'test-secret',
    timeoutMs: overrides.timeoutMs ?? 1000,
    concurrency: overrides.concurrency ?? 4,
    fetch: fetchImpl,
  });

/** Never answers; rejects with the signal's reason once aborted */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise((_resolve, reject) => {
    const signal = init?.signal;
    signal?.addEventListener('abort', () => reject(signal.reason));
  });

/** Sends headers and part of the body, then stalls until aborted */
const stallingBodyFetch: typeof fetch = async (_input, init) => {
  const signal = init?.signal;
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"translatedText": "He'));
      signal?.addEventListener('abort', () => controller.error(signal.reason));
    },
  });
  return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
};

const failure = async (promise: Promise<string>): Promise<BackendError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof BackendError) return error;
    throw error;
  }
  throw new Error('expected a BackendError');
};

describe('LibreTranslateAdapter', () => {
  it('posts the text as JSON and reads translatedText', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ translatedText: 'Hei' }));
    const adapter = createAdapter(fetchMock);

    await expect(adapter.translate('Hello', PAIR)).resolves.toBe('Hei');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      q: 'Hello',
      source: 'en',
      target: 'nb',
      format: 'text',
      api_key: 'test-secret',
    });
  });

  it('accepts the response shapes of compatible services', async () => {
    for (const body of [{ translation: 'Hei' }, { translated_text: 'Hei' }, { translated: 'Hei' }, 'Hei']) {
      const adapter = createAdapter(async () => jsonResponse(body));
      await expect(adapter.translate('Hello', PAIR)).resolves.toBe('Hei');
    }
  });

  it('returns blank text without calling the endpoint', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ translatedText: 'x' }));
    await expect(createAdapter(fetchMock).translate('  ', PAIR)).resolves.toBe('  ');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports non-2xx answers as http-status with the server message', async () => {
    const adapter = createAdapter(async () => jsonResponse({ error: 'Slow down' }, 429));
    const error = await failure(adapter.translate('Hello', PAIR));

    expect(error.kind).toBe('http-status');
    expect(error.status).toBe(429);
    expect(error.detail).toBe('Slow down');
    expect(error.message).toBe(`Translation backend ${ENDPOINT} returned HTTP 429: Slow down`);
  });

  it('reports unreadable bodies as decode errors', async () => {
    const notJson = await failure(createAdapter(async () => new Response('<html>oops</html>')).translate('Hello', PAIR));
    expect(notJson.kind).toBe('decode');
    expect(notJson.detail).toBe('not JSON: <html>oops</html>');

    const noField = await failure(createAdapter(async () => jsonResponse({ result: 'Hei' })).translate('Hello', PAIR));
    expect(noField.kind).toBe('decode');
    expect(noField.detail).toBe('no translatedText field');

    const empty = await failure(createAdapter(async () => jsonResponse({ translatedText: ' ' })).translate('Hello', PAIR));
    expect(empty.kind).toBe('decode');
    expect(empty.detail).toBe('empty translation');
  });

  it('reports connection failures as network errors', async () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5000'), { code: 'ECONNREFUSED' });
    const adapter = createAdapter(async () => {
      throw new TypeError('fetch failed', { cause: refused });
    });
    const error = await failure(adapter.translate('Hello', PAIR));

    expect(error.kind).toBe('network');
    expect(error.detail).toBe('ECONNREFUSED connect ECONNREFUSED 127.0.0.1:5000');
  });

  it('times out slow requests', async () => {
    const error = await failure(createAdapter(hangingFetch, { timeoutMs: 20 }).translate('Hello', PAIR));
    expect(error.kind).toBe('network');
    expect(error.detail).toBe('timeout');
  });

  it('times out a body that stops arriving after the headers', async () => {
    const error = await failure(createAdapter(stallingBodyFetch, { timeoutMs: 20 }).translate('Hello', PAIR));
    expect(error.kind).toBe('network');
    expect(error.detail).toBe('timeout');
  });

  it('passes caller aborts through unchanged', async () => {
    const controller = new AbortController();
    const pending = createAdapter(hangingFetch).translate('Hello', PAIR, controller.signal);
    controller.abort();

    const error = await pending.catch((reason: unknown) => reason);
    expect(error).not.toBeInstanceOf(BackendError);
    expect(error instanceof Error ? error.name : error).toBe('AbortError');
  });

  it('bounds concurrent requests', async () => {
    let inFlight = 0;
    let peak = 0;
    const adapter = createAdapter(
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return jsonResponse({ translatedText: 'ok' });
      },
      { concurrency: 2 }
    );

    await Promise.all(['a', 'b', 'c', 'd', 'e'].map((text) => adapter.translate(text, PAIR)));
    expect(peak).toBe(2);
  });
});
