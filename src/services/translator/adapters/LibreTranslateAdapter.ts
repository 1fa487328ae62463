/**
 * LibreTranslate Adapter
 * Implements TranslationBackend for LibreTranslate-compatible HTTP endpoints
 */

import { z } from 'zod';
import { BaseAdapter } from './BaseAdapter';
import { BackendError } from '@/services/utils/errors';
import { t } from '@/i18n';
import type { LanguagePair } from '@/types/translation';

export interface LibreTranslateConfig {
  /** Full URL of the /translate endpoint */
  url: string;
  apiKey?: string;
  timeoutMs: number;
  /** Concurrent requests allowed through this adapter */
  concurrency: number;
  fetch?: typeof fetch;
}

/**
 * LibreTranslate answers {"translatedText": "..."}; other compatible services use
 * different keys or a bare JSON string.
 */
const responseSchema = z.union([
  z.string(),
  z
    .object({
      translatedText: z.string().optional(),
      translation: z.string().optional(),
      translated_text: z.string().optional(),
      translated: z.string().optional(),
    })
    .passthrough(),
]);

const errorBodySchema = z.object({ error: z.string() }).passthrough();

function extractTranslation(body: z.infer<typeof responseSchema>): string | undefined {
  if (typeof body === 'string') return body;
  return body.translatedText ?? body.translation ?? body.translated_text ?? body.translated;
}

/**
 * Human-readable reason for a fetch rejection: undici wraps the socket error in `cause`
 */
function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return code ? `${code} ${cause.message}` : cause.message;
  }
  return error.message;
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data.error;
  } catch {
    // not JSON
  }
  const trimmed = text.trim();
  if (trimmed && !trimmed.startsWith('<')) return trimmed.slice(0, 200);
  return response.statusText || 'no details';
}

export class LibreTranslateAdapter extends BaseAdapter {
  readonly kind = 'api' as const;
  readonly label: string;

  private readonly config: LibreTranslateConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: LibreTranslateConfig) {
    super(config.concurrency);
    this.config = config;
    this.label = config.url;
    this.fetchImpl = config.fetch ?? fetch;
  }

  protected async translateText(
    text: string,
    pair: LanguagePair,
    signal?: AbortSignal
  ): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    // Handle external signal
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    // The timer stays armed until the body has been read
    const transportError = (error: unknown): unknown => {
      if (timedOut) {
        return new BackendError(
          'network',
          t('errors.backend.timeout', {
            backend: this.label,
            seconds: Math.round(this.config.timeoutMs / 1000),
          }),
          { backend: this.kind, detail: 'timeout', cause: error }
        );
      }
      if (signal?.aborted) return error;
      const detail = describeFetchError(error);
      return new BackendError('network', t('errors.backend.network', { backend: this.label, detail }), {
        backend: this.kind,
        detail,
        cause: error,
      });
    };

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.config.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
          body: JSON.stringify({
            q: text,
            source: pair.source,
            target: pair.target,
            format: 'text',
            ...(this.config.apiKey ? { api_key: this.config.apiKey } : {}),
          }),
          signal: controller.signal,
        });
      } catch (error) {
        throw transportError(error);
      }

      if (!response.ok) {
        const detail = await readErrorDetail(response);
        if (timedOut || signal?.aborted) throw transportError(controller.signal.reason);
        throw new BackendError(
          'http-status',
          t('errors.backend.httpStatus', { backend: this.label, status: response.status, detail }),
          { backend: this.kind, status: response.status, detail }
        );
      }

      let raw: string;
      try {
        raw = await response.text();
      } catch (error) {
        throw transportError(error);
      }
      return this.decode(raw);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private decode(raw: string): string {
    const fail = (detail: string) =>
      new BackendError('decode', t('errors.backend.decode', { backend: this.label, detail }), {
        backend: this.kind,
        detail,
      });

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw fail(`not JSON: ${raw.slice(0, 80)}`);
    }

    const parsed = responseSchema.safeParse(json);
    const translated = parsed.success ? extractTranslation(parsed.data) : undefined;
    if (translated === undefined) {
      throw fail('no translatedText field');
    }
    if (translated.trim() === '') {
      throw new BackendError('decode', t('errors.backend.emptyTranslation', { backend: this.label }), {
        backend: this.kind,
        detail: 'empty translation',
      });
    }
    return translated;
  }
}
