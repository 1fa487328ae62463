/**
 * BaseAdapter - shared behaviour of translation backends
 *
 * - Blank text is returned as-is without a backend call
 * - A semaphore owned by the adapter bounds concurrent calls
 * - Abort signals are checked before and after waiting for a permit
 * - Anything thrown that is not a BackendError is converted to one, unless the caller aborted
 */

import { Semaphore } from '@/services/utils/concurrency';
import { BackendError, getReadableErrorMessage } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { t } from '@/i18n';
import type { LanguagePair, TranslationBackend, TranslationMode } from '@/types/translation';

export abstract class BaseAdapter implements TranslationBackend {
  abstract readonly kind: TranslationMode;
  abstract readonly label: string;

  protected readonly gate: Semaphore;

  constructor(concurrency: number) {
    this.gate = new Semaphore(concurrency);
  }

  // ===== Backend-specific call (subclass must implement) =====
  protected abstract translateText(
    text: string,
    pair: LanguagePair,
    signal?: AbortSignal
  ): Promise<string>;

  async translate(text: string, pair: LanguagePair, signal?: AbortSignal): Promise<string> {
    if (text.trim() === '') return text;
    signal?.throwIfAborted();

    return this.gate.use(async () => {
      signal?.throwIfAborted();
      const startTime = Date.now();
      try {
        const translated = await this.translateText(text, pair, signal);
        logger.debug(`[${this.kind}] Translated ${text.length} chars in ${Date.now() - startTime}ms`, {
          backend: this.label,
          source: pair.source,
          target: pair.target,
        });
        return translated;
      } catch (error) {
        if (error instanceof BackendError || signal?.aborted) throw error;
        throw this.wrapError(error);
      }
    });
  }

  /**
   * Converts an unexpected exception into the backend taxonomy.
   * Defaults to a transport (network) failure.
   */
  protected wrapError(error: unknown): BackendError {
    const detail = getReadableErrorMessage(error);
    return new BackendError('network', t('errors.backend.network', { backend: this.label, detail }), {
      backend: this.kind,
      detail,
      cause: error,
    });
  }
}
