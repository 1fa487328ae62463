/**
 * Local Model Adapter
 * Implements TranslationBackend over an installed offline model. Never touches the network.
 */

import { BaseAdapter } from './BaseAdapter';
import { BackendError, getReadableErrorMessage } from '@/services/utils/errors';
import { t } from '@/i18n';
import type { LanguagePair } from '@/types/translation';
import type { LocalModelStore } from '../offline/LocalModelStore';
import { RuntimeUnavailableError } from '../offline/LocalModelRuntime';

export class LocalModelAdapter extends BaseAdapter {
  readonly kind = 'offline' as const;
  readonly label: string;

  /**
   * The single model instance is not safe for concurrent inference, so the adapter's
   * semaphore has one permit and acts as an exclusive lock.
   */
  constructor(private readonly store: LocalModelStore) {
    super(1);
    this.label = store.runtimeName;
  }

  protected async translateText(
    text: string,
    pair: LanguagePair,
    signal?: AbortSignal
  ): Promise<string> {
    const availability = await this.store.availability(pair);
    if (!availability.available) {
      throw new BackendError(
        'model-missing',
        t('errors.backend.modelMissing', { source: pair.source, target: pair.target }),
        { backend: this.kind, detail: availability.reason }
      );
    }

    const translated = await this.store.translate(text, pair, signal);
    if (translated.trim() === '') {
      throw new BackendError('decode', t('errors.backend.emptyTranslation', { backend: this.label }), {
        backend: this.kind,
        detail: 'empty translation',
      });
    }
    return translated;
  }

  protected wrapError(error: unknown): BackendError {
    const detail = getReadableErrorMessage(error);
    if (error instanceof RuntimeUnavailableError) {
      return new BackendError('model-missing', t('errors.backend.runtimeMissing', { detail }), {
        backend: this.kind,
        detail,
        cause: error,
      });
    }
    return new BackendError('network', t('errors.backend.runtimeFailed', { detail }), {
      backend: this.kind,
      detail,
      cause: error,
    });
  }
}
