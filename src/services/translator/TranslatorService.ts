/**
 * Translator Service
 * Picks the backend for a request and applies the offline → API fallback
 */

import type {
  LanguagePair,
  ResolvedBackend,
  TranslationBackend,
  TranslationMode,
} from '@/types/translation';
import type { TranslatorSettings } from '@/types/settings';
import { BackendError } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { t } from '@/i18n';
import { LibreTranslateAdapter } from './adapters/LibreTranslateAdapter';
import { LocalModelAdapter } from './adapters/LocalModelAdapter';
import { LocalModelStore } from './offline/LocalModelStore';
import { ArgosCliRuntime } from './offline/argosRuntime';

export interface TranslatorServiceConfig {
  apiUrl?: string;
  apiKey?: string;
  requestTimeoutMs: number;
  /** Upper bound on concurrent calls into one API endpoint */
  maxConcurrentJobs: number;
  /** Omit to run without an offline backend */
  localModels?: LocalModelStore;
  fetch?: typeof fetch;
}

export interface ResolveOptions {
  /** Per-request endpoint, replaces the configured one */
  apiUrl?: string;
}

/** What the pipeline needs from the service; tests substitute their own */
export interface BackendResolver {
  resolve(mode: TranslationMode, pair: LanguagePair, options?: ResolveOptions): Promise<ResolvedBackend>;
}

export class TranslatorService implements BackendResolver {
  private adapters = new Map<string, TranslationBackend>();

  constructor(private readonly config: TranslatorServiceConfig) {}

  /**
   * Returns the backend that will serve `pair` in `mode`.
   *
   * Offline mode falls back to the API when no local model covers the pair and an
   * endpoint is configured; the fallback is logged and reported. The API never falls
   * back to offline.
   */
  async resolve(
    mode: TranslationMode,
    pair: LanguagePair,
    options: ResolveOptions = {}
  ): Promise<ResolvedBackend> {
    const apiUrl = options.apiUrl || this.config.apiUrl;
    // Endpoints supplied per request are not cached, so clients cannot grow the cache
    const cacheAdapter = apiUrl === this.config.apiUrl;

    if (mode === 'api') {
      return { backend: this.getApiAdapter(apiUrl, cacheAdapter), requestedMode: mode, servedBy: 'api', fellBack: false };
    }

    const store = this.config.localModels;
    const availability = store
      ? await store.availability(pair)
      : { available: false as const, reason: 'no offline runtime configured' };

    if (store && availability.available) {
      return { backend: this.getOfflineAdapter(store), requestedMode: mode, servedBy: 'offline', fellBack: false };
    }

    const reason = availability.available ? '' : availability.reason;
    if (!apiUrl) {
      throw new BackendError(
        'model-missing',
        t('errors.backend.modelMissing', { source: pair.source, target: pair.target }),
        { backend: 'offline', detail: reason }
      );
    }

    logger.warn(`[Translator] Offline model unavailable (${reason}), falling back to API ${apiUrl}`, {
      source: pair.source,
      target: pair.target,
    });
    return { backend: this.getApiAdapter(apiUrl, cacheAdapter), requestedMode: mode, servedBy: 'api', fellBack: true };
  }

  private getApiAdapter(url: string | undefined, cache: boolean): TranslationBackend {
    if (!url) {
      throw new BackendError('network', t('errors.backend.apiNotConfigured'), {
        backend: 'api',
        detail: 'no endpoint',
      });
    }
    const create = () =>
      new LibreTranslateAdapter({
        url,
        apiKey: this.config.apiKey,
        timeoutMs: this.config.requestTimeoutMs,
        concurrency: this.config.maxConcurrentJobs,
        fetch: this.config.fetch,
      });
    return cache ? this.getOrCreateAdapter(this.getAdapterKey(url), create) : create();
  }

  private getOfflineAdapter(store: LocalModelStore): TranslationBackend {
    return this.getOrCreateAdapter('offline', () => new LocalModelAdapter(store));
  }

  /**
   * Get or create adapter instance (cached by key). A cached adapter keeps its
   * semaphore, so the concurrency bound holds across requests.
   */
  private getOrCreateAdapter(key: string, create: () => TranslationBackend): TranslationBackend {
    const cached = this.adapters.get(key);
    if (cached) return cached;
    const adapter = create();
    this.adapters.set(key, adapter);
    return adapter;
  }

  /**
   * Includes an apiKey fingerprint so a changed key gets a new adapter
   */
  private getAdapterKey(url: string): string {
    const keyFingerprint = this.config.apiKey ? this.config.apiKey.substring(0, 8) : 'no-key';
    return `api:${url}:${keyFingerprint}`;
  }
}

/**
 * Builds the service for a process from resolved settings, with Argos as the offline runtime.
 */
export function createTranslatorService(
  settings: TranslatorSettings,
  overrides: Partial<TranslatorServiceConfig> = {}
): TranslatorService {
  return new TranslatorService({
    apiUrl: settings.apiUrl,
    apiKey: settings.apiKey,
    requestTimeoutMs: settings.requestTimeout * 1000,
    maxConcurrentJobs: settings.maxConcurrentJobs,
    localModels: new LocalModelStore(new ArgosCliRuntime(settings.offline)),
    ...overrides,
  });
}
