import { logger } from '@/services/utils/logger';
import { getReadableErrorMessage } from '@/services/utils/errors';
import { primaryLanguage } from '@/services/utils/language';
import type { LanguagePair } from '@/types/translation';
import type { LocalModelRuntime } from './LocalModelRuntime';

/** Argos routes pairs without a direct package through English */
const PIVOT_LANGUAGE = 'en';

export type ModelAvailability =
  | { available: true; route: 'direct' | 'pivot' }
  | { available: false; reason: string };

interface Inventory {
  pairs: LanguagePair[];
  error?: string;
}

/**
 * Owns the local model runtime and the list of installed packages.
 *
 * The inventory is loaded on first use and kept for the lifetime of the store;
 * call {@link reload} after installing packages. One store is created per process
 * and handed to the offline adapter.
 */
export class LocalModelStore {
  private inventory: Promise<Inventory> | null = null;

  constructor(private readonly runtime: LocalModelRuntime) {}

  get runtimeName(): string {
    return this.runtime.name;
  }

  private load(): Promise<Inventory> {
    this.inventory ??= this.runtime.listInstalledPairs().then(
      (pairs) => {
        logger.info(`[Offline] ${this.runtime.name} ready with ${pairs.length} language pairs`);
        return { pairs };
      },
      (error: unknown) => {
        const detail = getReadableErrorMessage(error);
        logger.warn(`[Offline] ${this.runtime.name} unavailable: ${detail}`);
        return { pairs: [], error: detail };
      }
    );
    return this.inventory;
  }

  reload(): void {
    this.inventory = null;
  }

  async availability(pair: LanguagePair): Promise<ModelAvailability> {
    const { pairs, error } = await this.load();
    if (error) return { available: false, reason: error };

    const source = primaryLanguage(pair.source);
    const target = primaryLanguage(pair.target);
    const has = (from: string, to: string) =>
      pairs.some((p) => p.source === from && p.target === to);

    if (has(source, target)) return { available: true, route: 'direct' };
    if (
      source !== PIVOT_LANGUAGE &&
      target !== PIVOT_LANGUAGE &&
      has(source, PIVOT_LANGUAGE) &&
      has(PIVOT_LANGUAGE, target)
    ) {
      return { available: true, route: 'pivot' };
    }
    return { available: false, reason: `no package for ${source} → ${target}` };
  }

  translate(text: string, pair: LanguagePair, signal?: AbortSignal): Promise<string> {
    return this.runtime.translate(
      text,
      { source: primaryLanguage(pair.source), target: primaryLanguage(pair.target) },
      signal
    );
  }
}
