import { t } from '@/i18n';
import { PipelineError } from '@/services/utils/errors';
import { AUTO_DETECT, isValidLanguageCode, normalizeLanguageCode } from '@/services/utils/language';
import type { LanguagePair } from '@/types/translation';

const invalid = (message: string) => new PipelineError('unsupported-language-pair', message);

/**
 * Normalizes and checks a requested pair before any backend is contacted.
 * `auto` is accepted as a source; whether the chosen backend can honour it is decided
 * when the backend is resolved.
 */
export function validateLanguagePair(source: string, target: string): LanguagePair {
  const normalizedSource =
    source.trim().toLowerCase() === AUTO_DETECT ? AUTO_DETECT : normalizeLanguageCode(source);
  const normalizedTarget = normalizeLanguageCode(target);

  if (normalizedSource !== AUTO_DETECT && !isValidLanguageCode(normalizedSource)) {
    throw invalid(t('errors.pipeline.invalidCode', { code: source }));
  }
  if (normalizedTarget === AUTO_DETECT || !isValidLanguageCode(normalizedTarget)) {
    throw invalid(t('errors.pipeline.invalidCode', { code: target }));
  }
  if (normalizedSource === normalizedTarget) {
    throw invalid(t('errors.pipeline.sameLanguage', { code: normalizedTarget }));
  }

  return { source: normalizedSource, target: normalizedTarget };
}
