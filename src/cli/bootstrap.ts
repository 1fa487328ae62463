import { changeLanguage } from '@/i18n';
import { logger, parseLogLevel } from '@/services/utils/logger';
import type { TranslatorSettings } from '@/types/settings';

/**
 * Applies process-wide settings: log level, optional log file and message language.
 */
export async function bootstrap(settings: TranslatorSettings): Promise<void> {
  logger.setLevel(parseLogLevel(settings.logLevel));
  if (settings.logFile) {
    logger.setLogFile(settings.logFile);
  }
  await changeLanguage(settings.language);
}
