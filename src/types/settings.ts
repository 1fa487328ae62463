import { type UiLanguage } from '@/i18n';
import { type FailurePolicy, type Granularity, type TranslationMode } from '@/types/translation';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface OfflineSettings {
  translateBinary: string; // argos-translate executable
  packageManagerBinary: string; // argospm executable
}

export interface TranslatorSettings {
  apiUrl?: string; // LibreTranslate-compatible /translate endpoint; unset disables the API backend
  apiKey?: string;
  sourceLanguage: string;
  targetLanguage: string;
  mode: TranslationMode;
  failurePolicy: FailurePolicy;
  granularity: Granularity;
  maxConcurrentJobs: number;
  requestTimeout: number; // seconds
  allowEmptyCues: boolean;
  offline: OfflineSettings;
  logLevel: LogLevelName;
  language: UiLanguage; // language of messages and errors
  logFile?: string;

  // HTTP server
  host: string;
  port: number;
  maxUploadBytes: number;
}
