import fs from 'fs';
import { z } from 'zod';
import { t, SUPPORTED_UI_LANGUAGES } from '@/i18n';
import { ConfigError } from '@/services/utils/errors';
import { type TranslatorSettings } from '@/types/settings';

export const DEFAULT_API_URL = 'https://translate.argosopentech.com/translate';

export const DEFAULT_SETTINGS: TranslatorSettings = {
  apiUrl: DEFAULT_API_URL,
  sourceLanguage: 'en',
  targetLanguage: 'nb',
  mode: 'api',
  failurePolicy: 'lenient',
  granularity: 'segment',
  maxConcurrentJobs: 4,
  requestTimeout: 30,
  allowEmptyCues: false,
  offline: {
    translateBinary: 'argos-translate',
    packageManagerBinary: 'argospm',
  },
  logLevel: 'info',
  language: 'en-US',
  host: '127.0.0.1',
  port: 8000,
  maxUploadBytes: 10 * 1024 * 1024,
};

const offlineSchema = z.object({
  translateBinary: z.string().min(1),
  packageManagerBinary: z.string().min(1),
});

/** An http(s) URL of a translation endpoint; also checks per-request overrides */
export const apiEndpointSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'Must be an http(s) URL' });

// An empty string disables the API backend (no offline fallback either)
const apiUrlSchema = z.union([apiEndpointSchema, z.literal('')]).optional();

const settingsObject = z.object({
  apiUrl: apiUrlSchema.transform((value) => (value === '' ? undefined : value)),
  apiKey: z.string().min(1).optional(),
  sourceLanguage: z.string().min(1),
  targetLanguage: z.string().min(1),
  mode: z.enum(['api', 'offline']),
  failurePolicy: z.enum(['strict', 'lenient']),
  granularity: z.enum(['segment', 'cue']),
  maxConcurrentJobs: z.number().int().min(1).max(64),
  requestTimeout: z.number().positive(),
  allowEmptyCues: z.boolean(),
  offline: offlineSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'none']),
  language: z.enum(SUPPORTED_UI_LANGUAGES),
  logFile: z.string().min(1).optional(),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  maxUploadBytes: z.number().int().positive(),
});

export const settingsSchema = settingsObject satisfies z.ZodType<TranslatorSettings>;

/** Shape accepted in a settings file: any subset, `offline` merged key by key */
const settingsFileSchema = settingsObject
  .partial()
  .extend({ apiUrl: apiUrlSchema, offline: offlineSchema.partial().optional() })
  .strict();

export type SettingsOverrides = Omit<Partial<TranslatorSettings>, 'offline'> & {
  offline?: Partial<TranslatorSettings['offline']>;
};

/** Unknown values from JSON or the environment, checked as a whole by zod */
export type RawSettings = Record<string, unknown> & { offline?: Record<string, unknown> };

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : Number(value);

/**
 * Settings taken from environment variables. Unset variables are omitted.
 */
export const readEnvSettings = (env: NodeJS.ProcessEnv = process.env): RawSettings => {
  const raw: RawSettings = {
    apiUrl: env.SRT_TRANSLATE_API_URL,
    apiKey: env.SRT_TRANSLATE_API_KEY,
    sourceLanguage: env.SRT_TRANSLATE_SOURCE,
    targetLanguage: env.SRT_TRANSLATE_TARGET,
    mode: env.SRT_TRANSLATE_MODE,
    failurePolicy: env.SRT_TRANSLATE_POLICY,
    maxConcurrentJobs: toNumber(env.MAX_CONCURRENT_JOBS),
    requestTimeout: toNumber(env.SRT_TRANSLATE_TIMEOUT),
    logLevel: env.SRT_TRANSLATE_LOG_LEVEL,
    logFile: env.SRT_TRANSLATE_LOG_FILE,
    language: env.SRT_TRANSLATE_LANGUAGE,
    host: env.HOST,
    port: toNumber(env.PORT),
    offline: {
      translateBinary: env.ARGOS_TRANSLATE_BIN,
      packageManagerBinary: env.ARGOSPM_BIN,
    },
  };
  return dropUndefined(raw);
};

const dropUndefined = (raw: RawSettings): RawSettings => {
  const result: RawSettings = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (key === 'offline' && typeof value === 'object' && value !== null) {
      const offline = Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
      if (Object.keys(offline).length > 0) result.offline = offline;
      continue;
    }
    result[key] = value;
  }
  return result;
};

/**
 * Reads a JSON settings file. Any subset of the settings may be given.
 */
export const readSettingsFile = (filePath: string): SettingsOverrides => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      t('errors.config.unreadable', {
        path: filePath,
        detail: error instanceof Error ? error.message : String(error),
      }),
      error
    );
  }

  const result = settingsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(t('errors.config.invalid', { detail: formatIssues(result.error) }));
  }
  return result.data;
};

const mergeLayer = (base: RawSettings, layer: RawSettings | SettingsOverrides): RawSettings => {
  const { offline, ...rest } = layer;
  const merged: RawSettings = { ...base, ...dropUndefined(rest) };
  if (offline) {
    merged.offline = { ...base.offline, ...dropUndefined(offline) };
  }
  return merged;
};

export interface LoadSettingsOptions {
  /** JSON settings file; falls back to SRT_TRANSLATE_CONFIG */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Per-invocation values (CLI flags), highest precedence; validated with the rest */
  overrides?: RawSettings | SettingsOverrides;
}

/**
 * Resolves settings: defaults < settings file < environment < overrides.
 * Throws {@link ConfigError} when the result does not validate.
 */
export const loadSettings = (options: LoadSettingsOptions = {}): TranslatorSettings => {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.SRT_TRANSLATE_CONFIG;

  let raw: RawSettings = { ...DEFAULT_SETTINGS, offline: { ...DEFAULT_SETTINGS.offline } };
  if (configPath) {
    raw = mergeLayer(raw, readSettingsFile(configPath));
  }
  raw = mergeLayer(raw, readEnvSettings(env));
  if (options.overrides) {
    raw = mergeLayer(raw, options.overrides);
  }

  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(t('errors.config.invalid', { detail: formatIssues(result.error) }));
  }
  return result.data;
};
