/**
 * Shared entry point of the CLI and the HTTP server: bytes in, translated bytes out.
 */

import path from 'path';
import { apiEndpointSchema } from '@/config';
import { t } from '@/i18n';
import { parseSrt } from '@/services/subtitle/parser';
import { serializeSrt } from '@/services/subtitle/serializer';
import { decodeSubtitleBytes, encodeSubtitleText } from '@/services/subtitle/encoding';
import { translateDocument } from '@/services/translation';
import type { BackendResolver } from '@/services/translator/TranslatorService';
import {
  BackendError,
  ConfigError,
  InvalidRequestError,
  PipelineError,
  SubtitleParseError,
  getReadableErrorMessage,
  isAbortError,
} from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import type { TranslatorSettings } from '@/types/settings';
import type {
  FailurePolicy,
  TranslationMode,
  TranslationProgress,
  TranslationReport,
} from '@/types/translation';

export interface SubtitleRequest {
  content: Uint8Array;
  source: string;
  target: string;
  mode: TranslationMode;
  /** Defaults to the configured policy */
  policy?: FailurePolicy;
  apiUrl?: string;
  /** Name of the uploaded or input file, used for the output name */
  fileName?: string;
  renumber?: boolean;
  signal?: AbortSignal;
}

export interface DeliveryDeps {
  resolver: BackendResolver;
  settings: Pick<
    TranslatorSettings,
    'failurePolicy' | 'maxConcurrentJobs' | 'granularity' | 'allowEmptyCues'
  >;
  onProgress?: (progress: TranslationProgress) => void;
}

export interface DeliveryResult {
  content: Buffer;
  fileName: string;
  report: TranslationReport;
}

export type DeliveryErrorKind =
  | 'invalid-request'
  | 'parse-error'
  | 'unsupported-language-pair'
  | 'model-missing'
  | 'backend-unavailable'
  | 'cancelled'
  | 'internal';

export interface DeliveryError {
  kind: DeliveryErrorKind;
  message: string;
  status: number;
  block?: number;
  line?: number;
}

const STATUS_BY_KIND: Record<DeliveryErrorKind, number> = {
  'invalid-request': 400,
  'parse-error': 400,
  'unsupported-language-pair': 422,
  'model-missing': 424,
  'backend-unavailable': 502,
  cancelled: 499,
  internal: 500,
};

/** `episode.srt` + `nb` → `episode.nb.srt` */
export function translatedFileName(fileName: string | undefined, target: string): string {
  const base = path.basename(fileName || 'subtitles.srt').replace(/\.srt$/i, '') || 'subtitles';
  return `${base}.${target}.srt`;
}

export async function translateSubtitle(
  request: SubtitleRequest,
  deps: DeliveryDeps
): Promise<DeliveryResult> {
  const { settings } = deps;
  if (request.apiUrl !== undefined && !apiEndpointSchema.safeParse(request.apiUrl).success) {
    throw new InvalidRequestError(t('errors.request.invalidField', { field: 'api_url', value: request.apiUrl }));
  }
  const raw = decodeSubtitleBytes(request.content);
  const doc = parseSrt(raw, { allowEmptyCues: settings.allowEmptyCues });

  const { document, report } = await translateDocument(doc, {
    source: request.source,
    target: request.target,
    mode: request.mode,
    policy: request.policy ?? settings.failurePolicy,
    resolver: deps.resolver,
    concurrency: settings.maxConcurrentJobs,
    granularity: settings.granularity,
    apiUrl: request.apiUrl,
    signal: request.signal,
    onProgress: deps.onProgress,
  });

  return {
    content: encodeSubtitleText(serializeSrt(document, { renumber: request.renumber })),
    fileName: translatedFileName(request.fileName, request.target),
    report,
  };
}

const deliveryError = (kind: DeliveryErrorKind, message: string): DeliveryError => ({
  kind,
  message,
  status: STATUS_BY_KIND[kind],
});

const fromBackendError = (error: BackendError, message = error.message): DeliveryError =>
  deliveryError(error.kind === 'model-missing' ? 'model-missing' : 'backend-unavailable', message);

/**
 * Converts anything thrown while serving a request into the delivery taxonomy.
 */
export function toDeliveryError(error: unknown): DeliveryError {
  if (error instanceof SubtitleParseError) {
    return { ...deliveryError('parse-error', error.message), block: error.block, line: error.line };
  }
  if (error instanceof InvalidRequestError) {
    return { kind: 'invalid-request', message: error.message, status: error.status };
  }
  if (error instanceof ConfigError) {
    return deliveryError('invalid-request', error.message);
  }
  if (error instanceof PipelineError) {
    switch (error.kind) {
      case 'unsupported-language-pair':
        return deliveryError('unsupported-language-pair', error.message);
      case 'cancelled':
        return deliveryError('cancelled', error.message);
      case 'aborted-strict': {
        const cause = error.backendError;
        return cause ? fromBackendError(cause, error.message) : deliveryError('backend-unavailable', error.message);
      }
    }
  }
  if (error instanceof BackendError) {
    return fromBackendError(error);
  }
  if (isAbortError(error)) {
    return deliveryError('cancelled', t('errors.pipeline.cancelled'));
  }

  logger.error('Unexpected error while translating subtitles', error);
  return deliveryError('internal', t('errors.internal', { detail: getReadableErrorMessage(error) }));
}
