/**
 * Error taxonomy for parsing, backends and the translation pipeline.
 * Messages are resolved through i18n at construction time.
 */

import { t } from '@/i18n';
import { type ParseErrorReason } from '@/types/subtitle';
import { type BackendErrorKind, type TranslationMode } from '@/types/translation';

/**
 * Malformed subtitle input. `block` and `line` are 1-based positions in the source file.
 */
export class SubtitleParseError extends Error {
  readonly reason: ParseErrorReason;
  readonly block: number;
  readonly line: number;

  constructor(reason: ParseErrorReason, block: number, line: number, value?: string) {
    super(t(`errors.parse.${reason}`, { block, line, value }));
    this.name = 'SubtitleParseError';
    this.reason = reason;
    this.block = block;
    this.line = line;
  }
}

export interface BackendErrorOptions {
  backend: TranslationMode;
  /** HTTP status for `http-status` errors */
  status?: number;
  /** Raw detail from the backend (server error text, stderr), untranslated */
  detail?: string;
  cause?: unknown;
}

/**
 * A single translate call failed.
 * - network: the backend could not be reached, timed out, or its transport broke
 * - http-status: the endpoint answered with a non-2xx status
 * - decode: the response could not be read as a translation
 * - model-missing: no local model is installed for the language pair
 */
export class BackendError extends Error {
  readonly kind: BackendErrorKind;
  readonly backend: TranslationMode;
  readonly status?: number;
  readonly detail: string;

  constructor(kind: BackendErrorKind, message: string, options: BackendErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'BackendError';
    this.kind = kind;
    this.backend = options.backend;
    this.status = options.status;
    this.detail = options.detail ?? '';
  }
}

export type PipelineErrorKind = 'unsupported-language-pair' | 'aborted-strict' | 'cancelled';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PipelineError';
    this.kind = kind;
  }

  /** The backend failure behind an `aborted-strict` error, when there is one */
  get backendError(): BackendError | undefined {
    return this.cause instanceof BackendError ? this.cause : undefined;
  }
}

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

/** Request-level validation failure at the delivery surface */
export class InvalidRequestError extends Error {
  readonly status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'InvalidRequestError';
    this.status = status;
  }
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

const PAIR_REJECTION_PATTERN =
  /is not supported|not a supported language|unsupported language|language pair|invalid (?:source|target) language/i;

/**
 * Detects an endpoint refusing the language pair itself (LibreTranslate answers
 * `400 {"error": "xx is not supported"}`), as opposed to failing on one segment.
 */
export function isLanguagePairRejection(error: BackendError): boolean {
  return error.kind === 'http-status' && error.status === 400 && PAIR_REJECTION_PATTERN.test(error.detail);
}

/**
 * Extracts a human-readable message from any thrown value.
 * Handles messages that embed a JSON body like {"error":"..."} or {"error":{"message":"..."}}
 */
export function getReadableErrorMessage(error: unknown): string {
  const raw = error instanceof Error ? error.message : String(error);
  const match = raw.match(/\{.*\}/s);
  if (!match) return raw;
  try {
    const parsed: unknown = JSON.parse(match[0]);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const inner = parsed.error;
      if (typeof inner === 'string') return inner;
      if (typeof inner === 'object' && inner !== null && 'message' in inner) {
        return String(inner.message);
      }
    }
  } catch {
    // not JSON, use raw
  }
  return raw;
}
