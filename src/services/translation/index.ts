/**
 * Translation pipeline: translates every text segment of a parsed document and
 * reassembles a new document. Serialization is left to the caller.
 */

import { t } from '@/i18n';
import { mapInParallel, linkSignals } from '@/services/utils/concurrency';
import {
  BackendError,
  PipelineError,
  isLanguagePairRejection,
} from '@/services/utils/errors';
import { AUTO_DETECT } from '@/services/utils/language';
import { logger } from '@/services/utils/logger';
import type { BackendResolver } from '@/services/translator/TranslatorService';
import type { SubtitleDocument } from '@/types/subtitle';
import type {
  FailurePolicy,
  Granularity,
  LanguagePair,
  ResolvedBackend,
  SegmentFailure,
  TranslationMode,
  TranslationProgress,
  TranslationReport,
} from '@/types/translation';
import { validateLanguagePair } from './languagePair';
import { applyTranslations, collectSegments, groupByCue, type SegmentRef } from './segments';

export { validateLanguagePair } from './languagePair';

export interface TranslateDocumentOptions {
  source: string;
  target: string;
  mode: TranslationMode;
  policy: FailurePolicy;
  resolver: BackendResolver;
  /** Tasks in flight at once; defaults to 4 */
  concurrency?: number;
  granularity?: Granularity;
  /** Per-request API endpoint */
  apiUrl?: string;
  signal?: AbortSignal;
  onProgress?: (progress: TranslationProgress) => void;
}

export interface TranslationOutcome {
  document: SubtitleDocument;
  report: TranslationReport;
}

const cancelled = (cause?: unknown) =>
  new PipelineError('cancelled', t('errors.pipeline.cancelled'), cause);

async function resolveBackend(
  options: TranslateDocumentOptions,
  pair: LanguagePair
): Promise<ResolvedBackend> {
  try {
    return await options.resolver.resolve(options.mode, pair, { apiUrl: options.apiUrl });
  } catch (error) {
    if (error instanceof BackendError && error.kind === 'model-missing' && pair.source === AUTO_DETECT) {
      throw new PipelineError('unsupported-language-pair', t('errors.pipeline.autoOffline'), error);
    }
    throw error;
  }
}

/**
 * Translates `doc` from `source` to `target`.
 *
 * Failed segments abort the run under `strict` and keep their original text under
 * `lenient`. Results are placed by position, so completion order never matters.
 */
export async function translateDocument(
  doc: SubtitleDocument,
  options: TranslateDocumentOptions
): Promise<TranslationOutcome> {
  const startTime = Date.now();
  const pair = validateLanguagePair(options.source, options.target);
  if (options.signal?.aborted) throw cancelled(options.signal.reason);

  const resolved = await resolveBackend(options, pair);
  const { backend } = resolved;
  const { refs, skipped } = collectSegments(doc);
  const groups = options.granularity === 'cue' ? groupByCue(refs) : refs.map((ref) => [ref]);

  logger.info(
    `[Translation] ${refs.length} segments in ${doc.cues.length} cues, ${pair.source} → ${pair.target} via ${backend.kind}`,
    { backend: backend.label, policy: options.policy, fellBack: resolved.fellBack }
  );

  const translations: (string | undefined)[] = new Array<string | undefined>(refs.length);
  const failures: SegmentFailure[] = [];
  let completed = 0;

  const internal = new AbortController();
  const linked = linkSignals(options.signal, internal.signal);

  const translateSegment = async (ref: SegmentRef): Promise<string | undefined> => {
    try {
      return await backend.translate(ref.core, pair, linked.signal);
    } catch (error) {
      if (!(error instanceof BackendError)) throw error;

      if (isLanguagePairRejection(error)) {
        throw new PipelineError(
          'unsupported-language-pair',
          t('errors.pipeline.rejected', { source: pair.source, target: pair.target, detail: error.detail }),
          error
        );
      }
      if (options.policy === 'strict') {
        throw new PipelineError(
          'aborted-strict',
          t('errors.pipeline.abortedStrict', { cue: ref.cueIndex, detail: error.message }),
          error
        );
      }

      logger.warn(`[Translation] Cue ${ref.cueIndex}: keeping original text (${error.kind})`, {
        text: ref.core,
        message: error.message,
      });
      failures.push({
        cuePosition: ref.cuePosition,
        cueIndex: ref.cueIndex,
        line: ref.line,
        segment: ref.segment,
        text: ref.core,
        kind: error.kind,
        message: error.message,
      });
      return undefined;
    }
  };

  try {
    await mapInParallel(
      groups,
      options.concurrency ?? 4,
      async (group) => {
        // Segments of one group run in order
        for (const ref of group) {
          translations[ref.id] = await translateSegment(ref);
          completed++;
          options.onProgress?.({ completed, total: refs.length });
        }
      },
      linked.signal
    );
  } catch (error) {
    internal.abort();
    if (error instanceof PipelineError) throw error;
    // Only the caller's signal means cancellation; backend timeouts arrive as BackendError
    if (options.signal?.aborted) throw cancelled(error);
    throw error;
  } finally {
    linked.dispose();
  }

  failures.sort((a, b) => a.cuePosition - b.cuePosition || a.line - b.line || a.segment - b.segment);
  const report: TranslationReport = {
    requestedMode: resolved.requestedMode,
    servedBy: resolved.servedBy,
    fellBack: resolved.fellBack,
    translated: refs.length - failures.length,
    passthrough: failures.length,
    skipped,
    failures,
    durationMs: Date.now() - startTime,
  };

  logger.info(
    `[Translation] Done: ${report.translated} translated, ${report.passthrough} kept, ${report.skipped} skipped in ${report.durationMs}ms`
  );

  return { document: applyTranslations(doc, refs, translations), report };
}
