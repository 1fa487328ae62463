export type TranslationMode = 'api' | 'offline';

export type FailurePolicy = 'strict' | 'lenient';

/** `segment`: one task per text segment; `cue`: one task per cue, segments in order */
export type Granularity = 'segment' | 'cue';

export interface LanguagePair {
  source: string;
  target: string;
}

export type BackendErrorKind = 'network' | 'http-status' | 'decode' | 'model-missing';

/**
 * A translation provider. Exactly one operation; variants are told apart by `kind`
 * fixed at construction.
 */
export interface TranslationBackend {
  readonly kind: TranslationMode;
  /** Human-readable identity for logs (endpoint URL or runtime name) */
  readonly label: string;
  translate(text: string, pair: LanguagePair, signal?: AbortSignal): Promise<string>;
}

export interface ResolvedBackend {
  backend: TranslationBackend;
  requestedMode: TranslationMode;
  servedBy: TranslationMode;
  fellBack: boolean;
}

export interface SegmentFailure {
  /** Position of the cue in the document (0-based) */
  cuePosition: number;
  cueIndex: number;
  line: number;
  segment: number;
  text: string;
  kind: BackendErrorKind;
  message: string;
}

export interface TranslationReport {
  requestedMode: TranslationMode;
  servedBy: TranslationMode;
  fellBack: boolean;
  translated: number;
  passthrough: number;
  /** Text segments with nothing to translate (whitespace, digits, symbols) */
  skipped: number;
  failures: SegmentFailure[];
  durationMs: number;
}

export interface TranslationProgress {
  completed: number;
  total: number;
}
