import type { LanguagePair } from '@/types/translation';

/**
 * A locally installed translation engine holding its models in-process or behind a
 * local executable. It never reaches the network.
 */
export interface LocalModelRuntime {
  readonly name: string;
  /** Language pairs with an installed model package */
  listInstalledPairs(signal?: AbortSignal): Promise<LanguagePair[]>;
  translate(text: string, pair: LanguagePair, signal?: AbortSignal): Promise<string>;
}

/** The runtime itself is not installed (executable missing, library not importable) */
export class RuntimeUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RuntimeUnavailableError';
  }
}

/** The runtime ran but failed (non-zero exit, crash) */
export class RuntimeProcessError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string) {
    super(message);
    this.name = 'RuntimeProcessError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
