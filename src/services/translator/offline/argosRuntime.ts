import { spawn } from 'child_process';
import { logger } from '@/services/utils/logger';
import type { OfflineSettings } from '@/types/settings';
import type { LanguagePair } from '@/types/translation';
import {
  RuntimeProcessError,
  RuntimeUnavailableError,
  type LocalModelRuntime,
} from './LocalModelRuntime';

interface ProcessOutput {
  stdout: string;
  stderr: string;
}

export interface ProcessOptions {
  /** Written to stdin, which is then closed; stdin is empty without it */
  input?: string;
  signal?: AbortSignal;
}

export type ProcessRunner = (command: string, args: string[], options?: ProcessOptions) => Promise<ProcessOutput>;

/**
 * Runs an executable directly (no shell) and collects its output.
 * Arguments are passed as an array, so spaces and non-ASCII text survive as-is.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  const { input, signal } = options;
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
      signal,
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new RuntimeUnavailableError(`${command} not found on PATH`, error));
      } else {
        reject(error);
      }
    });

    // EPIPE when the process exits without reading; its exit code reports the failure
    child.stdin.on('error', (error) => logger.debug(`[Offline] ${command} stdin closed early`, error));
    child.stdin.end(input ?? '', 'utf-8');

    child.on('close', (code, killSignal) => {
      const output = {
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      };
      if (code === 0) {
        resolve(output);
      } else if (code !== null) {
        const lastLine = output.stderr.trim().split('\n').pop() || `exit code ${code}`;
        reject(new RuntimeProcessError(`${command}: ${lastLine}`, code, output.stderr));
      } else if (!signal?.aborted) {
        // Aborts were already rejected through the 'error' event
        reject(new RuntimeProcessError(`${command}: killed by ${killSignal}`, null, output.stderr));
      }
    });
  });
};

/**
 * Extracts language pairs from `argospm list`, which prints one installed package
 * per line, e.g. `translate-en_nb`.
 */
export function parseArgosPackageList(output: string): LanguagePair[] {
  const pairs: LanguagePair[] = [];
  for (const match of output.matchAll(/\btranslate-([a-z]{2,3})_([a-z]{2,3})\b/gi)) {
    pairs.push({ source: match[1].toLowerCase(), target: match[2].toLowerCase() });
  }
  return pairs;
}

/**
 * Argos Translate through its command line tools.
 */
export class ArgosCliRuntime implements LocalModelRuntime {
  readonly name = 'argos-translate';

  constructor(
    private readonly settings: OfflineSettings,
    private readonly run: ProcessRunner = runProcess
  ) {}

  async listInstalledPairs(signal?: AbortSignal): Promise<LanguagePair[]> {
    const { stdout } = await this.run(this.settings.packageManagerBinary, ['list'], { signal });
    const pairs = parseArgosPackageList(stdout);
    logger.debug(`[Offline] ${pairs.length} Argos packages installed`, pairs);
    return pairs;
  }

  /**
   * The text goes in on stdin: as an argument, a line such as `-Yes.` would be
   * read as an unknown option.
   */
  async translate(text: string, pair: LanguagePair, signal?: AbortSignal): Promise<string> {
    const { stdout } = await this.run(
      this.settings.translateBinary,
      ['--from-lang', pair.source, '--to-lang', pair.target],
      { input: text, signal }
    );
    return stdout.replace(/\r?\n$/, '');
  }
}
