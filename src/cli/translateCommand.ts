import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { t } from '@/i18n';
import { loadSettings, type RawSettings } from '@/config';
import { toDeliveryError, translateSubtitle, translatedFileName } from '@/delivery/translateSubtitle';
import { createTranslatorService, type BackendResolver } from '@/services/translator/TranslatorService';
import { InvalidRequestError } from '@/services/utils/errors';
import type { TranslatorSettings } from '@/types/settings';
import { bootstrap } from './bootstrap';

export interface CommandIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Builds the backend resolver from the resolved settings */
  createResolver: (settings: TranslatorSettings) => BackendResolver;
}

const defaultIO: CommandIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
  createResolver: (settings) => createTranslatorService(settings),
};

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined ? undefined : Number(value);

/**
 * `srt-translate`: translates one file. Resolves with the process exit code.
 */
export async function runTranslateCommand(argv: string[], io: Partial<CommandIO> = {}): Promise<number> {
  const { stdout, stderr, env, signal, createResolver } = { ...defaultIO, ...io };

  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        'source-lang': { type: 'string' },
        'target-lang': { type: 'string' },
        'api-url': { type: 'string' },
        mode: { type: 'string' },
        policy: { type: 'string' },
        concurrency: { type: 'string' },
        renumber: { type: 'boolean', default: false },
        config: { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
    });

    if (values.help) {
      stdout(t('cli.translateUsage'));
      return 0;
    }

    const input = values.input;
    if (!input) {
      throw new InvalidRequestError(t('errors.request.missingOption', { option: 'input' }));
    }
    if (!fs.existsSync(input)) {
      throw new InvalidRequestError(t('cli.inputMissing', { path: input }));
    }

    const overrides: RawSettings = {
      sourceLanguage: values['source-lang'],
      targetLanguage: values['target-lang'],
      apiUrl: values['api-url'],
      mode: values.mode,
      failurePolicy: values.policy,
      maxConcurrentJobs: toNumber(values.concurrency),
      logLevel: values['log-level'],
    };
    const settings = loadSettings({ configPath: values.config, env, overrides });
    await bootstrap(settings);

    const output =
      values.output ??
      path.join(path.dirname(input), translatedFileName(input, settings.targetLanguage));

    const result = await translateSubtitle(
      {
        content: await fs.promises.readFile(input),
        source: settings.sourceLanguage,
        target: settings.targetLanguage,
        mode: settings.mode,
        fileName: input,
        renumber: values.renumber,
        signal,
      },
      { resolver: createResolver(settings), settings }
    );

    await fs.promises.writeFile(output, result.content);

    const { report } = result;
    stdout(
      t('cli.summary', {
        translated: report.translated,
        passthrough: report.passthrough,
        backend: report.servedBy,
        fallback: report.fellBack ? t('cli.fallbackNote') : '',
      })
    );
    stdout(t('cli.done', { path: output }));
    return 0;
  } catch (error) {
    // parseArgs reports unknown or malformed flags as TypeError
    const failure =
      error instanceof TypeError && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS')
        ? { kind: 'invalid-request', message: error.message }
        : toDeliveryError(error);
    stderr(t('cli.failure', { kind: failure.kind, message: failure.message }));
    return 1;
  }
}
