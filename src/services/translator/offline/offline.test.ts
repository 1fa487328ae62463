import { describe, expect, it } from 'vitest';
import { BackendError } from '@/services/utils/errors';
import type { LanguagePair } from '@/types/translation';
import { LocalModelAdapter } from '../adapters/LocalModelAdapter';
import { ArgosCliRuntime, parseArgosPackageList, type ProcessOptions } from './argosRuntime';
import { LocalModelStore } from './LocalModelStore';
import { RuntimeProcessError, RuntimeUnavailableError, type LocalModelRuntime } from './LocalModelRuntime';

class FakeRuntime implements LocalModelRuntime {
  readonly name = 'fake-runtime';
  listCalls = 0;
  inFlight = 0;
  peak = 0;
  calls: { text: string; pair: LanguagePair }[] = [];

  constructor(
    private readonly pairs: LanguagePair[] | Error,
    private readonly translateImpl: (text: string) => string = (text) => `[nb] ${text}`
  ) {}

  async listInstalledPairs(): Promise<LanguagePair[]> {
    this.listCalls++;
    if (this.pairs instanceof Error) throw this.pairs;
    return this.pairs;
  }

  async translate(text: string, pair: LanguagePair): Promise<string> {
    this.calls.push({ text, pair });
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 2));
    this.inFlight--;
    return this.translateImpl(text);
  }
}

const EN_NB = { source: 'en', target: 'nb' };

const failure = async (promise: Promise<string>): Promise<BackendError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof BackendError) return error;
    throw error;
  }
  throw new Error('expected a BackendError');
};

describe('parseArgosPackageList', () => {
  it('reads installed translation packages', () => {
    const output = ['translate-en_nb: English → Norwegian', 'translate-de_en: German → English', 'other text'].join(
      '\n'
    );
    expect(parseArgosPackageList(output)).toEqual([
      { source: 'en', target: 'nb' },
      { source: 'de', target: 'en' },
    ]);
  });
});

describe('ArgosCliRuntime', () => {
  it('sends the text on stdin so leading dashes are not read as options', async () => {
    const invocations: { command: string; args: string[]; options?: ProcessOptions }[] = [];
    const runtime = new ArgosCliRuntime(
      { translateBinary: 'argos-translate', packageManagerBinary: 'argospm' },
      async (command, args, options) => {
        invocations.push({ command, args, options });
        return { stdout: '-Ja.\n', stderr: '' };
      }
    );

    await expect(runtime.translate('-Yes.', EN_NB)).resolves.toBe('-Ja.');
    expect(invocations).toHaveLength(1);
    expect(invocations[0].command).toBe('argos-translate');
    expect(invocations[0].args).toEqual(['--from-lang', 'en', '--to-lang', 'nb']);
    expect(invocations[0].options?.input).toBe('-Yes.');
  });
});

describe('LocalModelStore', () => {
  it('loads the inventory once', async () => {
    const runtime = new FakeRuntime([EN_NB]);
    const store = new LocalModelStore(runtime);

    await store.availability(EN_NB);
    await store.availability({ source: 'en', target: 'de' });
    expect(runtime.listCalls).toBe(1);

    store.reload();
    await store.availability(EN_NB);
    expect(runtime.listCalls).toBe(2);
  });

  it('finds direct and pivot routes', async () => {
    const store = new LocalModelStore(
      new FakeRuntime([
        { source: 'de', target: 'en' },
        { source: 'en', target: 'nb' },
      ])
    );

    expect(await store.availability({ source: 'en', target: 'nb' })).toEqual({ available: true, route: 'direct' });
    expect(await store.availability({ source: 'de', target: 'nb' })).toEqual({ available: true, route: 'pivot' });
    expect(await store.availability({ source: 'en', target: 'pt-BR' })).toEqual({
      available: false,
      reason: 'no package for en → pt',
    });
  });

  it('reports a missing runtime as unavailable', async () => {
    const store = new LocalModelStore(new FakeRuntime(new RuntimeUnavailableError('argospm not found on PATH')));
    expect(await store.availability(EN_NB)).toEqual({ available: false, reason: 'argospm not found on PATH' });
  });
});

describe('LocalModelAdapter', () => {
  it('translates through the installed model', async () => {
    const runtime = new FakeRuntime([EN_NB]);
    const adapter = new LocalModelAdapter(new LocalModelStore(runtime));

    await expect(adapter.translate('Hello', { source: 'en', target: 'nb' })).resolves.toBe('[nb] Hello');
    expect(adapter.kind).toBe('offline');
    expect(adapter.label).toBe('fake-runtime');
  });

  it('runs one inference at a time', async () => {
    const runtime = new FakeRuntime([EN_NB]);
    const adapter = new LocalModelAdapter(new LocalModelStore(runtime));

    const results = await Promise.all(['a', 'b', 'c', 'd'].map((text) => adapter.translate(text, EN_NB)));

    expect(results).toEqual(['[nb] a', '[nb] b', '[nb] c', '[nb] d']);
    expect(runtime.peak).toBe(1);
  });

  it('fails with model-missing when no package covers the pair', async () => {
    const runtime = new FakeRuntime([EN_NB]);
    const error = await failure(new LocalModelAdapter(new LocalModelStore(runtime)).translate('Hallo', { source: 'de', target: 'nb' }));

    expect(error.kind).toBe('model-missing');
    expect(error.backend).toBe('offline');
    expect(error.message).toBe('No offline model installed for de → nb');
    expect(runtime.calls).toEqual([]);
  });

  it('maps runtime failures into the backend taxonomy', async () => {
    const crashing = new FakeRuntime([EN_NB], () => {
      throw new RuntimeProcessError('argos-translate: out of memory', 1, 'out of memory');
    });
    const crashed = await failure(new LocalModelAdapter(new LocalModelStore(crashing)).translate('Hello', EN_NB));
    expect(crashed.kind).toBe('network');
    expect(crashed.message).toBe('Offline model failed: argos-translate: out of memory');

    const vanished = new FakeRuntime([EN_NB], () => {
      throw new RuntimeUnavailableError('argos-translate not found on PATH');
    });
    const missing = await failure(new LocalModelAdapter(new LocalModelStore(vanished)).translate('Hello', EN_NB));
    expect(missing.kind).toBe('model-missing');

    const silent = new FakeRuntime([EN_NB], () => '');
    const empty = await failure(new LocalModelAdapter(new LocalModelStore(silent)).translate('Hello', EN_NB));
    expect(empty.kind).toBe('decode');
  });
});
