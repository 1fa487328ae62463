import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@/services/utils/errors';
import { DEFAULT_API_URL, loadSettings, readEnvSettings } from './index';

let dir: string;

const writeConfig = (content: unknown): string => {
  const file = path.join(dir, 'settings.json');
  fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  return file;
};

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'srt-translate-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadSettings', () => {
  it('uses the defaults when nothing is set', () => {
    const settings = loadSettings({ env: {} });

    expect(settings.apiUrl).toBe(DEFAULT_API_URL);
    expect(settings.sourceLanguage).toBe('en');
    expect(settings.targetLanguage).toBe('nb');
    expect(settings.mode).toBe('api');
    expect(settings.failurePolicy).toBe('lenient');
    expect(settings.maxConcurrentJobs).toBe(4);
    expect(settings.requestTimeout).toBe(30);
  });

  it('layers file < environment < overrides', () => {
    const configPath = writeConfig({ mode: 'offline', targetLanguage: 'de', failurePolicy: 'strict' });
    const settings = loadSettings({
      configPath,
      env: { SRT_TRANSLATE_TARGET: 'sv', MAX_CONCURRENT_JOBS: '8' },
      overrides: { targetLanguage: 'fi', sourceLanguage: undefined },
    });

    expect(settings.mode).toBe('offline');
    expect(settings.failurePolicy).toBe('strict');
    expect(settings.maxConcurrentJobs).toBe(8);
    expect(settings.targetLanguage).toBe('fi');
    expect(settings.sourceLanguage).toBe('en');
  });

  it('reads the settings file named in the environment', () => {
    const configPath = writeConfig({ port: 9001 });
    expect(loadSettings({ env: { SRT_TRANSLATE_CONFIG: configPath } }).port).toBe(9001);
  });

  it('merges offline settings key by key', () => {
    const configPath = writeConfig({ offline: { translateBinary: '/opt/argos/bin/argos-translate' } });
    const settings = loadSettings({ configPath, env: { ARGOSPM_BIN: '/opt/argos/bin/argospm' } });

    expect(settings.offline).toEqual({
      translateBinary: '/opt/argos/bin/argos-translate',
      packageManagerBinary: '/opt/argos/bin/argospm',
    });
  });

  it('disables the API when the URL is empty', () => {
    const configPath = writeConfig({ apiUrl: '' });
    expect(loadSettings({ configPath, env: {} }).apiUrl).toBeUndefined();
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ env: { SRT_TRANSLATE_MODE: 'cloud' } })).toThrow(ConfigError);
    expect(() => loadSettings({ env: { SRT_TRANSLATE_MODE: 'cloud' } })).toThrow(
      /^Invalid configuration: mode: /
    );
    expect(() => loadSettings({ env: { MAX_CONCURRENT_JOBS: 'many' } })).toThrow(/maxConcurrentJobs/);
  });

  it('accepts only http(s) endpoints', () => {
    expect(() => loadSettings({ env: {}, overrides: { apiUrl: 'not a url' } })).toThrow(/apiUrl/);
    expect(() => loadSettings({ env: {}, overrides: { apiUrl: 'ftp://translate.test/translate' } })).toThrow(ConfigError);
    expect(loadSettings({ env: {}, overrides: { apiUrl: 'https://translate.test/translate' } }).apiUrl).toBe(
      'https://translate.test/translate'
    );
  });

  it('rejects unknown keys and unreadable files', () => {
    expect(() => loadSettings({ configPath: writeConfig({ colour: 'blue' }), env: {} })).toThrow(ConfigError);
    expect(() => loadSettings({ configPath: writeConfig('{ not json'), env: {} })).toThrow(
      /^Cannot read settings file /
    );
    expect(() => loadSettings({ configPath: path.join(dir, 'missing.json'), env: {} })).toThrow(ConfigError);
  });
});

describe('readEnvSettings', () => {
  it('omits unset variables', () => {
    expect(readEnvSettings({ SRT_TRANSLATE_API_KEY: 'test-secret', SRT_TRANSLATE_TIMEOUT: '5' })).toEqual({
      apiKey: 'test-secret',
      requestTimeout: 5,
    });
  });
});
