import { describe, expect, it } from 'vitest';
import { loadSettings } from '../config/settings.js';
import { ConfigurationError } from '../errors.js';
import { createBackend, EchoBackend, GoogleTranslateBackend } from './index.js';

describe('createBackend', () => {
  it('builds the configured backend', () => {
    const settings = loadSettings({ AUTOTRANSLATE_BACKEND: 'google', GOOGLE_TRANSLATE_KEY: 'test-key' });
    expect(createBackend(settings)).toBeInstanceOf(GoogleTranslateBackend);
  });

  it('lets the caller pick another backend', () => {
    const settings = loadSettings({});
    expect(createBackend(settings, 'echo')).toBeInstanceOf(EchoBackend);
  });

  it('requires a key for the remote backends', () => {
    const settings = loadSettings({});
    expect(() => createBackend(settings)).toThrow(ConfigurationError);
    expect(() => createBackend(settings, 'google')).toThrow('GOOGLE_TRANSLATE_KEY must be set');
  });
});

describe('EchoBackend', () => {
  it('returns the strings unchanged', async () => {
    expect(await new EchoBackend().translateStrings(['__item__ left'])).toEqual(['__item__ left']);
  });
});
