import { beforeEach, describe, expect, it, vi } from 'vitest';
import { BackendError } from '../errors.js';
import { GOOGLE_TRANSLATE_URL, GoogleTranslateBackend, toGoogleLanguage } from './GoogleTranslateBackend.js';

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock('axios', () => ({
  default: {
    post,
    isAxiosError: () => false,
  },
}));

describe('toGoogleLanguage', () => {
  it('hyphenates gettext locales', () => {
    expect(toGoogleLanguage('pt_BR')).toBe('pt-BR');
    expect(toGoogleLanguage('fr')).toBe('fr');
    expect(toGoogleLanguage('zh_Hans')).toBe('zh-CN');
  });
});

describe('GoogleTranslateBackend', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('posts the strings and returns translations in order', async () => {
    post.mockResolvedValue({
      data: { data: { translations: [{ translatedText: 'Bonjour' }, { translatedText: 'Au revoir' }] } },
    });
    const backend = new GoogleTranslateBackend('test-key');

    const result = await backend.translateStrings(['Hello', 'Goodbye'], 'fr', 'en', false);

    expect(result).toEqual(['Bonjour', 'Au revoir']);
    expect(post).toHaveBeenCalledWith(
      GOOGLE_TRANSLATE_URL,
      { q: ['Hello', 'Goodbye'], target: 'fr', source: 'en', format: 'text' },
      { params: { key: 'test-key' } }
    );
  });

  it('rejects a malformed response', async () => {
    post.mockResolvedValue({ data: { error: 'nope' } });
    const backend = new GoogleTranslateBackend('test-key');

    await expect(backend.translateStrings(['Hello'], 'fr', 'en', false)).rejects.toThrow(BackendError);
  });

  it('wraps request failures', async () => {
    post.mockRejectedValue(new Error('socket hang up'));
    const backend = new GoogleTranslateBackend('test-key');

    await expect(backend.translateStrings(['Hello'], 'fr', 'en', false)).rejects.toThrow(
      'Google Translate request failed: socket hang up'
    );
  });

  it('skips the request when asked to', async () => {
    const backend = new GoogleTranslateBackend('test-key');

    expect(await backend.translateStrings(['Hello'], 'fr', 'en', true)).toEqual(['Hello']);
    expect(post).not.toHaveBeenCalled();
  });
});
