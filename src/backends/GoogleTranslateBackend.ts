import axios from 'axios';
import { z } from 'zod';
import { BackendError } from '../errors.js';
import { TranslationBackend } from '../types/index.js';
import { translateInBatches } from './batching.js';

export const GOOGLE_TRANSLATE_URL = 'https://translation.googleapis.com/language/translate/v2';
// v2 takes up to 128 text segments per request
export const GOOGLE_BATCH_SIZE = 128;

const LANGUAGE_ALIASES: Record<string, string> = {
  'zh-hans': 'zh-CN',
  'zh-hant': 'zh-TW',
};

const translateResponseSchema = z.object({
  data: z.object({
    translations: z.array(z.object({ translatedText: z.string() })),
  }),
});

/** `pt_BR` -> `pt-BR` */
export function toGoogleLanguage(code: string): string {
  const hyphenated = code.replace(/_/g, '-');
  return LANGUAGE_ALIASES[hyphenated.toLowerCase()] ?? hyphenated;
}

function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status !== undefined ? `HTTP ${status}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

export class GoogleTranslateBackend implements TranslationBackend {
  public readonly name = 'google';

  constructor(private readonly apiKey: string) {}

  async translateStrings(
    strings: string[],
    targetLanguage: string,
    sourceLanguage: string,
    skip: boolean
  ): Promise<string[]> {
    if (skip || strings.length === 0) {
      return [...strings];
    }

    const target = toGoogleLanguage(targetLanguage);
    const source = toGoogleLanguage(sourceLanguage);

    return translateInBatches(strings, GOOGLE_BATCH_SIZE, async (batch) => {
      let body: unknown;
      try {
        const response = await axios.post<unknown>(
          GOOGLE_TRANSLATE_URL,
          { q: batch, target, source, format: 'text' },
          { params: { key: this.apiKey } }
        );
        body = response.data;
      } catch (error) {
        throw new BackendError('google', `Google Translate request failed: ${describeRequestError(error)}`, {
          cause: error,
        });
      }

      const parsed = translateResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new BackendError('google', `Malformed Google Translate response: ${parsed.error.message}`);
      }
      return parsed.data.data.translations.map((translation) => translation.translatedText);
    });
  }
}
