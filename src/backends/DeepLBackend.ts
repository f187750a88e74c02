import * as deepl from 'deepl-node';
import { BackendError, errorMessage } from '../errors.js';
import { TranslationBackend } from '../types/index.js';
import { translateInBatches } from './batching.js';

// DeepL accepts at most 50 texts per request
export const DEEPL_BATCH_SIZE = 50;

const SOURCE_LANGUAGES: readonly deepl.SourceLanguageCode[] = [
  'ar', 'bg', 'cs', 'da', 'de', 'el', 'en', 'es', 'et', 'fi', 'fr', 'hu', 'id', 'it', 'ja',
  'ko', 'lt', 'lv', 'nb', 'nl', 'pl', 'pt', 'ro', 'ru', 'sk', 'sl', 'sv', 'tr', 'uk', 'zh',
];

const TARGET_LANGUAGES: readonly deepl.TargetLanguageCode[] = [
  'ar', 'bg', 'cs', 'da', 'de', 'el', 'en-GB', 'en-US', 'es', 'et', 'fi', 'fr', 'hu', 'id', 'it', 'ja',
  'ko', 'lt', 'lv', 'nb', 'nl', 'pl', 'pt-BR', 'pt-PT', 'ro', 'ru', 'sk', 'sl', 'sv', 'tr', 'uk', 'zh',
];

// gettext locale codes that have no exact DeepL counterpart
const TARGET_ALIASES: Record<string, deepl.TargetLanguageCode> = {
  en: 'en-US',
  pt: 'pt-PT',
  no: 'nb',
  'zh-hans': 'zh',
};

/** `pt_BR` -> `pt-br` */
function normalizeLocale(code: string): string {
  return code.replace(/_/g, '-').toLowerCase();
}

export function toDeepLTargetLanguage(code: string): deepl.TargetLanguageCode {
  const normalized = normalizeLocale(code);
  const base = normalized.split('-')[0] ?? normalized;
  const match =
    TARGET_LANGUAGES.find((language) => language.toLowerCase() === normalized) ??
    TARGET_ALIASES[normalized] ??
    TARGET_LANGUAGES.find((language) => language.toLowerCase() === base) ??
    TARGET_ALIASES[base];
  if (!match) {
    throw new BackendError('deepl', `DeepL does not support target language "${code}"`);
  }
  return match;
}

export function toDeepLSourceLanguage(code: string): deepl.SourceLanguageCode {
  const base = normalizeLocale(code).split('-')[0];
  const match = SOURCE_LANGUAGES.find((language) => language === base);
  if (!match) {
    throw new BackendError('deepl', `DeepL does not support source language "${code}"`);
  }
  return match;
}

export class DeepLBackend implements TranslationBackend {
  public readonly name = 'deepl';
  private readonly translator: deepl.Translator;

  constructor(authKey: string) {
    this.translator = new deepl.Translator(authKey);
  }

  async translateStrings(
    strings: string[],
    targetLanguage: string,
    sourceLanguage: string,
    skip: boolean
  ): Promise<string[]> {
    if (skip || strings.length === 0) {
      return [...strings];
    }

    const target = toDeepLTargetLanguage(targetLanguage);
    const source = toDeepLSourceLanguage(sourceLanguage);

    return translateInBatches(strings, DEEPL_BATCH_SIZE, async (batch) => {
      try {
        const results = await this.translator.translateText(batch, source, target, { preserveFormatting: true });
        return results.map((result) => result.text);
      } catch (error) {
        throw new BackendError('deepl', `DeepL request failed: ${errorMessage(error)}`, { cause: error });
      }
    });
  }
}
