import PO from 'pofile';
import { CatalogSource } from '../utils/poSource.js';

export interface Catalog {
  path: string;
  po: PO;
  /** The file as it was read; saving patches it rather than re-serializing `po`. */
  source: CatalogSource;
}

export type CatalogEntry = InstanceType<typeof PO.Item>;

export interface TranslationStats {
  total: number;
  translated: number;
  untranslated: number;
  fuzzy: number;
  obsolete: number;
}

/**
 * Machine-translation service seen as a black box.
 *
 * Implementations must return exactly one translation per input string, in
 * the same order, however they batch requests internally. With `skip` set
 * they return the input unchanged and make no network call.
 */
export interface TranslationBackend {
  readonly name: string;
  translateStrings(
    strings: string[],
    targetLanguage: string,
    sourceLanguage: string,
    skip: boolean
  ): Promise<string[]>;
}

export interface LocaleQuery {
  /** Locale codes to restrict the search to; empty means every locale found. */
  locales?: string[];
  exclude?: string[];
}

export interface CatalogLocation {
  dirname: string;
  filename: string;
}

export interface TranslateFileResult {
  path: string;
  targetLanguage: string;
  /** Entries whose translation was rewritten. */
  entries: number;
  /** Strings sent to the backend. */
  strings: number;
  stats: TranslationStats;
}
