import * as path from 'node:path';
import PO from 'pofile';
import { TranslationCountMismatchError } from '../errors.js';
import { CatalogEntry, LocaleQuery, TranslateFileResult, TranslationBackend } from '../types/index.js';
import { createLogger, Logger } from '../utils/logger.js';
import { fixTranslation, humanize } from '../utils/placeholders.js';
import { TranslationCursor } from '../utils/TranslationCursor.js';
import { CatalogWalker, targetLanguageFor } from './CatalogWalker.js';
import { isFuzzy, isTranslated, pluralFormCount, POFileService } from './POFileService.js';

export const DEFAULT_SOURCE_LANGUAGE = 'en';

export interface TranslationServiceOptions {
  backend: TranslationBackend;
  sourceLanguage?: string;
  /** Leave entries that are already translated (and live) alone. */
  skipTranslated?: boolean;
  /** Flag every rewritten entry as fuzzy. */
  setFuzzy?: boolean;
  strictPlaceholders?: boolean;
  logger?: Logger;
  poFileService?: POFileService;
}

export class TranslationService {
  private readonly backend: TranslationBackend;
  private readonly sourceLanguage: string;
  private readonly skipTranslated: boolean;
  private readonly setFuzzy: boolean;
  private readonly strictPlaceholders: boolean;
  private readonly logger: Logger;
  private readonly poFileService: POFileService;

  constructor(options: TranslationServiceOptions) {
    this.backend = options.backend;
    this.sourceLanguage = options.sourceLanguage ?? DEFAULT_SOURCE_LANGUAGE;
    this.skipTranslated = options.skipTranslated ?? false;
    this.setFuzzy = options.setFuzzy ?? false;
    this.strictPlaceholders = options.strictPlaceholders ?? false;
    this.logger = options.logger ?? createLogger('silent');
    this.poFileService = options.poFileService ?? new POFileService();
  }

  // Obsolete entries are never "translated", so they are picked up even in
  // untranslated-only mode.
  public needTranslate(entry: CatalogEntry): boolean {
    return !this.skipTranslated || !isTranslated(entry) || entry.obsolete;
  }

  /**
   * Strings to send to the backend, in catalog order: the humanized msgid of
   * every selected entry, followed by its msgid_plural when it has one.
   */
  public getStringsToTranslate(po: PO): string[] {
    const strings: string[] = [];
    for (const entry of po.items) {
      if (!this.needTranslate(entry)) {
        continue;
      }
      strings.push(humanize(entry.msgid));
      if (entry.msgid_plural) {
        strings.push(humanize(entry.msgid_plural));
      }
    }
    return strings;
  }

  /**
   * Write translations back onto the entries they were extracted from.
   *
   * `translations` must line up with {@link getStringsToTranslate} for the same
   * catalog; a list of any other length is rejected before an entry is touched.
   * Returns the number of entries updated.
   */
  public updateTranslations(po: PO, translations: readonly string[]): number {
    const expected = this.getStringsToTranslate(po).length;
    if (translations.length !== expected) {
      throw new TranslationCountMismatchError(expected, translations.length);
    }

    const nplurals = pluralFormCount(po);
    const cursor = new TranslationCursor(translations);
    const fixOptions = { strict: this.strictPlaceholders };
    let updated = 0;

    for (const entry of po.items) {
      if (!this.needTranslate(entry)) {
        continue;
      }

      if (entry.msgid_plural) {
        // slot 0 takes the singular, every other slot the plural
        const singular = fixTranslation(entry.msgid, cursor.next(), fixOptions);
        const plural = fixTranslation(entry.msgid_plural, cursor.next(), fixOptions);
        const slots = Math.max(entry.msgstr.length, nplurals ?? 0, 1);
        entry.msgstr[0] = singular;
        for (let index = 1; index < slots; index++) {
          entry.msgstr[index] = plural;
        }
      } else {
        entry.msgstr = [fixTranslation(entry.msgid, cursor.next(), fixOptions)];
      }

      if (this.setFuzzy && !isFuzzy(entry)) {
        entry.flags['fuzzy'] = true;
      }
      updated++;
    }

    cursor.assertExhausted();
    return updated;
  }

  public async translateFile(filePath: string, targetLanguage: string): Promise<TranslateFileResult> {
    this.logger.info(`filling up translations for locale \`${targetLanguage}\``);

    const catalog = await this.poFileService.loadCatalog(filePath);
    const strings = this.getStringsToTranslate(catalog.po);
    if (strings.length === 0) {
      this.logger.debug(`${catalog.path}: nothing to translate`);
      return {
        path: catalog.path,
        targetLanguage,
        entries: 0,
        strings: 0,
        stats: this.poFileService.getTranslationStats(catalog.po),
      };
    }

    // one backend call per file; results come back in request order
    const translations = await this.backend.translateStrings(strings, targetLanguage, this.sourceLanguage, false);
    const entries = this.updateTranslations(catalog.po, translations);
    await this.poFileService.saveCatalog(catalog);

    this.logger.debug(`${catalog.path}: ${strings.length} strings sent to ${this.backend.name}, ${entries} entries updated`);
    return {
      path: catalog.path,
      targetLanguage,
      entries,
      strings: strings.length,
      stats: this.poFileService.getTranslationStats(catalog.po),
    };
  }

  /** Translate every catalog the walker finds, strictly one file after another. */
  public async translateAll(walker: CatalogWalker, query: LocaleQuery = {}): Promise<TranslateFileResult[]> {
    const results: TranslateFileResult[] = [];
    for await (const { dirname, filename } of walker.findPOFiles(query)) {
      results.push(await this.translateFile(path.join(dirname, filename), targetLanguageFor(dirname)));
    }
    return results;
  }
}
