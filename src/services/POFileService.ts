import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import PO from 'pofile';
import { CatalogLoadError, CatalogWriteError, errorMessage } from '../errors.js';
import { Catalog, CatalogEntry, TranslationStats } from '../types/index.js';
import { CatalogSource, renderCatalog, scanCatalog, SourceEntry } from '../utils/poSource.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isFuzzy(entry: CatalogEntry): boolean {
  return Boolean(entry.flags['fuzzy']);
}

/** An entry counts as translated when it is live, not fuzzy, and every slot it has is filled. */
export function isTranslated(entry: CatalogEntry): boolean {
  if (entry.obsolete || isFuzzy(entry)) {
    return false;
  }
  if (entry.msgid_plural) {
    return entry.msgstr.length > 0 && entry.msgstr.every((str) => str !== '');
  }
  return (entry.msgstr[0] ?? '') !== '';
}

/** Number of plural forms declared by the catalog's Plural-Forms header, if any. */
export function pluralFormCount(po: PO): number | undefined {
  const header = po.headers['Plural-Forms'];
  if (!header) {
    return undefined;
  }
  const match = /nplurals\s*=\s*(\d+)/.exec(header);
  const nplurals = Number(match?.[1]);
  return Number.isInteger(nplurals) && nplurals > 0 ? nplurals : undefined;
}

function toEntry(scanned: SourceEntry): CatalogEntry {
  const entry = new PO.Item();
  entry.msgid = scanned.msgid;
  if (scanned.msgctxt !== undefined) {
    entry.msgctxt = scanned.msgctxt;
  }
  if (scanned.msgidPlural !== undefined) {
    entry.msgid_plural = scanned.msgidPlural;
  }
  entry.msgstr = [...scanned.msgstr];
  entry.references = [...scanned.references];
  entry.comments = [...scanned.comments];
  entry.extractedComments = [...scanned.extractedComments];
  scanned.flags.forEach((flag) => {
    entry.flags[flag] = true;
  });
  entry.obsolete = scanned.obsolete;
  return entry;
}

export class POFileService {
  /**
   * The scan validates the whole file and builds the entries; pofile only
   * parses the header block.
   */
  public parseCatalog(filePath: string, content: string): Catalog {
    let source: CatalogSource;
    try {
      source = scanCatalog(content);
    } catch (error) {
      throw new CatalogLoadError(filePath, `Invalid PO file format: ${filePath}. ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const { header } = source;
    const po = header ? PO.parse(source.lines.slice(header.start, header.msgstrEnd).join('\n')) : new PO();
    po.items = source.entries.map(toEntry);
    return { path: filePath, po, source };
  }

  public async loadCatalog(filePath: string): Promise<Catalog> {
    const absolutePath = path.resolve(filePath);
    let content: string;
    try {
      content = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new CatalogLoadError(absolutePath, `File not found: ${filePath}`, { cause: error });
      }
      throw new CatalogLoadError(absolutePath, `Failed to load PO file ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return this.parseCatalog(absolutePath, content);
  }

  public async saveCatalog(catalog: Catalog): Promise<void> {
    try {
      await fs.writeFile(catalog.path, renderCatalog(catalog.source, catalog.po.items), 'utf-8');
    } catch (error) {
      throw new CatalogWriteError(catalog.path, `Failed to save PO file ${catalog.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  public getTranslationStats(po: PO): TranslationStats {
    const stats: TranslationStats = {
      total: po.items.length,
      translated: 0,
      untranslated: 0,
      fuzzy: 0,
      obsolete: 0,
    };

    po.items.forEach((entry) => {
      if (entry.obsolete) {
        stats.obsolete++;
      } else if (isFuzzy(entry)) {
        stats.fuzzy++;
      } else if (isTranslated(entry)) {
        stats.translated++;
      } else {
        stats.untranslated++;
      }
    });

    return stats;
  }
}
