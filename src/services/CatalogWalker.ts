import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { ConfigurationError, errorMessage } from '../errors.js';
import { CatalogLocation, LocaleQuery } from '../types/index.js';
import { createLogger, Logger } from '../utils/logger.js';

export const CATALOG_EXTENSION = '.po';

export interface CatalogWalkerOptions {
  /** Project root to search from. */
  root: string;
  /** Extra locale directories, relative to root or absolute. */
  localePaths?: string[];
  logger?: Logger;
}

/** The locale code of a catalog is the name of the directory above LC_MESSAGES. */
export function targetLanguageFor(dirname: string): string {
  return path.basename(path.dirname(dirname));
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Finds catalogs laid out the way gettext-based web frameworks expect them:
 * `<basedir>/<locale>/LC_MESSAGES/*.po`, where a basedir is `conf/locale`,
 * `locale`, any directory named `locale` below the root, or a configured path.
 */
export class CatalogWalker {
  private readonly root: string;
  private readonly localePaths: string[];
  private readonly logger: Logger;

  constructor(options: CatalogWalkerOptions) {
    this.root = path.resolve(options.root);
    this.localePaths = options.localePaths ?? [];
    this.logger = options.logger ?? createLogger('silent');
  }

  public async findBaseDirs(): Promise<string[]> {
    const candidates = [
      path.join(this.root, 'conf', 'locale'),
      path.join(this.root, 'locale'),
      ...this.localePaths.map((localePath) => path.resolve(this.root, localePath)),
    ];

    try {
      const nested = await glob('**/locale/', {
        cwd: this.root,
        absolute: true,
        ignore: ['**/node_modules/**'],
      });
      candidates.push(...nested);
    } catch (error) {
      throw new ConfigurationError(`Failed to search ${this.root} for locale directories: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const unique = [...new Set(candidates.map((candidate) => path.resolve(candidate)))];
    const existing: string[] = [];
    for (const candidate of unique) {
      if (await isDirectory(candidate)) {
        existing.push(candidate);
      }
    }

    if (existing.length === 0) {
      throw new ConfigurationError(
        `No locale directories found under ${this.root}. Run from the project or app tree, or configure LOCALE_PATHS.`
      );
    }

    return existing.sort();
  }

  public async listLocales(basedir: string): Promise<string[]> {
    const dirents = await fs.readdir(basedir, { withFileTypes: true });
    return dirents
      .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith('.'))
      .map((dirent) => dirent.name);
  }

  /**
   * Yield every catalog under the base directories, one at a time.
   *
   * Without explicit locales every locale directory found is searched. The
   * exclude list always applies; excluding every locale yields nothing.
   */
  public async *findPOFiles(query: LocaleQuery = {}): AsyncGenerator<CatalogLocation> {
    const basedirs = await this.findBaseDirs();
    const requested = query.locales ?? [];
    const excluded = new Set(query.exclude ?? []);

    const allLocales: string[] = [];
    if (requested.length === 0) {
      for (const basedir of basedirs) {
        allLocales.push(...(await this.listLocales(basedir)));
      }
    }

    const candidates = requested.length > 0 ? requested : allLocales;
    const locales = [...new Set(candidates)].filter((locale) => !excluded.has(locale)).sort();
    if (candidates.length > 0 && locales.length === 0) {
      this.logger.warn('Every locale is excluded, nothing to translate');
      return;
    }

    for (const basedir of basedirs) {
      const dirs = locales.length > 0 ? locales.map((locale) => path.join(basedir, locale, 'LC_MESSAGES')) : [basedir];
      for (const dir of dirs) {
        if (!(await isDirectory(dir))) {
          continue;
        }
        const files = await glob(`**/*${CATALOG_EXTENSION}`, { cwd: dir, nodir: true });
        for (const file of files.sort()) {
          const fullPath = path.join(dir, file);
          this.logger.debug(`found catalog ${fullPath}`);
          yield { dirname: path.dirname(fullPath), filename: path.basename(fullPath) };
        }
      }
    }
  }
}
