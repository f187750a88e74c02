import { createBackend } from '../backends/index.js';
import { Settings } from '../config/settings.js';
import { CatalogWalker } from '../services/CatalogWalker.js';
import { TranslationService } from '../services/TranslationService.js';
import { TranslateFileResult, TranslationBackend } from '../types/index.js';
import { createLogger, Logger } from '../utils/logger.js';
import { CliOptions } from './program.js';

export interface RunDependencies {
  logger?: Logger;
  backend?: TranslationBackend;
}

export async function runAutotranslate(
  options: CliOptions,
  settings: Settings,
  dependencies: RunDependencies = {}
): Promise<TranslateFileResult[]> {
  const logger = dependencies.logger ?? createLogger(settings.logLevel);
  const backend = dependencies.backend ?? createBackend(settings, options.backend);

  const walker = new CatalogWalker({ root: options.root, localePaths: settings.localePaths, logger });
  const service = new TranslationService({
    backend,
    sourceLanguage: options.sourceLanguage ?? settings.sourceLanguage,
    skipTranslated: options.untranslated,
    setFuzzy: options.setFuzzy,
    strictPlaceholders: options.strictPlaceholders,
    logger,
  });

  const results = await service.translateAll(walker, { locales: options.locale, exclude: options.exclude });

  for (const result of results) {
    const { translated, total } = result.stats;
    logger.info(`${result.path}: ${result.entries} entries updated, ${translated}/${total} translated`);
  }
  logger.info(`Processed ${results.length} catalog${results.length === 1 ? '' : 's'} with ${backend.name}`);

  return results;
}
