import { TranslationCountMismatchError } from '../errors.js';

/**
 * Split `strings` into requests of at most `batchSize` and concatenate the
 * answers. Each batch must come back with as many strings as it was sent.
 */
export async function translateInBatches(
  strings: readonly string[],
  batchSize: number,
  translateBatch: (batch: string[]) => Promise<string[]>
): Promise<string[]> {
  const results: string[] = [];
  for (let start = 0; start < strings.length; start += batchSize) {
    const batch = strings.slice(start, start + batchSize);
    const translated = await translateBatch(batch);
    if (translated.length !== batch.length) {
      throw new TranslationCountMismatchError(batch.length, translated.length);
    }
    results.push(...translated);
  }
  return results;
}
