import { describe, expect, it, vi } from 'vitest';
import { TranslationCountMismatchError } from '../errors.js';
import { translateInBatches } from './batching.js';

describe('translateInBatches', () => {
  it('splits requests and keeps the original order', async () => {
    const translateBatch = vi.fn(async (batch: string[]) => batch.map((text) => text.toUpperCase()));

    const result = await translateInBatches(['a', 'b', 'c', 'd', 'e'], 2, translateBatch);

    expect(result).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(translateBatch.mock.calls.map(([batch]) => batch)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('makes no request for an empty list', async () => {
    const translateBatch = vi.fn(async (batch: string[]) => batch);

    expect(await translateInBatches([], 10, translateBatch)).toEqual([]);
    expect(translateBatch).not.toHaveBeenCalled();
  });

  it('fails when a batch comes back short', async () => {
    const translateBatch = vi.fn(async (batch: string[]) => batch.slice(1));

    await expect(translateInBatches(['a', 'b', 'c'], 2, translateBatch)).rejects.toThrow(TranslationCountMismatchError);
  });
});
