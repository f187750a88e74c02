import { TranslationBackend } from '../types/index.js';

/** Returns every string untouched. Useful for dry runs and for checking placeholder handling offline. */
export class EchoBackend implements TranslationBackend {
  public readonly name = 'echo';

  async translateStrings(strings: string[]): Promise<string[]> {
    return [...strings];
  }
}
