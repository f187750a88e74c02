import { TranslationCountMismatchError } from '../errors.js';

/**
 * Hands out backend translations in order while the catalog is walked a
 * second time. Both running out early and finishing with leftovers are errors.
 */
export class TranslationCursor {
  private position = 0;

  constructor(private readonly translations: readonly string[]) {}

  public next(): string {
    const value = this.translations[this.position];
    if (value === undefined) {
      throw new TranslationCountMismatchError(this.position + 1, this.translations.length);
    }
    this.position++;
    return value;
  }

  public get consumed(): number {
    return this.position;
  }

  public assertExhausted(): void {
    if (this.position !== this.translations.length) {
      throw new TranslationCountMismatchError(this.position, this.translations.length);
    }
  }
}
