export class AutotranslateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised before any catalog is touched: nothing to search, bad settings, missing keys. */
export class ConfigurationError extends AutotranslateError {}

export class CatalogLoadError extends AutotranslateError {
  constructor(public readonly filePath: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** A catalog file that does not follow the PO grammar. Lines are 1-based. */
export class CatalogSyntaxError extends AutotranslateError {
  constructor(public readonly line: number, message: string) {
    super(`Line ${line}: ${message}`);
  }
}

export class CatalogWriteError extends AutotranslateError {
  constructor(public readonly filePath: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * The backend answered with a different number of strings than it was sent.
 * Re-applying such a list would shift every following translation onto the wrong entry.
 */
export class TranslationCountMismatchError extends AutotranslateError {
  constructor(public readonly expected: number, public readonly received: number) {
    super(`Expected ${expected} translations from the backend, received ${received}`);
  }
}

export class PlaceholderMismatchError extends AutotranslateError {
  constructor(
    public readonly msgid: string,
    public readonly expected: number,
    public readonly found: number
  ) {
    super(`Placeholder count mismatch for "${msgid}": expected ${expected}, found ${found} in translation`);
  }
}

export class BackendError extends AutotranslateError {
  constructor(public readonly backend: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
