import { PlaceholderMismatchError } from '../errors.js';

const PLACEHOLDER = /%(?:\((\w+)\))?([sd])/g;
const SPACED_PLACEHOLDER = /(\s*)(%(?:\(\w+\))?[sd])(\s*)/g;
const SPACED_TOKEN = /(\s*)(__\w+?__)(\s*)/g;

interface CapturedPlaceholder {
  before: string;
  placeholder: string;
  after: string;
}

export interface FixOptions {
  /** Throw when the translation carries a different number of tokens than msgid has placeholders. */
  strict?: boolean;
}

/**
 * Rewrite printf placeholders into word-like tokens that translation services leave alone.
 *
 *   %(name)s -> __name__
 *   %s       -> __item__
 *   %d       -> __number__
 */
export function humanize(msgid: string): string {
  return msgid.replace(PLACEHOLDER, (_match: string, name: string | undefined, kind: string) => {
    if (name) {
      return `__${name.toLowerCase()}__`;
    }
    return kind === 'd' ? '__number__' : '__item__';
  });
}

/**
 * Put the original placeholders back in place of the tokens, along with the
 * whitespace that surrounded each placeholder in msgid. Matching is positional.
 */
export function restorePlaceholders(msgid: string, translation: string, options: FixOptions = {}): string {
  const placeholders: CapturedPlaceholder[] = Array.from(msgid.matchAll(SPACED_PLACEHOLDER), (match) => ({
    before: match[1] ?? '',
    placeholder: match[2] ?? '',
    after: match[3] ?? '',
  }));

  if (options.strict) {
    const found = translation.match(SPACED_TOKEN)?.length ?? 0;
    if (found !== placeholders.length) {
      throw new PlaceholderMismatchError(msgid, placeholders.length, found);
    }
  }

  let index = 0;
  return translation.replace(SPACED_TOKEN, (match: string) => {
    const original = placeholders[index];
    if (!original) {
      return match;
    }
    index++;
    return `${original.before}${original.placeholder}${original.after}`;
  });
}

// Translation services drop a lot of formatting; put back what msgid had.
export function fixTranslation(msgid: string, translation: string, options: FixOptions = {}): string {
  let fixed = translation;
  if (msgid.startsWith('\n') && !fixed.startsWith('\n')) {
    fixed = `\n${fixed}`;
  }
  if (msgid.endsWith('\n') && !fixed.endsWith('\n')) {
    fixed = `${fixed}\n`;
  }
  return restorePlaceholders(msgid, fixed, options);
}
