import { CatalogSyntaxError } from '../errors.js';
import { CatalogEntry } from '../types/index.js';

/**
 * Line-level reading and patching of PO files.
 *
 * Scanning checks the file against the PO grammar and records, for every
 * entry, where its flags and msgstr lines sit. Rendering starts from the
 * original lines and rewrites only the msgstr and `#,` lines of entries whose
 * translation or flags changed, so headers, comments, `#|` lines and the
 * wrapping of untouched strings come back exactly as they were read.
 */

export interface SourceEntry {
  msgctxt?: string;
  msgid: string;
  msgidPlural?: string;
  msgstr: string[];
  flags: string[];
  references: string[];
  comments: string[];
  extractedComments: string[];
  obsolete: boolean;
  /** First line of the entry, comments included (0-based). */
  start: number;
  /** First msgctxt or msgid line. */
  keywords: number;
  flagsLines: number[];
  /** First `#|` line, before which a new flags line goes. */
  previousLine?: number;
  msgstrStart: number;
  /** One past the last msgstr line. */
  msgstrEnd: number;
}

export interface CatalogSource {
  lines: string[];
  eol: string;
  /** The `msgid ""` entry holding the headers, when the file has one. */
  header?: SourceEntry;
  entries: SourceEntry[];
}

type Field = 'msgctxt' | 'msgid' | 'msgidPlural' | 'msgstr';

interface Draft {
  start: number;
  keywords?: number;
  obsolete?: boolean;
  msgctxt?: string;
  msgid?: string;
  msgidPlural?: string;
  msgstr: string[];
  msgstrStart?: number;
  msgstrEnd: number;
  field?: Field;
  flags: string[];
  flagsLines: number[];
  previousLine?: number;
  references: string[];
  comments: string[];
  extractedComments: string[];
}

const KEYWORD = /^(msgctxt|msgid_plural|msgid|msgstr)(?:\[(\d+)\])?\s*(.*)$/;
const QUOTED = /^"((?:[^"\\]|\\.)*)"$/;

const UNESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
};

function unescape(value: string): string {
  return value.replace(/\\(.)/g, (_match: string, char: string) => UNESCAPES[char] ?? char);
}

function escape(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

function quoted(text: string, line: number): string {
  const match = QUOTED.exec(text.trim());
  if (!match) {
    throw new CatalogSyntaxError(line, `malformed string ${text.trim()}`);
  }
  return unescape(match[1] ?? '');
}

function newDraft(start: number): Draft {
  return {
    start,
    msgstr: [],
    msgstrEnd: start,
    flags: [],
    flagsLines: [],
    references: [],
    comments: [],
    extractedComments: [],
  };
}

function isComplete(draft: Draft): boolean {
  return draft.msgstrStart !== undefined;
}

function toEntry(draft: Draft): SourceEntry {
  if (draft.msgid === undefined || draft.keywords === undefined || draft.msgstrStart === undefined) {
    throw new CatalogSyntaxError((draft.keywords ?? draft.start) + 1, 'entry has no msgstr');
  }
  return {
    msgctxt: draft.msgctxt,
    msgid: draft.msgid,
    msgidPlural: draft.msgidPlural,
    msgstr: draft.msgstr,
    flags: draft.flags,
    references: draft.references,
    comments: draft.comments,
    extractedComments: draft.extractedComments,
    obsolete: draft.obsolete ?? false,
    start: draft.start,
    keywords: draft.keywords,
    flagsLines: draft.flagsLines,
    previousLine: draft.previousLine,
    msgstrStart: draft.msgstrStart,
    msgstrEnd: draft.msgstrEnd,
  };
}

export function scanCatalog(content: string): CatalogSource {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(/\r?\n/);
  const entries: SourceEntry[] = [];
  let draft: Draft | undefined;

  const finish = (current: Draft | undefined): undefined => {
    if (current?.keywords !== undefined) {
      entries.push(toEntry(current));
    }
    return undefined;
  };

  for (const [index, raw] of lines.entries()) {
    const lineNo = index + 1;
    let text = raw.trim();
    if (text === '') {
      continue;
    }

    let obsolete = false;
    if (text.startsWith('#~')) {
      text = text.slice(2).trim();
      obsolete = true;
      if (text.startsWith('|')) {
        text = `#${text}`;
      }
    }

    if (text.startsWith('#')) {
      if (draft && isComplete(draft)) {
        draft = finish(draft);
      } else if (draft?.keywords !== undefined) {
        throw new CatalogSyntaxError(lineNo, 'comment inside an entry, expected msgstr');
      }
      const current = draft ?? newDraft(index);
      draft = current;
      const marker = text.charAt(1);
      const body = text.slice(2).trim();
      if (marker === ',') {
        for (const flag of body.split(',').map((part) => part.trim())) {
          if (flag && !current.flags.includes(flag)) {
            current.flags.push(flag);
          }
        }
        current.flagsLines.push(index);
      } else if (marker === '|') {
        current.previousLine ??= index;
      } else if (marker === ':') {
        current.references.push(body);
      } else if (marker === '.') {
        current.extractedComments.push(body);
      } else {
        current.comments.push(text.slice(1).trim());
      }
      continue;
    }

    const keyword = KEYWORD.exec(text);
    if (!keyword) {
      if (!text.startsWith('"')) {
        throw new CatalogSyntaxError(lineNo, `unexpected content ${text}`);
      }
      if (!draft?.field || draft.obsolete !== obsolete) {
        throw new CatalogSyntaxError(lineNo, 'string continuation outside an entry');
      }
      const value = quoted(text, lineNo);
      const field = draft.field;
      if (field === 'msgstr') {
        const slot = draft.msgstr.length - 1;
        draft.msgstr[slot] = `${draft.msgstr[slot] ?? ''}${value}`;
        draft.msgstrEnd = index + 1;
      } else {
        draft[field] = `${draft[field] ?? ''}${value}`;
      }
      continue;
    }

    const [, name, slot, rest = ''] = keyword;
    if (slot !== undefined && name !== 'msgstr') {
      throw new CatalogSyntaxError(lineNo, `unexpected ${name}[${slot}]`);
    }
    const value = quoted(rest, lineNo);

    if (name === 'msgctxt' || name === 'msgid') {
      if (draft && isComplete(draft)) {
        draft = finish(draft);
      }
      const current = draft ?? newDraft(index);
      draft = current;
      if (current.msgid !== undefined || (name === 'msgctxt' && current.msgctxt !== undefined)) {
        throw new CatalogSyntaxError(lineNo, `unexpected ${name}`);
      }
      if (current.obsolete !== undefined && current.obsolete !== obsolete) {
        throw new CatalogSyntaxError(lineNo, 'entry mixes obsolete and live lines');
      }
      current.obsolete = obsolete;
      current.keywords ??= index;
      if (name === 'msgctxt') {
        current.msgctxt = value;
        current.field = 'msgctxt';
      } else {
        current.msgid = value;
        current.field = 'msgid';
      }
      continue;
    }

    if (!draft || draft.msgid === undefined) {
      throw new CatalogSyntaxError(lineNo, `${name} without msgid`);
    }
    if (draft.obsolete !== obsolete) {
      throw new CatalogSyntaxError(lineNo, 'entry mixes obsolete and live lines');
    }

    if (name === 'msgid_plural') {
      if (draft.msgidPlural !== undefined || isComplete(draft)) {
        throw new CatalogSyntaxError(lineNo, 'unexpected msgid_plural');
      }
      draft.msgidPlural = value;
      draft.field = 'msgidPlural';
      continue;
    }

    const plural = draft.msgidPlural !== undefined;
    if (plural !== (slot !== undefined)) {
      throw new CatalogSyntaxError(lineNo, plural ? 'plural entry needs msgstr[n]' : 'msgstr[n] without msgid_plural');
    }
    const expectedSlot = plural ? draft.msgstr.length : 0;
    if (Number(slot ?? 0) !== expectedSlot || (!plural && isComplete(draft))) {
      throw new CatalogSyntaxError(lineNo, `unexpected ${text.split(/\s/)[0] ?? name}`);
    }
    draft.msgstr.push(value);
    draft.msgstrStart ??= index;
    draft.msgstrEnd = index + 1;
    draft.field = 'msgstr';
  }

  finish(draft);

  const [first, ...rest] = entries;
  if (first && first.msgid === '' && first.msgctxt === undefined && !first.obsolete) {
    return { lines, eol, header: first, entries: rest };
  }
  return { lines, eol, entries };
}

function formatString(keyword: string, value: string, prefix: string): string[] {
  const segments = value.split(/(?<=\n)/).filter((segment) => segment !== '');
  if (segments.length <= 1) {
    return [`${prefix}${keyword} "${escape(value)}"`];
  }
  return [`${prefix}${keyword} ""`, ...segments.map((segment) => `${prefix}"${escape(segment)}"`)];
}

function formatMsgstr(entry: CatalogEntry, prefix: string): string[] {
  if (entry.msgid_plural) {
    return entry.msgstr.flatMap((value, slot) => formatString(`msgstr[${slot}]`, value, prefix));
  }
  return formatString('msgstr', entry.msgstr[0] ?? '', prefix);
}

function activeFlags(entry: CatalogEntry): string[] {
  return Object.keys(entry.flags).filter((flag) => entry.flags[flag]);
}

function sameList(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((value, index) => value === right[index]);
}

/**
 * Produce the file content for `entries`, which must be the entries scanned
 * from `source`, in the same order.
 */
export function renderCatalog(source: CatalogSource, entries: readonly CatalogEntry[]): string {
  if (entries.length !== source.entries.length) {
    throw new Error(`Catalog has ${entries.length} entries but ${source.entries.length} were read from the file`);
  }

  const lines = [...source.lines];
  // bottom-up, so the line numbers of earlier entries stay valid
  for (let index = source.entries.length - 1; index >= 0; index--) {
    const scanned = source.entries[index];
    const entry = entries[index];
    if (!scanned || !entry) {
      continue;
    }
    const prefix = scanned.obsolete ? '#~ ' : '';

    if (!sameList(entry.msgstr, scanned.msgstr)) {
      lines.splice(scanned.msgstrStart, scanned.msgstrEnd - scanned.msgstrStart, ...formatMsgstr(entry, prefix));
    }

    const flags = activeFlags(entry);
    if (!sameList(flags, scanned.flags)) {
      const flagsLine = flags.length > 0 ? [`#, ${flags.join(', ')}`] : [];
      const [firstFlagsLine, ...extraFlagsLines] = scanned.flagsLines;
      if (firstFlagsLine === undefined) {
        lines.splice(scanned.previousLine ?? scanned.keywords, 0, ...flagsLine);
      } else {
        for (const line of [...extraFlagsLines].reverse()) {
          lines.splice(line, 1);
        }
        lines.splice(firstFlagsLine, 1, ...flagsLine);
      }
    }
  }

  return lines.join(source.eol);
}
