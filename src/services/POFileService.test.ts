import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import PO from 'pofile';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CatalogLoadError } from '../errors.js';
import { CatalogEntry } from '../types/index.js';
import { makeTempDir, readFixture, removeTempDir, writeTree } from '../test-utils/index.js';
import { isFuzzy, isTranslated, pluralFormCount, POFileService } from './POFileService.js';

function entry(
  fields: Partial<Pick<CatalogEntry, 'msgid' | 'msgid_plural' | 'msgstr' | 'obsolete'>>,
  fuzzy = false
): CatalogEntry {
  const item = new PO.Item();
  Object.assign(item, fields);
  if (fuzzy) {
    item.flags['fuzzy'] = true;
  }
  return item;
}

describe('isTranslated', () => {
  it('needs a non-empty msgstr for singular entries', () => {
    expect(isTranslated(entry({ msgid: 'Yes', msgstr: ['Sí'] }))).toBe(true);
    expect(isTranslated(entry({ msgid: 'Yes', msgstr: [''] }))).toBe(false);
    expect(isTranslated(entry({ msgid: 'Yes', msgstr: [] }))).toBe(false);
  });

  it('needs every plural slot filled', () => {
    expect(isTranslated(entry({ msgid: 'One', msgid_plural: 'Many', msgstr: ['Uno', 'Varios'] }))).toBe(true);
    expect(isTranslated(entry({ msgid: 'One', msgid_plural: 'Many', msgstr: ['Uno', ''] }))).toBe(false);
  });

  it('never counts fuzzy or obsolete entries', () => {
    expect(isTranslated(entry({ msgid: 'Yes', msgstr: ['Sí'] }, true))).toBe(false);
    expect(isTranslated(entry({ msgid: 'Yes', msgstr: ['Sí'], obsolete: true }))).toBe(false);
  });
});

describe('isFuzzy', () => {
  it('reads the fuzzy flag', () => {
    expect(isFuzzy(entry({ msgid: 'Yes' }, true))).toBe(true);
    expect(isFuzzy(entry({ msgid: 'Yes' }))).toBe(false);
  });
});

describe('POFileService', () => {
  const service = new POFileService();
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reads the plural form count from the header', async () => {
    const catalog = service.parseCatalog('es.po', await readFixture('es.po'));
    expect(pluralFormCount(catalog.po)).toBe(2);
    expect(pluralFormCount(new PO())).toBeUndefined();
  });

  it('computes translation statistics', async () => {
    const catalog = service.parseCatalog('es.po', await readFixture('es.po'));
    expect(service.getTranslationStats(catalog.po)).toEqual({
      total: 5,
      translated: 1,
      untranslated: 2,
      fuzzy: 1,
      obsolete: 1,
    });
  });

  it('loads a catalog by path', async () => {
    const filePath = await writeTree(root, 'locale/es/LC_MESSAGES/django.po', await readFixture('es.po'));
    const catalog = await service.loadCatalog(filePath);
    expect(catalog.path).toBe(path.resolve(filePath));
    expect(catalog.po.items.map((item) => item.msgid)).toEqual([
      'Hello %(name)s, you have %d items\n',
      'Welcome',
      'Goodbye',
      'One file',
      'Old message',
    ]);
  });

  it('reports a missing file', async () => {
    const missing = path.join(root, 'missing.po');
    await expect(service.loadCatalog(missing)).rejects.toThrow(CatalogLoadError);
    await expect(service.loadCatalog(missing)).rejects.toThrow(`File not found: ${missing}`);
  });

  it('writes changes back to the same path', async () => {
    const filePath = await writeTree(root, 'django.po', await readFixture('es.po'));
    const catalog = await service.loadCatalog(filePath);
    const welcome = catalog.po.items.find((item) => item.msgid === 'Welcome');
    expect(welcome).toBeDefined();
    if (welcome) {
      welcome.msgstr = ['Bienvenida'];
    }

    await service.saveCatalog(catalog);

    const reloaded = await service.loadCatalog(filePath);
    expect(reloaded.po.items.find((item) => item.msgid === 'Welcome')?.msgstr).toEqual(['Bienvenida']);
    expect(reloaded.po.headers['Plural-Forms']).toBe('nplurals=2; plural=(n != 1);');
    expect(await fs.readFile(filePath, 'utf-8')).toMatch(/\n$/);
  });

  it('rewrites only the lines of entries that changed', async () => {
    const original = [
      'msgid ""',
      'msgstr ""',
      '"Content-Type: text/plain; charset=UTF-8\\n"',
      '',
      '#, fuzzy',
      '#| msgid "Old %s"',
      'msgid "New %s"',
      'msgstr "Viejo %s"',
      '',
      '#: app/models.py:3',
      'msgid "Plain"',
      'msgstr ""',
      '',
    ].join('\n');
    const filePath = await writeTree(root, 'django.po', original);
    const catalog = await service.loadCatalog(filePath);

    await service.saveCatalog(catalog);
    expect(await fs.readFile(filePath, 'utf-8')).toBe(original);

    const plain = catalog.po.items.find((item) => item.msgid === 'Plain');
    expect(plain).toBeDefined();
    if (plain) {
      plain.msgstr = ['Sencillo'];
      plain.flags['fuzzy'] = true;
    }
    await service.saveCatalog(catalog);

    expect(await fs.readFile(filePath, 'utf-8')).toBe(
      [
        'msgid ""',
        'msgstr ""',
        '"Content-Type: text/plain; charset=UTF-8\\n"',
        '',
        '#, fuzzy',
        '#| msgid "Old %s"',
        'msgid "New %s"',
        'msgstr "Viejo %s"',
        '',
        '#: app/models.py:3',
        '#, fuzzy',
        'msgid "Plain"',
        'msgstr "Sencillo"',
        '',
      ].join('\n')
    );
  });

  it('rejects a malformed catalog', () => {
    const parse = () =>
      service.parseCatalog('bad.po', 'msgid "unterminated\nthis is not po at all {{{\nmsgstr');
    expect(parse).toThrow(CatalogLoadError);
    expect(parse).toThrow('Invalid PO file format: bad.po. Line 1: malformed string "unterminated');
  });
});
