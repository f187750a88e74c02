import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadSettings } from '../config/settings.js';
import { POFileService } from '../services/POFileService.js';
import { makeTempDir, readFixture, RecordingBackend, removeTempDir, writeTree } from '../test-utils/index.js';
import { createLogger } from '../utils/logger.js';
import { CliOptions } from './program.js';
import { runAutotranslate } from './run.js';

describe('runAutotranslate', () => {
  let root: string;
  let options: CliOptions;

  beforeEach(async () => {
    root = await makeTempDir();
    options = {
      locale: [],
      exclude: [],
      untranslated: false,
      setFuzzy: false,
      strictPlaceholders: false,
      root,
    };
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('translates every catalog with the backend chosen on the command line', async () => {
    const filePath = await writeTree(root, 'locale/es/LC_MESSAGES/django.po', await readFixture('es.po'));
    const settings = loadSettings({ LOG_LEVEL: 'silent' });

    const results = await runAutotranslate({ ...options, backend: 'echo' }, settings);

    expect(results).toHaveLength(1);
    expect(results[0]?.entries).toBe(5);
    const po = (await new POFileService().loadCatalog(filePath)).po;
    expect(po.items.find((item) => item.msgid === 'One file')?.msgstr).toEqual(['One file', '%d files']);
    expect(po.items.find((item) => item.msgid === 'Hello %(name)s, you have %d items\n')?.msgstr).toEqual([
      'Hello %(name)s, you have %d items\n',
    ]);
  });

  it('passes locale filters and languages through', async () => {
    const fixture = await readFixture('es.po');
    await writeTree(root, 'locale/es/LC_MESSAGES/django.po', fixture);
    await writeTree(root, 'locale/fr/LC_MESSAGES/django.po', fixture);
    await writeTree(root, 'locale/it/LC_MESSAGES/django.po', fixture);
    const backend = new RecordingBackend();

    await runAutotranslate(
      { ...options, exclude: ['fr'], untranslated: true, sourceLanguage: 'en_GB' },
      loadSettings({}),
      { backend, logger: createLogger('silent') }
    );

    expect(backend.calls.map((call) => [call.targetLanguage, call.sourceLanguage, call.strings.length])).toEqual([
      ['es', 'en_GB', 5],
      ['it', 'en_GB', 5],
    ]);
  });
});
