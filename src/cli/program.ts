import { Command, Option } from 'commander';
import { BACKEND_NAMES, BackendName } from '../config/settings.js';

export type CliOptions = {
  locale: string[];
  exclude: string[];
  untranslated: boolean;
  setFuzzy: boolean;
  backend?: BackendName;
  sourceLanguage?: string;
  strictPlaceholders: boolean;
  root: string;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(run: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name('po-autotranslate')
    .description('Autotranslate all the message files generated by the message-extraction step.')
    .version('1.0.0')
    .option(
      '-l, --locale <code>',
      'autotranslate the message files for the given locale(s) (e.g. pt_BR). can be used multiple times.',
      collect,
      []
    )
    .option('-x, --exclude <code>', 'locales to exclude. can be used multiple times.', collect, [])
    .option('-u, --untranslated', 'autotranslate the fuzzy and empty messages only.', false)
    .option('-f, --set-fuzzy', 'set the fuzzy flag on autotranslated messages.', false)
    .addOption(new Option('-b, --backend <name>', 'translation backend (overrides AUTOTRANSLATE_BACKEND)').choices(BACKEND_NAMES))
    .option('-s, --source-language <code>', 'language of the msgids (overrides AUTOTRANSLATE_SOURCE_LANGUAGE)')
    .option('--strict-placeholders', 'fail when a translation loses or gains a placeholder', false)
    .option('--root <dir>', 'project root to search for locale directories', process.cwd())
    .action(async () => {
      await run(program.opts<CliOptions>());
    });

  return program;
}
