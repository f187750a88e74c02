#!/usr/bin/env node

import 'dotenv/config';
import { createProgram } from './cli/program.js';
import { runAutotranslate } from './cli/run.js';
import { loadSettings } from './config/settings.js';
import { errorMessage } from './errors.js';

const program = createProgram(async (options) => {
  await runAutotranslate(options, loadSettings());
});

program.parseAsync().catch((error: unknown) => {
  console.error(`po-autotranslate: ${errorMessage(error)}`);
  process.exit(1);
});
