/**
 * Runtime settings, read from the environment.
 *
 * The entry points load a `.env` file through dotenv first; everything here
 * works on whatever `env` it is handed so that callers and tests can pass
 * their own.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { LOG_LEVELS, LogLevel } from '../utils/logger.js';

export const BACKEND_NAMES = ['deepl', 'google', 'echo'] as const;
export type BackendName = (typeof BACKEND_NAMES)[number];

export interface Settings {
  backend: BackendName;
  sourceLanguage: string;
  deeplAuthKey?: string;
  googleTranslateKey?: string;
  /** Additional locale directories searched besides the conventional ones. */
  localePaths: string[];
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  AUTOTRANSLATE_BACKEND: z.enum(BACKEND_NAMES).default('deepl'),
  AUTOTRANSLATE_SOURCE_LANGUAGE: z.string().trim().min(1).default('en'),
  DEEPL_AUTH_KEY: optionalString,
  GOOGLE_TRANSLATE_KEY: optionalString,
  LOCALE_PATHS: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    backend: parsed.AUTOTRANSLATE_BACKEND,
    sourceLanguage: parsed.AUTOTRANSLATE_SOURCE_LANGUAGE,
    deeplAuthKey: parsed.DEEPL_AUTH_KEY,
    googleTranslateKey: parsed.GOOGLE_TRANSLATE_KEY,
    localePaths: parsed.LOCALE_PATHS ? parsed.LOCALE_PATHS.split(path.delimiter).filter(Boolean) : [],
    logLevel: parsed.LOG_LEVEL,
  };
}
