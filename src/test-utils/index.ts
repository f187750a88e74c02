import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TranslationBackend } from '../types/index.js';

const FIXTURES_DIR = fileURLToPath(new URL('./fixtures/', import.meta.url));

export interface BackendCall {
  strings: string[];
  targetLanguage: string;
  sourceLanguage: string;
  skip: boolean;
}

/** In-process backend that records every call and maps strings with `translate`. */
export class RecordingBackend implements TranslationBackend {
  public readonly name = 'recording';
  public readonly calls: BackendCall[] = [];

  constructor(private readonly translate: (text: string) => string = (text) => text) {}

  async translateStrings(
    strings: string[],
    targetLanguage: string,
    sourceLanguage: string,
    skip: boolean
  ): Promise<string[]> {
    this.calls.push({ strings: [...strings], targetLanguage, sourceLanguage, skip });
    return strings.map((text) => this.translate(text));
  }
}

export function dictionaryBackend(dictionary: Record<string, string>): RecordingBackend {
  return new RecordingBackend((text) => dictionary[text] ?? text);
}

export async function readFixture(name: string): Promise<string> {
  return fs.readFile(path.join(FIXTURES_DIR, name), 'utf-8');
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'po-autotranslate-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write `content` to `root/relativePath`, creating parent directories. Returns the full path. */
export async function writeTree(root: string, relativePath: string, content = ''): Promise<string> {
  const fullPath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content, 'utf-8');
  return fullPath;
}
