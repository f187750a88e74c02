import * as path from 'node:path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { createBackend } from '../backends/index.js';
import { BACKEND_NAMES, Settings } from '../config/settings.js';
import { errorMessage } from '../errors.js';
import { CatalogWalker, targetLanguageFor } from '../services/CatalogWalker.js';
import { POFileService } from '../services/POFileService.js';
import { TranslationService } from '../services/TranslationService.js';
import { TranslateFileResult } from '../types/index.js';
import { createLogger, Logger } from '../utils/logger.js';

const localeQueryShape = {
  root: z.string().optional(),
  locales: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
};

const translateOptionsShape = {
  untranslated: z.boolean().optional(),
  setFuzzy: z.boolean().optional(),
  backend: z.enum(BACKEND_NAMES).optional(),
  strictPlaceholders: z.boolean().optional(),
};

const findArgsSchema = z.object(localeQueryShape);
const translateAllArgsSchema = z.object({ ...localeQueryShape, ...translateOptionsShape });
const translateFileArgsSchema = z.object({
  filePath: z.string(),
  targetLanguage: z.string().optional(),
  ...translateOptionsShape,
});
const statsArgsSchema = z.object({ filePath: z.string() });

type TranslateOptions = z.infer<typeof translateAllArgsSchema>;

const localeQueryProperties = {
  root: {
    type: 'string',
    description: 'Project root to search for locale directories (defaults to the server working directory)',
  },
  locales: {
    type: 'array',
    items: { type: 'string' },
    description: 'Only these locale codes (e.g. pt_BR); all locales when omitted',
  },
  exclude: {
    type: 'array',
    items: { type: 'string' },
    description: 'Locale codes to skip',
  },
};

const translateOptionProperties = {
  untranslated: {
    type: 'boolean',
    description: 'Only fill fuzzy and empty messages',
  },
  setFuzzy: {
    type: 'boolean',
    description: 'Set the fuzzy flag on autotranslated messages',
  },
  backend: {
    type: 'string',
    enum: [...BACKEND_NAMES],
    description: 'Translation backend to use instead of the configured one',
  },
  strictPlaceholders: {
    type: 'boolean',
    description: 'Fail when a translation loses or gains a placeholder',
  },
};

const TOOLS: Tool[] = [
  {
    name: 'find_po_files',
    description: 'List the .po catalogs found under the locale directories of a project',
    inputSchema: {
      type: 'object',
      properties: localeQueryProperties,
    },
  },
  {
    name: 'translate_po_files',
    description: 'Machine-translate every catalog found under the locale directories of a project',
    inputSchema: {
      type: 'object',
      properties: { ...localeQueryProperties, ...translateOptionProperties },
    },
  },
  {
    name: 'translate_po_file',
    description: 'Machine-translate a single .po catalog',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: {
          type: 'string',
          description: 'Path to the .po file',
        },
        targetLanguage: {
          type: 'string',
          description: 'Target locale code; taken from <locale>/LC_MESSAGES in the path when omitted',
        },
        ...translateOptionProperties,
      },
      required: ['filePath'],
    },
  },
  {
    name: 'get_translation_stats',
    description: 'Get translation statistics for a .po file',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: {
          type: 'string',
          description: 'Path to the .po file',
        },
      },
      required: ['filePath'],
    },
  },
];

function textResult(text: string, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    ...(isError && { isError: true }),
  };
}

function formatResults(results: TranslateFileResult[]): string {
  if (results.length === 0) {
    return 'No catalogs found.';
  }
  const lines = results.map(
    (result) =>
      `${result.path} [${result.targetLanguage}]: ${result.entries} entries updated, ` +
      `${result.stats.translated}/${result.stats.total} translated`
  );
  return `Translated ${results.length} catalog${results.length === 1 ? '' : 's'}:\n${lines.join('\n')}`;
}

export class POAutotranslateMCPServer {
  private server: Server;
  private poFileService = new POFileService();
  private logger: Logger;

  constructor(private readonly settings: Settings, logger?: Logger) {
    this.logger = logger ?? createLogger(settings.logLevel);
    this.server = new Server(
      {
        name: 'po-autotranslate',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.handleToolCall(name, args ?? {});
    });
  }

  public listTools(): Tool[] {
    return TOOLS;
  }

  public async handleToolCall(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'find_po_files': {
          const { root, locales, exclude } = findArgsSchema.parse(args);
          const walker = this.createWalker(root);
          const files: string[] = [];
          for await (const { dirname, filename } of walker.findPOFiles({ locales, exclude })) {
            files.push(path.join(dirname, filename));
          }
          if (files.length === 0) {
            return textResult('No catalogs found.');
          }
          return textResult(`Found ${files.length} catalog${files.length === 1 ? '' : 's'}:\n${files.join('\n')}`);
        }

        case 'translate_po_files': {
          const options = translateAllArgsSchema.parse(args);
          const service = this.createTranslationService(options);
          const results = await service.translateAll(this.createWalker(options.root), {
            locales: options.locales,
            exclude: options.exclude,
          });
          return textResult(formatResults(results));
        }

        case 'translate_po_file': {
          const { filePath, targetLanguage, ...options } = translateFileArgsSchema.parse(args);
          const service = this.createTranslationService(options);
          const language = targetLanguage ?? targetLanguageFor(path.dirname(path.resolve(filePath)));
          const result = await service.translateFile(filePath, language);
          return textResult(formatResults([result]));
        }

        case 'get_translation_stats': {
          const { filePath } = statsArgsSchema.parse(args);
          const catalog = await this.poFileService.loadCatalog(filePath);
          const stats = this.poFileService.getTranslationStats(catalog.po);
          return textResult(`Translation statistics for ${filePath}:\n${JSON.stringify(stats, null, 2)}`);
        }

        default:
          return textResult(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      this.logger.error(`Tool ${name} failed:`, errorMessage(error));
      return textResult(`Error executing tool ${name}: ${errorMessage(error)}`, true);
    }
  }

  private createWalker(root: string | undefined): CatalogWalker {
    return new CatalogWalker({
      root: root ?? process.cwd(),
      localePaths: this.settings.localePaths,
      logger: this.logger,
    });
  }

  private createTranslationService(options: Omit<TranslateOptions, 'root' | 'locales' | 'exclude'>): TranslationService {
    return new TranslationService({
      backend: createBackend(this.settings, options.backend),
      sourceLanguage: this.settings.sourceLanguage,
      skipTranslated: options.untranslated,
      setFuzzy: options.setFuzzy,
      strictPlaceholders: options.strictPlaceholders,
      logger: this.logger,
      poFileService: this.poFileService,
    });
  }

  public async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('po-autotranslate MCP server running on stdio');
  }
}
