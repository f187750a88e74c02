#!/usr/bin/env node

import 'dotenv/config';
import { loadSettings } from './config/settings.js';
import { POAutotranslateMCPServer } from './mcp/server.js';

async function main(): Promise<void> {
  const server = new POAutotranslateMCPServer(loadSettings());
  await server.run();
}

main().catch((error) => {
  console.error('Server error:', error);
  process.exit(1);
});
