#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import * as logger from './logger.js';
import { createServer } from './server.js';
import { JavadocLibrary } from './services/javadoc-library.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const library = new JavadocLibrary();
  const archives = await library.loadDirectory(config.javadocPath);
  logger.info(`Loaded ${archives.length} Javadoc archives from ${config.javadocPath}`);

  const server = createServer(library);
  const transport = new StdioServerTransport();

  logger.info('Starting Javadoc Lookup MCP server...');
  await server.connect(transport);
}

main().catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
