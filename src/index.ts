#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createLogger } from './log.js';
import { createServer } from './server.js';
import { DiagramTools } from './tools.js';

const VERSION = '0.1.0';

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  const server = createServer(new DiagramTools(config, logger), VERSION);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info(`server started on stdio (history ${config.maxHistory}, delete policy ${config.deletePolicy})`);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error(`[mxdoc pid:${process.pid}] fatal error:`, err);
  process.exit(1);
});
