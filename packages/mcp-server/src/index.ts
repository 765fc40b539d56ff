#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import {
  GENERATOR_VERSION,
  LogLevel,
  initializeLogger,
  isErrorResponse,
  parseLogLevel,
} from '@rtf-composer/core';
import { loadConfig, validateConfig } from './config.js';
import { handleToolCall } from './handlers.js';
import { tools } from './tools.js';

// Initialize services
const config = loadConfig();
const logger = initializeLogger(parseLogLevel(config.logLevel) ?? LogLevel.WARN);

const configErrors = validateConfig(config);
if (configErrors.length > 0) {
  logger.error('[Config] Configuration errors:', undefined, configErrors);
}

// Create MCP server
const server = new Server(
  {
    name: 'rtf-composer-mcp-server',
    version: GENERATOR_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// Handle tool list requests
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Handle tool execution
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  logger.debug(`[Server] Calling ${name}`);
  const result = await handleToolCall(name, args ?? {}, { config, logger });

  return {
    content: [{
      type: 'text',
      text: JSON.stringify(result, null, 2)
    }],
    isError: isErrorResponse(result)
  };
});

// Start server
async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`[Server] RTF Composer MCP Server running on stdio (output: ${config.outputDir})`);
}

main().catch((error: unknown) => {
  logger.error('[Server] Fatal error', error instanceof Error ? error : undefined, String(error));
  process.exit(1);
});
