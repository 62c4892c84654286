/**
 * @module mcp
 * MCP (Model Context Protocol) server for the raster edit session.
 *
 * Talks to the client over stdio and keeps one {@link EditSession} in
 * process. Images move in and out as PNG files under `RASTER_EDIT_ROOT`.
 *
 * stdout carries the protocol, so every log line goes to stderr.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { EditSession } from '@raster-edit/core';
import type { SessionLogger } from '@raster-edit/core';
import { loadServerConfig } from './config.js';
import { TOOLS, handleToolCall } from './tools.js';

const logger: SessionLogger = {
  info: (...data: unknown[]) => console.error(...data),
  warn: (...data: unknown[]) => console.warn(...data),
  error: (...data: unknown[]) => console.error(...data),
};

const config = loadServerConfig();
const session = new EditSession({ logger });

const server = new Server(
  { name: 'raster-edit', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args ?? {}, { session, config, logger });
});

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info(`[MCP Server] raster-edit ready (root: ${config.root})`);
