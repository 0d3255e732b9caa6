/**
 * @module mcp
 * MCP (Model Context Protocol) server for the trip planner.
 *
 * Speaks the protocol over stdio and runs every tool against one session:
 * a JSON file store, a command invoker and its undo history. Logs go to
 * stderr because stdout carries the protocol.
 *
 * Configuration comes from the `TRIP_PLANNER_*` environment variables.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createLogger, createTripSession, loadConfig } from '@trip-planner/core';
import { TOOLS, handleToolCall } from './tools.js';

const config = loadConfig();
const logger = createLogger(config, { stderr: true });
const session = createTripSession({ config, logger });

const server = new Server(
  { name: 'trip-planner', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(session, name, args ?? {});
});

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ storeFile: config.storeFile, maxHistorySize: config.maxHistorySize }, 'MCP server ready');
