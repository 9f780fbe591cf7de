#!/usr/bin/env tsx
// imagegate MCP server — stdio entry point.
// stdout carries the protocol, so engine logs go to stderr.

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ImageGateEngine, createLogger, loadConfig } from '@imagegate/core';
import { createImageGateServer } from './server.js';

const engine = new ImageGateEngine({ config: loadConfig(), logger: createLogger() });
const server = createImageGateServer(engine);

// ── Start ─────────────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
