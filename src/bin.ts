#!/usr/bin/env node
/**
 * docsift - CLI Entry Point
 *
 * Usage:
 *   docsift                      # after npm install -g
 *   node dist/src/bin.js         # direct invocation
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module bin
 */

import { installShutdownHandlers, startServer } from './server/startup.js';

startServer()
  .then(installShutdownHandlers)
  .catch((error: unknown) => {
    console.error('[Startup] Fatal error starting MCP server:', error);
    process.exit(1);
  });
