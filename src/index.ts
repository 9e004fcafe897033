/**
 * docsift
 *
 * Document ingestion, hybrid retrieval and grounded question answering,
 * served as MCP tools. The `docsift` binary starts the stdio server; this
 * module exposes the same pieces for embedding in another process.
 *
 * @module index
 */

export {
  createServer,
  startServer,
  shutdown,
  installShutdownHandlers,
  SERVER_NAME,
  SERVER_VERSION,
} from './server/startup.js';
export { listToolNames } from './server/register-tools.js';
export type { ServerConfig } from './server/types.js';
export type { ToolName, ToolPayloads, ToolResponse } from './tools/shared.js';
