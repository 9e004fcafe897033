/**
 * Server Lifecycle
 *
 * Environment file loading, startup checks, server construction and
 * signal-driven shutdown for the docsift MCP server.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import dotenv from 'dotenv';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { closeServices, getActiveOperationCount, loadConfigFromEnv } from './state.js';
import { registerAllTools } from './register-tools.js';
import { PYTHON_DIR } from '../services/python/worker.js';
import type { ServerConfig } from './types.js';

export const SERVER_NAME = 'docsift';
export const SERVER_VERSION = '0.1.0';

const WORKER_SCRIPTS = ['extract_worker.py', 'ocr_worker.py', 'asr_worker.py'];

/** Grace period before a hung shutdown is abandoned */
const SHUTDOWN_GRACE_MS = 5000;

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * .env locations in priority order: DOCSIFT_ENV_FILE, the working
 * directory, then the package root.
 */
export function envFileCandidates(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  packageRoot: string = PACKAGE_ROOT
): string[] {
  const candidates = [path.resolve(cwd, '.env'), path.resolve(packageRoot, '.env')];
  const explicit = env.DOCSIFT_ENV_FILE?.trim();
  return [...new Set(explicit ? [path.resolve(cwd, explicit), ...candidates] : candidates)];
}

/**
 * Load the first existing candidate into process.env. Variables already set
 * are left alone.
 *
 * @returns The file loaded, or null when none exists
 */
export function loadEnvFile(candidates: string[]): string | null {
  const found = candidates.find((candidate) => existsSync(candidate));
  if (found === undefined) return null;

  const result = dotenv.config({ path: found, quiet: true });
  if (result.error) {
    throw result.error;
  }
  return found;
}

/**
 * Load DOCSIFT_* settings and warn about missing worker scripts.
 * Warnings only: a missing worker disables the formats that need it, not the server.
 *
 * @throws ValidationError if an environment value is invalid
 */
export function validateStartupDependencies(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config = loadConfigFromEnv(env);

  const missing = WORKER_SCRIPTS.filter((script) => !existsSync(path.join(PYTHON_DIR, script)));
  for (const script of missing) {
    console.error(`[Startup] ${script} not found in ${PYTHON_DIR}; formats that need it will fail to ingest`);
  }

  console.error(`[Config] index=${config.indexPath} embedding=${config.embeddingModel} generation=${config.generationModel}`);
  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER
// ═══════════════════════════════════════════════════════════════════════════════

export interface CreatedServer {
  server: McpServer;
  toolCount: number;
}

export function createServer(): CreatedServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  return { server, toolCount: registerAllTools(server) };
}

/**
 * Load the environment, apply config and serve tools over the transport
 * (stdio unless one is given).
 */
export async function startServer(transport: Transport = new StdioServerTransport()): Promise<McpServer> {
  const envFile = loadEnvFile(envFileCandidates());
  if (envFile !== null) {
    console.error(`[Config] environment loaded from ${envFile}`);
  }
  validateStartupDependencies();

  const { server, toolCount } = createServer();
  await server.connect(transport);
  console.error(`[Startup] ${SERVER_NAME} ${SERVER_VERSION} serving ${toolCount} tools`);
  return server;
}

/**
 * Close the server and release the index and python workers.
 *
 * @returns Process exit code
 */
export async function shutdown(server: Pick<McpServer, 'close'>, signal: string): Promise<number> {
  const busy = getActiveOperationCount();
  console.error(`[Shutdown] ${signal} received, ${busy} operation(s) in flight`);
  try {
    await server.close();
    closeServices();
    console.error('[Shutdown] Server closed');
    return 0;
  } catch (error) {
    console.error(`[Shutdown] Error closing server: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

export function installShutdownHandlers(server: Pick<McpServer, 'close'>): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    setTimeout(() => {
      console.error('[Shutdown] Forced exit after timeout');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();

    void shutdown(server, signal).then((code) => process.exit(code));
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}
