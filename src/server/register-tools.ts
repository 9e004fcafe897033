/**
 * Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { ingestionTools } from '../tools/ingestion.js';
import { searchTools } from '../tools/search.js';
import { maintenanceTools } from '../tools/maintenance.js';
import { configTools } from '../tools/config.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [ingestionTools, searchTools, maintenanceTools, configTools];

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules define the same tool name
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames.size;
}

/**
 * Names of every tool, in registration order
 */
export function listToolNames(): string[] {
  return allToolModules.flatMap((toolModule) => Object.keys(toolModule));
}
