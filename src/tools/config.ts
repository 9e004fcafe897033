/**
 * Configuration Management MCP Tools
 *
 * Tools: docsift_config_get, docsift_config_set
 *
 * Changes apply to the running server only; DOCSIFT_* environment variables
 * set the values a fresh start begins with.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, updateConfig } from '../server/state.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey, configEnvName } from '../utils/validation.js';
import { toolReply, type ToolResponse, type ToolModule } from './shared.js';

/** Settings whose change makes previously indexed chunks inconsistent */
const REINDEX_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>(['embeddingModel', 'embeddingBaseUrl', 'indexPath']);

const getReply = toolReply('docsift_config_get');
const setReply = toolReply('docsift_config_set');

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();

    if (input.key) {
      return getReply.ok({ key: input.key, value: config[input.key] ?? null, env: configEnvName(input.key) });
    }

    return getReply.ok({
      ...config,
      pythonPath: config.pythonPath ?? null,
      next_steps: [{ tool: 'docsift_config_set', description: 'Change a setting for this session' }],
    });
  } catch (error) {
    return getReply.fail(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    const previous = getConfig()[input.key];
    const updates: Partial<Record<ConfigKey, string | number>> = {};
    updates[input.key] = input.value;
    const updated = updateConfig(updates);

    console.error(`[config] ${input.key} changed from ${String(previous)} to ${String(updated[input.key])}`);

    return setReply.ok({
      key: input.key,
      previous: previous ?? null,
      value: updated[input.key] ?? null,
      updated: true,
      ...(REINDEX_KEYS.has(input.key) && {
        warning: 'Chunks indexed under the previous value are not re-embedded; clear and re-ingest if needed',
      }),
      next_steps: [{ tool: 'docsift_config_get', description: 'Verify the updated configuration' }],
    });
  } catch (error) {
    return setReply.fail(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const configTools: ToolModule<'docsift_config_get' | 'docsift_config_set'> = {
  docsift_config_get: {
    description: '[STATUS] View the current configuration, or one setting with its environment variable.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  docsift_config_set: {
    description:
      '[SETUP] Change one setting for the running server (chunk budget, thresholds, service endpoints, search limits). The merged configuration is validated before it applies.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
