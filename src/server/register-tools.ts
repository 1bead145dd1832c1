/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';
import { resolutionTools } from '../tools/resolution.js';
import { ResolverError } from './errors.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [resolutionTools];

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws ResolverError (INTERNAL_ERROR) when two modules share a tool name
 */
export function registerAllTools(
  server: Pick<McpServer, 'tool'>,
  modules: Record<string, ToolDefinition>[] = allToolModules
): number {
  const registeredToolNames = new Set<string>();

  for (const toolModule of modules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new ResolverError('INTERNAL_ERROR', `Duplicate tool name detected: "${name}"`, {
          name,
        });
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames.size;
}
