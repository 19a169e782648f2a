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

import { chunkingTools } from '../tools/chunking.js';
import { configTools } from '../tools/config.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [chunkingTools, configTools];

/**
 * Register all tools on the given MCP server instance.
 *
 * @param server - McpServer instance to register tools on
 * @returns Number of tools registered
 * @throws Exits process with code 1 if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        console.error(
          `[FATAL] Duplicate tool name detected: "${name}". Each tool must have a unique name.`
        );
        process.exit(1);
      }
      registeredToolNames.add(name);
      server.tool(
        name,
        tool.description,
        tool.inputSchema as Record<string, unknown>,
        tool.handler
      );
      toolCount++;
    }
  }

  return toolCount;
}
