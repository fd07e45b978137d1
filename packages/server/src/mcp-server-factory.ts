// MCP Server Factory - Creates configured McpServer instances with all tools registered
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  fetchPopulation,
  formatCatalog,
  formatPopulation,
  formatResolution,
  listVariables,
  resolvePlace,
} from '@datcom/core';
import {
  GetAvailableVariablesSchema,
  GetDcidSchema,
  GetPopulationCountSchema,
} from '@datcom/shared';
import { formatToolError } from './errors.js';
import type { SharedResources } from './shared-resources.js';

const SERVER_VERSION = '0.1.0';

export const TOOL_NAMES = [
  'get_dcid',
  'get_available_variables',
  'get_population_count',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Create a new McpServer instance with all tools registered.
 * Each connection gets its own McpServer; the Data Commons client is shared.
 */
export function createMcpServer(resources: SharedResources): McpServer {
  const mcpServer = new McpServer(
    {
      name: 'datcom',
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions:
        'Answers questions about places using Data Commons. Resolve a place name with get_dcid first, then pass the DCID to get_available_variables or get_population_count.',
    },
  );

  registerGetDcidTool(mcpServer, resources);
  registerGetAvailableVariablesTool(mcpServer, resources);
  registerGetPopulationCountTool(mcpServer, resources);

  return mcpServer;
}

function registerGetDcidTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'get_dcid',
    {
      description:
        'Get the Data Commons identifier (DCID) for a place name, e.g. "California" -> geoId/06',
      inputSchema: GetDcidSchema.shape,
    },
    async (args) => {
      try {
        const resolution = await resolvePlace(
          resources.getClient(),
          args.place,
        );
        return {
          content: [
            { type: 'text' as const, text: formatResolution(resolution) },
          ],
          structuredContent: { ...resolution },
        };
      } catch (error) {
        return formatToolError(error, 'get_dcid');
      }
    },
  );
}

function registerGetAvailableVariablesTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'get_available_variables',
    {
      description:
        'List the statistical variables Data Commons holds for one or more places (first 10 per place)',
      inputSchema: GetAvailableVariablesSchema.shape,
    },
    async (args) => {
      try {
        const catalog = await listVariables(
          resources.getClient(),
          args.place_dcids,
        );
        return {
          content: [{ type: 'text' as const, text: formatCatalog(catalog) }],
          structuredContent: { ...catalog },
        };
      } catch (error) {
        return formatToolError(error, 'get_available_variables');
      }
    },
  );
}

function registerGetPopulationCountTool(
  mcpServer: McpServer,
  resources: SharedResources,
): void {
  mcpServer.registerTool(
    'get_population_count',
    {
      description:
        'Get the total population (Count_Person) of one or more places, optionally for a specific date',
      inputSchema: GetPopulationCountSchema.shape,
    },
    async (args) => {
      try {
        const report = await fetchPopulation(
          resources.getClient(),
          args.place_dcids,
          args.date,
        );
        return {
          content: [{ type: 'text' as const, text: formatPopulation(report) }],
          structuredContent: { ...report },
        };
      } catch (error) {
        return formatToolError(error, 'get_population_count');
      }
    },
  );
}
