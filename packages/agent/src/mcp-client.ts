// MCP Client wrapper for the Data Commons agent
import type { SharedResources } from '@datcom/server';
import { createMcpServer } from '@datcom/server';
import type { ChatToolSchema } from '@datcom/shared';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type {
  MCPClientConfig,
  MCPTool,
  ToolCallOutcome,
  ToolClient,
} from './types.js';

const CLIENT_INFO = { name: 'datcom-agent', version: '0.1.0' };

/**
 * Resolve the Streamable HTTP endpoint for a server URL. A URL already
 * ending in /mcp is used as is; otherwise /mcp is appended to its path.
 */
export function mcpEndpoint(baseUrl: string): URL {
  const url = new URL(baseUrl);
  const path = url.pathname.replace(/\/+$/, '');
  url.pathname = path.endsWith('/mcp') ? path : `${path}/mcp`;
  return url;
}

/**
 * Config for an MCP client that talks to a server living in this process
 */
export function inProcessServer(resources: SharedResources): MCPClientConfig {
  return {
    mode: 'in-process',
    connectServer: (transport) => createMcpServer(resources).connect(transport),
  };
}

export class MCPClient implements ToolClient {
  private client: Client;
  private transport: Transport | null = null;
  private tools: MCPTool[] = [];
  private connected = false;

  constructor(private readonly config: MCPClientConfig) {
    this.client = new Client(CLIENT_INFO, { capabilities: {} });
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    this.transport = await this.openTransport();
    await this.client.connect(this.transport);
    this.connected = true;

    // Fetch available tools
    await this.refreshTools();
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;

    await this.transport?.close();
    this.transport = null;
    this.connected = false;
    this.tools = [];
    // MCP SDK client can't be reused after disconnect
    this.client = new Client(CLIENT_INFO, { capabilities: {} });
  }

  async refreshTools(): Promise<void> {
    const result = await this.client.listTools();
    this.tools = result.tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: { ...tool.inputSchema },
    }));
  }

  getTools(): MCPTool[] {
    return this.tools;
  }

  getToolSchemas(): ChatToolSchema[] {
    return this.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    }));
  }

  /**
   * Call a tool and collect its text content
   * @throws {Error} if not connected or the server rejects the request
   */
  async callTool(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolCallOutcome> {
    if (!this.connected) {
      throw new Error('MCP client not connected');
    }

    const result = CallToolResultSchema.parse(
      await this.client.callTool({ name, arguments: args }),
    );

    return {
      text: result.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('\n'),
      isError: result.isError ?? false,
    };
  }

  isConnected(): boolean {
    return this.connected;
  }

  private async openTransport(): Promise<Transport> {
    if (this.config.mode === 'http') {
      return new StreamableHTTPClientTransport(
        mcpEndpoint(this.config.baseUrl),
      );
    }

    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    await this.config.connectServer(serverTransport);
    return clientTransport;
  }
}
