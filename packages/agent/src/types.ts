// Type definitions for the Data Commons agent
import type { ChatToolSchema } from '@datcom/shared';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export interface AgentStep {
  type: 'thought' | 'action' | 'observation' | 'answer';
  content: string;
  toolCalls?: ToolCall[];
  toolResults?: ToolResult[];
  timestamp: Date;
}

export interface AgentResult {
  answer: string;
  steps: AgentStep[];
  toolsUsed: string[];
  totalSteps: number;
  success: boolean;
}

export interface AgentConfig {
  maxSteps: number;
  verbose: boolean;
  maxTokens?: number;
  temperature?: number;
}

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/** Text of a tool call and whether the server flagged it as an error */
export interface ToolCallOutcome {
  text: string;
  isError: boolean;
}

/**
 * What the agent needs from an MCP connection
 */
export interface ToolClient {
  getToolSchemas(): ChatToolSchema[];
  callTool(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolCallOutcome>;
}

export type MCPClientConfig =
  | {
      mode: 'http';
      /** Server URL, optionally with a path prefix or the /mcp endpoint */
      baseUrl: string;
    }
  | {
      mode: 'in-process';
      /** Attach a server to the server side of a linked in-memory pair */
      connectServer: (transport: Transport) => Promise<void>;
    };
