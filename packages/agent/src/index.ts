// Agent exports
export { DataCommonsAgent, MAX_STEPS_ANSWER, parseToolCall } from './agent.js';
export {
  type CLIOptions,
  CLIUsageError,
  HELP_TEXT,
  parseCliArgs,
} from './cli-options.js';
export { inProcessServer, MCPClient, mcpEndpoint } from './mcp-client.js';
export { AGENT_DESCRIPTION, AGENT_NAME, getSystemPrompt } from './prompts.js';
export type {
  AgentConfig,
  AgentResult,
  AgentStep,
  MCPClientConfig,
  MCPTool,
  ToolCall,
  ToolCallOutcome,
  ToolClient,
  ToolResult,
} from './types.js';

export const VERSION = '0.1.0';
