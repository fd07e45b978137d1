// datcom MCP server

export * from './errors.js';
export { HealthChecker, type HealthStatus } from './health.js';
export { HTTPTransport } from './http.js';
export {
  createMcpServer,
  TOOL_NAMES,
  type ToolName,
} from './mcp-server-factory.js';
export {
  SharedResources,
  type SharedResourcesOptions,
} from './shared-resources.js';

export const VERSION = '0.1.0';
