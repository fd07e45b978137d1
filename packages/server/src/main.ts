#!/usr/bin/env node
// datcom MCP server entry point
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '@datcom/shared';
import { HTTPTransport } from './http.js';
import { createMcpServer } from './mcp-server-factory.js';
import { SharedResources } from './shared-resources.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const stdio =
    process.argv.includes('--stdio') || config.server.mode === 'stdio';

  // Parse command line args for port
  const portArg = process.argv.find((arg) => arg.startsWith('--port='));
  const port = portArg
    ? Number.parseInt(portArg.slice('--port='.length), 10)
    : config.server.http.port;

  const resources = new SharedResources(config);

  if (!resources.isConfigured()) {
    console.error(
      'Warning: DATCOM_API_KEY is not set; tool calls will fail until it is configured',
    );
  }

  if (stdio) {
    await runStdio(resources);
    return;
  }

  await runHttp(resources, port, config.server.http.host);
}

/**
 * Serve MCP over stdin/stdout; stdout carries only the protocol
 */
async function runStdio(resources: SharedResources): Promise<void> {
  const mcpServer = createMcpServer(resources);
  const transport = new StdioServerTransport();

  const shutdown = async (signal: string): Promise<void> => {
    console.error(`Received ${signal}, shutting down...`);
    try {
      await mcpServer.close();
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await mcpServer.connect(transport);
  console.error('datcom MCP server running on stdio');
}

async function runHttp(
  resources: SharedResources,
  port: number,
  host: string | undefined,
): Promise<void> {
  const transport = new HTTPTransport({ port, host });
  transport.attachResources(resources);

  // Handle shutdown signals
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\nReceived ${signal}, shutting down...`);
    try {
      await transport.stop();
      console.log('Server stopped gracefully');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  console.log(`Starting HTTP server on port ${port}...`);
  await transport.start();

  const address = transport.getAddress();
  console.log(
    `datcom MCP server running at http://${address?.host}:${address?.port}`,
  );
  console.log('Endpoints:');
  console.log(`  - MCP: http://${address?.host}:${address?.port}/mcp`);
  console.log(`  - Health: http://${address?.host}:${address?.port}/health`);
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
