// HTTP transport handler for MCP over Streamable HTTP
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  type HTTPServerOptions,
  HTTPServerOptionsSchema,
} from '@datcom/shared';
import {
  ServerStartError,
  ServerStopError,
  TransportConfigError,
  wrapServerError,
} from './errors.js';
import { createMcpServer } from './mcp-server-factory.js';
import type { SharedResources } from './shared-resources.js';

export type { HTTPServerOptions };

const MAX_BODY_SIZE = 1024 * 1024; // 1MB

/**
 * HTTP Transport for MCP Server.
 * Runs Streamable HTTP in stateless mode: every POST to /mcp gets a fresh
 * McpServer and transport, so no session state is kept between requests.
 */
export class HTTPTransport {
  private server: Server | null = null;
  private resources: SharedResources | null = null;
  private readonly validatedOptions: HTTPServerOptions;

  /**
   * Create a new HTTP transport
   * @throws {TransportConfigError} if options are invalid
   */
  constructor(options: HTTPServerOptions) {
    const result = HTTPServerOptionsSchema.safeParse(options);
    if (!result.success) {
      const errorMessages = result.error.issues
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new TransportConfigError(
        `Invalid HTTP transport options:\n${errorMessages}`,
      );
    }
    this.validatedOptions = result.data;
  }

  attachResources(resources: SharedResources): void {
    this.resources = resources;
  }

  hasResources(): boolean {
    return this.resources !== null;
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start the HTTP server
   * @throws {ServerStartError} if server fails to start
   */
  async start(): Promise<void> {
    if (!this.hasResources()) {
      throw new ServerStartError(
        'No resources attached. Call attachResources() first.',
      );
    }

    if (this.isRunning()) {
      return; // Already running
    }

    const host = this.validatedOptions.host ?? '0.0.0.0';
    const port = this.validatedOptions.port;

    try {
      this.server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });

      await new Promise<void>((resolve, reject) => {
        this.server?.once('error', (err) => {
          reject(
            new ServerStartError(
              `Failed to start HTTP server on ${host}:${port}: ${err.message}`,
              err,
            ),
          );
        });
        this.server?.listen(port, host, () => {
          resolve();
        });
      });
    } catch (error) {
      this.server = null;

      if (error instanceof ServerStartError) {
        throw error;
      }
      throw new ServerStartError(
        `Failed to start HTTP transport: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Stop the HTTP server
   * @throws {ServerStopError} if shutdown fails
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server.closeAllConnections();
      });
    } catch (error) {
      throw new ServerStopError(
        `Errors during HTTP transport shutdown: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Handle an incoming HTTP request
   */
  private async handleRequest(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');

      if (url.pathname === '/health') {
        this.handleHealthCheck(req, res);
        return;
      }

      if (url.pathname === '/mcp' || url.pathname === '/') {
        await this.handleMCPRequest(req, res);
        return;
      }

      this.sendJsonResponse(res, 404, { error: 'Not found' });
    } catch (error) {
      console.error('Unhandled error in request handler:', error);
      if (!res.headersSent) {
        this.sendJsonResponse(res, 500, {
          error: 'Internal server error',
        });
      }
    }
  }

  /**
   * Handle MCP protocol requests
   */
  private async handleMCPRequest(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    if (!this.resources) {
      this.sendJsonResponse(res, 503, { error: 'Resources not attached' });
      return;
    }

    // Stateless mode has no stream to resume and no session to delete
    if (req.method !== 'POST') {
      this.sendJsonResponse(res, 405, {
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
      return;
    }

    let body: unknown;
    try {
      body = await this.parseBody(req);
    } catch (error) {
      this.sendJsonResponse(res, 400, {
        jsonrpc: '2.0',
        error: {
          code: -32700,
          message: error instanceof Error ? error.message : 'Parse error',
        },
        id: null,
      });
      return;
    }

    const mcpServer = createMcpServer(this.resources);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        console.error('Error closing MCP transport:', error);
      });
      mcpServer.close().catch((error: unknown) => {
        console.error('Error closing MCP server:', error);
      });
    });

    try {
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        this.sendJsonResponse(res, 500, {
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  }

  /**
   * Handle health check requests
   */
  private handleHealthCheck(req: IncomingMessage, res: ServerResponse): void {
    if (req.method !== 'GET') {
      this.sendJsonResponse(res, 405, { error: 'Method not allowed' });
      return;
    }

    try {
      if (!this.resources) {
        throw new ServerStartError('Resources not attached');
      }
      const health = this.resources.getHealth();
      this.sendJsonResponse(res, health.status === 'ok' ? 200 : 503, health);
    } catch (error) {
      const wrappedError = wrapServerError(error, 'Health check failed');
      console.error('Health check error:', wrappedError);

      this.sendJsonResponse(res, 500, {
        status: 'error',
        datacommons: 'unconfigured',
        tools: 0,
        uptime: 0,
        error: wrappedError.message,
      });
    }
  }

  /**
   * Parse request body as JSON
   * @throws {Error} if body is not valid JSON
   */
  private parseBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalSize = 0;

      req.on('data', (chunk: Buffer) => {
        totalSize += chunk.length;
        if (totalSize > MAX_BODY_SIZE) {
          reject(new Error('Request body too large'));
          req.destroy();
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        const body = Buffer.concat(chunks).toString('utf-8');
        if (!body) {
          resolve(undefined);
          return;
        }

        try {
          resolve(JSON.parse(body));
        } catch {
          reject(new Error('Invalid JSON body'));
        }
      });

      req.on('error', (error) => {
        reject(new Error(`Request error: ${error.message}`));
      });
    });
  }

  private sendJsonResponse(
    res: ServerResponse,
    statusCode: number,
    data: unknown,
  ): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }

  /**
   * Get the server address
   */
  getAddress(): { host: string; port: number } | null {
    if (!this.server) return null;
    const address = this.server.address();
    if (typeof address === 'string' || address === null) return null;
    return { host: address.address, port: address.port };
  }

  getOptions(): HTTPServerOptions {
    return this.validatedOptions;
  }
}
