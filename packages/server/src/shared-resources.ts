// SharedResources - holds the Data Commons client shared by every McpServer instance
import {
  DataCommonsAuthenticationError,
  DataCommonsClient,
  isDataCommonsError,
} from '@datcom/core';
import {
  type DatcomConfig,
  DatcomConfigSchema,
  type HealthStatus,
} from '@datcom/shared';
import { ServerConfigError } from './errors.js';
import { HealthChecker } from './health.js';
import { TOOL_NAMES } from './mcp-server-factory.js';

export interface SharedResourcesOptions {
  /** Replaces global fetch for Data Commons calls */
  fetch?: typeof fetch;
}

/**
 * SharedResources holds the reusable pieces every MCP server instance needs:
 * the validated configuration, the Data Commons client and the health checker.
 * A missing Data Commons key is not fatal; tools report it when called.
 */
export class SharedResources {
  readonly healthChecker: HealthChecker;
  private readonly client: DataCommonsClient | null;
  private readonly validatedConfig: DatcomConfig;

  /**
   * Create a new SharedResources instance
   * @throws {ServerConfigError} if configuration is invalid
   */
  constructor(config: DatcomConfig, options: SharedResourcesOptions = {}) {
    const configResult = DatcomConfigSchema.safeParse(config);
    if (!configResult.success) {
      throw new ServerConfigError(
        `Invalid configuration:\n${configResult.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
        undefined,
      );
    }
    this.validatedConfig = configResult.data;

    const { apiKey, baseUrl } = this.validatedConfig.datacommons;
    try {
      this.client = apiKey
        ? new DataCommonsClient({ apiKey, baseUrl, fetch: options.fetch })
        : null;
    } catch (error) {
      if (isDataCommonsError(error)) {
        throw new ServerConfigError(
          `Data Commons configuration error: ${error.message}`,
          'datacommons',
          error,
        );
      }
      throw new ServerConfigError(
        `Failed to initialize Data Commons client: ${error instanceof Error ? error.message : String(error)}`,
        'datacommons',
        error instanceof Error ? error : undefined,
      );
    }

    this.healthChecker = new HealthChecker(
      this.client !== null,
      TOOL_NAMES.length,
    );
  }

  /**
   * Data Commons client for tool handlers
   * @throws {DataCommonsAuthenticationError} if no API key is configured
   */
  getClient(): DataCommonsClient {
    if (!this.client) {
      throw new DataCommonsAuthenticationError(
        'Data Commons API key is not configured (set DATCOM_API_KEY)',
      );
    }
    return this.client;
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  getHealth(): HealthStatus {
    return this.healthChecker.check();
  }

  /**
   * Get validated configuration
   */
  getConfig(): DatcomConfig {
    return this.validatedConfig;
  }
}
