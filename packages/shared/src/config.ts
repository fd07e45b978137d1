// Configuration types and validation for datcom
import type { ZodError } from 'zod';
import {
  type AgentSettings,
  type DataCommonsConfig,
  type DatcomConfig,
  DatcomConfigSchema,
  type HTTPServerOptions,
  type LLMConfig,
} from './schemas.js';

// Re-export config types from schemas
export type {
  AgentSettings,
  DataCommonsConfig,
  DatcomConfig,
  HTTPServerOptions,
  LLMConfig,
};

export const DEFAULT_DATACOMMONS_BASE_URL = 'https://api.datacommons.org/v2';
export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';
export const DEFAULT_MAX_STEPS = 10;
export const DEFAULT_PORT = 3000;

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ZodError['errors'],
  ) {
    super(message);
    this.name = 'ConfigValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return formatIssues(this.errors);
  }
}

function formatIssues(errors: ZodError['errors']): string {
  return errors
    .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
    .join('\n');
}

/**
 * Parse environment variable as a positive integer, falling back when unset or invalid
 */
function parseEnvInt(
  envVar: string | undefined,
  fallback: number | undefined,
): number | undefined {
  if (!envVar) return fallback;
  const value = Number.parseInt(envVar, 10);
  if (Number.isNaN(value) || value < 0) {
    return fallback;
  }
  return value;
}

/**
 * Parse environment variable as a valid port number
 */
function parseEnvPort(envVar: string | undefined, defaultPort: number): number {
  const port = parseEnvInt(envVar, defaultPort);
  if (port === undefined || port > 65535) {
    return defaultPort;
  }
  return port;
}

function parseEnvMode(envVar: string | undefined): 'http' | 'stdio' {
  return envVar?.toLowerCase() === 'stdio' ? 'stdio' : 'http';
}

/**
 * Build raw configuration from environment variables
 * This creates an unvalidated config object
 */
function buildRawConfig(): DatcomConfig {
  const temperature = process.env.LLM_TEMPERATURE
    ? Number.parseFloat(process.env.LLM_TEMPERATURE)
    : undefined;

  return {
    datacommons: {
      apiKey: process.env.DATCOM_API_KEY || undefined,
      baseUrl: process.env.DATCOM_BASE_URL || DEFAULT_DATACOMMONS_BASE_URL,
    },
    llm: {
      provider: 'openai',
      model: process.env.LLM_MODEL || DEFAULT_LLM_MODEL,
      apiKey: process.env.OPENAI_API_KEY || undefined,
      maxTokens: parseEnvInt(process.env.LLM_MAX_TOKENS, undefined),
    },
    agent: {
      maxSteps:
        parseEnvInt(process.env.AGENT_MAX_STEPS, DEFAULT_MAX_STEPS) ??
        DEFAULT_MAX_STEPS,
      temperature:
        temperature === undefined || Number.isNaN(temperature)
          ? undefined
          : temperature,
    },
    server: {
      mode: parseEnvMode(process.env.DATCOM_MODE),
      http: {
        port: parseEnvPort(process.env.PORT, DEFAULT_PORT),
        host: process.env.HOST || '0.0.0.0',
      },
    },
  };
}

/**
 * Deep merge configuration objects
 */
function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: { [K in keyof T]?: unknown } | undefined,
): T {
  if (!overrides) return base;

  const result = { ...base };
  for (const key of Object.keys(overrides) as Array<keyof T>) {
    const value = overrides[key];
    if (
      value !== undefined &&
      typeof value === 'object' &&
      value !== null &&
      !Array.isArray(value)
    ) {
      result[key] = deepMerge(
        base[key] as Record<string, unknown>,
        value as Record<string, unknown>,
      ) as T[keyof T];
    } else if (value !== undefined) {
      result[key] = value as T[keyof T];
    }
  }
  return result;
}

/**
 * Partial overrides accepted by loadConfig, one level deep per section
 */
export type DatcomConfigOverrides = {
  [K in keyof DatcomConfig]?: Partial<DatcomConfig[K]>;
};

/**
 * Load and validate configuration
 * @throws {ConfigValidationError} When configuration is invalid
 */
export function loadConfig(overrides?: DatcomConfigOverrides): DatcomConfig {
  const merged = deepMerge(buildRawConfig(), overrides);

  const result = DatcomConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration:\n${formatIssues(result.error.errors)}`,
      result.error.errors,
    );
  }

  return result.data;
}

/**
 * Built-in defaults, independent of the environment
 */
export function defaultConfig(): DatcomConfig {
  return {
    datacommons: { baseUrl: DEFAULT_DATACOMMONS_BASE_URL },
    llm: { provider: 'openai', model: DEFAULT_LLM_MODEL },
    agent: { maxSteps: DEFAULT_MAX_STEPS },
    server: {
      mode: 'http',
      http: { port: DEFAULT_PORT, host: '0.0.0.0' },
    },
  };
}
