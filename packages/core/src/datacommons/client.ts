// Data Commons REST v2 client
import {
  DEFAULT_DATACOMMONS_BASE_URL,
  type ObservationResponse,
  ObservationResponseSchema,
  type ResolveResponse,
  ResolveResponseSchema,
} from '@datcom/shared';
import type { z } from 'zod';
import {
  DataCommonsAuthenticationError,
  DataCommonsRequestError,
  DataCommonsTransportError,
  MalformedResponseError,
} from './errors.js';

/** Header carrying the Data Commons API key */
export const API_KEY_HEADER = 'X-API-Key';

/** Resolve property for name → DCID lookups */
export const DESCRIPTION_TO_DCID = '<-description->dcid';

export type ObservationSelect = 'entity' | 'variable' | 'value' | 'date';

export interface ObservationQuery {
  entities: string[];
  variables?: string[];
  /** `LATEST` or an ISO date prefix */
  date: string;
  select: ObservationSelect[];
}

export interface DataCommonsClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Thin client over the Data Commons v2 REST API.
 * Each call is a single GET with no retries and no caching.
 */
export class DataCommonsClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DataCommonsClientOptions) {
    if (!options.apiKey) {
      throw new DataCommonsAuthenticationError(
        'Data Commons API key is required',
      );
    }
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_DATACOMMONS_BASE_URL).replace(
      /\/+$/,
      '',
    );
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Resolve node descriptions (place names) to candidate DCIDs
   */
  async resolve(
    nodes: string[],
    property = DESCRIPTION_TO_DCID,
  ): Promise<ResolveResponse> {
    const params = new URLSearchParams();
    for (const node of nodes) {
      params.append('nodes', node);
    }
    params.set('property', property);

    return this.request('/resolve', params, ResolveResponseSchema);
  }

  /**
   * Fetch observations for entities, optionally filtered to variables
   */
  async observe(query: ObservationQuery): Promise<ObservationResponse> {
    const params = new URLSearchParams();
    params.set('date', query.date);
    for (const dcid of query.entities) {
      params.append('entity.dcids', dcid);
    }
    for (const variable of query.variables ?? []) {
      params.append('variable.dcids', variable);
    }
    for (const field of query.select) {
      params.append('select', field);
    }

    return this.request('/observation', params, ObservationResponseSchema);
  }

  private async request<T>(
    endpoint: string,
    params: URLSearchParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = `${this.baseUrl}${endpoint}?${params.toString()}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          [API_KEY_HEADER]: this.apiKey,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataCommonsTransportError(
        `Request to Data Commons ${endpoint} failed: ${reason}`,
        endpoint,
        error instanceof Error ? error : undefined,
      );
    }

    if (!response.ok) {
      throw this.statusError(endpoint, response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new MalformedResponseError(
        `Data Commons ${endpoint} returned a body that is not valid JSON`,
        endpoint,
        [],
        error instanceof Error ? error : undefined,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      const details = issues
        .map((i) => `  - ${i.path || '(root)'}: ${i.message}`)
        .join('\n');
      throw new MalformedResponseError(
        `Data Commons ${endpoint} returned an unexpected response shape:\n${details}`,
        endpoint,
        issues,
      );
    }

    return result.data;
  }

  private statusError(endpoint: string, response: Response): Error {
    const status = response.status;
    const statusText = response.statusText ? ` ${response.statusText}` : '';

    if (status === 401 || status === 403) {
      return new DataCommonsAuthenticationError(
        `Data Commons rejected the API key (${status}${statusText})`,
        status,
      );
    }

    return new DataCommonsRequestError(
      `Data Commons ${endpoint} responded with ${status}${statusText}`,
      status,
      endpoint,
    );
  }
}
