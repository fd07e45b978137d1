// Zod schemas for MCP tool validation, Data Commons payloads and configuration
import { z } from 'zod';

// ============================================================================
// Tool Input Schemas
// ============================================================================

function dropBlankDcids(entries: unknown[]): unknown[] {
  return entries
    .map((entry) => (typeof entry === 'string' ? entry.trim() : entry))
    .filter((entry) => entry !== '');
}

/**
 * A list of place DCIDs. Models frequently send a single comma-separated
 * string instead of an array, so both shapes are accepted. Blank entries
 * are dropped from either shape.
 */
export const DcidListSchema = z.preprocess(
  (value) => {
    if (typeof value === 'string') return dropBlankDcids(value.split(','));
    if (Array.isArray(value)) return dropBlankDcids(value);
    return value;
  },
  z
    .array(z.string().trim().min(1, 'DCID cannot be empty'))
    .min(1, 'At least one DCID is required'),
);

/**
 * Observation date filter: a year, year-month, full date, or LATEST
 */
export const ObservationDateSchema = z
  .string()
  .trim()
  .regex(
    /^(?:LATEST|\d{4}(?:-\d{2}(?:-\d{2})?)?)$/i,
    'Date must be LATEST or an ISO date (YYYY, YYYY-MM or YYYY-MM-DD)',
  );

export const GetDcidSchema = z.object({
  place: z
    .string()
    .trim()
    .min(1, 'Place name cannot be empty')
    .describe('Name of the place, e.g. "California" or "Paris, France"'),
});

export const GetAvailableVariablesSchema = z.object({
  place_dcids: DcidListSchema.describe(
    'DCIDs of the places to inspect (array or comma-separated string)',
  ),
});

export const GetPopulationCountSchema = z.object({
  place_dcids: DcidListSchema.describe(
    'DCIDs of the places to query (array or comma-separated string)',
  ),
  date: ObservationDateSchema.optional().describe(
    'Observation date (YYYY, YYYY-MM or YYYY-MM-DD); omit for the latest value',
  ),
});

// ============================================================================
// Data Commons v2 Wire Schemas
// ============================================================================

export const ResolveCandidateSchema = z.object({
  dcid: z.string().min(1),
  dominantType: z.string().optional(),
});

export const ResolveEntitySchema = z.object({
  node: z.string(),
  candidates: z.array(ResolveCandidateSchema).optional(),
});

export const ResolveResponseSchema = z.object({
  entities: z.array(ResolveEntitySchema).optional(),
});

export const ObservationPointSchema = z.object({
  date: z.string(),
  value: z.union([z.number(), z.string()]).optional(),
});

export const OrderedFacetSchema = z.object({
  facetId: z.string(),
  observations: z.array(ObservationPointSchema).optional(),
  earliestDate: z.string().optional(),
  latestDate: z.string().optional(),
  obsCount: z.number().optional(),
});

export const EntityObservationSchema = z.object({
  orderedFacets: z.array(OrderedFacetSchema).optional(),
});

export const VariableObservationSchema = z.object({
  byEntity: z.record(z.string(), EntityObservationSchema).optional(),
});

export const FacetSchema = z.object({
  importName: z.string().optional(),
  provenanceUrl: z.string().optional(),
  measurementMethod: z.string().optional(),
  observationPeriod: z.string().optional(),
  unit: z.string().optional(),
});

export const ObservationResponseSchema = z.object({
  byVariable: z.record(z.string(), VariableObservationSchema).optional(),
  facets: z.record(z.string(), FacetSchema).optional(),
});

// ============================================================================
// Configuration Schemas
// ============================================================================

export const DataCommonsConfigSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url('Data Commons base URL must be a valid URL'),
});

export const LLMConfigSchema = z.object({
  provider: z.enum(['openai']),
  model: z.string().min(1, 'Model name is required'),
  apiKey: z.string().optional(),
  maxTokens: z.number().int().positive().optional(),
});

export const AgentSettingsSchema = z.object({
  maxSteps: z.number().int().min(1).max(50),
  temperature: z.number().min(0).max(2).optional(),
});

export const ServerModeSchema = z.enum(['http', 'stdio']);

export const HTTPServerOptionsSchema = z.object({
  port: z.number().int().min(0).max(65535),
  host: z.string().min(1).optional(),
});

export const DatcomConfigSchema = z.object({
  datacommons: DataCommonsConfigSchema,
  llm: LLMConfigSchema,
  agent: AgentSettingsSchema,
  server: z.object({
    mode: ServerModeSchema,
    http: HTTPServerOptionsSchema,
  }),
});

export const HealthStatusSchema = z.object({
  status: z.enum(['ok', 'error']),
  datacommons: z.enum(['configured', 'unconfigured']),
  tools: z.number().int().nonnegative(),
  uptime: z.number().nonnegative(),
});

// ============================================================================
// Inferred Types
// ============================================================================

export type GetDcidInput = z.infer<typeof GetDcidSchema>;
export type GetAvailableVariablesInput = z.infer<
  typeof GetAvailableVariablesSchema
>;
export type GetPopulationCountInput = z.infer<typeof GetPopulationCountSchema>;

export type ResolveCandidate = z.infer<typeof ResolveCandidateSchema>;
export type ResolveEntity = z.infer<typeof ResolveEntitySchema>;
export type ResolveResponse = z.infer<typeof ResolveResponseSchema>;
export type ObservationPoint = z.infer<typeof ObservationPointSchema>;
export type OrderedFacet = z.infer<typeof OrderedFacetSchema>;
export type EntityObservation = z.infer<typeof EntityObservationSchema>;
export type VariableObservation = z.infer<typeof VariableObservationSchema>;
export type Facet = z.infer<typeof FacetSchema>;
export type ObservationResponse = z.infer<typeof ObservationResponseSchema>;

export type DataCommonsConfig = z.infer<typeof DataCommonsConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type ServerMode = z.infer<typeof ServerModeSchema>;
export type HTTPServerOptions = z.infer<typeof HTTPServerOptionsSchema>;
export type DatcomConfig = z.infer<typeof DatcomConfigSchema>;
export type HealthStatus = z.infer<typeof HealthStatusSchema>;
