// datcom shared - schemas, types and configuration
export * from './schemas.js';
export type * from './types.js';
export {
  ConfigValidationError,
  DEFAULT_DATACOMMONS_BASE_URL,
  DEFAULT_LLM_MODEL,
  DEFAULT_MAX_STEPS,
  DEFAULT_PORT,
  type DatcomConfigOverrides,
  defaultConfig,
  loadConfig,
} from './config.js';

export const VERSION = '0.1.0';
