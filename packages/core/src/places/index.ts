// Place lookups: resolution, variable catalog and population
export { resolvePlace } from './resolver.js';
export { listVariables, VARIABLE_LIMIT } from './catalog.js';
export { fetchPopulation, POPULATION_VARIABLE } from './population.js';
export {
  LATEST_DATE,
  normalizeDcids,
  normalizeObservationDate,
  uniqueDcids,
} from './dcids.js';
export {
  formatCatalog,
  formatObservationValue,
  formatPopulation,
  formatResolution,
} from './report.js';
