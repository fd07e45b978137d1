// Population counts for places
import type {
  EntityObservation,
  Facet,
  FacetInfo,
  PopulationRecord,
  PopulationReport,
} from '@datcom/shared';
import type { DataCommonsClient } from '../datacommons/client.js';
import {
  normalizeDcids,
  normalizeObservationDate,
  uniqueDcids,
} from './dcids.js';

/** Statistical variable holding total population */
export const POPULATION_VARIABLE = 'Count_Person';

/**
 * Fetch the population count of each place.
 *
 * Returns exactly one record per requested DCID, in request order. A place
 * without an observed value for the requested date gets a `missing` record.
 * When a place has several sources, the service's preferred facet (the
 * first ordered facet) is used.
 */
export async function fetchPopulation(
  client: DataCommonsClient,
  dcids: readonly string[],
  date?: string,
): Promise<PopulationReport> {
  const places = normalizeDcids(dcids);
  const requestedDate = normalizeObservationDate(date);

  const response = await client.observe({
    entities: uniqueDcids(places),
    variables: [POPULATION_VARIABLE],
    date: requestedDate,
    select: ['entity', 'variable', 'value', 'date'],
  });

  const byEntity = new Map<string, EntityObservation>(
    Object.entries(response.byVariable?.[POPULATION_VARIABLE]?.byEntity ?? {}),
  );
  const facets = new Map<string, Facet>(Object.entries(response.facets ?? {}));

  return {
    variable: POPULATION_VARIABLE,
    requestedDate,
    records: places.map((dcid) =>
      toRecord(dcid, requestedDate, byEntity.get(dcid), facets),
    ),
  };
}

function toRecord(
  dcid: string,
  requestedDate: string,
  observation: EntityObservation | undefined,
  facets: Map<string, Facet>,
): PopulationRecord {
  const facet = observation?.orderedFacets?.[0];
  const point = facet?.observations?.[0];

  if (!facet || point?.value === undefined) {
    return {
      status: 'missing',
      dcid,
      variable: POPULATION_VARIABLE,
      requestedDate,
    };
  }

  const details = facets.get(facet.facetId);
  const facetInfo: FacetInfo = { facetId: facet.facetId, ...details };

  return {
    status: 'observed',
    dcid,
    variable: POPULATION_VARIABLE,
    date: point.date,
    value: point.value,
    facet: facetInfo,
  };
}
