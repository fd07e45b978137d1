// Statistical variables available for places
import type { PlaceVariables, VariableCatalog } from '@datcom/shared';
import type { DataCommonsClient } from '../datacommons/client.js';
import { LATEST_DATE, normalizeDcids, uniqueDcids } from './dcids.js';

/** Maximum number of variables reported per place */
export const VARIABLE_LIMIT = 10;

/**
 * List the statistical variables Data Commons holds for each place.
 *
 * Variables keep the order the service reports them in and are cut at
 * {@link VARIABLE_LIMIT} per place. Every requested DCID gets an entry,
 * in request order, even when the service knows no variables for it.
 */
export async function listVariables(
  client: DataCommonsClient,
  dcids: readonly string[],
): Promise<VariableCatalog> {
  const places = normalizeDcids(dcids);

  const response = await client.observe({
    entities: uniqueDcids(places),
    date: LATEST_DATE,
    select: ['entity', 'variable'],
  });

  const found = new Map<string, { variables: string[]; total: number }>(
    uniqueDcids(places).map((dcid) => [dcid, { variables: [], total: 0 }]),
  );

  for (const [variable, observation] of Object.entries(
    response.byVariable ?? {},
  )) {
    for (const entity of Object.keys(observation.byEntity ?? {})) {
      const entry = found.get(entity);
      if (!entry) continue;
      entry.total += 1;
      if (entry.variables.length < VARIABLE_LIMIT) {
        entry.variables.push(variable);
      }
    }
  }

  return {
    limit: VARIABLE_LIMIT,
    places: places.map((dcid): PlaceVariables => {
      const entry = found.get(dcid);
      return {
        dcid,
        variables: entry ? [...entry.variables] : [],
        totalAvailable: entry?.total ?? 0,
      };
    }),
  };
}
