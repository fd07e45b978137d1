// Place name → DCID resolution
import type { PlaceResolution } from '@datcom/shared';
import type { DataCommonsClient } from '../datacommons/client.js';
import { DataCommonsValidationError } from '../datacommons/errors.js';

/**
 * Resolve a free-text place name to its Data Commons identifier.
 *
 * The first candidate of the first matching entity wins; the remaining
 * candidates are returned so callers can offer alternatives. A name the
 * service does not know yields `not_found` rather than an error.
 */
export async function resolvePlace(
  client: DataCommonsClient,
  place: string,
): Promise<PlaceResolution> {
  const name = place.trim();
  if (!name) {
    throw new DataCommonsValidationError('Place name cannot be empty', 'place');
  }

  const response = await client.resolve([name]);

  const entity = response.entities?.find(
    (candidate) => (candidate.candidates?.length ?? 0) > 0,
  );
  const candidates = entity?.candidates ?? [];
  const [best] = candidates;

  if (!best) {
    return { status: 'not_found', place: name };
  }

  return {
    status: 'found',
    place: name,
    dcid: best.dcid,
    dominantType: best.dominantType,
    candidates: candidates.map((candidate) => candidate.dcid),
  };
}
