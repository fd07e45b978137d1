// Input normalisation shared by the place lookups
import { DataCommonsValidationError } from '../datacommons/errors.js';

export const LATEST_DATE = 'LATEST';

const ISO_DATE_PATTERN = /^\d{4}(?:-\d{2}(?:-\d{2})?)?$/;

/**
 * Trim and drop empty DCIDs, keeping the caller's order and duplicates
 * @throws {DataCommonsValidationError} When no DCID remains
 */
export function normalizeDcids(dcids: readonly string[]): string[] {
  const cleaned = dcids.map((dcid) => dcid.trim()).filter((dcid) => dcid);
  if (cleaned.length === 0) {
    throw new DataCommonsValidationError(
      'At least one place DCID is required',
      'place_dcids',
    );
  }
  return cleaned;
}

/**
 * DCIDs to send to the service: first occurrence of each, in order
 */
export function uniqueDcids(dcids: readonly string[]): string[] {
  return [...new Set(dcids)];
}

/**
 * Map an optional date filter to the value the observation endpoint expects
 * @throws {DataCommonsValidationError} When the date is not LATEST or an ISO date prefix
 */
export function normalizeObservationDate(date?: string): string {
  const trimmed = date?.trim();
  if (!trimmed || trimmed.toUpperCase() === LATEST_DATE) {
    return LATEST_DATE;
  }
  if (!ISO_DATE_PATTERN.test(trimmed)) {
    throw new DataCommonsValidationError(
      `Invalid date '${trimmed}': use YYYY, YYYY-MM, YYYY-MM-DD or LATEST`,
      'date',
    );
  }
  return trimmed;
}
