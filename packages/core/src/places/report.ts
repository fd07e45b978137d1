// Human-readable renderings of lookup results
import type {
  ObservationValue,
  PlaceResolution,
  PopulationReport,
  VariableCatalog,
} from '@datcom/shared';
import { LATEST_DATE } from './dcids.js';

const numberFormat = new Intl.NumberFormat('en-US');

export function formatResolution(resolution: PlaceResolution): string {
  if (resolution.status === 'not_found') {
    return `Could not find place data for '${resolution.place}'`;
  }
  return `DCID for ${resolution.place}: ${resolution.dcid}`;
}

export function formatCatalog(catalog: VariableCatalog): string {
  let report = `Available variables (limited to first ${catalog.limit} per place):\n`;
  for (const place of catalog.places) {
    if (place.variables.length === 0) {
      report += `\nNo variables found for place ${place.dcid}\n`;
      continue;
    }
    report += `\nFor place ${place.dcid}:\n`;
    for (const variable of place.variables) {
      report += `  - ${variable}\n`;
    }
  }
  return report;
}

export function formatObservationValue(value: ObservationValue): string {
  return typeof value === 'number' ? numberFormat.format(value) : value;
}

export function formatPopulation(report: PopulationReport): string {
  let text = 'Population counts:\n';
  for (const record of report.records) {
    if (record.status === 'missing') {
      text +=
        record.requestedDate === LATEST_DATE
          ? `\n${record.dcid}: no data (latest)`
          : `\n${record.dcid}: no data for ${record.requestedDate}`;
      continue;
    }
    text += `\n${record.dcid}: ${formatObservationValue(record.value)} (as of ${record.date})`;
  }
  return text;
}
