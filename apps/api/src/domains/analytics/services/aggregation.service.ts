// ============================================================================
// Aggregator
// Provider profiles, indicator summaries, sector overview and residents'
// experience breakdown over a (filtered) set of ServiceRecords.
// All values keep full precision; rounding happens in the presenter.
// ============================================================================

import {
  RE_FREQUENCY_ORDER,
  ServiceMeasure,
  type Measure,
} from '@carelens/shared/constants/extract.constants.js';
import {
  mean,
  presentValues,
  standardErrorOfMean,
} from '@carelens/shared/utils/stats.utils.js';
import type {
  IndicatorSummary,
  ProviderProfile,
  ResidentsExperienceItem,
  SectorOverview,
  ServiceRecord,
  SizeCounts,
} from '../analytics.types.js';
import { measureValue, measureValues } from '../measures.js';
import { detectOutliers } from './outlier.service.js';

// ---------------------------------------------------------------------------
// Provider profile
// ---------------------------------------------------------------------------

/**
 * Profile of one provider within the given subset. A provider with no
 * services in the subset gets zero counts and missing means.
 */
export function aggregateProvider(
  records: readonly ServiceRecord[],
  providerId: string,
): ProviderProfile {
  const services = records.filter((record) => record.providerId === providerId);

  const sizeCounts: SizeCounts = { Small: 0, Medium: 0, Large: 0, Unknown: 0 };
  const suburbs = new Set<string>();
  for (const service of services) {
    sizeCounts[service.size ?? 'Unknown']++;
    if (service.suburb !== null) suburbs.add(service.suburb);
  }

  return {
    providerId,
    providerName: services[0]?.providerName ?? null,
    serviceCount: services.length,
    suburbCount: suburbs.size,
    sizeCounts,
    meanOverallRating: mean(measureValues(services, ServiceMeasure.OVERALL_STAR_RATING)),
    meanRnCareCompliancePct: mean(measureValues(services, ServiceMeasure.RN_CARE_COMPLIANCE)),
    meanTotalCareCompliancePct: mean(
      measureValues(services, ServiceMeasure.TOTAL_CARE_COMPLIANCE),
    ),
    services: Object.freeze(services),
  };
}

// ---------------------------------------------------------------------------
// Indicator summary
// ---------------------------------------------------------------------------

export interface IndicatorSummaryOptions {
  iqrMultiplier: number;
  /**
   * Distribution the outlier fences are computed from. Defaults to `records`,
   * which makes outliers relative to the active filter.
   */
  population?: readonly ServiceRecord[];
}

export function summarizeIndicator(
  records: readonly ServiceRecord[],
  indicator: Measure,
  options: IndicatorSummaryOptions,
): IndicatorSummary {
  const present = records
    .map((record) => ({ serviceId: record.serviceId, value: measureValue(record, indicator) }))
    .filter((entry): entry is { serviceId: string; value: number } => entry.value !== null);
  const values = present.map((entry) => entry.value);

  const reference = options.population
    ? measureValues(options.population, indicator)
    : undefined;
  const { bounds, flags } = detectOutliers(values, {
    multiplier: options.iqrMultiplier,
    reference,
  });

  return {
    indicator,
    mean: mean(values),
    standardError: standardErrorOfMean(values),
    count: values.length,
    bounds,
    values: present.map((entry, i) => ({ ...entry, isOutlier: flags[i] })),
  };
}

// ---------------------------------------------------------------------------
// Sector overview
// ---------------------------------------------------------------------------

export function summarizeSector(records: readonly ServiceRecord[]): SectorOverview {
  return {
    serviceCount: records.length,
    providerCount: new Set(records.map((record) => record.providerId)).size,
    meanOverallRating: mean(measureValues(records, ServiceMeasure.OVERALL_STAR_RATING)),
    meanRnCareCompliancePct: mean(measureValues(records, ServiceMeasure.RN_CARE_COMPLIANCE)),
    meanTotalCareCompliancePct: mean(
      measureValues(records, ServiceMeasure.TOTAL_CARE_COMPLIANCE),
    ),
    nonCompliantCount: records.filter((record) => record.ratings.compliance === 1).length,
  };
}

// ---------------------------------------------------------------------------
// Residents' experience
// ---------------------------------------------------------------------------

const RE_HEADER = /^\[RE\]\s+(.*?)\s+-\s+(Always|Most of the time|Some of the time|Never)$/;

/**
 * Mean response percentage per `[RE] <Category> - <Frequency>` column,
 * ordered by category then frequency.
 */
export function summarizeResidentsExperience(
  records: readonly ServiceRecord[],
): ResidentsExperienceItem[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const column of Object.keys(record.residentsExperience)) columns.add(column);
  }

  const items: ResidentsExperienceItem[] = [];
  for (const column of columns) {
    const match = RE_HEADER.exec(column);
    if (!match) continue;
    const values = presentValues(records.map((record) => record.residentsExperience[column]));
    const meanPct = mean(values);
    const frequency = RE_FREQUENCY_ORDER.find((candidate) => candidate === match[2]);
    if (meanPct === null || frequency === undefined) continue;
    items.push({ column, category: match[1], frequency, meanPct, count: values.length });
  }

  return items.sort(
    (a, b) =>
      a.category.localeCompare(b.category) ||
      RE_FREQUENCY_ORDER.indexOf(a.frequency) - RE_FREQUENCY_ORDER.indexOf(b.frequency),
  );
}
