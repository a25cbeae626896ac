// ============================================================================
// Outlier Detector
// Interquartile-range rule: a value is an outlier when it falls below
// Q1 - k*IQR or above Q3 + k*IQR of the reference distribution.
// ============================================================================

import {
  ANOMALY_MEASURES,
  ConcernDirection,
  MEASURES,
} from '@carelens/shared/constants/extract.constants.js';
import { presentValues, quantile } from '@carelens/shared/utils/stats.utils.js';
import type {
  Anomaly,
  AnomalyReport,
  IqrBounds,
  OutlierDetection,
  ServiceRecord,
} from '../analytics.types.js';
import { measureValue, measureValues } from '../measures.js';

export function computeIqrBounds(values: readonly number[], multiplier: number): IqrBounds | null {
  const q1 = quantile(values, 0.25);
  const q3 = quantile(values, 0.75);
  if (q1 === null || q3 === null) return null;
  const iqr = q3 - q1;
  return {
    q1,
    q3,
    iqr,
    lowerBound: q1 - multiplier * iqr,
    upperBound: q3 + multiplier * iqr,
  };
}

export function isOutlier(value: number, bounds: IqrBounds): boolean {
  return value < bounds.lowerBound || value > bounds.upperBound;
}

export interface OutlierOptions {
  multiplier: number;
  /** Values the fences come from; defaults to the non-missing input values. */
  reference?: readonly number[];
}

/**
 * Flags each value of one indicator against IQR fences.
 * Missing values are ignored when computing the fences and never flagged.
 */
export function detectOutliers(
  values: ReadonlyArray<number | null>,
  options: OutlierOptions,
): OutlierDetection {
  const reference = options.reference ?? presentValues(values);
  const bounds = computeIqrBounds(reference, options.multiplier);
  return {
    bounds,
    flags: values.map((value) => bounds !== null && value !== null && isOutlier(value, bounds)),
  };
}

export interface AnomalyOptions {
  iqrMultiplier: number;
  minOutlierSample: number;
  population?: readonly ServiceRecord[];
}

/**
 * Directional outlier report: low values of ratings and care compliance,
 * high values of adverse-event indicators. Measures with too few values in
 * the reference distribution are skipped.
 */
export function findAnomalies(
  records: readonly ServiceRecord[],
  options: AnomalyOptions,
): AnomalyReport {
  const population = options.population ?? records;
  const report: AnomalyReport = {
    anomalies: [],
    skippedMeasures: [],
    countsByMeasure: {},
    countsByProvider: {},
  };

  for (const measure of MEASURES) {
    const direction = ANOMALY_MEASURES[measure];
    if (!direction) continue;

    const reference = measureValues(population, measure);
    if (reference.length < options.minOutlierSample) {
      report.skippedMeasures.push(measure);
      continue;
    }
    const bounds = computeIqrBounds(reference, options.iqrMultiplier);
    if (!bounds) continue;

    for (const record of records) {
      const value = measureValue(record, measure);
      if (value === null) continue;
      const concerning =
        direction === ConcernDirection.LOW ? value < bounds.lowerBound : value > bounds.upperBound;
      if (!concerning) continue;

      const anomaly: Anomaly = {
        serviceId: record.serviceId,
        serviceName: record.serviceName,
        providerId: record.providerId,
        providerName: record.providerName,
        measure,
        value,
        direction,
        bounds,
      };
      report.anomalies.push(anomaly);
      report.countsByMeasure[measure] = (report.countsByMeasure[measure] ?? 0) + 1;
      report.countsByProvider[record.providerId] =
        (report.countsByProvider[record.providerId] ?? 0) + 1;
    }
  }

  return report;
}
