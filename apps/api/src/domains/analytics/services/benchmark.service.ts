// ============================================================================
// Sector benchmarking
// Where a provider sits against its peers in the current subset.
// ============================================================================

import {
  BENCHMARK_MEASURES,
  BenchmarkBand,
  QUALITY_INDICATORS,
  RADAR_CONCERN_PERCENTILE,
  RADAR_MIN_SECTOR_SERVICES,
  RADAR_STRENGTH_PERCENTILE,
  type QualityIndicator,
} from '@carelens/shared/constants/extract.constants.js';
import { mean, median, percentileOfScore, quantile } from '@carelens/shared/utils/stats.utils.js';
import type {
  MeasureBenchmark,
  RadarAxis,
  RiskRadar,
  SectorBenchmarks,
  ServiceRecord,
} from '../analytics.types.js';
import { measureValues } from '../measures.js';

export function bandFor(
  providerValue: number | null,
  medianValue: number | null,
  p90: number | null,
): BenchmarkBand | null {
  if (providerValue === null || medianValue === null || p90 === null) return null;
  if (providerValue >= p90) return BenchmarkBand.TOP_DECILE;
  if (providerValue >= medianValue) return BenchmarkBand.ABOVE_MEDIAN;
  return BenchmarkBand.BELOW_MEDIAN;
}

/**
 * Median, 75th and 90th percentile of each benchmark measure across the
 * provider's peers (every other service in the subset), with the provider's
 * own mean and band.
 */
export function computeSectorBenchmarks(
  records: readonly ServiceRecord[],
  providerId: string,
): SectorBenchmarks {
  const own = records.filter((record) => record.providerId === providerId);
  const peers = records.filter((record) => record.providerId !== providerId);

  const measures: MeasureBenchmark[] = BENCHMARK_MEASURES.map((measure) => {
    const peerValues = measureValues(peers, measure);
    const medianValue = median(peerValues);
    const p90 = quantile(peerValues, 0.9);
    const providerValue = mean(measureValues(own, measure));
    return {
      measure,
      median: medianValue,
      p75: quantile(peerValues, 0.75),
      p90,
      providerValue,
      band: bandFor(providerValue, medianValue, p90),
    };
  });

  return { providerId, peerServiceCount: peers.length, measures };
}

/**
 * Percentile rank of the provider's mean on every quality indicator within the
 * subset (provider included). Higher indicator rates are worse, so a high
 * rank is a concern and a low rank a strength.
 */
export function computeRiskRadar(
  records: readonly ServiceRecord[],
  providerId: string,
): RiskRadar {
  if (records.length < RADAR_MIN_SECTOR_SERVICES) {
    return { providerId, sufficientData: false, axes: [], concerns: [], strengths: [] };
  }

  const own = records.filter((record) => record.providerId === providerId);
  const axes: RadarAxis[] = [];
  const concerns: QualityIndicator[] = [];
  const strengths: QualityIndicator[] = [];

  for (const indicator of QUALITY_INDICATORS) {
    const providerMean = mean(measureValues(own, indicator));
    if (providerMean === null) continue;
    const percentileRank = percentileOfScore(measureValues(records, indicator), providerMean);
    if (percentileRank === null) continue;

    axes.push({ indicator, providerMean, percentileRank });
    if (percentileRank >= RADAR_CONCERN_PERCENTILE) concerns.push(indicator);
    else if (percentileRank <= RADAR_STRENGTH_PERCENTILE) strengths.push(indicator);
  }

  return { providerId, sufficientData: axes.length > 0, axes, concerns, strengths };
}
