// ============================================================================
// Response shaping
// Services keep full precision; numbers are rounded to one decimal here,
// on the way out.
// ============================================================================

import {
  CONCERN_REASON_LABELS,
  MEASURE_LABELS,
} from '@carelens/shared/constants/extract.constants.js';
import { roundTo } from '@carelens/shared/utils/stats.utils.js';
import type {
  AnalysisSession,
  AnomalyReport,
  DataQualityWarning,
  IndicatorSummary,
  IqrBounds,
  ProviderProfile,
  ResidentsExperienceItem,
  RiskRadar,
  SectorBenchmarks,
  SectorOverview,
  ServiceRecord,
} from './analytics.types.js';
import type { ConcernEntry } from './services/analysis-session.service.js';

function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

function presentBounds(bounds: IqrBounds | null) {
  if (!bounds) return null;
  return {
    q1: roundTo(bounds.q1),
    q3: roundTo(bounds.q3),
    iqr: roundTo(bounds.iqr),
    lowerBound: roundTo(bounds.lowerBound),
    upperBound: roundTo(bounds.upperBound),
  };
}

export function presentSession(session: AnalysisSession) {
  return {
    sessionId: session.id,
    fileName: session.fileName,
    sourceHash: session.sourceHash,
    loadedAt: session.loadedAt.toISOString(),
    serviceCount: session.records.length,
    providerCount: new Set(session.records.map((record) => record.providerId)).size,
    warningCounts: countBy(session.warnings, (warning) => warning.code),
    warnings: session.warnings,
  };
}

export function presentService(record: ServiceRecord) {
  return {
    serviceId: record.serviceId,
    serviceName: record.serviceName,
    providerId: record.providerId,
    providerName: record.providerName,
    state: record.state,
    suburb: record.suburb,
    mmmCode: record.mmmCode,
    remoteness: record.remoteness,
    places: record.places,
    size: record.size,
    ratings: record.ratings,
    rnCareCompliancePct: roundTo(record.rnCareCompliancePct),
    totalCareCompliancePct: roundTo(record.totalCareCompliancePct),
    qualityIndicators: record.qualityIndicators,
    complianceAction: record.complianceAction,
  };
}

export function presentServices(records: readonly ServiceRecord[]) {
  return records.map(presentService);
}

export function presentOverview(overview: SectorOverview) {
  return {
    ...overview,
    meanOverallRating: roundTo(overview.meanOverallRating),
    meanRnCareCompliancePct: roundTo(overview.meanRnCareCompliancePct),
    meanTotalCareCompliancePct: roundTo(overview.meanTotalCareCompliancePct),
  };
}

export function presentProfile(profile: ProviderProfile) {
  return {
    providerId: profile.providerId,
    providerName: profile.providerName,
    serviceCount: profile.serviceCount,
    suburbCount: profile.suburbCount,
    sizeCounts: profile.sizeCounts,
    meanOverallRating: roundTo(profile.meanOverallRating),
    meanRnCareCompliancePct: roundTo(profile.meanRnCareCompliancePct),
    meanTotalCareCompliancePct: roundTo(profile.meanTotalCareCompliancePct),
    services: presentServices(profile.services),
  };
}

export function presentIndicator(summary: IndicatorSummary) {
  return {
    indicator: summary.indicator,
    label: MEASURE_LABELS[summary.indicator],
    mean: roundTo(summary.mean),
    standardError: roundTo(summary.standardError),
    count: summary.count,
    bounds: presentBounds(summary.bounds),
    outlierCount: summary.values.filter((entry) => entry.isOutlier).length,
    values: summary.values.map((entry) => ({ ...entry, value: roundTo(entry.value) })),
  };
}

export function presentConcerns(entries: readonly ConcernEntry[]) {
  return {
    count: entries.length,
    countsByReason: countBy(
      entries.flatMap((entry) => entry.flag.reasons),
      (reason) => reason,
    ),
    services: entries.map(({ record, flag }) => ({
      serviceId: record.serviceId,
      serviceName: record.serviceName,
      providerId: record.providerId,
      providerName: record.providerName,
      state: record.state,
      reasons: flag.reasons,
      reasonLabels: flag.reasons.map((reason) => CONCERN_REASON_LABELS[reason]),
    })),
  };
}

export function presentAnomalies(report: AnomalyReport) {
  const providerNames = new Map(
    report.anomalies.map((anomaly) => [anomaly.providerId, anomaly.providerName]),
  );
  return {
    anomalies: report.anomalies.map((anomaly) => ({
      ...anomaly,
      label: MEASURE_LABELS[anomaly.measure],
      value: roundTo(anomaly.value),
      bounds: presentBounds(anomaly.bounds),
    })),
    skippedMeasures: report.skippedMeasures,
    countsByMeasure: report.countsByMeasure,
    countsByProvider: Object.entries(report.countsByProvider)
      .map(([providerId, count]) => ({
        providerId,
        providerName: providerNames.get(providerId) ?? providerId,
        count,
      }))
      .sort((a, b) => b.count - a.count || a.providerId.localeCompare(b.providerId)),
  };
}

export function presentBenchmarks(benchmarks: SectorBenchmarks) {
  return {
    providerId: benchmarks.providerId,
    peerServiceCount: benchmarks.peerServiceCount,
    measures: benchmarks.measures.map((entry) => ({
      measure: entry.measure,
      label: MEASURE_LABELS[entry.measure],
      median: roundTo(entry.median),
      p75: roundTo(entry.p75),
      p90: roundTo(entry.p90),
      providerValue: roundTo(entry.providerValue),
      band: entry.band,
    })),
  };
}

export function presentRadar(radar: RiskRadar) {
  return {
    ...radar,
    axes: radar.axes.map((axis) => ({
      indicator: axis.indicator,
      label: MEASURE_LABELS[axis.indicator],
      providerMean: roundTo(axis.providerMean),
      percentileRank: roundTo(axis.percentileRank),
    })),
  };
}

export function presentResidentsExperience(items: readonly ResidentsExperienceItem[]) {
  return items.map((item) => ({ ...item, meanPct: roundTo(item.meanPct) }));
}

/** `{ data }` envelope, with filter warnings attached when there are any. */
export function envelope<T>(data: T, warnings: readonly DataQualityWarning[] = []) {
  return warnings.length > 0 ? { data, warnings } : { data };
}
