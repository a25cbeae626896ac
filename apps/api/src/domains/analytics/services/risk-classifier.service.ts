// ============================================================================
// Risk Classifier
// Ordered predicate → reason rules evaluated against one immutable record.
// Every rule runs; reasons accumulate in rule order.
// ============================================================================

import { ConcernReason } from '@carelens/shared/constants/extract.constants.js';
import type { AnalysisConfig } from '../analysis.config.js';
import type { ConcernFlag, ServiceRecord } from '../analytics.types.js';

export type RiskConfig = Pick<
  AnalysisConfig,
  'staffingBenchmarkPct' | 'starRatingConcernCutoff' | 'componentRatingRules'
>;

export interface ConcernRule {
  reason: ConcernReason;
  /** Rules gated off by configuration are skipped entirely. */
  enabled: (config: RiskConfig) => boolean;
  /** Missing inputs must evaluate to false. */
  applies: (record: ServiceRecord, config: RiskConfig) => boolean;
}

const always = () => true;
const componentRules = (config: RiskConfig) => config.componentRatingRules;

function atOrBelow(value: number | null, cutoff: number): boolean {
  return value !== null && value <= cutoff;
}

function below(value: number | null, threshold: number): boolean {
  return value !== null && value < threshold;
}

export const CONCERN_RULES: readonly ConcernRule[] = Object.freeze([
  {
    reason: ConcernReason.LOW_STAR_RATING,
    enabled: always,
    applies: (record, config) => atOrBelow(record.ratings.overall, config.starRatingConcernCutoff),
  },
  {
    reason: ConcernReason.ACTIVE_COMPLIANCE_ACTION,
    enabled: always,
    applies: (record) => record.complianceAction !== null,
  },
  {
    reason: ConcernReason.STAFFING_BENCHMARK_SHORTFALL,
    enabled: always,
    applies: (record, config) =>
      below(record.rnCareCompliancePct, config.staffingBenchmarkPct) ||
      below(record.totalCareCompliancePct, config.staffingBenchmarkPct),
  },
  {
    reason: ConcernReason.NON_COMPLIANCE_RATING,
    enabled: componentRules,
    applies: (record) => record.ratings.compliance === 1,
  },
  {
    reason: ConcernReason.LOW_COMPONENT_RATING,
    enabled: componentRules,
    applies: (record, config) =>
      atOrBelow(record.ratings.staffing, config.starRatingConcernCutoff) ||
      atOrBelow(record.ratings.qualityMeasures, config.starRatingConcernCutoff) ||
      atOrBelow(record.ratings.residentsExperience, config.starRatingConcernCutoff),
  },
]);

export function classifyService(
  record: ServiceRecord,
  config: RiskConfig,
  rules: readonly ConcernRule[] = CONCERN_RULES,
): ConcernFlag {
  const reasons: ConcernReason[] = [];
  for (const rule of rules) {
    if (rule.enabled(config) && rule.applies(record, config)) {
      reasons.push(rule.reason);
    }
  }
  return { serviceId: record.serviceId, reasons };
}

/** Flags for the services that matched at least one rule, in input order. */
export function classifyServices(
  records: readonly ServiceRecord[],
  config: RiskConfig,
): ConcernFlag[] {
  return records
    .map((record) => classifyService(record, config))
    .filter((flag) => flag.reasons.length > 0);
}
