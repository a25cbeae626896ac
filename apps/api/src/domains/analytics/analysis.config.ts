// ============================================================================
// Analytics thresholds and tuning, resolved from the environment
// ============================================================================

import { OutlierScope } from '@carelens/shared/constants/extract.constants.js';
import type { Env } from '../../lib/env.js';

export interface SizeBreakpoints {
  /** Largest place count still bucketed as Small. */
  smallMaxPlaces: number;
  /** Largest place count still bucketed as Medium; above is Large. */
  mediumMaxPlaces: number;
}

export interface AnalysisConfig {
  staffingBenchmarkPct: number;
  starRatingConcernCutoff: number;
  componentRatingRules: boolean;
  sizeBreakpoints: SizeBreakpoints;
  iqrMultiplier: number;
  outlierScope: OutlierScope;
  minOutlierSample: number;
  strictNormalization: boolean;
}

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  staffingBenchmarkPct: 100,
  starRatingConcernCutoff: 2,
  componentRatingRules: false,
  sizeBreakpoints: Object.freeze({ smallMaxPlaces: 29, mediumMaxPlaces: 60 }),
  iqrMultiplier: 1.5,
  outlierScope: OutlierScope.FILTER,
  minOutlierSample: 5,
  strictNormalization: false,
});

export function analysisConfigFromEnv(env: Env): AnalysisConfig {
  return {
    staffingBenchmarkPct: env.STAFFING_BENCHMARK_PCT,
    starRatingConcernCutoff: env.STAR_RATING_CONCERN_CUTOFF,
    componentRatingRules: env.CONCERN_COMPONENT_RULES,
    sizeBreakpoints: {
      smallMaxPlaces: env.SIZE_SMALL_MAX_PLACES,
      mediumMaxPlaces: env.SIZE_MEDIUM_MAX_PLACES,
    },
    iqrMultiplier: env.IQR_MULTIPLIER,
    outlierScope: env.OUTLIER_SCOPE,
    minOutlierSample: env.MIN_OUTLIER_SAMPLE,
    strictNormalization: env.NORMALIZATION_STRICT,
  };
}

export function withConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  return {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...overrides,
    sizeBreakpoints: {
      ...DEFAULT_ANALYSIS_CONFIG.sizeBreakpoints,
      ...overrides.sizeBreakpoints,
    },
  };
}
