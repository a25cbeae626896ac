import { ServiceMeasure, type Measure } from '@carelens/shared/constants/extract.constants.js';
import { presentValues } from '@carelens/shared/utils/stats.utils.js';
import type { ServiceRecord } from './analytics.types.js';

export function measureValue(record: ServiceRecord, measure: Measure): number | null {
  switch (measure) {
    case ServiceMeasure.OVERALL_STAR_RATING:
      return record.ratings.overall;
    case ServiceMeasure.RN_CARE_COMPLIANCE:
      return record.rnCareCompliancePct;
    case ServiceMeasure.TOTAL_CARE_COMPLIANCE:
      return record.totalCareCompliancePct;
    default:
      return record.qualityIndicators[measure];
  }
}

/** Non-missing values of one measure across the records. */
export function measureValues(records: readonly ServiceRecord[], measure: Measure): number[] {
  return presentValues(records.map((record) => measureValue(record, measure)));
}
