// ============================================================================
// Extract Analytics — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  QualityIndicator,
  ServiceMeasure,
  ServiceSize,
} from '../../constants/extract.constants.js';

// --- Enum Value Arrays ---

const SERVICE_SIZES = [
  ServiceSize.SMALL,
  ServiceSize.MEDIUM,
  ServiceSize.LARGE,
] as const;

const MEASURES = [
  ServiceMeasure.OVERALL_STAR_RATING,
  ServiceMeasure.RN_CARE_COMPLIANCE,
  ServiceMeasure.TOTAL_CARE_COMPLIANCE,
  QualityIndicator.PRESSURE_INJURIES,
  QualityIndicator.RESTRICTIVE_PRACTICES,
  QualityIndicator.UNPLANNED_WEIGHT_LOSS,
  QualityIndicator.FALLS,
  QualityIndicator.MAJOR_INJURY_FROM_FALL,
  QualityIndicator.POLYPHARMACY,
  QualityIndicator.ANTIPSYCHOTIC,
] as const;

// --- Helpers ---

// "NSW,VIC" → ['NSW', 'VIC']; blanks are dropped so "?state=" means ANY
function commaList<T extends z.ZodTypeAny>(item: T) {
  return z
    .string()
    .max(1000)
    .transform((raw) =>
      raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0),
    )
    .pipe(z.array(item));
}

// ============================================================================
// Path params
// ============================================================================

export const sessionParamSchema = z.object({
  sessionId: z.string().uuid(),
});

export type SessionParam = z.infer<typeof sessionParamSchema>;

export const providerParamSchema = z.object({
  sessionId: z.string().uuid(),
  providerId: z.string().min(1).max(200),
});

export type ProviderParam = z.infer<typeof providerParamSchema>;

export const indicatorParamSchema = z.object({
  sessionId: z.string().uuid(),
  indicator: z.enum(MEASURES),
});

export type IndicatorParam = z.infer<typeof indicatorParamSchema>;

// ============================================================================
// Filter query (shared by every dashboard endpoint)
// ============================================================================

export const serviceFilterQuerySchema = z.object({
  state: commaList(z.string().min(1).max(50)).optional(),
  provider: z.string().min(1).max(200).optional(),
  size: commaList(z.enum(SERVICE_SIZES)).optional(),
  mmm: commaList(z.coerce.number().int().min(1).max(7)).optional(),
});

export type ServiceFilterQuery = z.infer<typeof serviceFilterQuerySchema>;
