// ============================================================================
// Normalizer
// Turns raw extract tables into immutable ServiceRecords. Bad fields degrade
// to missing; structurally impossible rows raise NormalizationError, which is
// thrown in strict mode and otherwise turned into a dropped-row warning.
// ============================================================================

import {
  DataWarningCode,
  ExtractColumn,
  MMM_REMOTENESS,
  QUALITY_INDICATOR_COLUMNS,
  QualityIndicator,
  STAR_RATING_MAX,
  STAR_RATING_MIN,
  ServiceSize,
} from '@carelens/shared/constants/extract.constants.js';
import { NormalizationError } from '../../../lib/errors.js';
import type { AnalysisConfig, SizeBreakpoints } from '../analysis.config.js';
import type {
  ComplianceAction,
  DataQualityWarning,
  NormalizedExtract,
  RawCell,
  RawExtract,
  RawRow,
  ServiceRecord,
  StarRatings,
} from '../analytics.types.js';
import { isResidentsExperienceColumn } from './extract-loader.service.js';

export type NormalizerConfig = Pick<AnalysisConfig, 'sizeBreakpoints' | 'strictNormalization'>;

// ---------------------------------------------------------------------------
// Field derivations
// ---------------------------------------------------------------------------

export function sizeFromPlaces(places: number, breakpoints: SizeBreakpoints): ServiceSize {
  if (places <= breakpoints.smallMaxPlaces) return ServiceSize.SMALL;
  if (places <= breakpoints.mediumMaxPlaces) return ServiceSize.MEDIUM;
  return ServiceSize.LARGE;
}

export function sizeFromLabel(label: string | null): ServiceSize | null {
  switch (label?.trim().toLowerCase()) {
    case 'small':
      return ServiceSize.SMALL;
    case 'medium':
      return ServiceSize.MEDIUM;
    case 'large':
      return ServiceSize.LARGE;
    default:
      return null;
  }
}

/** Accepts `3`, `"3"`, `"MM3"` and `"MM 3"`. */
export function parseMmmCode(raw: RawCell): number | null {
  if (raw === null) return null;
  const match = /^(?:mm\s*)?(\d+)$/i.exec(String(raw).trim());
  return match ? Number(match[1]) : null;
}

export function remotenessFor(mmmCode: number | null): string | null {
  if (mmmCode === null) return null;
  return MMM_REMOTENESS[mmmCode] ?? null;
}

/** actual / target as a percentage; missing when either side is missing or the target is 0. */
export function compliancePct(actual: number | null, target: number | null): number | null {
  if (actual === null || target === null || target === 0) return null;
  return (actual * 100) / target;
}

// ---------------------------------------------------------------------------
// Row access helpers
// ---------------------------------------------------------------------------

function text(row: RawRow, column: string): string | null {
  const value = row.values[column];
  if (value === null || value === undefined) return null;
  const str = String(value).trim();
  return str.length > 0 ? str : null;
}

function num(row: RawRow | undefined, column: string): number | null {
  const value = row?.values[column];
  return typeof value === 'number' ? value : null;
}

function qualityIndicatorsOf(row: RawRow): Record<QualityIndicator, number | null> {
  const qm = (indicator: QualityIndicator) => num(row, QUALITY_INDICATOR_COLUMNS[indicator]);
  return {
    [QualityIndicator.PRESSURE_INJURIES]: qm(QualityIndicator.PRESSURE_INJURIES),
    [QualityIndicator.RESTRICTIVE_PRACTICES]: qm(QualityIndicator.RESTRICTIVE_PRACTICES),
    [QualityIndicator.UNPLANNED_WEIGHT_LOSS]: qm(QualityIndicator.UNPLANNED_WEIGHT_LOSS),
    [QualityIndicator.FALLS]: qm(QualityIndicator.FALLS),
    [QualityIndicator.MAJOR_INJURY_FROM_FALL]: qm(QualityIndicator.MAJOR_INJURY_FROM_FALL),
    [QualityIndicator.POLYPHARMACY]: qm(QualityIndicator.POLYPHARMACY),
    [QualityIndicator.ANTIPSYCHOTIC]: qm(QualityIndicator.ANTIPSYCHOTIC),
  };
}

// ---------------------------------------------------------------------------
// Row normalization
// ---------------------------------------------------------------------------

interface RowContext {
  config: NormalizerConfig;
  summaryByService: ReadonlyMap<string, RawRow>;
  reColumns: readonly string[];
}

function rating(
  row: RawRow,
  summaryRow: RawRow | undefined,
  column: string,
  warnings: DataQualityWarning[],
): number | null {
  let value = num(row, column);
  let sourceRow = row.rowNumber;
  if (value === null && summaryRow) {
    value = num(summaryRow, column);
    sourceRow = summaryRow.rowNumber;
  }
  if (value === null) return null;
  if (value < STAR_RATING_MIN || value > STAR_RATING_MAX) {
    warnings.push({
      code: DataWarningCode.RATING_OUT_OF_RANGE,
      row: sourceRow,
      column,
      message: `Rating ${value} is outside ${STAR_RATING_MIN}-${STAR_RATING_MAX} and was treated as missing`,
    });
    return null;
  }
  return value;
}

// Field warnings go to `warnings` and are only kept if the row is.
function normalizeRow(
  row: RawRow,
  ctx: RowContext,
  warnings: DataQualityWarning[],
): ServiceRecord {
  const serviceName = text(row, ExtractColumn.SERVICE_NAME);
  if (serviceName === null) {
    throw new NormalizationError('Service name is blank', row.rowNumber, ExtractColumn.SERVICE_NAME);
  }
  const providerName = text(row, ExtractColumn.PROVIDER_NAME);
  if (providerName === null) {
    throw new NormalizationError('Provider name is blank', row.rowNumber, ExtractColumn.PROVIDER_NAME);
  }

  const places = num(row, ExtractColumn.PLACES);
  if (places !== null && places < 0) {
    throw new NormalizationError(
      `Residential place count cannot be negative (${places})`,
      row.rowNumber,
      ExtractColumn.PLACES,
    );
  }

  const serviceId = text(row, ExtractColumn.SERVICE_ID) ?? serviceName;
  const summaryRow = ctx.summaryByService.get(serviceId) ?? ctx.summaryByService.get(serviceName);

  const mmmRaw = row.values[ExtractColumn.MMM_CODE] ?? null;
  const mmmCode = parseMmmCode(mmmRaw);
  const remoteness = remotenessFor(mmmCode);
  if (mmmRaw !== null && remoteness === null) {
    warnings.push({
      code: DataWarningCode.UNKNOWN_MMM_CODE,
      row: row.rowNumber,
      column: ExtractColumn.MMM_CODE,
      message: `Unrecognised MMM code "${mmmRaw}"`,
    });
  }

  const ratings: StarRatings = {
    overall: rating(row, summaryRow, ExtractColumn.OVERALL_RATING, warnings),
    compliance: rating(row, summaryRow, ExtractColumn.COMPLIANCE_RATING, warnings),
    staffing: rating(row, summaryRow, ExtractColumn.STAFFING_RATING, warnings),
    qualityMeasures: rating(row, summaryRow, ExtractColumn.QUALITY_MEASURES_RATING, warnings),
    residentsExperience: rating(
      row,
      summaryRow,
      ExtractColumn.RESIDENTS_EXPERIENCE_RATING,
      warnings,
    ),
  };

  const residentsExperience: Record<string, number | null> = {};
  for (const column of ctx.reColumns) {
    residentsExperience[column] = num(row, column);
  }

  const decisionType = text(row, ExtractColumn.DECISION_TYPE);
  const complianceAction: ComplianceAction | null = decisionType
    ? Object.freeze({
        decisionType,
        dateApplied: text(row, ExtractColumn.DECISION_APPLIED),
        dateEnds: text(row, ExtractColumn.DECISION_ENDS),
      })
    : null;

  return Object.freeze({
    serviceId,
    serviceName,
    providerId: text(row, ExtractColumn.PROVIDER_ID) ?? providerName,
    providerName,
    state: text(row, ExtractColumn.STATE) ?? 'Unknown',
    suburb: text(row, ExtractColumn.SUBURB),
    mmmCode,
    remoteness,
    places,
    size:
      places !== null
        ? sizeFromPlaces(places, ctx.config.sizeBreakpoints)
        : sizeFromLabel(text(row, ExtractColumn.SIZE)),
    ratings: Object.freeze(ratings),
    rnCareCompliancePct: compliancePct(
      num(row, ExtractColumn.RN_MINUTES_ACTUAL),
      num(row, ExtractColumn.RN_MINUTES_TARGET),
    ),
    totalCareCompliancePct: compliancePct(
      num(row, ExtractColumn.TOTAL_MINUTES_ACTUAL),
      num(row, ExtractColumn.TOTAL_MINUTES_TARGET),
    ),
    qualityIndicators: Object.freeze(qualityIndicatorsOf(row)),
    residentsExperience: Object.freeze(residentsExperience),
    complianceAction,
    sourceRow: row.rowNumber,
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Derives ServiceRecords from the loaded extract.
 *
 * A bad field becomes `null` and the row is kept. A blank service or provider
 * name, a negative place count or a repeated service id makes the row
 * invalid: strict mode throws, otherwise the row is dropped with a warning.
 */
export function normalizeExtract(raw: RawExtract, config: NormalizerConfig): NormalizedExtract {
  const warnings: DataQualityWarning[] = [...raw.warnings];

  const summaryByService = new Map<string, RawRow>();
  for (const row of raw.summary.rows) {
    const key = text(row, ExtractColumn.SERVICE_ID) ?? text(row, ExtractColumn.SERVICE_NAME);
    if (key !== null && !summaryByService.has(key)) {
      summaryByService.set(key, row);
    }
  }

  const ctx: RowContext = {
    config,
    summaryByService,
    reColumns: raw.detailed.columns.filter(isResidentsExperienceColumn),
  };

  const records: ServiceRecord[] = [];
  const seen = new Set<string>();

  for (const row of raw.detailed.rows) {
    const rowWarnings: DataQualityWarning[] = [];
    try {
      const record = normalizeRow(row, ctx, rowWarnings);
      if (seen.has(record.serviceId)) {
        throw new NormalizationError(
          `Duplicate service id "${record.serviceId}"`,
          row.rowNumber,
          ExtractColumn.SERVICE_ID,
        );
      }
      seen.add(record.serviceId);
      records.push(record);
      warnings.push(...rowWarnings);
    } catch (err) {
      if (!(err instanceof NormalizationError) || config.strictNormalization) {
        throw err;
      }
      warnings.push({
        code: DataWarningCode.ROW_DROPPED,
        row: err.row,
        column: err.column,
        message: err.message,
      });
    }
  }

  return { records: Object.freeze(records), warnings };
}
