// ============================================================================
// Extract Analytics — Domain Types
// ============================================================================

import type {
  BenchmarkBand,
  ConcernDirection,
  ConcernReason,
  DataWarningCode,
  ExtractSheet,
  Measure,
  QualityIndicator,
  ReFrequency,
  ServiceMeasure,
  ServiceSize,
} from '@carelens/shared/constants/extract.constants.js';

// ---------------------------------------------------------------------------
// Loader output
// ---------------------------------------------------------------------------

export type RawCell = string | number | null;

export interface RawRow {
  /** 1-based row number in the sheet; the header is row 1. */
  rowNumber: number;
  values: Readonly<Record<string, RawCell>>;
}

export interface RawTable {
  sheet: ExtractSheet;
  columns: readonly string[];
  rows: readonly RawRow[];
}

export interface RawExtract {
  detailed: RawTable;
  summary: RawTable;
  warnings: DataQualityWarning[];
}

export interface DataQualityWarning {
  code: DataWarningCode;
  row: number | null;
  column: string | null;
  message: string;
}

// ---------------------------------------------------------------------------
// Service records
// ---------------------------------------------------------------------------

export interface StarRatings {
  overall: number | null;
  compliance: number | null;
  staffing: number | null;
  qualityMeasures: number | null;
  residentsExperience: number | null;
}

export interface ComplianceAction {
  decisionType: string;
  dateApplied: string | null;
  dateEnds: string | null;
}

export interface ServiceRecord {
  readonly serviceId: string;
  readonly serviceName: string;
  readonly providerId: string;
  readonly providerName: string;
  readonly state: string;
  readonly suburb: string | null;
  readonly mmmCode: number | null;
  readonly remoteness: string | null;
  readonly places: number | null;
  readonly size: ServiceSize | null;
  readonly ratings: Readonly<StarRatings>;
  readonly rnCareCompliancePct: number | null;
  readonly totalCareCompliancePct: number | null;
  readonly qualityIndicators: Readonly<Record<QualityIndicator, number | null>>;
  /** Keyed by the full `[RE] <Category> - <Frequency>` header. */
  readonly residentsExperience: Readonly<Record<string, number | null>>;
  readonly complianceAction: Readonly<ComplianceAction> | null;
  readonly sourceRow: number;
}

export interface NormalizedExtract {
  records: readonly ServiceRecord[];
  warnings: DataQualityWarning[];
}

// ---------------------------------------------------------------------------
// Derived entities
// ---------------------------------------------------------------------------

export interface SizeCounts {
  Small: number;
  Medium: number;
  Large: number;
  Unknown: number;
}

export interface ProviderProfile {
  providerId: string;
  providerName: string | null;
  serviceCount: number;
  suburbCount: number;
  sizeCounts: SizeCounts;
  meanOverallRating: number | null;
  meanRnCareCompliancePct: number | null;
  meanTotalCareCompliancePct: number | null;
  services: readonly ServiceRecord[];
}

export interface IndicatorValue {
  serviceId: string;
  value: number;
  isOutlier: boolean;
}

export interface IndicatorSummary {
  indicator: Measure;
  mean: number | null;
  standardError: number | null;
  count: number;
  bounds: IqrBounds | null;
  values: IndicatorValue[];
}

export interface SectorOverview {
  serviceCount: number;
  providerCount: number;
  meanOverallRating: number | null;
  meanRnCareCompliancePct: number | null;
  meanTotalCareCompliancePct: number | null;
  nonCompliantCount: number;
}

export interface ResidentsExperienceItem {
  column: string;
  category: string;
  frequency: ReFrequency;
  meanPct: number;
  count: number;
}

export interface IqrBounds {
  q1: number;
  q3: number;
  iqr: number;
  lowerBound: number;
  upperBound: number;
}

export interface OutlierDetection {
  bounds: IqrBounds | null;
  /** Aligned with the input values; missing values are never outliers. */
  flags: boolean[];
}

export interface Anomaly {
  serviceId: string;
  serviceName: string;
  providerId: string;
  providerName: string;
  measure: Measure;
  value: number;
  direction: ConcernDirection;
  bounds: IqrBounds;
}

export interface AnomalyReport {
  anomalies: Anomaly[];
  /** Measures with fewer non-missing values than the minimum sample. */
  skippedMeasures: Measure[];
  countsByMeasure: Partial<Record<Measure, number>>;
  /** Keyed by provider id. */
  countsByProvider: Record<string, number>;
}

export interface ConcernFlag {
  serviceId: string;
  reasons: ConcernReason[];
}

export interface MeasureBenchmark {
  measure: ServiceMeasure;
  median: number | null;
  p75: number | null;
  p90: number | null;
  providerValue: number | null;
  band: BenchmarkBand | null;
}

export interface SectorBenchmarks {
  providerId: string;
  peerServiceCount: number;
  measures: MeasureBenchmark[];
}

export interface RadarAxis {
  indicator: QualityIndicator;
  providerMean: number;
  percentileRank: number;
}

export interface RiskRadar {
  providerId: string;
  sufficientData: boolean;
  axes: RadarAxis[];
  concerns: QualityIndicator[];
  strengths: QualityIndicator[];
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface AnalysisSession {
  readonly id: string;
  readonly fileName: string;
  /** SHA-256 of the uploaded workbook bytes, hex encoded. */
  readonly sourceHash: string;
  readonly records: readonly ServiceRecord[];
  readonly warnings: readonly DataQualityWarning[];
  readonly loadedAt: Date;
}

export interface FilterResult {
  records: readonly ServiceRecord[];
  warnings: DataQualityWarning[];
}
