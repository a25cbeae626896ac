// ============================================================================
// Star Ratings Extract — Constants
// Sheet names, column headers and lookup tables for the quarterly
// aged-care Star Ratings data extract.
// ============================================================================

// --- Sheets ---

export const ExtractSheet = {
  STAR_RATINGS: 'Star Ratings',
  DETAILED_DATA: 'Detailed data',
} as const;

export type ExtractSheet = (typeof ExtractSheet)[keyof typeof ExtractSheet];

// --- Column headers (exact text as published) ---

export const ExtractColumn = {
  SERVICE_ID: 'Service ID',
  SERVICE_NAME: 'Service Name',
  PROVIDER_ID: 'Provider ID',
  PROVIDER_NAME: 'Provider Name',
  STATE: 'State/Territory',
  SUBURB: 'Service Suburb',
  MMM_CODE: 'MMM Code',
  SIZE: 'Size',
  PLACES: 'Residential Places',

  OVERALL_RATING: 'Overall Star Rating',
  COMPLIANCE_RATING: 'Compliance rating',
  STAFFING_RATING: 'Staffing rating',
  QUALITY_MEASURES_RATING: 'Quality Measures rating',
  RESIDENTS_EXPERIENCE_RATING: "Residents' Experience rating",

  RN_MINUTES_ACTUAL: '[S] Registered Nurse Care Minutes - Actual',
  RN_MINUTES_TARGET: '[S] Registered Nurse Care Minutes - Target',
  TOTAL_MINUTES_ACTUAL: '[S] Total Care Minutes - Actual',
  TOTAL_MINUTES_TARGET: '[S] Total Care Minutes - Target',

  DECISION_TYPE: '[C] Decision type',
  DECISION_APPLIED: '[C] Date Decision Applied',
  DECISION_ENDS: '[C] Date Decision Ends',
} as const;

export type ExtractColumn = (typeof ExtractColumn)[keyof typeof ExtractColumn];

export const REQUIRED_COLUMNS: Readonly<Record<ExtractSheet, readonly string[]>> =
  Object.freeze({
    [ExtractSheet.DETAILED_DATA]: [
      ExtractColumn.SERVICE_NAME,
      ExtractColumn.PROVIDER_NAME,
      ExtractColumn.STATE,
    ],
    [ExtractSheet.STAR_RATINGS]: [ExtractColumn.SERVICE_NAME],
  });

export const RATING_COLUMNS = [
  ExtractColumn.OVERALL_RATING,
  ExtractColumn.COMPLIANCE_RATING,
  ExtractColumn.STAFFING_RATING,
  ExtractColumn.QUALITY_MEASURES_RATING,
  ExtractColumn.RESIDENTS_EXPERIENCE_RATING,
] as const;

export const STAFFING_MINUTE_COLUMNS = [
  ExtractColumn.RN_MINUTES_ACTUAL,
  ExtractColumn.RN_MINUTES_TARGET,
  ExtractColumn.TOTAL_MINUTES_ACTUAL,
  ExtractColumn.TOTAL_MINUTES_TARGET,
] as const;

// Cells treated as "no value" before numeric parsing
export const MISSING_VALUE_SENTINELS: ReadonlySet<string> = new Set([
  '',
  'n/a',
  'na',
  '-',
  '--',
  'null',
  'not available',
]);

// --- Quality indicators ([QM] columns) ---

export const QualityIndicator = {
  PRESSURE_INJURIES: 'pressure_injuries',
  RESTRICTIVE_PRACTICES: 'restrictive_practices',
  UNPLANNED_WEIGHT_LOSS: 'unplanned_weight_loss',
  FALLS: 'falls',
  MAJOR_INJURY_FROM_FALL: 'major_injury_from_fall',
  POLYPHARMACY: 'polypharmacy',
  ANTIPSYCHOTIC: 'antipsychotic',
} as const;

export type QualityIndicator =
  (typeof QualityIndicator)[keyof typeof QualityIndicator];

export const QUALITY_INDICATOR_COLUMNS: Readonly<Record<QualityIndicator, string>> =
  Object.freeze({
    [QualityIndicator.PRESSURE_INJURIES]: '[QM] Pressure injuries*',
    [QualityIndicator.RESTRICTIVE_PRACTICES]: '[QM] Restrictive practices',
    [QualityIndicator.UNPLANNED_WEIGHT_LOSS]: '[QM] Unplanned weight loss*',
    [QualityIndicator.FALLS]: '[QM] Falls and major injury - falls*',
    [QualityIndicator.MAJOR_INJURY_FROM_FALL]:
      '[QM] Falls and major injury - major injury from a fall*',
    [QualityIndicator.POLYPHARMACY]: '[QM] Medication management - polypharmacy',
    [QualityIndicator.ANTIPSYCHOTIC]: '[QM] Medication management - antipsychotic',
  });

export const QUALITY_INDICATORS: readonly QualityIndicator[] = Object.freeze(
  Object.values(QualityIndicator),
);

// --- Measures (anything an IndicatorSummary can be computed over) ---

export const ServiceMeasure = {
  OVERALL_STAR_RATING: 'overall_star_rating',
  RN_CARE_COMPLIANCE: 'rn_care_compliance_pct',
  TOTAL_CARE_COMPLIANCE: 'total_care_compliance_pct',
} as const;

export type ServiceMeasure =
  (typeof ServiceMeasure)[keyof typeof ServiceMeasure];

export type Measure = QualityIndicator | ServiceMeasure;

export const MEASURES: readonly Measure[] = Object.freeze([
  ...Object.values(ServiceMeasure),
  ...QUALITY_INDICATORS,
]);

export const MEASURE_LABELS: Readonly<Record<Measure, string>> = Object.freeze({
  [ServiceMeasure.OVERALL_STAR_RATING]: 'Overall Star Rating',
  [ServiceMeasure.RN_CARE_COMPLIANCE]: 'RN Care Compliance %',
  [ServiceMeasure.TOTAL_CARE_COMPLIANCE]: 'Total Care Compliance %',
  [QualityIndicator.PRESSURE_INJURIES]: 'Pressure injuries',
  [QualityIndicator.RESTRICTIVE_PRACTICES]: 'Restrictive practices',
  [QualityIndicator.UNPLANNED_WEIGHT_LOSS]: 'Unplanned weight loss',
  [QualityIndicator.FALLS]: 'Falls',
  [QualityIndicator.MAJOR_INJURY_FROM_FALL]: 'Major injury from a fall',
  [QualityIndicator.POLYPHARMACY]: 'Med Mgmt - polypharmacy',
  [QualityIndicator.ANTIPSYCHOTIC]: 'Med Mgmt - antipsychotic',
});

// Measures compared against sector peers in the benchmark table
export const BENCHMARK_MEASURES: readonly ServiceMeasure[] = Object.freeze([
  ServiceMeasure.OVERALL_STAR_RATING,
  ServiceMeasure.RN_CARE_COMPLIANCE,
  ServiceMeasure.TOTAL_CARE_COMPLIANCE,
]);

// --- Anomaly detection direction per measure ---

export const ConcernDirection = {
  LOW: 'LOW',
  HIGH: 'HIGH',
} as const;

export type ConcernDirection =
  (typeof ConcernDirection)[keyof typeof ConcernDirection];

export const ANOMALY_MEASURES: Readonly<Partial<Record<Measure, ConcernDirection>>> =
  Object.freeze({
    [ServiceMeasure.OVERALL_STAR_RATING]: ConcernDirection.LOW,
    [ServiceMeasure.RN_CARE_COMPLIANCE]: ConcernDirection.LOW,
    [ServiceMeasure.TOTAL_CARE_COMPLIANCE]: ConcernDirection.LOW,
    [QualityIndicator.PRESSURE_INJURIES]: ConcernDirection.HIGH,
    [QualityIndicator.RESTRICTIVE_PRACTICES]: ConcernDirection.HIGH,
    [QualityIndicator.FALLS]: ConcernDirection.HIGH,
    [QualityIndicator.ANTIPSYCHOTIC]: ConcernDirection.HIGH,
  });

// --- Residents' experience ([RE] <Category> - <Frequency>) ---

export const RESIDENTS_EXPERIENCE_PREFIX = '[RE]';

export const RE_FREQUENCY_ORDER = [
  'Always',
  'Most of the time',
  'Some of the time',
  'Never',
] as const;

export type ReFrequency = (typeof RE_FREQUENCY_ORDER)[number];

// --- Service size buckets ---

export const ServiceSize = {
  SMALL: 'Small',
  MEDIUM: 'Medium',
  LARGE: 'Large',
} as const;

export type ServiceSize = (typeof ServiceSize)[keyof typeof ServiceSize];

export const SERVICE_SIZES: readonly ServiceSize[] = Object.freeze(
  Object.values(ServiceSize),
);

// --- Modified Monash Model remoteness ---

export const MMM_REMOTENESS: Readonly<Record<number, string>> = Object.freeze({
  1: 'Metropolitan areas',
  2: 'Regional centres',
  3: 'Large rural towns',
  4: 'Medium rural towns',
  5: 'Small rural towns',
  6: 'Remote communities',
  7: 'Very remote communities',
});

// --- Star rating bounds ---

export const STAR_RATING_MIN = 1;
export const STAR_RATING_MAX = 5;

// --- Concern reasons ---

export const ConcernReason = {
  LOW_STAR_RATING: 'LOW_STAR_RATING',
  ACTIVE_COMPLIANCE_ACTION: 'ACTIVE_COMPLIANCE_ACTION',
  STAFFING_BENCHMARK_SHORTFALL: 'STAFFING_BENCHMARK_SHORTFALL',
  NON_COMPLIANCE_RATING: 'NON_COMPLIANCE_RATING',
  LOW_COMPONENT_RATING: 'LOW_COMPONENT_RATING',
} as const;

export type ConcernReason = (typeof ConcernReason)[keyof typeof ConcernReason];

export const CONCERN_REASON_LABELS: Readonly<Record<ConcernReason, string>> =
  Object.freeze({
    [ConcernReason.LOW_STAR_RATING]: 'low star rating',
    [ConcernReason.ACTIVE_COMPLIANCE_ACTION]: 'active compliance action',
    [ConcernReason.STAFFING_BENCHMARK_SHORTFALL]: 'staffing benchmark shortfall',
    [ConcernReason.NON_COMPLIANCE_RATING]: 'non-compliance rating',
    [ConcernReason.LOW_COMPONENT_RATING]: 'low component rating',
  });

// --- Data-quality warnings ---

export const DataWarningCode = {
  MISSING_VALUE_COERCED: 'MISSING_VALUE_COERCED',
  RATING_OUT_OF_RANGE: 'RATING_OUT_OF_RANGE',
  UNKNOWN_MMM_CODE: 'UNKNOWN_MMM_CODE',
  ROW_DROPPED: 'ROW_DROPPED',
  EMPTY_RESULT: 'EMPTY_RESULT',
} as const;

export type DataWarningCode =
  (typeof DataWarningCode)[keyof typeof DataWarningCode];

// --- Outlier scope ---

export const OutlierScope = {
  FILTER: 'filter',
  NATIONAL: 'national',
} as const;

export type OutlierScope = (typeof OutlierScope)[keyof typeof OutlierScope];

// --- Benchmark bands ---

export const BenchmarkBand = {
  TOP_DECILE: 'TOP_DECILE',
  ABOVE_MEDIAN: 'ABOVE_MEDIAN',
  BELOW_MEDIAN: 'BELOW_MEDIAN',
} as const;

export type BenchmarkBand = (typeof BenchmarkBand)[keyof typeof BenchmarkBand];

// Percentile-rank thresholds for the QM risk radar
export const RADAR_CONCERN_PERCENTILE = 80;
export const RADAR_STRENGTH_PERCENTILE = 20;
export const RADAR_MIN_SECTOR_SERVICES = 3;
