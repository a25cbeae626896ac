export {
  ExtractSheet,
  ExtractColumn,
  REQUIRED_COLUMNS,
  RATING_COLUMNS,
  STAFFING_MINUTE_COLUMNS,
  MISSING_VALUE_SENTINELS,
  QualityIndicator,
  QUALITY_INDICATOR_COLUMNS,
  QUALITY_INDICATORS,
  ServiceMeasure,
  type Measure,
  MEASURES,
  MEASURE_LABELS,
  BENCHMARK_MEASURES,
  ConcernDirection,
  ANOMALY_MEASURES,
  RESIDENTS_EXPERIENCE_PREFIX,
  RE_FREQUENCY_ORDER,
  type ReFrequency,
  ServiceSize,
  SERVICE_SIZES,
  MMM_REMOTENESS,
  STAR_RATING_MIN,
  STAR_RATING_MAX,
  ConcernReason,
  CONCERN_REASON_LABELS,
  DataWarningCode,
  OutlierScope,
  BenchmarkBand,
  RADAR_CONCERN_PERCENTILE,
  RADAR_STRENGTH_PERCENTILE,
  RADAR_MIN_SECTOR_SERVICES,
} from './extract.constants.js';
