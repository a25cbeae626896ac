import { describe, it, expect } from 'vitest';
import {
  DataWarningCode,
  ExtractColumn,
  ExtractSheet,
  QUALITY_INDICATOR_COLUMNS,
  QualityIndicator,
} from '@carelens/shared/constants/extract.constants.js';
import { SchemaError } from '../../../lib/errors.js';
import { buildWorkbook, serviceRow } from '../../../../test/fixtures/extract-workbook.js';
import {
  coerceNumeric,
  coerceText,
  isNumericColumn,
  isResidentsExperienceColumn,
  loadExtract,
} from './extract-loader.service.js';

// ============================================================================
// Cell coercion
// ============================================================================

describe('coerceNumeric', () => {
  it('passes finite numbers through', () => {
    expect(coerceNumeric(3.5)).toBe(3.5);
    expect(coerceNumeric(0)).toBe(0);
  });

  it('strips percent signs, separators and whitespace', () => {
    expect(coerceNumeric(' 85% ')).toBe(85);
    expect(coerceNumeric('1,250')).toBe(1250);
  });

  it('maps sentinels and blanks to null, never zero', () => {
    expect(coerceNumeric('N/A')).toBeNull();
    expect(coerceNumeric('-')).toBeNull();
    expect(coerceNumeric('')).toBeNull();
    expect(coerceNumeric('   ')).toBeNull();
    expect(coerceNumeric(null)).toBeNull();
  });

  it('maps unparseable text and non-finite numbers to null', () => {
    expect(coerceNumeric('four')).toBeNull();
    expect(coerceNumeric(Number.NaN)).toBeNull();
    expect(coerceNumeric(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('coerceText', () => {
  it('trims text and turns blanks into null', () => {
    expect(coerceText('  Manly ')).toBe('Manly');
    expect(coerceText('   ')).toBeNull();
    expect(coerceText(undefined)).toBeNull();
  });

  it('renders numbers and dates as text', () => {
    expect(coerceText(42)).toBe('42');
    expect(coerceText(new Date(Date.UTC(2024, 2, 1)))).toBe('2024-03-01');
  });
});

describe('column classification', () => {
  it('recognises residents experience frequency columns', () => {
    expect(isResidentsExperienceColumn('[RE] Food - Always')).toBe(true);
    expect(isResidentsExperienceColumn('[RE] Food')).toBe(false);
    expect(isResidentsExperienceColumn(ExtractColumn.RESIDENTS_EXPERIENCE_RATING)).toBe(false);
  });

  it('treats ratings, minutes, indicators and places as numeric', () => {
    expect(isNumericColumn(ExtractColumn.OVERALL_RATING)).toBe(true);
    expect(isNumericColumn(ExtractColumn.RN_MINUTES_TARGET)).toBe(true);
    expect(isNumericColumn(QUALITY_INDICATOR_COLUMNS[QualityIndicator.FALLS])).toBe(true);
    expect(isNumericColumn(ExtractColumn.PLACES)).toBe(true);
    expect(isNumericColumn(ExtractColumn.STATE)).toBe(false);
    expect(isNumericColumn(ExtractColumn.MMM_CODE)).toBe(false);
  });
});

// ============================================================================
// loadExtract
// ============================================================================

describe('loadExtract', () => {
  it('reads both sheets keyed by header with 1-based row numbers', () => {
    const bytes = buildWorkbook({
      detailed: [serviceRow(), serviceRow({ [ExtractColumn.SERVICE_ID]: 'SVC-2' })],
    });

    const raw = loadExtract(bytes);

    expect(raw.detailed.sheet).toBe(ExtractSheet.DETAILED_DATA);
    expect(raw.detailed.rows).toHaveLength(2);
    expect(raw.detailed.rows[0].rowNumber).toBe(2);
    expect(raw.detailed.rows[1].rowNumber).toBe(3);
    expect(raw.detailed.rows[1].values[ExtractColumn.SERVICE_ID]).toBe('SVC-2');
    expect(raw.detailed.rows[0].values[ExtractColumn.PLACES]).toBe(45);
    expect(raw.summary.rows).toHaveLength(2);
    expect(raw.warnings).toEqual([]);
  });

  it('accepts columns in any order', () => {
    const row = serviceRow();
    const bytes = buildWorkbook({ detailed: [row], detailedColumns: Object.keys(row).reverse() });

    const raw = loadExtract(bytes);

    expect(raw.detailed.rows[0].values[ExtractColumn.PROVIDER_NAME]).toBe('Coastal Care Group');
    expect(raw.detailed.rows[0].values[ExtractColumn.OVERALL_RATING]).toBe(4);
  });

  it('coerces numeric text and sentinels in numeric columns', () => {
    const bytes = buildWorkbook({
      detailed: [
        serviceRow({
          [ExtractColumn.OVERALL_RATING]: 'N/A',
          [ExtractColumn.RN_MINUTES_ACTUAL]: ' 38 ',
          '[RE] Food - Always': '62%',
        }),
      ],
    });

    const values = loadExtract(bytes).detailed.rows[0].values;

    expect(values[ExtractColumn.OVERALL_RATING]).toBeNull();
    expect(values[ExtractColumn.RN_MINUTES_ACTUAL]).toBe(38);
    expect(values['[RE] Food - Always']).toBe(62);
  });

  it('warns when unexpected text in a numeric column becomes missing', () => {
    const bytes = buildWorkbook({
      detailed: [serviceRow({ [ExtractColumn.STAFFING_RATING]: 'pending' })],
    });

    const raw = loadExtract(bytes);

    expect(raw.detailed.rows[0].values[ExtractColumn.STAFFING_RATING]).toBeNull();
    expect(raw.warnings).toEqual([
      {
        code: DataWarningCode.MISSING_VALUE_COERCED,
        row: 2,
        column: ExtractColumn.STAFFING_RATING,
        message: 'Non-numeric value "pending" treated as missing',
      },
    ]);
  });

  it('skips fully blank rows but keeps sheet row numbers', () => {
    const first = serviceRow();
    const blank = Object.fromEntries(Object.keys(first).map((column) => [column, null]));
    const bytes = buildWorkbook({
      detailed: [first, blank, serviceRow({ [ExtractColumn.SERVICE_ID]: 'SVC-3' })],
    });

    const rows = loadExtract(bytes).detailed.rows;

    expect(rows.map((row) => row.rowNumber)).toEqual([2, 4]);
  });

  it('throws SchemaError naming a missing sheet', () => {
    const bytes = buildWorkbook({
      detailed: [serviceRow()],
      omitSheets: [ExtractSheet.STAR_RATINGS],
    });

    expect(() => loadExtract(bytes)).toThrow(
      'Workbook is missing required sheet(s): Star Ratings',
    );
  });

  it('throws SchemaError listing missing required columns', () => {
    const { [ExtractColumn.PROVIDER_NAME]: _omitted, ...row } = serviceRow();
    const bytes = buildWorkbook({ detailed: [row] });

    try {
      loadExtract(bytes);
      expect.unreachable('loadExtract should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (err instanceof SchemaError) {
        expect(err.message).toBe(
          "Missing required column(s) in 'Detailed data': Provider Name",
        );
        expect(err.missing.columns).toEqual({ [ExtractSheet.DETAILED_DATA]: ['Provider Name'] });
        expect(err.statusCode).toBe(422);
      }
    }
  });

  it('rejects bytes that are not an extract workbook', () => {
    expect(() => loadExtract(Buffer.from('not a spreadsheet'))).toThrow(SchemaError);
  });
});
