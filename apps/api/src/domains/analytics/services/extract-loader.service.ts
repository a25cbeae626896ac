// ============================================================================
// Extract Loader
// Reads the two-sheet Star Ratings workbook into raw tables keyed by column
// header. Validates sheets and required columns, coerces numeric columns.
// ============================================================================

import * as XLSX from 'xlsx';
import {
  DataWarningCode,
  ExtractColumn,
  ExtractSheet,
  MISSING_VALUE_SENTINELS,
  QUALITY_INDICATOR_COLUMNS,
  RATING_COLUMNS,
  REQUIRED_COLUMNS,
  RESIDENTS_EXPERIENCE_PREFIX,
  RE_FREQUENCY_ORDER,
  STAFFING_MINUTE_COLUMNS,
} from '@carelens/shared/constants/extract.constants.js';
import { SchemaError } from '../../../lib/errors.js';
import type {
  DataQualityWarning,
  RawCell,
  RawExtract,
  RawRow,
  RawTable,
} from '../analytics.types.js';

// ---------------------------------------------------------------------------
// Column classification
// ---------------------------------------------------------------------------

const NUMERIC_COLUMNS: ReadonlySet<string> = new Set<string>([
  ...RATING_COLUMNS,
  ...STAFFING_MINUTE_COLUMNS,
  ...Object.values(QUALITY_INDICATOR_COLUMNS),
  ExtractColumn.PLACES,
]);

export function isResidentsExperienceColumn(column: string): boolean {
  return (
    column.startsWith(RESIDENTS_EXPERIENCE_PREFIX) &&
    RE_FREQUENCY_ORDER.some((freq) => column.includes(freq))
  );
}

export function isNumericColumn(column: string): boolean {
  return NUMERIC_COLUMNS.has(column) || isResidentsExperienceColumn(column);
}

// ---------------------------------------------------------------------------
// Cell coercion
// ---------------------------------------------------------------------------

/**
 * Coerces a spreadsheet cell to a number.
 *
 * Percent signs, thousands separators and surrounding whitespace are
 * stripped. Blank cells and sentinels such as "N/A" become `null`, never 0.
 */
export function coerceNumeric(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string') return null;

  const text = raw.replace(/%/g, '').replace(/,/g, '').trim();
  if (MISSING_VALUE_SENTINELS.has(text.toLowerCase())) return null;

  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function coerceText(raw: unknown): string | null {
  if (raw === null || raw === undefined) return null;
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? null : raw.toISOString().slice(0, 10);
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
  if (typeof raw !== 'string') return null;
  const text = raw.trim();
  return text.length > 0 ? text : null;
}

function isBlank(raw: unknown): boolean {
  return raw === null || raw === undefined || (typeof raw === 'string' && raw.trim() === '');
}

// Non-blank text that is neither a number nor a known sentinel
function isUnexpectedText(raw: unknown): raw is string {
  if (typeof raw !== 'string') return false;
  const text = raw.replace(/%/g, '').trim().toLowerCase();
  return !MISSING_VALUE_SENTINELS.has(text);
}

// ---------------------------------------------------------------------------
// Sheet reading
// ---------------------------------------------------------------------------

function readTable(
  sheet: ExtractSheet,
  worksheet: XLSX.WorkSheet,
  warnings: DataQualityWarning[],
): RawTable {
  const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });

  const headerRow = grid[0] ?? [];
  const columns: string[] = [];
  const indexByColumn = new Map<string, number>();
  headerRow.forEach((cell, index) => {
    const name = coerceText(cell);
    if (name !== null && !indexByColumn.has(name)) {
      indexByColumn.set(name, index);
      columns.push(name);
    }
  });

  const rows: RawRow[] = [];
  for (let i = 1; i < grid.length; i++) {
    const cells = grid[i] ?? [];
    if (cells.every(isBlank)) continue;

    const rowNumber = i + 1;
    const values: Record<string, RawCell> = {};
    for (const [column, index] of indexByColumn) {
      const raw = cells[index];
      if (isNumericColumn(column)) {
        const value = coerceNumeric(raw);
        if (value === null && isUnexpectedText(raw)) {
          warnings.push({
            code: DataWarningCode.MISSING_VALUE_COERCED,
            row: rowNumber,
            column,
            message: `Non-numeric value "${raw.trim()}" treated as missing`,
          });
        }
        values[column] = value;
      } else {
        values[column] = coerceText(raw);
      }
    }
    rows.push({ rowNumber, values });
  }

  return { sheet, columns, rows };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses workbook bytes into the "Detailed data" and "Star Ratings" tables.
 *
 * Column order is free, renamed columns are not recognised.
 *
 * @throws SchemaError when the bytes are not a workbook, a sheet is missing
 *   or a required column is absent
 */
export function loadExtract(bytes: Buffer): RawExtract {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`File is not a readable spreadsheet: ${reason}`, {
      sheets: [ExtractSheet.STAR_RATINGS, ExtractSheet.DETAILED_DATA],
      columns: {},
    });
  }

  const sheets = [ExtractSheet.DETAILED_DATA, ExtractSheet.STAR_RATINGS] as const;
  const missingSheets = sheets.filter((name) => !workbook.Sheets[name]);
  if (missingSheets.length > 0) {
    throw new SchemaError(`Workbook is missing required sheet(s): ${missingSheets.join(', ')}`, {
      sheets: [...missingSheets],
      columns: {},
    });
  }

  const warnings: DataQualityWarning[] = [];
  const detailed = readTable(
    ExtractSheet.DETAILED_DATA,
    workbook.Sheets[ExtractSheet.DETAILED_DATA],
    warnings,
  );
  const summary = readTable(
    ExtractSheet.STAR_RATINGS,
    workbook.Sheets[ExtractSheet.STAR_RATINGS],
    warnings,
  );

  const missingColumns: Record<string, string[]> = {};
  for (const table of [detailed, summary]) {
    const missing = REQUIRED_COLUMNS[table.sheet].filter(
      (column) => !table.columns.includes(column),
    );
    if (missing.length > 0) {
      missingColumns[table.sheet] = missing;
    }
  }

  if (Object.keys(missingColumns).length > 0) {
    const described = Object.entries(missingColumns)
      .map(([sheet, columns]) => `'${sheet}': ${columns.join(', ')}`)
      .join('; ');
    throw new SchemaError(`Missing required column(s) in ${described}`, {
      sheets: [],
      columns: missingColumns,
    });
  }

  return { detailed, summary, warnings };
}
