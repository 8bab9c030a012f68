import { z } from 'zod';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import type { SheetRows, SpecRow } from '../kernel/types.js';

/** Column headers as they appear in the specification workbook. */
export const SPEC_COLUMNS = Object.freeze({
  level: 'Seg lvl',
  fieldName: 'FieldName',
  description: 'Description',
  length: 'Length',
  datatype: 'Messaging Datatype',
  optionality: 'Opt (O/M)',
  nullable: 'Null (Y/N)',
  nls: 'NLS (Y/N)',
  sampleValues: 'Sample Value(s)',
  remarks: 'Remarks',
  physicalName: 'GMR Physical Name',
  testValue: 'Test Value',
  hardCodeRule: 'Hard code Value for MNL',
  occurrence: 'Occurrence',
} as const);

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()]);

export const RawRowRecordSchema = z.record(z.string(), CellSchema);

export type RawRowRecord = z.infer<typeof RawRowRecordSchema>;

export interface ReadSpecRowsOptions {
  /** Row number of the first record; workbook data usually starts on row 9. */
  readonly firstRowNumber?: number;
}

export interface ReadSpecRowsResult {
  readonly sheet: SheetRows;
  readonly diagnostics: readonly Diagnostic[];
}

const DEFAULT_FIRST_ROW_NUMBER = 1;

export function readSpecRows(
  sheet: string,
  records: readonly unknown[],
  options: ReadSpecRowsOptions = {},
): ReadSpecRowsResult {
  const diagnostics: Diagnostic[] = [];
  const rows: SpecRow[] = [];
  const firstRowNumber = options.firstRowNumber ?? DEFAULT_FIRST_ROW_NUMBER;

  for (const [index, record] of records.entries()) {
    const rowNumber = firstRowNumber + index;
    const parsed = RawRowRecordSchema.safeParse(record);
    if (!parsed.success) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_ROW,
        path: rowPath(sheet, rowNumber),
        severity: 'error',
        message: `Row is not a column-keyed record of scalar cells: ${parsed.error.issues.map((issue) => issue.message).join('; ')}.`,
        source: { sheet, rowNumber },
      });
      continue;
    }

    const cells = parsed.data;
    const fieldName = readCell(cells, SPEC_COLUMNS.fieldName);
    const description = readCell(cells, SPEC_COLUMNS.description);
    if (fieldName === '' && description === '') {
      continue;
    }

    const levelText = readCell(cells, SPEC_COLUMNS.level);
    const level = parseSegmentLevel(levelText);
    if (level === null) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_LEVEL,
        path: rowPath(sheet, rowNumber),
        severity: 'error',
        message: `Segment level "${levelText}" of field "${fieldName}" is not a non-negative integer.`,
        suggestion: 'Set the Seg lvl column to 0 for top-level fields and parent level + 1 below.',
        source: { sheet, rowNumber },
      });
      continue;
    }

    const occurrence = readCell(cells, SPEC_COLUMNS.occurrence);
    rows.push({
      sheet,
      rowNumber,
      level,
      fieldName,
      description,
      length: readCell(cells, SPEC_COLUMNS.length),
      datatype: readCell(cells, SPEC_COLUMNS.datatype),
      optionality: readCell(cells, SPEC_COLUMNS.optionality),
      nullable: readCell(cells, SPEC_COLUMNS.nullable),
      nls: readCell(cells, SPEC_COLUMNS.nls),
      sampleValues: readCell(cells, SPEC_COLUMNS.sampleValues),
      remarks: readCell(cells, SPEC_COLUMNS.remarks),
      physicalName: readCell(cells, SPEC_COLUMNS.physicalName),
      testValue: readCell(cells, SPEC_COLUMNS.testValue),
      hardCodeRule: readCell(cells, SPEC_COLUMNS.hardCodeRule),
      ...(occurrence === '' ? {} : { occurrence }),
    });
  }

  return { sheet: { sheet, rows }, diagnostics };
}

export function rowPath(sheet: string, rowNumber: number): string {
  return `${sheet}.rows.${rowNumber}`;
}

function readCell(cells: RawRowRecord, column: string): string {
  const value = cells[column];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    return String(value);
  }
  return value.replace(/\s+/g, ' ').trim();
}

function parseSegmentLevel(text: string): number | null {
  if (!/^\d+$/.test(text)) {
    return null;
  }
  return Number.parseInt(text, 10);
}
