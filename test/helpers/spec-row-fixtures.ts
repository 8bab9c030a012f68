import * as assert from 'node:assert/strict';
import { buildMessageModel, type BuildMessageModelOptions } from '../../src/ir/build-message-model.js';
import type { MessageModel, MessageType, SheetRows, SpecRow } from '../../src/kernel/types.js';
import { formatDiagnostics } from './diagnostic-helpers.js';

export type RowInit = Partial<Omit<SpecRow, 'sheet' | 'rowNumber'>> & Pick<SpecRow, 'level' | 'fieldName'>;

export function specRow(sheet: string, rowNumber: number, init: RowInit): SpecRow {
  return {
    sheet,
    rowNumber,
    description: '',
    length: '',
    datatype: '',
    optionality: '',
    nullable: '',
    nls: '',
    sampleValues: '',
    remarks: '',
    physicalName: '',
    testValue: '',
    hardCodeRule: '',
    ...init,
  };
}

/** Row numbers start at 1 unless told otherwise. */
export function sheetOf(sheet: string, rows: readonly RowInit[], firstRowNumber = 1): SheetRows {
  return { sheet, rows: rows.map((row, index) => specRow(sheet, firstRowNumber + index, row)) };
}

export function leaf(
  level: number,
  fieldName: string,
  length: string,
  datatype: string,
  extra: Partial<RowInit> = {},
): RowInit {
  return { level, fieldName, length, datatype, ...extra };
}

export function marker(level: number, fieldName: string, occurrence?: string, extra: Partial<RowInit> = {}): RowInit {
  return { level, fieldName, ...(occurrence === undefined ? {} : { occurrence }), ...extra };
}

export function buildOrFail(
  messageType: MessageType,
  sheet: SheetRows,
  options: BuildMessageModelOptions = {},
): MessageModel {
  const result = buildMessageModel(messageType, sheet, options);
  if (result.model === null) {
    assert.fail(`Expected ${messageType} model to build:\n${formatDiagnostics(result.diagnostics)}`);
  }
  return result.model;
}

/** Scenario rows: one object `a` holding a ten-character order id. */
export function orderObjectSheet(occurrence = '1..1'): SheetRows {
  return sheetOf('Request', [marker(0, 'a:A', occurrence), leaf(1, 'Order_ID', '10', 'string')]);
}
