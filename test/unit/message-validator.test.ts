import * as assert from 'node:assert/strict';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../../src/kernel/diagnostic-codes.js';
import { computeLayout } from '../../src/layout/compute-layout.js';
import type { OffsetTable } from '../../src/layout/offset-table.js';
import { validateMessage, type ValueResolverContext } from '../../src/validate/message-validator.js';
import { diagnosticCodes } from '../helpers/diagnostic-helpers.js';
import { buildOrFail, leaf, sheetOf } from '../helpers/spec-row-fixtures.js';

// msgType@0+4 count@4+3 channel@7+1 filler@8+2 region@10+3
const VALID_PAYLOAD = 'ORDR0071  EUR';

function orderHeaderTable(): OffsetTable {
  const model = buildOrFail(
    'request',
    sheetOf('Request', [
      leaf(0, 'Msg Type', '4', 'String', { hardCodeRule: 'ORDR' }),
      leaf(0, 'Count', '3', 'Number', { hardCodeRule: '7' }),
      leaf(0, 'Channel', '1', 'String', { hardCodeRule: 'Web=1,Branch=2' }),
      leaf(0, 'Filler', '2', 'String', { hardCodeRule: 'BLANK' }),
      leaf(0, 'Region', '3', 'String', { hardCodeRule: 'Refer Column S for Value Listing' }),
    ]),
  );
  const { table } = computeLayout(model);
  assert.ok(table);
  return table;
}

describe('validateMessage', () => {
  it('accepts a conforming payload and flags unresolvable references as warnings', () => {
    const result = validateMessage(orderHeaderTable(), VALID_PAYLOAD);

    assert.equal(result.success, true);
    assert.equal(result.exitCode, 0);
    assert.deepEqual(diagnosticCodes(result.issues), [MESSAGE_SPEC_DIAGNOSTIC_CODES.UNVERIFIABLE_FIELD]);
    assert.equal(result.issues[0]?.path, 'region');
  });

  it('asks the resolver for referenced columns', () => {
    const seen: ValueResolverContext[] = [];
    const result = validateMessage(orderHeaderTable(), VALID_PAYLOAD, {
      resolver: (column, context) => {
        seen.push(context);
        return column === 'S' ? 'EUR' : undefined;
      },
    });

    assert.deepEqual(result.issues, []);
    assert.equal(seen.length, 1);
    assert.equal(seen[0]?.indexedPath, 'region');
    assert.equal(seen[0]?.length, 3);
    assert.equal(seen[0]?.messageType, 'request');
  });

  it('reports a mismatch with both values', () => {
    const result = validateMessage(orderHeaderTable(), 'ORDX0071  EUR', { resolver: () => 'EUR' });

    assert.deepEqual(result.errors(), [
      {
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.VALUE_MISMATCH,
        path: 'msgType',
        severity: 'error',
        message: 'Field "msgType" at offset 0 is "ORDX", expected "ORDR".',
        expected: 'ORDR',
        actual: 'ORDX',
      },
    ]);
  });

  it('reports every mismatching field in one pass', () => {
    const result = validateMessage(orderHeaderTable(), 'XXXX0083 xEUR', { resolver: () => 'EUR' });

    assert.deepEqual(
      result.errors().map((issue) => `${issue.path}:${issue.expected ?? ''}:${issue.actual ?? ''}`),
      ['msgType:ORDR:XXXX', 'count:007:008', 'channel:1:3', 'filler:  : x'],
    );
    assert.equal(result.exitCode, 1);
  });

  it('uses overrides to pick an enumerated code', () => {
    const table = orderHeaderTable();
    const overridden = validateMessage(table, VALID_PAYLOAD, { resolver: () => 'EUR', overrides: { channel: 'Branch' } });
    assert.deepEqual(
      overridden.errors().map((issue) => issue.expected),
      ['2'],
    );

    const matching = validateMessage(table, 'ORDR0072  EUR', { resolver: () => 'EUR', overrides: { channel: 'Branch' } });
    assert.equal(matching.success, true);
  });

  it('reports each field the payload is too short for', () => {
    const result = validateMessage(orderHeaderTable(), 'ORDR00', { resolver: () => 'EUR' });

    assert.deepEqual(diagnosticCodes(result.issues), [
      MESSAGE_SPEC_DIAGNOSTIC_CODES.TRUNCATED_PAYLOAD,
      MESSAGE_SPEC_DIAGNOSTIC_CODES.TRUNCATED_PAYLOAD,
      MESSAGE_SPEC_DIAGNOSTIC_CODES.TRUNCATED_PAYLOAD,
      MESSAGE_SPEC_DIAGNOSTIC_CODES.TRUNCATED_PAYLOAD,
    ]);
    assert.deepEqual(
      result.issues.map((issue) => issue.path),
      ['count', 'channel', 'filler', 'region'],
    );
  });

  it('decodes byte payloads one byte per character', () => {
    const bytes = Buffer.from(VALID_PAYLOAD, 'latin1');
    const result = validateMessage(orderHeaderTable(), new Uint8Array(bytes), { resolver: () => 'EUR' });
    assert.deepEqual(result.issues, []);
  });

  it('honors configured numeric datatypes', () => {
    const model = buildOrFail('request', sheetOf('Request', [leaf(0, 'Amount', '5', 'Decimal', { hardCodeRule: '12' })]));
    const { table } = computeLayout(model);
    assert.ok(table);

    assert.equal(validateMessage(table, '12   ').success, true);
    assert.equal(validateMessage(table, '00012', { numericDatatypes: ['decimal'] }).success, true);
  });
});
