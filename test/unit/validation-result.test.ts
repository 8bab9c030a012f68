import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { Diagnostic } from '../../src/kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../../src/kernel/diagnostic-codes.js';
import { ValidationResult } from '../../src/kernel/validation-result.js';

const error = (path: string): Diagnostic => ({
  code: MESSAGE_SPEC_DIAGNOSTIC_CODES.VALUE_MISMATCH,
  path,
  severity: 'error',
  message: `${path} differs.`,
});

const warning = (path: string): Diagnostic => ({
  code: MESSAGE_SPEC_DIAGNOSTIC_CODES.UNVERIFIABLE_FIELD,
  path,
  severity: 'warning',
  message: `${path} unverifiable.`,
});

describe('ValidationResult', () => {
  it('succeeds with no issues or only warnings', () => {
    assert.equal(ValidationResult.empty().success, true);
    assert.equal(ValidationResult.empty().exitCode, 0);

    const warned = ValidationResult.of([warning('a')]);
    assert.equal(warned.success, true);
    assert.equal(warned.warningCount, 1);
    assert.equal(warned.exitCode, 0);
  });

  it('fails on any error', () => {
    const result = ValidationResult.of([warning('a'), error('b'), error('c')]);
    assert.equal(result.success, false);
    assert.equal(result.exitCode, 1);
    assert.equal(result.errorCount, 2);
    assert.deepEqual(
      result.errors().map((issue) => issue.path),
      ['b', 'c'],
    );
    assert.deepEqual(
      result.warnings().map((issue) => issue.path),
      ['a'],
    );
  });

  it('merges by appending the other result after the receiver', () => {
    const left = ValidationResult.of([error('a')]);
    const right = ValidationResult.of([warning('b'), error('c')]);

    assert.deepEqual(
      left.merge(right).issues.map((issue) => issue.path),
      ['a', 'b', 'c'],
    );
    assert.deepEqual(
      right.merge(left).issues.map((issue) => issue.path),
      ['b', 'c', 'a'],
    );
    assert.deepEqual(
      ValidationResult.mergeAll([left, ValidationResult.empty(), right]).issues.map((issue) => issue.path),
      ['a', 'b', 'c'],
    );
    assert.equal(left.issues.length, 1);
  });

  it('does not share the caller array', () => {
    const issues = [error('a')];
    const result = ValidationResult.of(issues);
    issues.push(error('b'));

    assert.equal(result.issues.length, 1);
    assert.equal(Object.isFrozen(result.issues), true);
  });
});
