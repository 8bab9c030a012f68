import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { isNotApplicableLength, parseLengthSpec, parseOccurrenceRange } from '../../src/ir/field-specs.js';

describe('length specifications', () => {
  it('parses fixed lengths and inclusive ranges', () => {
    assert.deepEqual(parseLengthSpec('10'), { ok: true, value: { kind: 'fixed', length: 10 } });
    assert.deepEqual(parseLengthSpec('1-10'), { ok: true, value: { kind: 'range', min: 1, max: 10 } });
    assert.deepEqual(parseLengthSpec(' 2..8 '), { ok: true, value: { kind: 'range', min: 2, max: 8 } });
  });

  it('treats empty and N/A cells as not applicable', () => {
    for (const text of ['', 'N/A', 'na', '-']) {
      assert.equal(isNotApplicableLength(text), true, text);
      assert.deepEqual(parseLengthSpec(text), { ok: true, value: { kind: 'notApplicable' } });
    }
  });

  it('rejects inverted ranges and free text', () => {
    assert.equal(parseLengthSpec('10-1').ok, false);
    assert.equal(parseLengthSpec('ten').ok, false);
    assert.equal(parseLengthSpec('5.5').ok, false);
  });
});

describe('occurrence ranges', () => {
  it('parses single, bounded and unbounded ranges', () => {
    assert.deepEqual(parseOccurrenceRange('1..1'), { ok: true, value: { min: 1, max: 1 } });
    assert.deepEqual(parseOccurrenceRange('0..N'), { ok: true, value: { min: 0, max: 'unbounded' } });
    assert.deepEqual(parseOccurrenceRange('1..*'), { ok: true, value: { min: 1, max: 'unbounded' } });
    assert.deepEqual(parseOccurrenceRange('0 .. 5'), { ok: true, value: { min: 0, max: 5 } });
  });

  it('rejects ranges outside 0..N, 1..N and 1..1', () => {
    for (const text of ['2..N', '1..0', '0..0', 'many', '1']) {
      assert.equal(parseOccurrenceRange(text).ok, false, text);
    }
  });
});
