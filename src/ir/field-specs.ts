import type { LengthSpec, OccurrenceRange } from '../kernel/types.js';

export type ParseOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

const NOT_APPLICABLE_LENGTHS: ReadonlySet<string> = new Set(['', 'n/a', 'na', '-']);
const FIXED_LENGTH_PATTERN = /^\d+$/;
const RANGE_LENGTH_PATTERN = /^(\d+)\s*(?:-|\.\.)\s*(\d+)$/;
const OCCURRENCE_PATTERN = /^(\d+)\s*\.\.\s*(\d+|[Nn*])$/;

export function isNotApplicableLength(text: string): boolean {
  return NOT_APPLICABLE_LENGTHS.has(text.trim().toLowerCase());
}

export function parseLengthSpec(text: string): ParseOutcome<LengthSpec> {
  const trimmed = text.trim();
  if (isNotApplicableLength(trimmed)) {
    return { ok: true, value: { kind: 'notApplicable' } };
  }

  if (FIXED_LENGTH_PATTERN.test(trimmed)) {
    return { ok: true, value: { kind: 'fixed', length: Number.parseInt(trimmed, 10) } };
  }

  const range = RANGE_LENGTH_PATTERN.exec(trimmed);
  if (range !== null) {
    const min = Number.parseInt(range[1] ?? '', 10);
    const max = Number.parseInt(range[2] ?? '', 10);
    if (min > max) {
      return { ok: false, reason: `length range "${trimmed}" has min greater than max` };
    }
    return { ok: true, value: { kind: 'range', min, max } };
  }

  return { ok: false, reason: `length "${trimmed}" is neither an integer nor a "min-max" range` };
}

/**
 * Accepts `min..max` where min is 0 or 1 and max is either `N` (unbounded) or an
 * integer no smaller than max(min, 1).
 */
export function parseOccurrenceRange(text: string): ParseOutcome<OccurrenceRange> {
  const trimmed = text.trim();
  const match = OCCURRENCE_PATTERN.exec(trimmed);
  if (match === null) {
    return { ok: false, reason: `occurrence "${trimmed}" must look like "0..N", "1..N" or "1..1"` };
  }

  const minText = match[1] ?? '';
  const maxText = match[2] ?? '';
  const parsedMin = Number.parseInt(minText, 10);
  if (parsedMin !== 0 && parsedMin !== 1) {
    return { ok: false, reason: `occurrence "${trimmed}" must start at 0 or 1` };
  }
  const min: 0 | 1 = parsedMin === 0 ? 0 : 1;

  if (/^[Nn*]$/.test(maxText)) {
    return { ok: true, value: { min, max: 'unbounded' } };
  }

  const max = Number.parseInt(maxText, 10);
  if (max < Math.max(min, 1)) {
    return { ok: false, reason: `occurrence "${trimmed}" must allow at least one instance` };
  }
  return { ok: true, value: { min, max } };
}
