import { Buffer } from 'node:buffer';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { ValidationResult } from '../kernel/validation-result.js';
import type { OffsetEntry, OffsetTable } from '../layout/offset-table.js';
import {
  DEFAULT_NUMERIC_DATATYPES,
  type HardCodeRule,
  isNumericDatatype,
  padToWidth,
  parseHardCodeRule,
  selectEnumeratedCode,
} from './hard-code-rule.js';

export interface ValueResolverContext {
  readonly messageType: OffsetTable['messageType'];
  readonly path: string;
  readonly indexedPath: string;
  readonly datatype: string;
  readonly length: number;
  readonly occurrenceIndex: number;
  /** Full rule text, e.g. `Refer Column S for Value Listing`. */
  readonly ruleText: string;
}

/** Returns the expected raw value for a referenced-column rule, or undefined when unknown. */
export type ValueResolver = (column: string, context: ValueResolverContext) => string | undefined;

export interface ValidateMessageOptions {
  readonly resolver?: ValueResolver;
  /** Enumerated selections keyed by indexed path or plain path; indexed wins. */
  readonly overrides?: Readonly<Record<string, string>>;
  readonly numericDatatypes?: readonly string[];
}

export interface ExpectedValueOptions extends ValidateMessageOptions {
  readonly messageType: OffsetTable['messageType'];
}

export type ExpectedValue =
  | { readonly verifiable: true; readonly value: string }
  | { readonly verifiable: false; readonly reason: string };

export function validateMessage(
  table: OffsetTable,
  payload: string | Uint8Array,
  options: ValidateMessageOptions = {},
): ValidationResult {
  const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('latin1');
  const numericDatatypes = options.numericDatatypes ?? DEFAULT_NUMERIC_DATATYPES;
  const issues: Diagnostic[] = [];

  for (const entry of table.getEntries()) {
    const actual = text.slice(entry.start, entry.start + entry.length);
    if (actual.length < entry.length) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.TRUNCATED_PAYLOAD,
        path: entry.indexedPath,
        severity: 'error',
        message: `Field "${entry.indexedPath}" expects ${entry.length} characters at offset ${entry.start} but the payload (${text.length} characters) provides ${actual.length}.`,
        expected: String(entry.length),
        actual: String(actual.length),
      });
      continue;
    }

    const rule = parseHardCodeRule(entry.hardCodeRule);
    if (rule === null) {
      continue;
    }

    const expected = expectedValueFor(rule, entry, { ...options, messageType: table.messageType, numericDatatypes });
    if (!expected.verifiable) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.UNVERIFIABLE_FIELD,
        path: entry.indexedPath,
        severity: 'warning',
        message: `Field "${entry.indexedPath}" cannot be verified: ${expected.reason}.`,
      });
      continue;
    }

    if (expected.value !== actual) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.VALUE_MISMATCH,
        path: entry.indexedPath,
        severity: 'error',
        message: `Field "${entry.indexedPath}" at offset ${entry.start} is ${JSON.stringify(actual)}, expected ${JSON.stringify(expected.value)}.`,
        expected: expected.value,
        actual,
      });
    }
  }

  return ValidationResult.of(issues);
}

export function expectedValueFor(
  rule: HardCodeRule,
  entry: OffsetEntry,
  options: ExpectedValueOptions,
): ExpectedValue {
  const numeric = isNumericDatatype(entry.datatype, options.numericDatatypes ?? DEFAULT_NUMERIC_DATATYPES);

  switch (rule.kind) {
    case 'blank':
      return { verifiable: true, value: ' '.repeat(entry.length) };
    case 'fixed':
      return { verifiable: true, value: padToWidth(rule.value, entry.length, numeric) };
    case 'enumerated': {
      const override = options.overrides?.[entry.indexedPath] ?? options.overrides?.[entry.path];
      return { verifiable: true, value: padToWidth(selectEnumeratedCode(rule.mappings, override), entry.length, numeric) };
    }
    case 'referenced': {
      if (options.resolver === undefined) {
        return { verifiable: false, reason: `refers to column ${rule.column} and no resolver is configured` };
      }
      const resolved = options.resolver(rule.column, {
        messageType: options.messageType,
        path: entry.path,
        indexedPath: entry.indexedPath,
        datatype: entry.datatype,
        length: entry.length,
        occurrenceIndex: entry.occurrenceIndex,
        ruleText: rule.text,
      });
      if (resolved === undefined) {
        return { verifiable: false, reason: `resolver has no value for column ${rule.column}` };
      }
      return { verifiable: true, value: padToWidth(resolved, entry.length, numeric) };
    }
  }
}
