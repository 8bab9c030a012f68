export interface EnumeratedMapping {
  readonly label: string;
  readonly code: string;
}

export type HardCodeRule =
  | { readonly kind: 'fixed'; readonly value: string }
  | { readonly kind: 'enumerated'; readonly mappings: readonly EnumeratedMapping[] }
  | { readonly kind: 'blank' }
  | { readonly kind: 'referenced'; readonly column: string; readonly text: string };

export const DEFAULT_NUMERIC_DATATYPES: readonly string[] = Object.freeze(['number', 'n', 'unsigned integer']);

const BLANK_PATTERN = /^blanks?$/i;
const REFERENCED_PATTERN = /^refer\s+(?:to\s+)?col(?:umn)?\s+([A-Za-z0-9_]+)/i;
const MAPPING_PATTERN = /^([^=,]+)=([^=,]*)$/;
const QUOTED_PATTERN = /^(["'])(.*)\1$/s;

/** Returns null for an empty cell; unrecognized text is treated as a fixed literal. */
export function parseHardCodeRule(text: string | undefined): HardCodeRule | null {
  const trimmed = text?.trim() ?? '';
  if (trimmed === '') {
    return null;
  }
  if (BLANK_PATTERN.test(trimmed)) {
    return { kind: 'blank' };
  }

  const referenced = REFERENCED_PATTERN.exec(trimmed);
  if (referenced !== null) {
    return { kind: 'referenced', column: referenced[1] ?? '', text: trimmed };
  }

  const mappings = parseMappings(trimmed);
  if (mappings !== null) {
    return { kind: 'enumerated', mappings };
  }

  const quoted = QUOTED_PATTERN.exec(trimmed);
  return { kind: 'fixed', value: quoted === null ? trimmed : (quoted[2] ?? '') };
}

/** Value an artifact should default the field to: the literal, or the first enumerated code. */
export function defaultValueOf(rule: HardCodeRule | null): string | undefined {
  if (rule === null) {
    return undefined;
  }
  switch (rule.kind) {
    case 'fixed':
      return rule.value;
    case 'enumerated':
      return rule.mappings[0]?.code;
    case 'blank':
    case 'referenced':
      return undefined;
  }
}

/** An override may name either a label or a code; anything else is taken literally. */
export function selectEnumeratedCode(mappings: readonly EnumeratedMapping[], override: string | undefined): string {
  if (override === undefined) {
    return mappings[0]?.code ?? '';
  }
  const byLabel = mappings.find((mapping) => mapping.label === override);
  return byLabel === undefined ? override : byLabel.code;
}

export function isNumericDatatype(datatype: string, numericDatatypes: readonly string[] = DEFAULT_NUMERIC_DATATYPES): boolean {
  const normalized = datatype.trim().toLowerCase();
  return numericDatatypes.some((candidate) => candidate.trim().toLowerCase() === normalized);
}

/** Numeric fields are zero-filled on the left; everything else is space-filled on the right. */
export function padToWidth(value: string, length: number, numeric: boolean): string {
  if (value.length >= length) {
    return value.slice(0, length);
  }
  return numeric ? value.padStart(length, '0') : value.padEnd(length, ' ');
}

function parseMappings(text: string): readonly EnumeratedMapping[] | null {
  const mappings: EnumeratedMapping[] = [];
  for (const part of text.split(',')) {
    const match = MAPPING_PATTERN.exec(part.trim());
    if (match === null) {
      return null;
    }
    mappings.push({ label: (match[1] ?? '').trim(), code: (match[2] ?? '').trim() });
  }
  return mappings;
}
