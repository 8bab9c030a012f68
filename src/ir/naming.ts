import type { RenameReason } from '../kernel/types.js';

export const DEFAULT_MAX_NAME_LENGTH = 50;
export const DEFAULT_DESCRIPTION_WORDS = 4;
export const FALLBACK_FIELD_NAME = 'field';

const LEGAL_IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SEPARATOR_PATTERN = /[\s\-_]+/;
const CASE_BOUNDARY_PATTERN = /(?<=[a-z0-9])(?=[A-Z])|(?<=[A-Z])(?=[A-Z][a-z])/;
const STRIPPED_CHARACTERS_PATTERN = /[^A-Za-z0-9\s\-_]/g;
const HAS_STRIPPED_CHARACTER_PATTERN = /[^A-Za-z0-9\s\-_]/;

export interface NamingContext {
  /** Names already assigned among the same parent's children in the same scope. */
  readonly taken: ReadonlySet<string>;
  readonly description?: string;
  readonly maxNameLength?: number;
  readonly descriptionWords?: number;
}

export interface NormalizedName {
  readonly name: string;
  readonly reason: RenameReason;
}

export function isLegalIdentifier(name: string): boolean {
  return LEGAL_IDENTIFIER_PATTERN.test(name);
}

/** Splits on whitespace, hyphens, underscores and case transitions; digits stay with their word. */
export function tokenizeName(raw: string): readonly string[] {
  return raw
    .replace(STRIPPED_CHARACTERS_PATTERN, '')
    .split(SEPARATOR_PATTERN)
    .flatMap((part) => part.split(CASE_BOUNDARY_PATTERN))
    .filter((token) => token.length > 0);
}

export function toLowerCamelCase(tokens: readonly string[]): string {
  return tokens
    .map((token, index) => {
      const lower = token.toLowerCase();
      return index === 0 ? lower : lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join('');
}

export function normalizeFieldName(raw: string, context: NamingContext): NormalizedName {
  const maxNameLength = context.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH;
  let reason: RenameReason = 'unchanged';
  let name = toLowerCamelCase(tokenizeName(raw));

  if (name !== '') {
    if (HAS_STRIPPED_CHARACTER_PATTERN.test(raw)) {
      reason = 'non-alnum stripped';
    } else if (name !== raw) {
      reason = 'case normalized';
    }
  } else {
    name = deriveFromDescription(context.description ?? '', context.descriptionWords ?? DEFAULT_DESCRIPTION_WORDS);
    reason = 'description-derived';
  }

  if (/^[0-9]/.test(name)) {
    name = `_${name}`;
    if (reason !== 'description-derived') {
      reason = 'digit-prefixed';
    }
  }

  if (name.length > maxNameLength) {
    name = name.slice(0, maxNameLength);
  }

  if (context.taken.has(name)) {
    let suffix = 2;
    let candidate = withSuffix(name, suffix, maxNameLength);
    while (context.taken.has(candidate)) {
      suffix += 1;
      candidate = withSuffix(name, suffix, maxNameLength);
    }
    return { name: candidate, reason: 'collision-suffixed' };
  }

  return { name, reason };
}

/** The base gives way to the suffix so the result stays within the length limit. */
function withSuffix(base: string, suffix: number, maxNameLength: number): string {
  const tail = `_${suffix}`;
  return `${base.slice(0, Math.max(0, maxNameLength - tail.length))}${tail}`;
}

function deriveFromDescription(description: string, words: number): string {
  const derived = toLowerCamelCase(tokenizeName(description).slice(0, Math.max(1, words)));
  return derived === '' ? FALLBACK_FIELD_NAME : derived;
}

/** Operation-id derived names replace normalization entirely; null when the name is not a legal identifier. */
export function applyOverrideName(raw: string): NormalizedName | null {
  return isLegalIdentifier(raw) ? { name: raw, reason: 'operation-id override' } : null;
}
