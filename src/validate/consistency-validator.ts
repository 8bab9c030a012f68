import { z } from 'zod';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { PATH_SEPARATOR } from '../kernel/field-tree.js';
import { artifactProjectionInvalidError } from '../kernel/spec-error.js';
import type { MessageModel } from '../kernel/types.js';
import { ValidationResult } from '../kernel/validation-result.js';
import {
  ARTIFACT_KINDS,
  projectArtifact,
  type ArtifactKind,
  type ArtifactProjection,
  type ProjectedField,
} from './projections.js';

/** Translates a canonical type (spec datatype or container type) into an artifact's vocabulary. */
export type TypeMapper = (canonicalType: string, field: ProjectedField) => string;

export interface ValidateConsistencyOptions {
  readonly typeMappers?: Partial<Readonly<Record<ArtifactKind, TypeMapper>>>;
}

/** Artifacts whose field order must follow the model's sibling order. */
const ORDER_PRESERVING_ARTIFACTS: ReadonlySet<ArtifactKind> = new Set(['wireLayout']);

const ROOT_PARENT = '<root>';

export const ArtifactProjectionSchema = z
  .object({
    artifact: z.enum(['wireLayout', 'businessObject', 'apiSchema']),
    fields: z.array(
      z
        .object({
          path: z.string().min(1),
          type: z.string(),
          required: z.boolean(),
          defaultValue: z.string().optional(),
        })
        .strict(),
    ),
  })
  .strict();

export function parseArtifactProjection(value: unknown): ArtifactProjection {
  const parsed = ArtifactProjectionSchema.safeParse(value);
  if (!parsed.success) {
    throw artifactProjectionInvalidError('Artifact projection failed schema validation.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Compares each supplied artifact with the model's projection for it. Every artifact
 * kind is expected; a kind with no projection reports each canonical field as missing.
 */
export function validateConsistency(
  model: MessageModel,
  projections: readonly ArtifactProjection[],
  options: ValidateConsistencyOptions = {},
): ValidationResult {
  const supplied = new Set(projections.map((projection) => projection.artifact));
  const absent = ARTIFACT_KINDS.filter((artifact) => !supplied.has(artifact)).map(
    (artifact): ArtifactProjection => ({ artifact, fields: [] }),
  );
  return ValidationResult.mergeAll(
    [...projections, ...absent].map((projection) =>
      compareProjection(model, projection, options.typeMappers?.[projection.artifact]),
    ),
  );
}

function compareProjection(
  model: MessageModel,
  projection: ArtifactProjection,
  typeMapper: TypeMapper | undefined,
): ValidationResult {
  const artifact = projection.artifact;
  const canonical = projectArtifact(model, artifact).fields;
  const issues: Diagnostic[] = [];

  const actualByPath = new Map<string, ProjectedField>();
  for (const field of projection.fields) {
    if (actualByPath.has(field.path)) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.DUPLICATE_ARTIFACT_FIELD,
        path: field.path,
        severity: 'error',
        artifact,
        message: `Artifact ${artifact} defines field "${field.path}" more than once.`,
      });
      continue;
    }
    actualByPath.set(field.path, field);
  }

  const canonicalPaths = new Set<string>();
  for (const expected of canonical) {
    canonicalPaths.add(expected.path);
    const actual = actualByPath.get(expected.path);
    if (actual === undefined) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.MISSING_IN_ARTIFACT,
        path: expected.path,
        severity: 'error',
        artifact,
        message: `Artifact ${artifact} is missing field "${expected.path}".`,
      });
      continue;
    }

    const expectedType = typeMapper === undefined ? expected.type : typeMapper(expected.type, expected);
    const attributes: ReadonlyArray<readonly [string, string, string]> = [
      ['type', expectedType, actual.type],
      ['required', String(expected.required), String(actual.required)],
      ['default', formatDefault(expected.defaultValue), formatDefault(actual.defaultValue)],
    ];
    for (const [attribute, expectedValue, actualValue] of attributes) {
      if (expectedValue !== actualValue) {
        issues.push({
          code: MESSAGE_SPEC_DIAGNOSTIC_CODES.ATTRIBUTE_MISMATCH,
          path: expected.path,
          severity: 'error',
          artifact,
          expected: expectedValue,
          actual: actualValue,
          message: `Artifact ${artifact} field "${expected.path}" has ${attribute} ${actualValue}, expected ${expectedValue}.`,
        });
      }
    }
  }

  for (const path of actualByPath.keys()) {
    if (!canonicalPaths.has(path)) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.EXTRANEOUS_FIELD,
        path,
        severity: 'error',
        artifact,
        message: `Artifact ${artifact} defines field "${path}" that the ${model.messageType} model does not have.`,
      });
    }
  }

  if (ORDER_PRESERVING_ARTIFACTS.has(artifact)) {
    issues.push(...compareSiblingOrder(artifact, canonical, [...actualByPath.keys()], canonicalPaths));
  }

  return ValidationResult.of(issues);
}

/** Compares sibling sequences per parent, restricted to paths both sides know. */
function compareSiblingOrder(
  artifact: ArtifactKind,
  canonical: readonly ProjectedField[],
  actualPaths: readonly string[],
  canonicalPaths: ReadonlySet<string>,
): Diagnostic[] {
  const actualPathSet = new Set(actualPaths);
  const expectedGroups = groupByParent(canonical.map((field) => field.path).filter((path) => actualPathSet.has(path)));
  const actualGroups = groupByParent(actualPaths.filter((path) => canonicalPaths.has(path)));
  const issues: Diagnostic[] = [];

  for (const [parent, expectedOrder] of expectedGroups) {
    const actualOrder = actualGroups.get(parent) ?? [];
    if (expectedOrder.join('\n') !== actualOrder.join('\n')) {
      issues.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.ORDER_MISMATCH,
        path: parent,
        severity: 'error',
        artifact,
        expected: expectedOrder.join(', '),
        actual: actualOrder.join(', '),
        message: `Artifact ${artifact} orders the children of ${parent} differently from the model.`,
      });
    }
  }
  return issues;
}

function groupByParent(paths: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const path of paths) {
    const separator = path.lastIndexOf(PATH_SEPARATOR);
    const parent = separator < 0 ? ROOT_PARENT : path.slice(0, separator);
    const siblings = groups.get(parent);
    if (siblings === undefined) {
      groups.set(parent, [path]);
    } else {
      siblings.push(path);
    }
  }
  return groups;
}

function formatDefault(value: string | undefined): string {
  return value === undefined ? '(none)' : JSON.stringify(value);
}
