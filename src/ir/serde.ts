import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { computeDeclaredLength, getRoot } from '../kernel/field-tree.js';
import { persistedModelInvalidError } from '../kernel/spec-error.js';
import type { FieldNode, LengthSpec, MessageModel, OccurrenceRange, RowSource, TransitoryRole } from '../kernel/types.js';

export const PERSISTED_FORMAT_VERSION = 1;

export type PersistedFormat = 'json' | 'yaml';

export interface PersistedField {
  readonly name: string;
  readonly rawName: string;
  readonly kind: 'leaf' | 'object' | 'array';
  readonly typeName?: string;
  readonly datatype: string;
  readonly length: LengthSpec;
  readonly required: boolean;
  readonly nullable: boolean;
  readonly hardCodeRule?: string;
  readonly occurrence?: OccurrenceRange;
  readonly groupId?: string;
  readonly transitory?: TransitoryRole;
  readonly source: RowSource;
  readonly fields: readonly PersistedField[];
}

export interface PersistedMessageModel {
  readonly formatVersion: typeof PERSISTED_FORMAT_VERSION;
  readonly messageType: MessageModel['messageType'];
  readonly totalDeclaredLength: number;
  readonly provenance: MessageModel['provenance'];
  readonly renames: MessageModel['renames'];
  readonly root: PersistedField;
}

const RowSourceSchema = z.object({ sheet: z.string(), rowNumber: z.number().int().nonnegative() }).strict();

const LengthSpecSchema = z.union([
  z.object({ kind: z.literal('fixed'), length: z.number().int().nonnegative() }).strict(),
  z.object({ kind: z.literal('range'), min: z.number().int().nonnegative(), max: z.number().int().nonnegative() }).strict(),
  z.object({ kind: z.literal('notApplicable') }).strict(),
]);

const OccurrenceRangeSchema = z
  .object({
    min: z.union([z.literal(0), z.literal(1)]),
    max: z.union([z.number().int().positive(), z.literal('unbounded')]),
  })
  .strict();

const PersistedFieldSchema: z.ZodType<PersistedField> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      rawName: z.string(),
      kind: z.enum(['leaf', 'object', 'array']),
      typeName: z.string().optional(),
      datatype: z.string(),
      length: LengthSpecSchema,
      required: z.boolean(),
      nullable: z.boolean(),
      hardCodeRule: z.string().optional(),
      occurrence: OccurrenceRangeSchema.optional(),
      groupId: z.string().optional(),
      transitory: z.enum(['groupId', 'occurrenceCount']).optional(),
      source: RowSourceSchema,
      fields: z.array(PersistedFieldSchema),
    })
    .strict(),
);

const RenameEntrySchema = z
  .object({
    rawName: z.string(),
    normalizedName: z.string(),
    scope: z.enum(['request', 'response', 'header']),
    reason: z.enum([
      'unchanged',
      'case normalized',
      'non-alnum stripped',
      'digit-prefixed',
      'description-derived',
      'collision-suffixed',
      'operation-id override',
    ]),
    path: z.string(),
    source: RowSourceSchema,
  })
  .strict();

export const PersistedMessageModelSchema = z
  .object({
    formatVersion: z.literal(PERSISTED_FORMAT_VERSION),
    messageType: z.enum(['request', 'response']),
    totalDeclaredLength: z.number().int().nonnegative(),
    provenance: z
      .object({
        sheets: z.array(
          z
            .object({
              sheet: z.string(),
              firstRow: z.number().int().nonnegative(),
              lastRow: z.number().int().nonnegative(),
              rowCount: z.number().int().nonnegative(),
            })
            .strict(),
        ),
      })
      .strict(),
    renames: z.array(RenameEntrySchema),
    root: PersistedFieldSchema,
  })
  .strict();

export function serializeMessageModel(model: MessageModel): PersistedMessageModel {
  const toPersisted = (node: FieldNode): PersistedField => ({
    name: node.name,
    rawName: node.rawName,
    kind: node.kind,
    ...(node.typeName === undefined ? {} : { typeName: node.typeName }),
    datatype: node.datatype,
    length: node.length,
    required: node.required,
    nullable: node.nullable,
    ...(node.hardCodeRule === undefined ? {} : { hardCodeRule: node.hardCodeRule }),
    ...(node.occurrence === undefined ? {} : { occurrence: node.occurrence }),
    ...(node.groupId === undefined ? {} : { groupId: node.groupId }),
    ...(node.transitory === undefined ? {} : { transitory: node.transitory }),
    source: node.source,
    fields: node.childIds.map((childId) => toPersisted(nodeAt(model, childId))),
  });

  return {
    formatVersion: PERSISTED_FORMAT_VERSION,
    messageType: model.messageType,
    totalDeclaredLength: model.totalDeclaredLength,
    provenance: model.provenance,
    renames: model.renames,
    root: toPersisted(getRoot(model)),
  };
}

/**
 * Rebuilds the arena from the nested form. Ids, paths and levels are recomputed
 * rather than trusted, so the result is indistinguishable from a fresh build.
 */
export function deserializeMessageModel(value: unknown): MessageModel {
  const parsed = PersistedMessageModelSchema.safeParse(value);
  if (!parsed.success) {
    throw persistedModelInvalidError('Persisted message model failed schema validation.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const persisted = parsed.data;
  if (persisted.root.kind !== 'object') {
    throw persistedModelInvalidError('Persisted message root must be an object.', { kind: persisted.root.kind });
  }

  const nodes: FieldNode[] = [];
  const visit = (field: PersistedField, parentId: number | null, parentPath: readonly string[], level: number): number => {
    const id = nodes.length;
    const path = parentId === null ? [] : [...parentPath, field.name];
    if (field.kind === 'leaf' && field.fields.length > 0) {
      throw persistedModelInvalidError(`Leaf "${path.join('.')}" must not carry nested fields.`, { path });
    }
    if (field.kind !== 'leaf' && field.occurrence === undefined) {
      throw persistedModelInvalidError(`Container "${path.join('.')}" is missing its occurrence range.`, { path });
    }

    const childIds: number[] = [];
    // Reserve the slot so ids stay in pre-order while children are visited.
    nodes.push(placeholderNode(id));
    const names = new Set<string>();
    for (const child of field.fields) {
      if (names.has(child.name)) {
        throw persistedModelInvalidError(`Duplicate field "${[...path, child.name].join('.')}".`, { path });
      }
      names.add(child.name);
      childIds.push(visit(child, id, path, level + 1));
    }

    nodes[id] = Object.freeze({
      id,
      parentId,
      path: Object.freeze(path),
      level,
      rawName: field.rawName,
      name: field.name,
      kind: field.kind,
      ...(field.typeName === undefined ? {} : { typeName: field.typeName }),
      datatype: field.datatype,
      length: field.length,
      required: field.required,
      nullable: field.nullable,
      ...(field.hardCodeRule === undefined ? {} : { hardCodeRule: field.hardCodeRule }),
      ...(field.occurrence === undefined ? {} : { occurrence: field.occurrence }),
      ...(field.groupId === undefined ? {} : { groupId: field.groupId }),
      ...(field.transitory === undefined ? {} : { transitory: field.transitory }),
      childIds: Object.freeze(childIds),
      source: field.source,
    });
    return id;
  };
  visit(persisted.root, null, [], -1);

  const model: MessageModel = Object.freeze({
    messageType: persisted.messageType,
    rootId: 0,
    nodes: Object.freeze(nodes),
    totalDeclaredLength: persisted.totalDeclaredLength,
    provenance: persisted.provenance,
    renames: Object.freeze(persisted.renames),
  });

  const recomputed = computeDeclaredLength(model);
  if (recomputed !== persisted.totalDeclaredLength) {
    throw persistedModelInvalidError('Persisted total declared length does not match its fields.', {
      persisted: persisted.totalDeclaredLength,
      recomputed,
    });
  }
  return model;
}

export function stringifyPersistedModel(model: MessageModel, format: PersistedFormat = 'json'): string {
  const persisted = serializeMessageModel(model);
  if (format === 'json') {
    return `${JSON.stringify(persisted, null, 2)}\n`;
  }
  // Rename sources share objects with node sources; write them out in full.
  return stringifyYaml(persisted, { aliasDuplicateObjects: false });
}

/** Accepts either JSON or YAML text; JSON is a subset of YAML. */
export function parsePersistedModel(text: string): MessageModel {
  let value: unknown;
  try {
    value = parseYaml(text);
  } catch (error) {
    throw persistedModelInvalidError('Persisted message model is not valid JSON or YAML.', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return deserializeMessageModel(value);
}

function nodeAt(model: MessageModel, id: number): FieldNode {
  const node = model.nodes[id];
  if (node === undefined) {
    throw persistedModelInvalidError(`Node ${id} is referenced but missing from the arena.`, { id });
  }
  return node;
}

function placeholderNode(id: number): FieldNode {
  return {
    id,
    parentId: null,
    path: [],
    level: -1,
    rawName: '',
    name: '',
    kind: 'leaf',
    datatype: '',
    length: { kind: 'notApplicable' },
    required: false,
    nullable: false,
    childIds: [],
    source: { sheet: '', rowNumber: 0 },
  };
}
