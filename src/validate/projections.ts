import { pathKey, walkFields } from '../kernel/field-tree.js';
import type { FieldNode, MessageModel } from '../kernel/types.js';
import { defaultValueOf, parseHardCodeRule } from './hard-code-rule.js';

export type ArtifactKind = 'wireLayout' | 'businessObject' | 'apiSchema';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['wireLayout', 'businessObject', 'apiSchema'];

/** One field definition as an artifact sees it. Containers are fields too. */
export interface ProjectedField {
  readonly path: string;
  readonly type: string;
  readonly required: boolean;
  readonly defaultValue?: string;
}

export interface ArtifactProjection {
  readonly artifact: ArtifactKind;
  readonly fields: readonly ProjectedField[];
}

/** Every field in wire order, including the group-id and occurrence-count leaves. */
export function projectWireLayout(model: MessageModel): ArtifactProjection {
  return { artifact: 'wireLayout', fields: projectFields(model, true) };
}

export function projectBusinessObject(model: MessageModel): ArtifactProjection {
  return { artifact: 'businessObject', fields: projectFields(model, false) };
}

export function projectApiSchema(model: MessageModel): ArtifactProjection {
  return { artifact: 'apiSchema', fields: projectFields(model, false) };
}

export function projectArtifact(model: MessageModel, artifact: ArtifactKind): ArtifactProjection {
  switch (artifact) {
    case 'wireLayout':
      return projectWireLayout(model);
    case 'businessObject':
      return projectBusinessObject(model);
    case 'apiSchema':
      return projectApiSchema(model);
  }
}

export function projectedType(node: FieldNode): string {
  if (node.kind === 'leaf') {
    return node.datatype;
  }
  const typeName = node.typeName ?? node.name;
  return node.kind === 'array' ? `${typeName}[]` : typeName;
}

function projectFields(model: MessageModel, includeTransitory: boolean): readonly ProjectedField[] {
  const fields: ProjectedField[] = [];
  walkFields(model, (node) => {
    if (!includeTransitory && node.transitory !== undefined) {
      return;
    }

    const defaultValue = node.kind === 'leaf' ? defaultValueOf(parseHardCodeRule(node.hardCodeRule)) : undefined;
    fields.push({
      path: pathKey(node.path),
      type: projectedType(node),
      required: node.required,
      ...(defaultValue === undefined ? {} : { defaultValue }),
    });
  });

  return fields;
}
