import { unknownNodeError } from './spec-error.js';
import type { FieldNode, LengthSpec, MessageModel, OccurrenceRange } from './types.js';

export const PATH_SEPARATOR = '.';

export function pathKey(path: readonly string[]): string {
  return path.join(PATH_SEPARATOR);
}

export function getNode(model: MessageModel, id: number): FieldNode {
  const node = model.nodes[id];
  if (node === undefined) {
    throw unknownNodeError(`Node ${id} does not exist in the ${model.messageType} model.`, { id });
  }
  return node;
}

export function getRoot(model: MessageModel): FieldNode {
  return getNode(model, model.rootId);
}

export function childrenOf(model: MessageModel, node: FieldNode): readonly FieldNode[] {
  return node.childIds.map((childId) => getNode(model, childId));
}

export function parentOf(model: MessageModel, node: FieldNode): FieldNode | null {
  return node.parentId === null ? null : getNode(model, node.parentId);
}

export function findNodeByPath(model: MessageModel, path: string): FieldNode | undefined {
  return model.nodes.find((node) => node.parentId !== null && pathKey(node.path) === path);
}

/** Pre-order walk below the message root, siblings in spec row order. */
export function walkFields(model: MessageModel, visit: (node: FieldNode, depth: number) => void): void {
  const walk = (node: FieldNode, depth: number): void => {
    for (const child of childrenOf(model, node)) {
      visit(child, depth);
      walk(child, depth + 1);
    }
  };
  walk(getRoot(model), 0);
}

export function isContainer(node: FieldNode): boolean {
  return node.kind !== 'leaf';
}

export function allocatedWidth(length: LengthSpec): number {
  switch (length.kind) {
    case 'fixed':
      return length.length;
    case 'range':
      return length.max;
    case 'notApplicable':
      return 0;
  }
}

export function formatOccurrence(occurrence: OccurrenceRange): string {
  return `${occurrence.min}..${occurrence.max === 'unbounded' ? 'N' : occurrence.max}`;
}

export function isSingleOccurrence(occurrence: OccurrenceRange | undefined): boolean {
  return occurrence === undefined || (occurrence.min === 1 && occurrence.max === 1);
}

/** Sum of leaf widths with every container expanded exactly once. */
export function computeDeclaredLength(model: MessageModel): number {
  let total = 0;
  walkFields(model, (node) => {
    if (node.kind === 'leaf') {
      total += allocatedWidth(node.length);
    }
  });
  return total;
}
