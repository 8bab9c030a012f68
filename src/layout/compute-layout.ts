import { hasErrorDiagnostics, type Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { allocatedWidth, childrenOf, findNodeByPath, formatOccurrence, getRoot, pathKey, walkFields } from '../kernel/field-tree.js';
import type { FieldNode, MessageModel } from '../kernel/types.js';
import { OffsetTable, type OffsetEntry } from './offset-table.js';

/** Repetition counts keyed by array field path, e.g. `{ 'order.items': 3 }`. */
export type RepetitionCounts = Readonly<Record<string, number>>;

export interface ComputeLayoutOptions {
  readonly repetitionCounts?: RepetitionCounts;
}

export interface ComputeLayoutResult {
  readonly table: OffsetTable | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function computeLayout(model: MessageModel, options: ComputeLayoutOptions = {}): ComputeLayoutResult {
  const repetitionCounts = options.repetitionCounts ?? {};
  const { counts, diagnostics } = resolveRepetitionCounts(model, repetitionCounts);
  if (hasErrorDiagnostics(diagnostics)) {
    return { table: null, diagnostics };
  }

  const entries: OffsetEntry[] = [];
  let cursor = 0;

  const layoutChildren = (
    node: FieldNode,
    indexedPrefix: readonly string[],
    occurrences: readonly number[],
    externalCount: number | undefined,
  ): void => {
    for (const child of childrenOf(model, node)) {
      if (child.kind === 'leaf') {
        const length = allocatedWidth(child.length);
        const counterRule =
          child.transitory === 'occurrenceCount' && externalCount !== undefined ? String(externalCount) : undefined;
        const hardCodeRule = counterRule ?? child.hardCodeRule;
        entries.push({
          path: pathKey(child.path),
          indexedPath: pathKey([...indexedPrefix, child.name]),
          nodeId: child.id,
          start: cursor,
          length,
          occurrenceIndex: occurrences[occurrences.length - 1] ?? 0,
          occurrences,
          datatype: child.datatype,
          ...(hardCodeRule === undefined ? {} : { hardCodeRule }),
        });
        cursor += length;
        continue;
      }

      if (child.kind === 'object') {
        layoutChildren(child, [...indexedPrefix, child.name], occurrences, undefined);
        continue;
      }

      const external = counts.get(child.id);
      const repetitions = external ?? boundedMax(child);
      for (let index = 0; index < repetitions; index += 1) {
        layoutChildren(child, [...indexedPrefix, `${child.name}[${index}]`], [...occurrences, index], external);
      }
    }
  };

  layoutChildren(getRoot(model), [], [], undefined);
  return { table: new OffsetTable(model.messageType, entries), diagnostics };
}

/**
 * Checks every array up front so all unbounded arrays without a count are
 * reported together.
 */
function resolveRepetitionCounts(
  model: MessageModel,
  repetitionCounts: RepetitionCounts,
): { readonly counts: ReadonlyMap<number, number>; readonly diagnostics: readonly Diagnostic[] } {
  const counts = new Map<number, number>();
  const diagnostics: Diagnostic[] = [];

  walkFields(model, (node) => {
    if (node.kind !== 'array' || node.occurrence === undefined) {
      return;
    }
    const path = pathKey(node.path);
    const supplied = repetitionCounts[path];

    if (node.occurrence.max !== 'unbounded') {
      if (supplied !== undefined) {
        diagnostics.push({
          code: MESSAGE_SPEC_DIAGNOSTIC_CODES.REPETITION_COUNT_IGNORED,
          path,
          severity: 'warning',
          message: `Array "${path}" is bounded (${formatOccurrence(node.occurrence)}); repetition count ${supplied} is ignored.`,
        });
      }
      return;
    }

    if (supplied === undefined) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.UNBOUNDED_ARRAY,
        path,
        severity: 'error',
        message: `Array "${path}" has occurrence ${formatOccurrence(node.occurrence)} and no repetition count was supplied.`,
        suggestion: `Add layout.repetitionCounts.${model.messageType}["${path}"] to the configuration.`,
      });
      return;
    }

    if (!Number.isInteger(supplied) || supplied < 0 || supplied < node.occurrence.min) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_REPETITION_COUNT,
        path,
        severity: 'error',
        message: `Repetition count ${supplied} for array "${path}" must be an integer of at least ${node.occurrence.min}.`,
      });
      return;
    }

    counts.set(node.id, supplied);
  });

  for (const [path, supplied] of Object.entries(repetitionCounts)) {
    const node = findNodeByPath(model, path);
    if (node === undefined || node.kind !== 'array') {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.REPETITION_COUNT_IGNORED,
        path,
        severity: 'warning',
        message: `No array field "${path}" exists in the ${model.messageType} model; repetition count ${supplied} is ignored.`,
      });
    }
  }

  return { counts, diagnostics };
}

function boundedMax(node: FieldNode): number {
  const max = node.occurrence?.max;
  return typeof max === 'number' ? max : 0;
}
