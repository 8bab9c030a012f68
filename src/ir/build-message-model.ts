import type { Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { computeDeclaredLength, formatOccurrence, isSingleOccurrence, pathKey } from '../kernel/field-tree.js';
import type {
  FieldNode,
  LengthSpec,
  MessageModel,
  MessageType,
  NameScope,
  OccurrenceRange,
  RenameEntry,
  RenameReason,
  RowSource,
  SheetProvenance,
  SheetRows,
  SpecRow,
  TransitoryRole,
} from '../kernel/types.js';
import { capDiagnostics } from './diagnostic-limits.js';
import { isNotApplicableLength, parseLengthSpec, parseOccurrenceRange } from './field-specs.js';
import { applyOverrideName, normalizeFieldName } from './naming.js';
import { rowPath } from './spec-rows.js';

export interface BuildMessageModelOptions {
  /** Operation-id derived name for the message root; must already be a legal identifier. */
  readonly rootName?: string;
  readonly header?: SheetRows;
  /** Index among the body's top-level fields where the header is spliced. */
  readonly headerAnchor?: number;
  /** When set, header fields are wrapped in an object of this name instead of spliced flat. */
  readonly headerGroupName?: string;
  readonly maxNameLength?: number;
  readonly descriptionWords?: number;
  readonly maxDiagnostics?: number;
  /** Segment nesting deeper than this is reported as a warning; top-level rows are depth 1. */
  readonly maxNestingDepth?: number;
}

export interface BuildMessageModelResult {
  readonly model: MessageModel | null;
  readonly diagnostics: readonly Diagnostic[];
}

export const DEFAULT_MAX_NESTING_DEPTH = 50;

const MARKER_PATTERN = /^\s*([^:]+?)\s*:\s*([^:]+?)\s*$/;
const GROUP_ID_PATTERN = /^group\s*id$/i;
const OCCURRENCE_COUNT_PATTERN = /^occurr?ence\s*count$/i;

const TRANSITORY_DEFAULTS: Readonly<Record<TransitoryRole, { readonly length: number; readonly datatype: string }>> = {
  groupId: { length: 10, datatype: 'String' },
  occurrenceCount: { length: 4, datatype: 'Number' },
};

const SINGLE_OCCURRENCE: OccurrenceRange = { min: 1, max: 1 };

interface DraftNode {
  readonly source: RowSource;
  readonly scope: NameScope;
  readonly rawName: string;
  readonly name: string;
  readonly renameReason: RenameReason;
  readonly container: boolean;
  readonly typeName?: string;
  readonly datatype: string;
  readonly length: LengthSpec;
  readonly required: boolean;
  readonly nullable: boolean;
  readonly level: number;
  readonly transitory?: TransitoryRole;
  hardCodeRule?: string;
  occurrence?: OccurrenceRange;
  occurrenceFromColumn: boolean;
  groupId?: string;
  readonly children: DraftNode[];
  readonly takenNames: Set<string>;
}

interface NamingSettings {
  readonly maxNameLength?: number;
  readonly descriptionWords?: number;
}

export function buildMessageModel(
  messageType: MessageType,
  sheet: SheetRows,
  options: BuildMessageModelOptions = {},
): BuildMessageModelResult {
  const diagnostics: Diagnostic[] = [];
  const naming: NamingSettings = {
    ...(options.maxNameLength === undefined ? {} : { maxNameLength: options.maxNameLength }),
    ...(options.descriptionWords === undefined ? {} : { descriptionWords: options.descriptionWords }),
  };

  const maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;

  const root = createRootDraft(messageType, sheet, options.rootName, diagnostics);
  root.children.push(...buildFieldForest(messageType, sheet, naming, maxNestingDepth, diagnostics));

  if (options.header !== undefined) {
    const headerFields = buildFieldForest('header', options.header, naming, maxNestingDepth, diagnostics);
    const spliced =
      options.headerGroupName === undefined
        ? headerFields
        : [createHeaderGroupDraft(options.headerGroupName, options.header, root, headerFields, naming)];
    const anchor = clampAnchor(options.headerAnchor, root.children.length);
    root.children.splice(anchor, 0, ...spliced);
  }

  const { nodes, renames } = flattenDrafts(root, diagnostics);
  const maxDiagnostics = options.maxDiagnostics;
  const capped = maxDiagnostics === undefined ? diagnostics : capDiagnostics(diagnostics, maxDiagnostics, `${messageType}.build`);

  const fatal = diagnostics.some(
    (diagnostic) =>
      diagnostic.severity === 'error' && diagnostic.code !== MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_OVERRIDE_NAME,
  );
  if (fatal) {
    return { model: null, diagnostics: capped };
  }

  const provenance = {
    sheets: Object.freeze([
      summarizeSheet(sheet),
      ...(options.header === undefined ? [] : [summarizeSheet(options.header)]),
    ]),
  };
  const partial: MessageModel = {
    messageType,
    rootId: 0,
    nodes,
    totalDeclaredLength: 0,
    provenance,
    renames,
  };
  const model: MessageModel = Object.freeze({ ...partial, totalDeclaredLength: computeDeclaredLength(partial) });
  return { model, diagnostics: capped };
}

/**
 * Turns one sheet's rows into top-level draft nodes using an ancestor stack keyed by
 * segment level. Rows below a hierarchy gap are skipped so the gap is reported once.
 */
function buildFieldForest(
  scope: NameScope,
  sheet: SheetRows,
  naming: NamingSettings,
  maxNestingDepth: number,
  diagnostics: Diagnostic[],
): DraftNode[] {
  const anchor = createDraft({
    source: { sheet: sheet.sheet, rowNumber: 0 },
    scope,
    rawName: sheet.sheet,
    name: sheet.sheet,
    renameReason: 'unchanged',
    container: true,
    level: -1,
  });
  const stack: DraftNode[] = [anchor];
  let skipBelowLevel: number | null = null;

  for (const row of sheet.rows) {
    const source: RowSource = { sheet: row.sheet, rowNumber: row.rowNumber };
    if (!Number.isInteger(row.level) || row.level < 0) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_LEVEL,
        path: rowPath(row.sheet, row.rowNumber),
        severity: 'error',
        message: `Segment level ${row.level} of field "${row.fieldName}" is not a non-negative integer.`,
        source,
      });
      continue;
    }

    if (skipBelowLevel !== null) {
      if (row.level > skipBelowLevel) {
        continue;
      }
      skipBelowLevel = null;
    }

    while (stack.length > 1 && currentTop(stack).level >= row.level) {
      stack.pop();
    }
    const parent = currentTop(stack);

    if (row.level > parent.level + 1) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.HIERARCHY_GAP,
        path: rowPath(row.sheet, row.rowNumber),
        severity: 'error',
        message: `Field "${row.fieldName}" at level ${row.level} has no open parent at level ${row.level - 1}; nearest open ancestor is at level ${parent.level}.`,
        suggestion: 'Fix the Seg lvl value or declare the parent row as "name:TypeName" with empty length and datatype.',
        source,
      });
      skipBelowLevel = row.level;
      continue;
    }

    if (row.level + 1 > maxNestingDepth) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.NESTING_TOO_DEEP,
        path: rowPath(row.sheet, row.rowNumber),
        severity: 'warning',
        message: `Field "${row.fieldName}" is nested ${row.level + 1} levels deep, beyond the maximum of ${maxNestingDepth}.`,
        suggestion: 'Flatten the structure or raise structure.maxNestingDepth.',
        source,
      });
    }

    const draft = createRowDraft(row, parent, scope, naming, diagnostics);
    parent.children.push(draft);
    if (draft.container) {
      stack.push(draft);
    }
  }

  for (const draft of anchor.children) {
    finalizeContainers(draft);
  }
  return anchor.children;
}

function createRowDraft(
  row: SpecRow,
  parent: DraftNode,
  scope: NameScope,
  naming: NamingSettings,
  diagnostics: Diagnostic[],
): DraftNode {
  const source: RowSource = { sheet: row.sheet, rowNumber: row.rowNumber };
  const path = rowPath(row.sheet, row.rowNumber);
  const marker = MARKER_PATTERN.exec(row.fieldName);

  if (marker !== null && row.datatype === '') {
    const memberName = marker[1] ?? '';
    const typeName = marker[2] ?? '';
    if (!isNotApplicableLength(row.length)) {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.MARKER_LENGTH,
        path,
        severity: 'error',
        message: `Object/array marker "${row.fieldName}" declares length "${row.length}"; markers carry no data.`,
        suggestion: 'Clear the Length column on the marker row.',
        source,
      });
    }

    const occurrence = parseOccurrenceColumn(row, diagnostics);
    const normalized = assignName(parent, memberName, row.description, naming);
    return createDraft({
      source,
      scope,
      rawName: row.fieldName,
      name: normalized.name,
      renameReason: normalized.reason,
      container: true,
      typeName,
      level: row.level,
      nullable: isYes(row.nullable),
      ...(row.hardCodeRule === '' ? {} : { hardCodeRule: row.hardCodeRule }),
      ...(occurrence === undefined ? {} : { occurrence, occurrenceFromColumn: true }),
    });
  }

  const transitory = detectTransitoryRole(row, parent);
  if (row.fieldName === '' && row.description === '') {
    diagnostics.push(missingFieldDiagnostic(row, 'field name'));
  }

  let length: LengthSpec = { kind: 'notApplicable' };
  const parsedLength = parseLengthSpec(row.length);
  if (!parsedLength.ok) {
    diagnostics.push({
      code: MESSAGE_SPEC_DIAGNOSTIC_CODES.UNPARSABLE_LENGTH,
      path,
      severity: 'error',
      message: `Field "${row.fieldName}": ${parsedLength.reason}.`,
      suggestion: 'Use a whole number of bytes or an inclusive range such as "1-10".',
      source,
    });
  } else if (parsedLength.value.kind !== 'notApplicable') {
    length = parsedLength.value;
  } else if (transitory !== undefined) {
    length = { kind: 'fixed', length: TRANSITORY_DEFAULTS[transitory].length };
  } else {
    diagnostics.push(missingFieldDiagnostic(row, 'length'));
  }

  let datatype = row.datatype;
  if (datatype === '') {
    if (transitory !== undefined) {
      datatype = TRANSITORY_DEFAULTS[transitory].datatype;
    } else {
      diagnostics.push(missingFieldDiagnostic(row, 'datatype'));
    }
  }

  let hardCodeRule = row.hardCodeRule === '' ? undefined : row.hardCodeRule;
  if (transitory === 'groupId') {
    const groupId = row.description !== '' ? row.description : row.hardCodeRule;
    if (groupId !== '') {
      parent.groupId = groupId;
      hardCodeRule = hardCodeRule ?? groupId;
    }
  } else if (transitory === 'occurrenceCount' && row.description !== '') {
    const parsed = parseOccurrenceRange(row.description);
    if (!parsed.ok) {
      diagnostics.push(invalidOccurrenceDiagnostic(row, parsed.reason));
    } else if (!parent.occurrenceFromColumn) {
      parent.occurrence = parsed.value;
    }
  }

  const normalized = assignName(parent, row.fieldName, row.description, naming);
  return createDraft({
    source,
    scope,
    rawName: row.fieldName,
    name: normalized.name,
    renameReason: normalized.reason,
    container: false,
    datatype,
    length,
    required: isMandatory(row.optionality),
    nullable: isYes(row.nullable),
    level: row.level,
    ...(hardCodeRule === undefined ? {} : { hardCodeRule }),
    ...(transitory === undefined ? {} : { transitory }),
  });
}

function finalizeContainers(draft: DraftNode): void {
  if (!draft.container) {
    return;
  }
  for (const child of draft.children) {
    finalizeContainers(child);
  }
  const occurrence = draft.occurrence ?? SINGLE_OCCURRENCE;
  draft.occurrence = occurrence;
  const counter = draft.children.find((child) => child.transitory === 'occurrenceCount');
  if (counter !== undefined && counter.hardCodeRule === undefined && occurrence.max !== 'unbounded') {
    counter.hardCodeRule = String(occurrence.max);
  }
}

function flattenDrafts(
  root: DraftNode,
  diagnostics: Diagnostic[],
): { readonly nodes: readonly FieldNode[]; readonly renames: readonly RenameEntry[] } {
  const nodes: FieldNode[] = [];
  const renames: RenameEntry[] = [];
  let nextId = 0;

  const visit = (draft: DraftNode, parentId: number | null, parentPath: readonly string[], level: number): number => {
    const id = nextId;
    nextId += 1;
    const path = parentId === null ? [] : [...parentPath, draft.name];

    if (parentId !== null || draft.renameReason === 'operation-id override') {
      renames.push(
        Object.freeze({
          rawName: draft.rawName,
          normalizedName: draft.name,
          scope: draft.scope,
          reason: draft.renameReason,
          path: pathKey(path),
          source: draft.source,
        }),
      );
    }

    const seen = new Set<string>();
    const childIds: number[] = [];
    for (const child of draft.children) {
      if (seen.has(child.name)) {
        const duplicatePath = pathKey([...path, child.name]);
        diagnostics.push({
          code: MESSAGE_SPEC_DIAGNOSTIC_CODES.DUPLICATE_FIELD_PATH,
          path: duplicatePath,
          severity: 'error',
          message: `Field path "${duplicatePath}" is defined more than once (${child.scope} row ${child.source.rowNumber} of "${child.source.sheet}").`,
          suggestion: 'Rename one of the fields or wrap the shared header in a named group.',
          source: child.source,
        });
      }
      seen.add(child.name);
      childIds.push(visit(child, id, path, level + 1));
    }

    nodes[id] = freezeNode(draft, id, parentId, path, level, childIds);
    return id;
  };

  visit(root, null, [], -1);
  return { nodes: Object.freeze(nodes), renames: Object.freeze(renames) };
}

function freezeNode(
  draft: DraftNode,
  id: number,
  parentId: number | null,
  path: readonly string[],
  level: number,
  childIds: readonly number[],
): FieldNode {
  const kind = !draft.container ? 'leaf' : isSingleOccurrence(draft.occurrence) ? 'object' : 'array';
  return Object.freeze({
    id,
    parentId,
    path: Object.freeze([...path]),
    level,
    rawName: draft.rawName,
    name: draft.name,
    kind,
    ...(draft.typeName === undefined ? {} : { typeName: draft.typeName }),
    datatype: draft.datatype,
    length: draft.length,
    required: draft.container ? (draft.occurrence ?? SINGLE_OCCURRENCE).min === 1 : draft.required,
    nullable: draft.nullable,
    ...(draft.hardCodeRule === undefined ? {} : { hardCodeRule: draft.hardCodeRule }),
    ...(draft.container ? { occurrence: draft.occurrence ?? SINGLE_OCCURRENCE } : {}),
    ...(draft.container && draft.groupId !== undefined ? { groupId: draft.groupId } : {}),
    ...(draft.transitory === undefined ? {} : { transitory: draft.transitory }),
    childIds: Object.freeze([...childIds]),
    source: draft.source,
  });
}

function createRootDraft(
  messageType: MessageType,
  sheet: SheetRows,
  rootName: string | undefined,
  diagnostics: Diagnostic[],
): DraftNode {
  let name: string = messageType;
  let renameReason: RenameReason = 'unchanged';
  if (rootName !== undefined) {
    const override = applyOverrideName(rootName);
    if (override !== null) {
      name = override.name;
      renameReason = override.reason;
    } else {
      diagnostics.push({
        code: MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_OVERRIDE_NAME,
        path: `${messageType}.root`,
        severity: 'error',
        message: `Root name override "${rootName}" is not a legal identifier; using "${messageType}".`,
        suggestion: 'Use letters, digits and underscores only, not starting with a digit.',
      });
    }
  }

  return createDraft({
    source: { sheet: sheet.sheet, rowNumber: 0 },
    scope: messageType,
    rawName: rootName ?? messageType,
    name,
    renameReason,
    container: true,
    typeName: capitalize(name),
    level: -1,
    occurrence: SINGLE_OCCURRENCE,
  });
}

function createHeaderGroupDraft(
  groupName: string,
  header: SheetRows,
  root: DraftNode,
  children: readonly DraftNode[],
  naming: NamingSettings,
): DraftNode {
  const normalized = assignName(root, groupName, header.sheet, naming);
  const group = createDraft({
    source: { sheet: header.sheet, rowNumber: header.rows[0]?.rowNumber ?? 0 },
    scope: 'header',
    rawName: groupName,
    name: normalized.name,
    renameReason: normalized.reason,
    container: true,
    typeName: capitalize(normalized.name),
    level: 0,
    occurrence: SINGLE_OCCURRENCE,
  });
  group.children.push(...children);
  return group;
}

interface DraftInit {
  readonly source: RowSource;
  readonly scope: NameScope;
  readonly rawName: string;
  readonly name: string;
  readonly renameReason: RenameReason;
  readonly container: boolean;
  readonly level: number;
  readonly typeName?: string;
  readonly datatype?: string;
  readonly length?: LengthSpec;
  readonly required?: boolean;
  readonly nullable?: boolean;
  readonly hardCodeRule?: string;
  readonly occurrence?: OccurrenceRange;
  readonly occurrenceFromColumn?: boolean;
  readonly transitory?: TransitoryRole;
}

function createDraft(init: DraftInit): DraftNode {
  return {
    ...init,
    datatype: init.datatype ?? '',
    length: init.length ?? { kind: 'notApplicable' },
    required: init.required ?? false,
    nullable: init.nullable ?? false,
    occurrenceFromColumn: init.occurrenceFromColumn ?? false,
    children: [],
    takenNames: new Set<string>(),
  };
}

function assignName(
  parent: DraftNode,
  raw: string,
  description: string,
  naming: NamingSettings,
): { readonly name: string; readonly reason: RenameReason } {
  const normalized = normalizeFieldName(raw, {
    taken: parent.takenNames,
    description,
    ...naming,
  });
  parent.takenNames.add(normalized.name);
  return normalized;
}

function parseOccurrenceColumn(row: SpecRow, diagnostics: Diagnostic[]): OccurrenceRange | undefined {
  if (row.occurrence === undefined || row.occurrence.trim() === '') {
    return undefined;
  }
  const parsed = parseOccurrenceRange(row.occurrence);
  if (!parsed.ok) {
    diagnostics.push(invalidOccurrenceDiagnostic(row, parsed.reason));
    return undefined;
  }
  return parsed.value;
}

function detectTransitoryRole(row: SpecRow, parent: DraftNode): TransitoryRole | undefined {
  if (parent.level < 0 || !parent.container) {
    return undefined;
  }
  if (GROUP_ID_PATTERN.test(row.fieldName)) {
    return 'groupId';
  }
  if (OCCURRENCE_COUNT_PATTERN.test(row.fieldName)) {
    return 'occurrenceCount';
  }
  return undefined;
}

function missingFieldDiagnostic(row: SpecRow, column: 'field name' | 'length' | 'datatype'): Diagnostic {
  return {
    code: MESSAGE_SPEC_DIAGNOSTIC_CODES.MISSING_FIELD,
    path: rowPath(row.sheet, row.rowNumber),
    severity: 'error',
    message: `Field "${row.fieldName}" is missing its ${column}.`,
    suggestion:
      column === 'field name'
        ? 'Provide a field name or at least a description to derive one from.'
        : `Fill in the ${column} column; only "name:TypeName" marker rows may leave it empty.`,
    source: { sheet: row.sheet, rowNumber: row.rowNumber },
  };
}

function invalidOccurrenceDiagnostic(row: SpecRow, reason: string): Diagnostic {
  return {
    code: MESSAGE_SPEC_DIAGNOSTIC_CODES.INVALID_OCCURRENCE,
    path: rowPath(row.sheet, row.rowNumber),
    severity: 'error',
    message: `Field "${row.fieldName}": ${reason}.`,
    suggestion: `Use one of 1..1, 0..N, 1..N (N may be a number), e.g. ${formatOccurrence({ min: 0, max: 'unbounded' })}.`,
    source: { sheet: row.sheet, rowNumber: row.rowNumber },
  };
}

function summarizeSheet(sheet: SheetRows): SheetProvenance {
  const rowNumbers = sheet.rows.map((row) => row.rowNumber);
  return Object.freeze({
    sheet: sheet.sheet,
    firstRow: rowNumbers.length === 0 ? 0 : Math.min(...rowNumbers),
    lastRow: rowNumbers.length === 0 ? 0 : Math.max(...rowNumbers),
    rowCount: rowNumbers.length,
  });
}

function clampAnchor(anchor: number | undefined, childCount: number): number {
  if (anchor === undefined || !Number.isFinite(anchor)) {
    return 0;
  }
  return Math.min(Math.max(0, Math.floor(anchor)), childCount);
}

function currentTop(stack: readonly DraftNode[]): DraftNode {
  const top = stack[stack.length - 1];
  if (top === undefined) {
    throw new Error('Ancestor stack is empty.');
  }
  return top;
}

function isMandatory(optionality: string): boolean {
  return /^m/i.test(optionality.trim());
}

function isYes(flag: string): boolean {
  return /^y/i.test(flag.trim());
}

function capitalize(name: string): string {
  const trimmed = name.replace(/^_+/, '');
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
}
