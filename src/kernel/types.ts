import type { DiagnosticRowSource } from './diagnostics.js';

export type MessageType = 'request' | 'response';

export const MESSAGE_TYPES: readonly MessageType[] = ['request', 'response'];

export type NameScope = MessageType | 'header';

export type FieldKind = 'leaf' | 'object' | 'array';

/** Leaves that carry container metadata on the wire but never reach business objects or API schemas. */
export type TransitoryRole = 'groupId' | 'occurrenceCount';

export type RowSource = DiagnosticRowSource;

export interface SpecRow {
  readonly sheet: string;
  readonly rowNumber: number;
  readonly level: number;
  readonly fieldName: string;
  readonly description: string;
  readonly length: string;
  readonly datatype: string;
  readonly optionality: string;
  readonly nullable: string;
  readonly nls: string;
  readonly sampleValues: string;
  readonly remarks: string;
  readonly physicalName: string;
  readonly testValue: string;
  readonly hardCodeRule: string;
  readonly occurrence?: string;
}

export interface SheetRows {
  readonly sheet: string;
  readonly rows: readonly SpecRow[];
}

export type LengthSpec =
  | { readonly kind: 'fixed'; readonly length: number }
  | { readonly kind: 'range'; readonly min: number; readonly max: number }
  | { readonly kind: 'notApplicable' };

export interface OccurrenceRange {
  readonly min: 0 | 1;
  readonly max: number | 'unbounded';
}

export interface FieldNode {
  readonly id: number;
  readonly parentId: number | null;
  /** Normalized names from the first level below the message root. Empty for the root. */
  readonly path: readonly string[];
  readonly level: number;
  readonly rawName: string;
  readonly name: string;
  readonly kind: FieldKind;
  readonly typeName?: string;
  readonly datatype: string;
  readonly length: LengthSpec;
  readonly required: boolean;
  readonly nullable: boolean;
  readonly hardCodeRule?: string;
  readonly occurrence?: OccurrenceRange;
  readonly groupId?: string;
  readonly transitory?: TransitoryRole;
  readonly childIds: readonly number[];
  readonly source: RowSource;
}

export interface SheetProvenance {
  readonly sheet: string;
  readonly firstRow: number;
  readonly lastRow: number;
  readonly rowCount: number;
}

export interface MessageProvenance {
  readonly sheets: readonly SheetProvenance[];
}

export type RenameReason =
  | 'unchanged'
  | 'case normalized'
  | 'non-alnum stripped'
  | 'digit-prefixed'
  | 'description-derived'
  | 'collision-suffixed'
  | 'operation-id override';

export interface RenameEntry {
  readonly rawName: string;
  readonly normalizedName: string;
  readonly scope: NameScope;
  readonly reason: RenameReason;
  readonly path: string;
  readonly source: RowSource;
}

export interface MessageModel {
  readonly messageType: MessageType;
  readonly rootId: number;
  /** Arena in depth-first pre-order; a node's id is its index. */
  readonly nodes: readonly FieldNode[];
  readonly totalDeclaredLength: number;
  readonly provenance: MessageProvenance;
  readonly renames: readonly RenameEntry[];
}

/** Version record handed in by the caller and attached to a completed run untouched. */
export interface RunProvenance {
  readonly toolVersion?: string;
  readonly ruleVersion?: string;
  readonly templateVersion?: string;
  readonly [key: string]: string | undefined;
}
