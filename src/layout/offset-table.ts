import { offsetTableInvariantError } from '../kernel/spec-error.js';
import type { MessageType } from '../kernel/types.js';

export interface OffsetEntry {
  /** Field path without occurrence indices, e.g. `items.sku`. */
  readonly path: string;
  /** Field path with `[i]` after every enclosing array, e.g. `items[1].sku`. */
  readonly indexedPath: string;
  readonly nodeId: number;
  readonly start: number;
  readonly length: number;
  /** Index within the innermost enclosing array; 0 outside arrays. */
  readonly occurrenceIndex: number;
  /** Indices of all enclosing arrays, outermost first. */
  readonly occurrences: readonly number[];
  readonly datatype: string;
  readonly hardCodeRule?: string;
}

export interface OffsetTableJson {
  readonly messageType: MessageType;
  readonly totalLength: number;
  readonly entries: readonly OffsetEntry[];
}

/**
 * Wire layout of one message type. Entries tile `[0, totalLength)` without gaps or
 * overlaps, in traversal order; the constructor rejects anything else.
 */
export class OffsetTable {
  readonly messageType: MessageType;
  readonly totalLength: number;
  private readonly entries: readonly OffsetEntry[];

  constructor(messageType: MessageType, entries: readonly OffsetEntry[]) {
    let cursor = 0;
    for (const [index, entry] of entries.entries()) {
      if (entry.start !== cursor || !Number.isInteger(entry.length) || entry.length < 0) {
        throw offsetTableInvariantError(`Offset entry ${index} (${entry.indexedPath}) breaks contiguity.`, {
          index,
          expectedStart: cursor,
          start: entry.start,
          length: entry.length,
        });
      }
      cursor += entry.length;
    }

    this.messageType = messageType;
    this.totalLength = cursor;
    this.entries = Object.freeze(
      entries.map((entry) => Object.freeze({ ...entry, occurrences: Object.freeze([...entry.occurrences]) })),
    );
  }

  get size(): number {
    return this.entries.length;
  }

  getEntries(): OffsetEntry[] {
    return [...this.entries];
  }

  /** Matches either the plain path (every occurrence) or one indexed path. */
  entriesForPath(path: string): OffsetEntry[] {
    return this.entries.filter((entry) => entry.path === path || entry.indexedPath === path);
  }

  toJSON(): OffsetTableJson {
    return { messageType: this.messageType, totalLength: this.totalLength, entries: this.getEntries() };
  }
}
