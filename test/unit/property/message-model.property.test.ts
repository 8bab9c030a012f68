import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { buildMessageModel } from '../../../src/ir/build-message-model.js';
import { parsePersistedModel, serializeMessageModel, stringifyPersistedModel } from '../../../src/ir/serde.js';
import { childrenOf, getRoot, walkFields } from '../../../src/kernel/field-tree.js';
import type { MessageModel, SheetRows } from '../../../src/kernel/types.js';
import { computeLayout } from '../../../src/layout/compute-layout.js';
import { formatDiagnostics } from '../../helpers/diagnostic-helpers.js';
import { leaf, marker, sheetOf, type RowInit } from '../../helpers/spec-row-fixtures.js';

const NAME_POOL = ['Order ID', 'Order_ID', 'order-id', 'Amount', 'Code', '1st Line', 'Ref#No'] as const;
const SEEDS = [1, 7, 23, 101, 4099] as const;

function createLcg(seed: number): (bound: number) => number {
  let state = seed >>> 0;
  return (bound) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % bound;
  };
}

function pick<T>(next: (bound: number) => number, items: readonly T[]): T {
  const item = items[next(items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list.');
  }
  return item;
}

/** Random well-formed sheet: every container has children and arrays are bounded. */
function randomSheet(seed: number): SheetRows {
  const next = createLcg(seed);
  const rows: RowInit[] = [];
  let containerCount = 0;

  const emitFields = (level: number): void => {
    const count = 1 + next(4);
    for (let index = 0; index < count; index += 1) {
      if (level < 3 && next(3) === 0) {
        containerCount += 1;
        rows.push(marker(level, `group${containerCount}:Group${containerCount}`, pick(next, ['1..1', '0..3', '1..2'])));
        emitFields(level + 1);
      } else {
        rows.push(leaf(level, pick(next, NAME_POOL), String(1 + next(12)), pick(next, ['String', 'Number'])));
      }
    }
  };

  emitFields(0);
  return sheetOf('Request', rows);
}

function buildModel(sheet: SheetRows): MessageModel {
  const result = buildMessageModel('request', sheet);
  if (result.model === null) {
    assert.fail(formatDiagnostics(result.diagnostics));
  }
  return result.model;
}

describe('message model properties', () => {
  it('builds the same model from the same rows', () => {
    for (const seed of SEEDS) {
      const sheet = randomSheet(seed);
      assert.deepEqual(buildModel(sheet), buildModel(sheet));
    }
  });

  it('keeps sibling names unique and legal', () => {
    for (const seed of SEEDS) {
      const model = buildModel(randomSheet(seed));
      const parents = [getRoot(model)];
      walkFields(model, (node) => {
        if (node.kind !== 'leaf') {
          parents.push(node);
        }
      });

      for (const parent of parents) {
        const names = childrenOf(model, parent).map((child) => child.name);
        assert.equal(new Set(names).size, names.length);
        for (const name of names) {
          assert.match(name, /^[A-Za-z_][A-Za-z0-9_]*$/);
        }
      }
    }
  });

  it('lays out contiguous entries that add up to the total length', () => {
    for (const seed of SEEDS) {
      const table = computeLayout(buildModel(randomSheet(seed))).table;
      assert.ok(table !== null);

      let cursor = 0;
      for (const entry of table.getEntries()) {
        assert.equal(entry.start, cursor);
        cursor += entry.length;
      }
      assert.equal(table.totalLength, cursor);
    }
  });

  it('produces the same layout after a persist and reload in either format', () => {
    for (const seed of SEEDS) {
      const model = buildModel(randomSheet(seed));
      const expected = computeLayout(model).table?.toJSON();

      for (const format of ['json', 'yaml'] as const) {
        const reloaded = parsePersistedModel(stringifyPersistedModel(model, format));
        assert.deepEqual(serializeMessageModel(reloaded), serializeMessageModel(model));
        assert.deepEqual(computeLayout(reloaded).table?.toJSON(), expected);
      }
    }
  });
});
