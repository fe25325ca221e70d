import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { analyze, columnType, describeNumbers, describeText, quantile } from '../src/documents/analysis.js';

describe('quantile', () => {
  it('interpolates between ranks', () => {
    assert.equal(quantile([1, 2, 3, 4], 0.25), 1.75);
    assert.equal(quantile([1, 2, 3, 4], 0.5), 2.5);
    assert.equal(quantile([7], 0.75), 7);
  });
});

describe('describeNumbers', () => {
  it('uses the sample standard deviation', () => {
    const s = describeNumbers([2, 4, 4, 4, 5, 5, 7, 9]);
    assert.equal(s?.mean, 5);
    assert.equal(s?.std, Math.sqrt(32 / 7));
    assert.equal(s?.min, 2);
    assert.equal(s?.max, 9);
  });

  it('has no spread for a single value and nothing for none', () => {
    assert.equal(describeNumbers([5])?.std, null);
    assert.equal(describeNumbers([]), null);
  });
});

describe('column types', () => {
  it('ignores blanks and flags mixed columns', () => {
    assert.equal(columnType([1, null, '', 2]), 'number');
    assert.equal(columnType([1, 'two']), 'mixed');
    assert.equal(columnType([null, '']), 'empty');
    assert.equal(columnType([new Date('2026-01-01T00:00:00Z')]), 'date');
  });

  it('counts the most frequent text value', () => {
    assert.deepEqual(describeText(['a', 'b', 'b', null]), { count: 3, unique: 2, top: 'b', freq: 2 });
  });
});

describe('analyze', () => {
  const table = {
    columns: ['Region', 'Units', 'Notes'],
    rows: [
      ['North', 120, null],
      ['South', 95, null],
    ],
  };

  it('reports shape and per-column info', () => {
    assert.deepEqual(analyze(table, 'shape'), { rows: 2, columns: 3, column_names: ['Region', 'Units', 'Notes'] });
    assert.deepEqual(analyze(table, 'info'), {
      rows: 2,
      columns: [
        { name: 'Region', type: 'text', non_null: 2 },
        { name: 'Units', type: 'number', non_null: 2 },
        { name: 'Notes', type: 'empty', non_null: 0 },
      ],
    });
  });

  it('skips empty columns in the summary', () => {
    assert.deepEqual(Object.keys(analyze(table, 'summary')), ['Region', 'Units']);
  });
});
