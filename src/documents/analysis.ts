/** Descriptive statistics over a worksheet table (see XlsxWorkbook.table). */

import type { TableValue } from './xlsx.js';

export type AnalysisType = 'summary' | 'info' | 'head' | 'shape';

export type ColumnType = 'number' | 'text' | 'boolean' | 'date' | 'mixed' | 'empty';

export type Table = { columns: string[]; rows: TableValue[][] };

export type NumericSummary = {
  count: number;
  mean: number;
  std: number | null;
  min: number;
  '25%': number;
  '50%': number;
  '75%': number;
  max: number;
};

export type TextSummary = { count: number; unique: number; top: string | null; freq: number };

function kindOf(v: TableValue): Exclude<ColumnType, 'mixed' | 'empty'> | null {
  if (v === null || v === '') return null;
  if (typeof v === 'number') return 'number';
  if (typeof v === 'boolean') return 'boolean';
  if (v instanceof Date) return 'date';
  return 'text';
}

function column(table: Table, index: number): TableValue[] {
  return table.rows.map((r) => r[index] ?? null);
}

export function columnType(values: TableValue[]): ColumnType {
  const kinds = new Set(values.map(kindOf).filter((k): k is NonNullable<typeof k> => k !== null));
  if (!kinds.size) return 'empty';
  if (kinds.size > 1) return 'mixed';
  return [...kinds][0] ?? 'empty';
}

/** Linear interpolation between closest ranks; `sorted` must be ascending and non-empty. */
export function quantile(sorted: number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

export function describeNumbers(values: number[]): NumericSummary | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const mean = sorted.reduce((s, v) => s + v, 0) / n;
  const variance = n > 1 ? sorted.reduce((s, v) => s + (v - mean) ** 2, 0) / (n - 1) : null;
  return {
    count: n,
    mean,
    std: variance === null ? null : Math.sqrt(variance),
    min: sorted[0] ?? 0,
    '25%': quantile(sorted, 0.25),
    '50%': quantile(sorted, 0.5),
    '75%': quantile(sorted, 0.75),
    max: sorted[n - 1] ?? 0,
  };
}

export function describeText(values: TableValue[]): TextSummary {
  const counts = new Map<string, number>();
  for (const v of values) {
    if (kindOf(v) === null) continue;
    const key = v instanceof Date ? v.toISOString() : String(v);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  let top: string | null = null;
  let freq = 0;
  for (const [k, c] of counts) {
    if (c > freq) {
      top = k;
      freq = c;
    }
  }
  return { count: [...counts.values()].reduce((s, c) => s + c, 0), unique: counts.size, top, freq };
}

/** Numeric columns get count/mean/std/quartiles; any other non-empty column gets count/unique/top/freq. */
function summarize(table: Table): Record<string, NumericSummary | TextSummary> {
  const out: Record<string, NumericSummary | TextSummary> = {};
  table.columns.forEach((name, i) => {
    const values = column(table, i);
    const type = columnType(values);
    if (type === 'empty') return;
    if (type === 'number') {
      const nums = values.filter((v): v is number => typeof v === 'number');
      const stats = describeNumbers(nums);
      if (stats) out[name] = stats;
      return;
    }
    out[name] = describeText(values);
  });
  return out;
}

export function analyze(table: Table, type: AnalysisType): Record<string, unknown> {
  switch (type) {
    case 'shape':
      return { rows: table.rows.length, columns: table.columns.length, column_names: table.columns };
    case 'head':
      return {
        columns: table.columns,
        rows: table.rows.slice(0, 10).map((r) => Object.fromEntries(table.columns.map((c, i) => [c, r[i] ?? null]))),
      };
    case 'info':
      return {
        rows: table.rows.length,
        columns: table.columns.map((name, i) => {
          const values = column(table, i);
          return { name, type: columnType(values), non_null: values.filter((v) => kindOf(v) !== null).length };
        }),
      };
    case 'summary': {
      const summary = summarize(table);
      return Object.keys(summary).length ? summary : { note: 'no non-empty columns' };
    }
  }
}
