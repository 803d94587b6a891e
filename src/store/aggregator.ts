import type { FieldValue, OpsRecord } from '../types/records.js';

type Records = readonly OpsRecord[];

export type Tally = Map<string, number>;

export const count = (records: Records): number => records.length;

// Field values compare as text, so 4 and '4' are the same value.
export const sameValue = (actual: FieldValue | undefined, expected: FieldValue): boolean =>
  String(actual ?? '') === String(expected);

export function countWhere(records: Records, field: string, value: FieldValue): number {
  return records.filter(r => sameValue(r[field], value)).length;
}

export function countWhereIn(records: Records, field: string, values: readonly FieldValue[]): number {
  return records.filter(r => values.some(v => sameValue(r[field], v))).length;
}

// Missing, blank or non-numeric values count as zero.
export function toNumeric(value: FieldValue | undefined): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (value === undefined || value.trim() === '') return 0;
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function sumNumeric(records: Records, field: string): number {
  return records.reduce((sum, r) => sum + toNumeric(r[field]), 0);
}

export function average(records: Records, field: string): number {
  return records.length > 0 ? sumNumeric(records, field) / records.length : 0;
}

/**
 * Counts records per value of `field`. The map keeps first-encountered order,
 * which `topN` relies on to break ties.
 */
export function groupTally(records: Records, field: string, missingLabel = 'Unknown'): Tally {
  const tally: Tally = new Map();
  for (const r of records) {
    const raw = r[field];
    const key = raw === undefined || String(raw).trim() === '' ? missingLabel : String(raw);
    tally.set(key, (tally.get(key) ?? 0) + 1);
  }
  return tally;
}

// Array.prototype.sort is stable, so equal counts stay in insertion order.
export function topN(tally: Tally, n: number): Array<[string, number]> {
  return [...tally.entries()].sort((a, b) => b[1] - a[1]).slice(0, Math.max(0, n));
}
