// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════
import type { Point } from '../types.ts';

/** Round to a fixed number of decimals, returned as a number */
export function round(value: number, decimals = 2): number {
  return +value.toFixed(decimals);
}

export const clamp = (value: number, lo: number, hi: number): number => Math.min(Math.max(value, lo), hi);

/** Ascending numeric copy; the input is left untouched */
export const sortedAsc = (values: readonly number[]): number[] => [...values].sort((a, b) => a - b);

/**
 * Index-based quantile of an ascending array: s[⌊n·q⌋], no interpolation.
 * q = 0.25 → s[⌊n/4⌋], q = 0.75 → s[⌊3n/4⌋].
 */
export function quantileAt(sorted: readonly number[], numerator: number, denominator: number): number {
  return sorted[Math.floor((numerator * sorted.length) / denominator)];
}

/** Single middle element s[⌊n/2⌋] (no averaging on even n) */
export function middleValue(sorted: readonly number[]): number {
  return sorted[Math.floor(sorted.length / 2)];
}

/** Median averaging the two central values on even n (returns 0 for empty) */
export function med(arr: readonly number[]): number {
  if (!arr.length) return 0;
  const s = sortedAsc(arr);
  const m = Math.floor(s.length / 2);
  return s.length % 2 ? s[m] : (s[m - 1] + s[m]) / 2;
}

export const sum = (values: readonly number[]): number => values.reduce((acc, v) => acc + v, 0);

export const mean = (values: readonly number[]): number => values.length ? sum(values) / values.length : 0;

/** Sample standard deviation (n − 1 denominator); 0 when n < 2 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

// ── Dates ──

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Parse a deal date into canonical YYYY-MM-DD.
 * Accepts Date instances and strings starting with YYYY-MM-DD (a time suffix is ignored).
 */
export function parseDealDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  if (typeof value !== 'string') return null;
  const m = ISO_DATE.exec(value.trim());
  if (!m) return null;
  const [, y, mo, d] = m;
  const year = Number(y), month = Number(mo), day = Number(d);
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${y}-${mo}-${d}`;
}

/** "2024-03-17" → "2024-03" */
export const monthKey = (isoDate: string): string => isoDate.slice(0, 7);

/** "2024-03-17" → "2024-Q1" */
export function quarterKey(isoDate: string): string {
  const month = Number(isoDate.slice(5, 7));
  return `${isoDate.slice(0, 4)}-Q${Math.floor((month - 1) / 3) + 1}`;
}

/** Fractional year used as the regression time axis: year + month/12 */
export function fractionalYear(isoDate: string): number {
  return Number(isoDate.slice(0, 4)) + Number(isoDate.slice(5, 7)) / 12;
}

/** Shift a date back by whole days; returns YYYY-MM-DD */
export function daysBefore(now: Date, days: number): string {
  return new Date(now.getTime() - days * 86_400_000).toISOString().slice(0, 10);
}

/** Object with its keys sorted ascending (string order) */
export function sortedRecord<V>(rec: Record<string, V>): Record<string, V> {
  return Object.fromEntries(Object.entries(rec).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

// ── Geometry ──

/** Euclidean distance in metres between projected coordinates */
export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

// ── Numbers from loosely typed records ──

/** Finite number from a number or numeric string, else null */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim().replace(/,/g, ''));
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Promise-based delay */
export const sleep = (ms: number): Promise<void> => new Promise(r => setTimeout(r, ms));
