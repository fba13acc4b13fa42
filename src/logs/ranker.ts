/**
 * Ranking of the aggregated tables for the report
 *
 * Entries are ordered by value descending; equal values fall back to the key
 * in ascending code-unit order so repeated runs give identical reports.
 */

import { PathStat, RankedEntry } from '../types';

const BYTES_PER_KIB = 1024;

function byValueDescending(a: RankedEntry, b: RankedEntry): number {
  if (a.value !== b.value) {
    return b.value - a.value;
  }
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

/**
 * Sorts entries by value and keeps the first `limit`
 */
export function rankEntries(entries: RankedEntry[], limit: number): RankedEntry[] {
  return entries.sort(byValueDescending).slice(0, Math.max(0, limit));
}

/**
 * Rounds to two decimal places, sending exact halves to the even digit
 * (0.125 → 0.12, 0.375 → 0.38)
 */
export function roundTo2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

/**
 * Most frequent client addresses
 *
 * @param clients - Hit count per address
 * @param limit - Maximum entries to return (0 returns none)
 */
export function rankClients(clients: ReadonlyMap<string, number>, limit: number): RankedEntry[] {
  const entries = Array.from(clients, ([key, value]) => ({ key, value }));
  return rankEntries(entries, limit);
}

/**
 * Paths with the largest average response size, in KiB
 *
 * Averages are rounded only after the top entries are chosen so rounding
 * never changes which paths make the cut.
 *
 * @param paths - Hit count and byte total per path
 * @param limit - Maximum entries to return (0 returns none)
 */
export function rankPathsByAverageSize(paths: ReadonlyMap<string, PathStat>, limit: number): RankedEntry[] {
  const entries = Array.from(paths, ([key, stat]) => ({
    key,
    value: stat.totalSize / stat.count / BYTES_PER_KIB,
  }));

  return rankEntries(entries, limit).map(entry => ({
    key: entry.key,
    value: roundTo2(entry.value),
  }));
}
