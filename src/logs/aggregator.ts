/**
 * Running totals for one analysis run
 */

import { LineOutcome, PathStat, RejectionReason, RunCounters } from '../types';

/**
 * Everything a run accumulates. One context per run; nothing is shared.
 */
export interface RunContext {
  counters: RunCounters;
  /** Hit count per client address */
  clients: Map<string, number>;
  /** Hit count and byte total per decoded path */
  paths: Map<string, PathStat>;
}

export function createRunContext(): RunContext {
  return {
    counters: { processed: 0, passed: 0, failed: 0, rejections: emptyRejections() },
    clients: new Map(),
    paths: new Map(),
  };
}

function emptyRejections(): Record<RejectionReason, number> {
  return {
    'malformed-line': 0,
    'field-count': 0,
    'address-invalid': 0,
    'timestamp-invalid': 0,
    'request-invalid': 0,
    'status-invalid': 0,
    'size-invalid': 0,
    'agent-invalid': 0,
  };
}

/**
 * Adds a validated line to the client and path tables
 */
export function recordPass(context: RunContext, address: string, path: string, size: number): void {
  context.clients.set(address, (context.clients.get(address) ?? 0) + 1);

  let pathStat = context.paths.get(path);
  if (!pathStat) {
    pathStat = { count: 0, totalSize: 0 };
    context.paths.set(path, pathStat);
  }
  pathStat.count++;
  pathStat.totalSize += size;
}

/**
 * Counts a finished line as passed or failed
 */
export function recordOutcome(context: RunContext, outcome: LineOutcome): void {
  const { counters } = context;
  counters.processed++;
  if (outcome.passed) {
    counters.passed++;
  } else {
    counters.failed++;
    counters.rejections[outcome.reason]++;
  }
}
