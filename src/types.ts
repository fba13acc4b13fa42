/**
 * Shared types for the CLF analyzer
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Output format for the final report
 */
export type ReportFormat = 'json' | 'markdown' | 'pretty';

/**
 * Why a log line was rejected
 */
export type RejectionReason =
  | 'malformed-line'
  | 'field-count'
  | 'address-invalid'
  | 'timestamp-invalid'
  | 'request-invalid'
  | 'status-invalid'
  | 'size-invalid'
  | 'agent-invalid';

export const REJECTION_REASONS: readonly RejectionReason[] = [
  'malformed-line',
  'field-count',
  'address-invalid',
  'timestamp-invalid',
  'request-invalid',
  'status-invalid',
  'size-invalid',
  'agent-invalid',
];

/**
 * The nine positional tokens of a CLF line once quoting is respected.
 * The bracketed timestamp is split across `date` and `timezone`.
 */
export interface FieldSet {
  address: string;
  identity: string;
  userid: string;
  date: string;
  timezone: string;
  request: string;
  status: string;
  size: string;
  agent: string;
}

/**
 * Result of validating a single field
 */
export type FieldResult<T> =
  | { success: true; value: T }
  | { success: false; reason: RejectionReason; message: string };

/**
 * Values derived from a line that passed every validator
 */
export interface ValidatedLine {
  /** Client address with leading zeros stripped from each octet */
  address: string;
  /** Percent-decoded resource path */
  path: string;
  /** Response size in bytes */
  size: number;
}

export type LineOutcome =
  | { passed: true; line: ValidatedLine }
  | { passed: false; reason: RejectionReason; message: string };

export interface PathStat {
  count: number;
  totalSize: number;
}

export interface RunCounters {
  processed: number;
  passed: number;
  failed: number;
  /** Failure breakdown; values sum to `failed` */
  rejections: Record<RejectionReason, number>;
}

/**
 * A ranked key/value pair in report order
 */
export interface RankedEntry {
  key: string;
  value: number;
}

export interface ReportLimits {
  maxClientIps: number;
  maxPaths: number;
}

/**
 * Final snapshot of a run
 */
export interface Report {
  readonly counters: Readonly<RunCounters>;
  /** Client addresses by hit count, descending */
  readonly topClientIps: readonly RankedEntry[];
  /** Paths by average response size in KiB (2 decimals), descending */
  readonly topPathAvgResponseSize: readonly RankedEntry[];
}
