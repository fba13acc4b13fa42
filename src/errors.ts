/**
 * Error types raised while splitting a log line
 *
 * Both are per-line failures: the pipeline counts them and moves on.
 */

import { RejectionReason } from './types';

export class LineRejectedError extends Error {
  readonly reason: RejectionReason;

  constructor(reason: RejectionReason, message: string) {
    super(message);
    this.name = new.target.name;
    this.reason = reason;
  }
}

/**
 * Quoting is unbalanced or an escape has nothing to escape
 */
export class MalformedLineError extends LineRejectedError {
  constructor(message: string) {
    super('malformed-line', message);
  }
}

/**
 * The line split into something other than the nine CLF fields
 */
export class FieldCountError extends LineRejectedError {
  readonly count: number;

  constructor(count: number, expected: number) {
    super('field-count', `Expected ${expected} fields but found ${count}`);
    this.count = count;
  }
}
