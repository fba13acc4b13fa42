/**
 * Counter sink for per-line metrics
 *
 * Counters are fire-and-forget: a failing StatsD server never stops a run.
 */

import { StatsD } from 'hot-shots';
import { logger } from '../logger';

export const METRIC_LINES_PROCESSED = 'lines.processed';
export const METRIC_LINES_PASSED = 'lines.passed';
export const METRIC_LINES_FAILED = 'lines.failed';

const METRIC_PREFIX = 'clfstats.';

export interface CounterSink {
  increment(name: string): void;
  /** Flushes pending counters and releases the connection */
  close(): Promise<void>;
}

/**
 * Sink used when no StatsD server is configured
 */
export class NoopCounterSink implements CounterSink {
  increment(_name: string): void {}

  async close(): Promise<void> {}
}

export interface StatsdTarget {
  host: string;
  port: number;
}

/**
 * Result of parsing a `host:port` StatsD address
 */
export type ParseStatsdServerResult =
  | { success: true; target: StatsdTarget }
  | { success: false; error: string };

/**
 * Parses a StatsD server address such as `localhost:8125`
 */
export function parseStatsdServer(value: string): ParseStatsdServerResult {
  const parts = value.split(':');
  if (parts.length !== 2 || parts[0].length === 0) {
    return { success: false, error: `Expected host:port but got "${value}"` };
  }

  const [host, portStr] = parts;
  if (!/^\d+$/.test(portStr)) {
    return { success: false, error: `Port is not numeric: "${portStr}"` };
  }

  const port = parseInt(portStr, 10);
  if (port < 1 || port > 65535) {
    return { success: false, error: `Port out of range: ${port}` };
  }

  return { success: true, target: { host, port } };
}

/**
 * Sends counters to a StatsD server over UDP
 */
export class StatsdCounterSink implements CounterSink {
  private client: StatsD;

  constructor(target: StatsdTarget) {
    this.client = new StatsD({
      host: target.host,
      port: target.port,
      prefix: METRIC_PREFIX,
      errorHandler: error => {
        logger.debug(`StatsD error: ${error.message}`);
      },
    });
  }

  increment(name: string): void {
    try {
      this.client.increment(name);
    } catch (error) {
      logger.debug(`Failed to send counter ${name}: ${error instanceof Error ? error.message : error}`);
    }
  }

  close(): Promise<void> {
    return new Promise(resolve => {
      this.client.close(error => {
        if (error) {
          logger.debug(`Failed to close StatsD client: ${error.message}`);
        }
        resolve();
      });
    });
  }
}

/**
 * Creates a StatsD sink for `host:port`, or a no-op sink when unset or invalid
 */
export function createCounterSink(server: string | undefined): CounterSink {
  if (!server) {
    logger.debug('No StatsD server configured, counters are disabled');
    return new NoopCounterSink();
  }

  const parsed = parseStatsdServer(server);
  if (!parsed.success) {
    logger.warn(`Ignoring StatsD server: ${parsed.error}`);
    return new NoopCounterSink();
  }

  logger.info(`Sending counters to StatsD at ${parsed.target.host}:${parsed.target.port}`);
  return new StatsdCounterSink(parsed.target);
}
