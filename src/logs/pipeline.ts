/**
 * Line-by-line driver: parse, validate, aggregate, then rank
 */

import * as readline from 'readline';
import { LineRejectedError } from '../errors';
import { logger } from '../logger';
import {
  CounterSink,
  METRIC_LINES_FAILED,
  METRIC_LINES_PASSED,
  METRIC_LINES_PROCESSED,
  NoopCounterSink,
} from '../metrics/counter-sink';
import { FieldSet, LineOutcome, Report, ReportLimits, ValidatedLine } from '../types';
import { RunContext, createRunContext, recordOutcome, recordPass } from './aggregator';
import {
  validateClientAddress,
  validateRequestLine,
  validateResponseSize,
  validateStatusCode,
  validateTimestamp,
  validateUserAgent,
} from './field-validators';
import { parseLine } from './line-parser';
import { rankClients, rankPathsByAverageSize } from './ranker';

export interface PipelineOptions extends ReportLimits {
  /** Receives one processed counter and one passed/failed counter per line */
  counterSink?: CounterSink;
}

/**
 * Runs every validator over a field set, stopping at the first failure
 */
export function validateFields(fields: FieldSet): LineOutcome {
  const address = validateClientAddress(fields.address);
  if (!address.success) return { passed: false, reason: address.reason, message: address.message };

  // identity and userid carry no constraints

  const timestamp = validateTimestamp(fields.date, fields.timezone);
  if (!timestamp.success) return { passed: false, reason: timestamp.reason, message: timestamp.message };

  const request = validateRequestLine(fields.request);
  if (!request.success) return { passed: false, reason: request.reason, message: request.message };

  const status = validateStatusCode(fields.status);
  if (!status.success) return { passed: false, reason: status.reason, message: status.message };

  const size = validateResponseSize(fields.size);
  if (!size.success) return { passed: false, reason: size.reason, message: size.message };

  const agent = validateUserAgent(fields.agent);
  if (!agent.success) return { passed: false, reason: agent.reason, message: agent.message };

  const line: ValidatedLine = { address: address.value, path: request.value, size: size.value };
  return { passed: true, line };
}

/**
 * Parses and validates one raw line without touching any state
 */
export function evaluateLine(line: string): LineOutcome {
  let fields: FieldSet;
  try {
    fields = parseLine(line);
  } catch (error) {
    if (error instanceof LineRejectedError) {
      return { passed: false, reason: error.reason, message: error.message };
    }
    throw error;
  }
  return validateFields(fields);
}

/**
 * Processes one line into the run context
 */
export function processLine(
  context: RunContext,
  line: string,
  counterSink: CounterSink = new NoopCounterSink()
): LineOutcome {
  const outcome = evaluateLine(line);

  if (outcome.passed) {
    recordPass(context, outcome.line.address, outcome.line.path, outcome.line.size);
  } else {
    logger.debug(`Line ${context.counters.processed + 1} rejected (${outcome.reason}): ${outcome.message}`);
  }
  recordOutcome(context, outcome);

  counterSink.increment(METRIC_LINES_PROCESSED);
  counterSink.increment(outcome.passed ? METRIC_LINES_PASSED : METRIC_LINES_FAILED);

  return outcome;
}

/**
 * Ranks the accumulated tables into the final report
 */
export function buildReport(context: RunContext, limits: ReportLimits): Report {
  const { processed, passed, failed, rejections } = context.counters;

  return {
    counters: { processed, passed, failed, rejections: { ...rejections } },
    topClientIps: rankClients(context.clients, limits.maxClientIps),
    topPathAvgResponseSize: rankPathsByAverageSize(context.paths, limits.maxPaths),
  };
}

/**
 * Reads the input to the end and returns the report
 *
 * @param input - CLF text, one entry per line
 * @throws Error when the input stream fails
 */
export async function runPipeline(input: NodeJS.ReadableStream, options: PipelineOptions): Promise<Report> {
  const context = createRunContext();
  const counterSink = options.counterSink ?? new NoopCounterSink();

  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });

  for await (const line of rl) {
    processLine(context, line, counterSink);
  }

  const { processed, passed, failed } = context.counters;
  logger.info(`Processed ${processed} lines: ${passed} ok, ${failed} failed`);
  logger.debug(`Distinct clients: ${context.clients.size}, distinct paths: ${context.paths.size}`);

  return buildReport(context, options);
}
