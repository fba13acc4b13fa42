#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel, ReportFormat } from './types';
import { Logger, logger } from './logger';
import { analyzeCommand } from './commands/analyze';

export const MAX_LIMIT = 10000;
export const DEFAULT_LIMIT = 10;

const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'markdown', 'pretty'];

/**
 * Result of parsing a CLI value
 */
export type ParseResult<T> = { success: true; value: T } | { success: false; error: string };

/**
 * Parses a result-count limit (0 to 10000)
 * @param input - Raw flag value, e.g. "25"
 * @param name - Flag name for error messages
 */
export function parseLimit(input: string, name: string): ParseResult<number> {
  if (!/^\d+$/.test(input.trim())) {
    return { success: false, error: `Value of "${input}" for ${name} is not a whole number` };
  }
  const value = parseInt(input, 10);
  if (value > MAX_LIMIT) {
    return { success: false, error: `Value of ${value} for ${name} is not between 0 and ${MAX_LIMIT}` };
  }
  return { success: true, value };
}

export function parseFormat(input: string): ParseResult<ReportFormat> {
  const format = REPORT_FORMATS.find(candidate => candidate === input.toLowerCase());
  if (!format) {
    return { success: false, error: `Unknown format "${input}" (expected ${REPORT_FORMATS.join(', ')})` };
  }
  return { success: true, value: format };
}

/**
 * Decides the log level from the flag, the environment and verbosity.
 * `-v` forces debug and `-vv` forces trace, overriding everything else.
 * @param flag - Value of --log-level, if given
 * @param env - Value of CLFSTATS_LOG_LEVEL, if set
 * @param verbosity - Number of -v flags
 */
export function resolveLogLevel(
  flag: string | undefined,
  env: string | undefined,
  verbosity: number
): { level: LogLevel; warnings: string[] } {
  const warnings: string[] = [];

  if (verbosity >= 2) {
    return { level: 'trace', warnings };
  }
  if (verbosity === 1) {
    return { level: 'debug', warnings };
  }

  if (flag !== undefined) {
    const level = Logger.parseLevel(flag);
    if (level) {
      return { level, warnings };
    }
    warnings.push(`Invalid --log-level "${flag}", defaulting to info`);
    return { level: 'info', warnings };
  }

  if (env !== undefined && env !== '') {
    const level = Logger.parseLevel(env);
    if (level) {
      return { level, warnings };
    }
    warnings.push(`Value "${env}" in CLFSTATS_LOG_LEVEL is not a valid log level, defaulting to info`);
  }

  return { level: 'info', warnings };
}

const program = new Command();

program
  .name('clfstats')
  .description('Validate Common Log Format access logs and report top clients and paths')
  .version('0.1.0')
  .requiredOption('-i, --in <file>', 'Input log file (CLF entries, e.g. from nginx)')
  .option('-o, --out <file>', 'Output report file (defaults to stdout)')
  .option(
    '-c, --max-client-ips <n>',
    `Maximum number of entries in top_client_ips (0-${MAX_LIMIT})`,
    String(DEFAULT_LIMIT)
  )
  .option(
    '-p, --max-paths <n>',
    `Maximum number of entries in top_path_avg_response_size (0-${MAX_LIMIT})`,
    String(DEFAULT_LIMIT)
  )
  .option('-f, --format <format>', 'Report format: json, markdown, pretty', 'json')
  .option('--log-level <level>', 'Log level: trace, debug, info, warn, error')
  .option(
    '-v, --verbose',
    'Verbose logging (-v for debug, -vv for trace); overrides --log-level and CLFSTATS_LOG_LEVEL',
    (_value: string, previous: number) => previous + 1,
    0
  )
  .option('--statsd <host:port>', 'StatsD server for per-line counters', process.env.STATSD_SERVER)
  .action(async options => {
    const { level, warnings } = resolveLogLevel(
      options.logLevel,
      process.env.CLFSTATS_LOG_LEVEL,
      options.verbose
    );
    logger.setLevel(level);
    warnings.forEach(warning => logger.warn(warning));
    logger.debug(`Command line options: ${JSON.stringify(options)}`);

    const maxClientIps = parseLimit(options.maxClientIps, 'max-client-ips');
    const maxPaths = parseLimit(options.maxPaths, 'max-paths');
    const format = parseFormat(options.format);

    for (const parsed of [maxClientIps, maxPaths, format]) {
      if (!parsed.success) {
        logger.error(parsed.error);
      }
    }
    if (!maxClientIps.success || !maxPaths.success || !format.success) {
      logger.error('Error found with command line arguments. Exiting.');
      process.exit(1);
    }

    logger.info(`max-client-ips is set to ${maxClientIps.value}`);
    logger.info(`max-paths is set to ${maxPaths.value}`);

    await analyzeCommand({
      input: options.in,
      output: options.out,
      format: format.value,
      maxClientIps: maxClientIps.value,
      maxPaths: maxPaths.value,
      statsdServer: options.statsd,
    });
  });

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch(error => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}
