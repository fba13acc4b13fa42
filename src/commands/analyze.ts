/**
 * Command handler for `clfstats` analysis runs
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger';
import { formatReport, runPipeline } from '../logs';
import { createCounterSink } from '../metrics/counter-sink';
import { Report, ReportFormat } from '../types';

/**
 * Options for the analyze command
 */
export interface AnalyzeCommandOptions {
  /** CLF log file to read */
  input: string;
  /** Report destination; stdout when omitted */
  output?: string;
  /** Output format: json, markdown, pretty */
  format: ReportFormat;
  maxClientIps: number;
  maxPaths: number;
  /** StatsD `host:port` for per-line counters */
  statsdServer?: string;
}

/**
 * Checks that the input can be read and the output can be written.
 * Returns an error message, or null when both are usable.
 */
export function checkPaths(input: string, output: string | undefined): string | null {
  if (!fs.existsSync(input)) {
    return `Cannot find input file: ${input}`;
  }
  try {
    fs.accessSync(input, fs.constants.R_OK);
  } catch {
    return `No read access to input file: ${input}`;
  }
  logger.info(`Input file to be parsed is: ${input}`);

  if (output) {
    if (fs.existsSync(output)) {
      logger.warn(`Output file already exists and will be overwritten: ${output}`);
    }
    const outputDir = path.dirname(path.resolve(output));
    try {
      fs.accessSync(outputDir, fs.constants.W_OK);
    } catch {
      return `Output file cannot be opened for writing: ${output}`;
    }
    logger.info(`Report will be written to: ${output}`);
  }

  return null;
}

/**
 * Main handler: runs the pipeline over the input file and writes the report
 *
 * @param options - Command options
 */
export async function analyzeCommand(options: AnalyzeCommandOptions): Promise<void> {
  const pathError = checkPaths(options.input, options.output);
  if (pathError) {
    logger.error(pathError);
    process.exit(1);
  }

  const counterSink = createCounterSink(options.statsdServer);

  let report: Report;
  try {
    report = await runPipeline(fs.createReadStream(options.input, { encoding: 'utf-8' }), {
      maxClientIps: options.maxClientIps,
      maxPaths: options.maxPaths,
      counterSink,
    });
  } catch (error) {
    logger.error(`Failed to read input file: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  } finally {
    await counterSink.close();
  }

  const colorize = !!(process.stdout.isTTY && options.format === 'pretty' && !options.output);
  const formatted = formatReport(report, options.format, colorize);
  logger.debug(`Report:\n${formatted}`);

  if (!options.output) {
    console.log(formatted);
    return;
  }

  try {
    fs.writeFileSync(options.output, formatted + '\n', 'utf-8');
  } catch (error) {
    logger.error(`Failed to write report: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
  logger.success(`Report written to ${options.output}`);
}
