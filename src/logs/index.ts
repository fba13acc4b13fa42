/**
 * Common Log Format parsing, validation and aggregation
 */

export { tokenize } from './tokenizer';
export { parseLine, CLF_FIELD_COUNT } from './line-parser';
export {
  validateClientAddress,
  validateTimestamp,
  validateRequestLine,
  validateStatusCode,
  validateResponseSize,
  validateUserAgent,
  decodeResourcePath,
} from './field-validators';
export { RunContext, createRunContext, recordPass, recordOutcome } from './aggregator';
export { rankClients, rankPathsByAverageSize } from './ranker';
export { PipelineOptions, evaluateLine, processLine, buildReport, runPipeline } from './pipeline';
export { formatReport, formatReportJson, formatReportMarkdown, formatReportPretty } from './report-formatter';
