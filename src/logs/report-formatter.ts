/**
 * Formatter for the final report in various formats
 */

import chalk from 'chalk';
import { RankedEntry, REJECTION_REASONS, Report, ReportFormat } from '../types';

const JSON_INDENT = '    ';

/**
 * Serializes ranked entries as a JSON object that keeps rank order.
 * Building the text directly avoids JavaScript moving integer-like keys
 * (a path such as "404") to the front of an object.
 */
function formatOrderedObject(entries: readonly RankedEntry[], indent: string): string {
  if (entries.length === 0) {
    return '{}';
  }
  const members = entries.map(
    ({ key, value }) => `${indent}${JSON_INDENT}${JSON.stringify(key)}: ${JSON.stringify(value)}`
  );
  return `{\n${members.join(',\n')}\n${indent}}`;
}

/**
 * Formats the report as JSON with four-space indentation
 */
export function formatReportJson(report: Report): string {
  const { counters } = report;
  const members = [
    `"total_number_of_lines_processed": ${counters.processed}`,
    `"total_number_of_lines_ok": ${counters.passed}`,
    `"total_number_of_lines_failed": ${counters.failed}`,
    `"top_client_ips": ${formatOrderedObject(report.topClientIps, JSON_INDENT)}`,
    `"top_path_avg_response_size": ${formatOrderedObject(report.topPathAvgResponseSize, JSON_INDENT)}`,
  ];
  return `{\n${members.map(member => JSON_INDENT + member).join(',\n')}\n}`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

/**
 * Formats the report as markdown (suitable for a CI step summary)
 */
export function formatReportMarkdown(report: Report): string {
  const { counters } = report;
  const lines: string[] = [];

  lines.push('### Access Log Summary\n');
  lines.push(
    `${counters.processed} ${counters.processed === 1 ? 'line' : 'lines'} | ` +
      `${counters.passed} ok | ${counters.failed} failed\n`
  );

  lines.push('#### Top Client IPs\n');
  if (report.topClientIps.length > 0) {
    lines.push('| Client IP | Requests |');
    lines.push('|-----------|----------|');
    for (const { key, value } of report.topClientIps) {
      lines.push(`| ${escapeMarkdownCell(key)} | ${value} |`);
    }
  } else {
    lines.push('No client activity recorded.');
  }

  lines.push('\n#### Top Paths by Average Response Size\n');
  if (report.topPathAvgResponseSize.length > 0) {
    lines.push('| Path | Avg Size (KiB) |');
    lines.push('|------|----------------|');
    for (const { key, value } of report.topPathAvgResponseSize) {
      lines.push(`| ${escapeMarkdownCell(key)} | ${value.toFixed(2)} |`);
    }
  } else {
    lines.push('No path activity recorded.');
  }

  return lines.join('\n') + '\n';
}

/**
 * Formats the report for terminal display
 *
 * @param colorize - Whether to use colors (default: true)
 */
export function formatReportPretty(report: Report, colorize: boolean = true): string {
  const { counters } = report;
  const lines: string[] = [];

  const c = colorize
    ? chalk
    : (new Proxy({}, { get: () => (s: string) => s }) as typeof chalk);

  lines.push(c.bold('Access Log Summary'));
  lines.push(c.gray('-'.repeat(40)));
  lines.push('');

  const okPct = counters.processed > 0 ? ((counters.passed / counters.processed) * 100).toFixed(1) : '0.0';
  const failedPct = counters.processed > 0 ? ((counters.failed / counters.processed) * 100).toFixed(1) : '0.0';

  lines.push(`Lines Processed: ${counters.processed}`);
  lines.push(`OK:              ${c.green(String(counters.passed))} (${okPct}%)`);
  lines.push(`Failed:          ${c.red(String(counters.failed))} (${failedPct}%)`);

  const rejected = REJECTION_REASONS.filter(reason => counters.rejections[reason] > 0);
  for (const reason of rejected) {
    lines.push(c.gray(`  ${reason.padEnd(18)}${counters.rejections[reason]}`));
  }

  appendRanking(lines, c.bold('Top Client IPs:'), report.topClientIps, value => `${value} requests`);
  appendRanking(lines, c.bold('Top Paths (avg KiB):'), report.topPathAvgResponseSize, value => value.toFixed(2));

  lines.push('');
  return lines.join('\n');
}

function appendRanking(
  lines: string[],
  heading: string,
  entries: readonly RankedEntry[],
  formatValue: (value: number) => string
): void {
  if (entries.length === 0) {
    return;
  }
  lines.push('');
  lines.push(heading);
  const maxKeyLen = Math.max(...entries.map(entry => entry.key.length));
  for (const { key, value } of entries) {
    lines.push(`  ${key.padEnd(maxKeyLen + 2)}${formatValue(value)}`);
  }
}

/**
 * Formats the report based on the specified format
 *
 * @param colorize - Whether to use colors for pretty format
 */
export function formatReport(report: Report, format: ReportFormat, colorize: boolean = true): string {
  switch (format) {
    case 'json':
      return formatReportJson(report);
    case 'markdown':
      return formatReportMarkdown(report);
    case 'pretty':
    default:
      return formatReportPretty(report, colorize);
  }
}
