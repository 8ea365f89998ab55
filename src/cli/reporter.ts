/**
 * Console rendering of audit reports
 */

import chalk from 'chalk';
import { table } from 'table';
import { AuditReport } from '../types';

export interface ReportColumn<R> {
  header: string;
  value: (row: R) => string;
}

export interface RenderOptions {
  json?: boolean;
  /** Caption printed before the match count */
  summary: string;
}

export function renderReport<R>(report: AuditReport<R>, columns: ReportColumn<R>[], options: RenderOptions): string {
  if (options.json) {
    return JSON.stringify(report, null, 2);
  }

  const lines: string[] = [];

  if (report.matches.length > 0) {
    const data = [
      columns.map((c) => chalk.bold(c.header)),
      ...report.matches.map((row) => columns.map((c) => c.value(row))),
    ];
    lines.push(table(data).trimEnd());
  }

  lines.push(`${options.summary}: ${report.matchCount}`);
  lines.push(
    chalk.dim(
      `Examined ${report.examined} record(s); enriched ${report.dispatched}; skipped ${report.skipped} by pre-filter.`
    )
  );

  if (report.undetermined.length > 0) {
    lines.push(chalk.yellow(`\nCould not determine ${report.undetermined.length} record(s):`));
    for (const entry of report.undetermined) {
      lines.push(chalk.yellow(`  ? ${entry.key}`) + chalk.dim(` (${entry.reason})`));
    }
  }

  return lines.join('\n');
}
