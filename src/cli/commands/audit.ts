/**
 * Audit CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { AuditDefinition, runAudit } from '../../core/pipeline';
import {
  LicensedSharedMailbox,
  PrivilegedSharedMailbox,
  SignInEnabledSharedMailbox,
  adminRolesAudit,
  blockStatusAudit,
  licensesAudit,
} from '../../core/audits';
import { AuditPhase } from '../../types';
import { parseInteger, prepare, runAction } from '../context';
import { ReportColumn, renderReport } from '../reporter';

interface AuditCommandOptions {
  concurrency?: number;
  retries?: number;
  json?: boolean;
  include?: string[];
  exclude?: string[];
}

const PHASE_LABELS: Record<AuditPhase, string> = {
  authenticating: 'Authenticating',
  fetching: 'Fetching directory',
  enriching: 'Reading mailbox settings',
  aggregating: 'Aggregating results',
  reported: 'Done',
};

function auditCommand<T, V, R>(
  definition: AuditDefinition<T, V, R>,
  summary: string,
  columns: ReportColumn<R>[]
): Command {
  return new Command(definition.name)
    .description(definition.description)
    .option('-c, --concurrency <n>', 'Concurrent mailbox lookups', parseInteger('--concurrency'))
    .option('-r, --retries <n>', 'Retries per throttled lookup', parseInteger('--retries'))
    .option('-i, --include <patterns...>', 'Only check user principal names matching these globs')
    .option('-x, --exclude <patterns...>', 'Skip user principal names matching these globs')
    .option('--json', 'Print the report as JSON')
    .action((options: AuditCommandOptions, command: Command) =>
      runAction(async () => {
        const env = prepare(command, { concurrency: options.concurrency, maxRetries: options.retries });
        const spinner = ora(PHASE_LABELS.authenticating).start();

        try {
          const report = await runAudit(definition, {
            connect: env.connect,
            options: env.config.audit,
            scope: { include: options.include, exclude: options.exclude },
            signal: env.signal,
            onPhase: (phase: AuditPhase, detail?: string) => {
              if (phase === 'reported') {
                spinner.succeed(`${definition.name}: ${detail ?? 'complete'}`);
                return;
              }
              spinner.text = detail ? `${PHASE_LABELS[phase]} (${detail})` : PHASE_LABELS[phase];
            },
            onProgress: (completed, total) => {
              spinner.text = `${PHASE_LABELS.enriching} [${completed}/${total}]`;
            },
          });

          console.log(renderReport(report, columns, { json: options.json, summary }));
        } catch (error) {
          spinner.fail(`${definition.name} audit failed`);
          throw error;
        }
      })
    );
}

const licenseColumns: ReportColumn<LicensedSharedMailbox>[] = [
  { header: 'User Principal Name', value: (row) => row.userPrincipalName },
  { header: 'Licenses', value: (row) => String(row.licenseCount) },
  { header: 'SKU IDs', value: (row) => row.skuIds.join('\n') },
];

const blockStatusColumns: ReportColumn<SignInEnabledSharedMailbox>[] = [
  { header: 'User Principal Name', value: (row) => row.userPrincipalName },
  { header: 'Display Name', value: (row) => row.displayName ?? chalk.dim('-') },
];

const adminRoleColumns: ReportColumn<PrivilegedSharedMailbox>[] = [
  { header: 'User Principal Name', value: (row) => row.userPrincipalName },
  { header: 'Display Name', value: (row) => row.displayName ?? chalk.dim('-') },
  { header: 'Roles', value: (row) => row.roles.join('\n') },
];

export const auditCommands = new Command('audit')
  .description('Find misconfigured shared mailboxes')
  .addCommand(auditCommand(licensesAudit, 'Licensed shared mailboxes', licenseColumns))
  .addCommand(auditCommand(blockStatusAudit, 'Shared mailboxes with sign-in enabled', blockStatusColumns))
  .addCommand(auditCommand(adminRolesAudit, 'Shared mailboxes with admin roles', adminRoleColumns));
