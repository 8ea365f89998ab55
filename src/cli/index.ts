#!/usr/bin/env node
/**
 * m365audit CLI
 * Directory audits and remediation tools for a Microsoft 365 tenant
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { auditCommands } from './commands/audit';
import { revokeCommands } from './commands/revoke';
import { mailCommands } from './commands/mail';
import { licenseCommands } from './commands/license';
import { tokenCommand } from './commands/token';
import { errorMessage } from '../utils/errors';

const program = new Command();

program
  .name('m365audit')
  .description('Audit shared mailboxes and manage users in a Microsoft 365 tenant')
  .version('1.0.0')
  .option('--env-file <path>', 'Load credentials from this .env file')
  .option('-v, --verbose', 'Log progress (same as --info)')
  .option('--info', 'Log progress')
  .option('--debug', 'Log every request');

// Register command groups
program.addCommand(auditCommands);
program.addCommand(revokeCommands);
program.addCommand(mailCommands);
program.addCommand(licenseCommands);
program.addCommand(tokenCommand);

// Global error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  });
}
