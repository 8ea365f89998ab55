/**
 * License CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { removeLicenses, skuAvailability } from '../../core/actions';
import { prepare, runAction } from '../context';

interface RemoveOptions {
  user: string;
}

interface AvailableOptions {
  json?: boolean;
}

export const licenseCommands = new Command('license')
  .description('Manage user licenses');

licenseCommands
  .command('remove')
  .description('Remove every license assigned to a user')
  .requiredOption('-u, --user <upn>', 'User principal name')
  .action((options: RemoveOptions, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const spinner = ora(`Removing licenses from ${options.user}...`).start();

      try {
        const client = await env.connect();
        const removed = await removeLicenses(client, options.user);

        if (removed.length === 0) {
          spinner.info(`No licenses assigned to ${options.user}`);
          return;
        }
        spinner.succeed(`Removed ${removed.length} license(s) from ${options.user}`);
        for (const skuId of removed) {
          console.log(chalk.dim(`  - ${skuId}`));
        }
      } catch (error) {
        spinner.fail(`Could not remove licenses from ${options.user}`);
        throw error;
      }
    })
  );

licenseCommands
  .command('available [skus...]')
  .description('Show remaining seats per SKU part number ("*" or none for all)')
  .option('--json', 'Print as JSON')
  .action((skus: string[], options: AvailableOptions, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const client = await env.connect();
      const requested = skus.length > 0 ? skus : ['*'];
      const available = await skuAvailability(client, requested, {
        signal: env.signal,
        maxPages: env.config.audit.maxPages,
      });

      if (options.json) {
        console.log(JSON.stringify(available, null, 2));
        return;
      }

      if (available.length === 0) {
        console.log(chalk.yellow('No matching subscribed SKUs.'));
        return;
      }

      const data = [
        [chalk.bold('SKU'), chalk.bold('Remaining')],
        ...available.map((sku) => [
          sku.skuPartNumber,
          sku.remainingUnits > 0 ? chalk.green(String(sku.remainingUnits)) : chalk.red(String(sku.remainingUnits)),
        ]),
      ];
      console.log(table(data));
    })
  );
