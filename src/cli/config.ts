import { Command } from 'commander';
import chalk from 'chalk';
import { formatConfig, getConfigPath, loadConfig } from '../config.js';

export const configCommand = new Command('config')
  .description('Show the effective configuration')
  .option('--json', 'Output as JSON')
  .action(async (opts: { json?: boolean }) => {
    try {
      const config = await loadConfig();

      if (opts.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      console.log(chalk.dim(`# ${getConfigPath()}`));
      console.log(formatConfig(config));
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  });
