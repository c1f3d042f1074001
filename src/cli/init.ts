import { Command } from 'commander';
import chalk from 'chalk';
import { access } from 'node:fs/promises';
import { getConfigPath, getDefaultConfig, saveConfig } from '../config.js';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export const initCommand = new Command('init')
  .description('Write a default configuration file')
  .option('-f, --force', 'Overwrite an existing configuration')
  .action(async (opts: { force?: boolean }) => {
    try {
      const configPath = getConfigPath();

      if ((await fileExists(configPath)) && !opts.force) {
        console.log(chalk.yellow(`Config already exists at ${configPath}. Use --force to overwrite.`));
        return;
      }

      await saveConfig(getDefaultConfig(), configPath);
      console.log(chalk.green(`Wrote ${configPath}`));
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  });
