import { Command } from 'commander';
import { codeCommand, reposCommand } from './search.js';
import { initCommand } from './init.js';
import { configCommand } from './config.js';

export const program = new Command()
  .name('codehop')
  .description('Fuzzy-find git repositories for a launcher')
  .version('0.1.0');

program.addCommand(codeCommand);
program.addCommand(reposCommand);
program.addCommand(initCommand);
program.addCommand(configCommand);
