#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { newCommand } from '../commands/new';
import { featuresCommand } from '../commands/features';
import { boardsCommand } from '../commands/boards';
import { configsCommand } from '../commands/configs';
import { version, description } from '../../package.json';

const program = new Command();

program
  .name('pico-project')
  .description(description)
  .version(version)
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

// Register commands
newCommand(program);
featuresCommand(program);
boardsCommand(program);
configsCommand(program);

program.configureHelp({
  sortSubcommands: true,
  subcommandTerm: (cmd) => cmd.name()
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
