#!/usr/bin/env node

/**
 * reconpipe CLI entry point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('reconpipe')
  .description('Concurrent reconnaissance pipeline: subdomains, ports, web fingerprints, screenshots')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('RECONPIPE')} ${chalk.gray(`v${VERSION}`)}                                    ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Network reconnaissance pipeline')}                          ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(scanCommand);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  // --help and --version surface as exit-override errors with code 0
  if (error instanceof CommanderError && error.exitCode === 0) {
    process.exit(0);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
