#!/usr/bin/env node

/**
 * subprobe CLI Entry Point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('subprobe')
  .description('Wordlist subdomain enumerator with DNS and HTTP verification')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('SUBPROBE')} ${chalk.gray(`v${VERSION}`)}                              ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Subdomain brute force + live verification')}    ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(scanCommand);

// Error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  // commander has already printed help, version or its own usage error
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n✘ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
