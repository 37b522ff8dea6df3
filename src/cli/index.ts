#!/usr/bin/env node

/**
 * CaseTrace CLI — forensic IOC correlation and timeline reconstruction
 *
 * Usage:
 *   casetrace analyze ./exports --iocs "evil.com,payload.exe" --case-type Ransomware
 *   casetrace search ./exports --iocs-file iocs.txt --timeline matches.csv
 *   casetrace classify 10.0.0.5 evil[.]com payload.exe
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';

import { VERSION } from '../version.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerSearchCommand } from './commands/search.js';
import { registerClassifyCommand } from './commands/classify.js';

const program = new Command();

program
  .name('casetrace')
  .description('Correlate IOCs and suspicious patterns across forensic CSV exports into a case timeline')
  .version(VERSION);

registerAnalyzeCommand(program);
registerSearchCommand(program);
registerClassifyCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected — don't treat as error
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      process.exit(err.exitCode);
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "casetrace --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
