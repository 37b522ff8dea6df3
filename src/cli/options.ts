/**
 * Shared CLI option helpers for CaseTrace commands.
 *
 * Option registration, path resolution, choice narrowing and the
 * chalk-colored message helpers used across all commands.
 */

import { existsSync, mkdirSync, statSync } from 'fs';
import { resolve } from 'path';
import { Option, type Command } from 'commander';
import chalk from 'chalk';

import type { ModelTier } from '../config/schema.js';
import type { PartialMatchScope } from '../correlation/indicator-matcher.js';

// ---------------------------------------------------------------------------
// Choices
// ---------------------------------------------------------------------------

export const CASE_TYPES = ['Ransomware', 'BEC', 'Intrusion', 'Other'] as const;
export type CaseType = (typeof CASE_TYPES)[number];

const MODEL_TIERS: readonly ModelTier[] = ['fast', 'standard', 'quality'];
const PARTIAL_SCOPES: readonly PartialMatchScope[] = ['all', 'text'];

/**
 * Match a case type case-insensitively.
 *
 * @example parseCaseType('ransomware') => 'Ransomware'
 */
export function parseCaseType(value: string): CaseType | undefined {
  const wanted = value.trim().toLowerCase();
  return CASE_TYPES.find(t => t.toLowerCase() === wanted);
}

export function isModelTier(value: unknown): value is ModelTier {
  return typeof value === 'string' && MODEL_TIERS.some(t => t === value);
}

export function isPartialMatchScope(value: unknown): value is PartialMatchScope {
  return typeof value === 'string' && PARTIAL_SCOPES.some(s => s === value);
}

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the --model option. No default here, so the config file can supply one.
 */
export function addModelOption(cmd: Command): Command {
  return cmd.addOption(
    new Option('--model <tier>', 'AI model tier').choices([...MODEL_TIERS]),
  );
}

export function addOutputOption(cmd: Command): Command {
  return cmd.option('-o, --output <dir>', 'Output directory for timeline and report files');
}

export function addConfigOption(cmd: Command): Command {
  return cmd.option('--config <path>', 'Path to a casetrace.config.yaml file');
}

export function addPartialScopeOption(cmd: Command): Command {
  return cmd.addOption(
    new Option('--partial-scope <scope>', 'Columns eligible for partial matches').choices([...PARTIAL_SCOPES]),
  );
}

export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output');
}

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input directory exists.
 * Prints a chalk-colored error and exits if not.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);

  if (!existsSync(resolved)) {
    console.error(chalk.red(`Error: Input path does not exist: ${resolved}`));
    process.exit(1);
  }

  return resolved;
}

/**
 * Resolve an output directory path, creating it (and parents) if missing.
 */
export function resolveOutputDir(dir: string): string {
  const resolved = resolve(dir);

  if (!existsSync(resolved)) {
    try {
      mkdirSync(resolved, { recursive: true });
    } catch (err) {
      console.error(chalk.red(`Error: Could not create output directory: ${resolved}`));
      console.error(chalk.red(`  ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  } else if (!statSync(resolved).isDirectory()) {
    console.error(chalk.red(`Error: Output path exists but is not a directory: ${resolved}`));
    process.exit(1);
  }

  return resolved;
}

/**
 * Local-time stamp for output file names.
 *
 * @example fileStamp(new Date(2024, 2, 15, 10, 22, 5)) => '20240315_102205'
 */
export function fileStamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

export function printHeader(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  CaseTrace — ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
