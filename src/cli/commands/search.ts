/**
 * Search command — IOC matching only, no detection or AI.
 *
 * Prints per-source match counts and the first matches as a table, and
 * optionally writes the match-only timeline.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { loadConfig } from '../../config/loader.js';
import { IndicatorMatcher, summarizeMatches } from '../../correlation/indicator-matcher.js';
import { combineIndicators, parseIndicatorList, readIndicatorFile } from '../../correlation/indicators.js';
import { ingestDirectory } from '../../ingestion/directory.js';
import { writeTimelineCsv } from '../../reporting/timeline-csv.js';
import { TimelineBuilder } from '../../timeline/builder.js';
import type { Match } from '../../types/findings.js';
import { errorMessage } from '../../utils/errors.js';
import { setLogLevel } from '../../utils/logger.js';
import {
  addConfigOption,
  addPartialScopeOption,
  addVerboseOption,
  isPartialMatchScope,
  printError,
  printHeader,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface SearchOptions {
  iocs?: string;
  iocsFile?: string;
  timeline?: string;
  analyst?: string;
  config?: string;
  partialScope?: string;
  verbose?: boolean;
}

/** Rows shown in the match table */
export const MATCH_TABLE_LIMIT = 50;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerSearchCommand(program: Command): void {
  const cmd = program
    .command('search')
    .description('Search CSV exports for indicators of compromise')
    .argument('<csvDir>', 'Directory of CSV exports')
    .option('--iocs <list>', 'Indicators, separated by commas, semicolons, pipes or newlines')
    .option('--iocs-file <path>', 'File of indicators, one per line or delimited')
    .option('--timeline <file>', 'Also write a timeline CSV of the matches')
    .option('--analyst <name>', 'Analyst name for the timeline');

  addConfigOption(cmd);
  addPartialScopeOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (csvDir: string, options: SearchOptions) => {
    await runSearch(csvDir, options);
  });
}

// ---------------------------------------------------------------------------
// Match table
// ---------------------------------------------------------------------------

function clip(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text.padEnd(width);
}

/**
 * Render matches as a fixed-width table, at most `limit` rows, with a
 * trailing note when more exist.
 */
export function formatMatchTable(matches: readonly Match[], limit: number = MATCH_TABLE_LIMIT): string {
  const lines = [
    `  ${clip('Source', 20)} ${clip('Indicator', 24)} ${clip('Type', 10)} ${clip('Column', 16)} ${clip('Row', 6)} Match`,
    `  ${'─'.repeat(86)}`,
  ];
  for (const m of matches.slice(0, limit)) {
    lines.push(
      `  ${clip(m.source, 20)} ${clip(m.indicator, 24)} ${clip(m.indicatorKind, 10)} ${clip(m.column, 16)} ${clip(String(m.rowIndex), 6)} ${m.matchKind}`,
    );
  }
  if (matches.length > limit) {
    lines.push(`  ... and ${matches.length - limit} more`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runSearch(csvDir: string, options: SearchOptions): Promise<void> {
  printHeader('IOC Search');

  let config;
  try {
    config = loadConfig({ path: options.config });
  } catch (err) {
    printError('Failed to load configuration', errorMessage(err));
    process.exit(1);
  }
  setLogLevel(options.verbose ? 'debug' : config.logging.level);

  const inputDir = resolveInputPath(csvDir);

  let indicators: string[];
  try {
    indicators = combineIndicators(
      options.iocs ? parseIndicatorList(options.iocs) : [],
      options.iocsFile ? readIndicatorFile(options.iocsFile) : [],
    );
  } catch (err) {
    printError('Failed to read indicators', errorMessage(err));
    process.exit(1);
  }

  if (indicators.length === 0) {
    printError('No indicators given', 'Use --iocs or --iocs-file');
    process.exit(1);
  }

  const spinner = ora('Loading CSV exports...').start();
  let store;
  try {
    store = await ingestDirectory(inputDir);
  } catch (err) {
    spinner.fail(chalk.red('Ingestion failed'));
    printError('Could not read input directory', errorMessage(err));
    process.exit(1);
  }
  if (store.size === 0) {
    spinner.fail(chalk.red('No CSV data found'));
    process.exit(1);
  }

  spinner.text = `Searching ${store.size} source(s) for ${indicators.length} indicator(s)...`;
  const matcher = new IndicatorMatcher(indicators, {
    partialMatchScope: isPartialMatchScope(options.partialScope)
      ? options.partialScope
      : config.partialMatchScope,
    exactMatchMode: config.exactMatchMode,
  });
  const { matches } = matcher.searchAll(store);
  spinner.succeed(chalk.green(`${matches.length} match(es) across ${store.size} source(s)`));

  console.log('');
  if (matches.length === 0) {
    printWarning('No indicators found in the data');
  } else {
    const summary = summarizeMatches(matches);
    for (const [source, count] of Object.entries(summary.bySource)) {
      printInfo(`${source}: ${count}`);
    }
    console.log('');
    console.log(formatMatchTable(matches));
  }

  if (options.timeline) {
    const builder = new TimelineBuilder({ analyst: options.analyst ?? config.analyst });
    const timeline = builder.addMatches(matches, store).finalize();
    try {
      writeTimelineCsv(timeline, options.timeline);
      console.log('');
      printSuccess(`Timeline written to ${options.timeline}`);
    } catch (err) {
      printError('Failed to write timeline', errorMessage(err));
      process.exit(1);
    }
  }
  console.log('');
}
