/**
 * Analyze command — full case analysis over a directory of CSV exports.
 *
 * Ingests every CSV, runs pattern detection and IOC matching, optionally
 * pulls threat-actor intel and per-source AI assessments, builds the
 * timeline and writes it with the JSON and text case reports.
 */

import { join } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { AIClient } from '../../ai/client.js';
import { analyzeCase, type CaseStage } from '../../analysis/case-analysis.js';
import { loadConfig } from '../../config/loader.js';
import type { CaseTraceConfig } from '../../config/schema.js';
import { combineIndicators, parseIndicatorList, readIndicatorFile } from '../../correlation/indicators.js';
import { resolveSuspicionRules } from '../../detection/rules.js';
import { ingestDirectory } from '../../ingestion/directory.js';
import { summarizeStore } from '../../ingestion/record-store.js';
import { writeCaseReport, type CaseReport } from '../../reporting/json-reporter.js';
import { printSummary } from '../../reporting/summary-reporter.js';
import { printThreatTable, sourcedThreats, writeTextReport } from '../../reporting/text-reporter.js';
import { writeTimelineCsv } from '../../reporting/timeline-csv.js';
import { errorMessage } from '../../utils/errors.js';
import { setLogLevel } from '../../utils/logger.js';
import { VERSION } from '../../version.js';
import {
  addConfigOption,
  addModelOption,
  addOutputOption,
  addPartialScopeOption,
  addVerboseOption,
  CASE_TYPES,
  fileStamp,
  isModelTier,
  isPartialMatchScope,
  parseCaseType,
  printError,
  printHeader,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
  resolveOutputDir,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface AnalyzeOptions {
  iocs?: string;
  iocsFile?: string;
  threatActor?: string;
  caseType?: string;
  analyst?: string;
  ai?: boolean;
  model?: string;
  output?: string;
  config?: string;
  partialScope?: string;
  verbose?: boolean;
}

const STAGE_LABELS: Record<CaseStage, string> = {
  detect: 'Detecting pattern anomalies',
  intel: 'Retrieving threat-actor intelligence',
  match: 'Matching indicators',
  assess: 'Assessing threats',
  timeline: 'Building timeline',
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerAnalyzeCommand(program: Command): void {
  const cmd = program
    .command('analyze')
    .description('Correlate IOCs and anomalies across CSV exports and build a case timeline')
    .argument('<csvDir>', 'Directory of CSV exports')
    .option('--iocs <list>', 'Indicators, separated by commas, semicolons, pipes or newlines')
    .option('--iocs-file <path>', 'File of indicators, one per line or delimited')
    .option('--threat-actor <name>', 'Threat actor group to pull intelligence for')
    .option('--case-type <type>', `Case type: ${CASE_TYPES.join(', ')}`)
    .option('--analyst <name>', 'Analyst name stamped on every finding')
    .option('--ai', 'Enable AI intel lookup and threat assessment')
    .option('--no-ai', 'Disable AI even when the config enables it');

  addModelOption(cmd);
  addOutputOption(cmd);
  addConfigOption(cmd);
  addPartialScopeOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (csvDir: string, options: AnalyzeOptions) => {
    await runAnalyze(csvDir, options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

function loadConfigOrExit(path: string | undefined): CaseTraceConfig {
  try {
    return loadConfig({ path });
  } catch (err) {
    printError('Failed to load configuration', errorMessage(err));
    process.exit(1);
  }
}

function collectUserIndicators(options: AnalyzeOptions): string[] {
  const inline = options.iocs ? parseIndicatorList(options.iocs) : [];
  let fromFile: string[] = [];
  if (options.iocsFile) {
    try {
      fromFile = readIndicatorFile(options.iocsFile);
    } catch (err) {
      printError('Failed to read indicator file', errorMessage(err));
      process.exit(1);
    }
  }
  return combineIndicators(inline, fromFile);
}

async function runAnalyze(csvDir: string, options: AnalyzeOptions): Promise<void> {
  const startTime = Date.now();
  printHeader('Case Analysis');

  // --- Configuration (CLI > env > file > defaults) ---
  const config = loadConfigOrExit(options.config);
  setLogLevel(options.verbose ? 'debug' : config.logging.level);

  const inputDir = resolveInputPath(csvDir);
  const analyst = options.analyst ?? config.analyst;
  const outputDir = resolveOutputDir(options.output ?? config.output.dir);
  const aiEnabled = options.ai ?? config.ai.enabled;
  const model = isModelTier(options.model) ? options.model : config.ai.model;
  const partialMatchScope = isPartialMatchScope(options.partialScope)
    ? options.partialScope
    : config.partialMatchScope;

  let caseType: string | undefined;
  if (options.caseType) {
    caseType = parseCaseType(options.caseType);
    if (!caseType) {
      printError(`Unknown case type "${options.caseType}"`, `Valid types: ${CASE_TYPES.join(', ')}`);
      process.exit(1);
    }
  }

  const indicators = collectUserIndicators(options);

  printInfo(`Input:      ${inputDir}`);
  printInfo(`Output:     ${outputDir}`);
  printInfo(`Analyst:    ${analyst}`);
  if (caseType) printInfo(`Case type:  ${caseType}`);
  if (options.threatActor) printInfo(`Actor:      ${options.threatActor}`);
  printInfo(`Indicators: ${indicators.length}`);
  printInfo(`AI:         ${aiEnabled ? `enabled (${model})` : 'disabled'}`);
  console.log('');

  // --- AI client ---
  let client: AIClient | undefined;
  if (aiEnabled) {
    try {
      client = AIClient.fromEnv();
    } catch (err) {
      printWarning(`AI disabled: ${errorMessage(err)}`);
    }
  }

  // --- Ingest ---
  const ingestSpinner = ora('Loading CSV exports...').start();
  let store;
  try {
    store = await ingestDirectory(inputDir);
  } catch (err) {
    ingestSpinner.fail(chalk.red('Ingestion failed'));
    printError('Could not read input directory', errorMessage(err));
    process.exit(1);
  }

  if (store.size === 0) {
    ingestSpinner.fail(chalk.red('No CSV data found'));
    printError(`No CSV files could be loaded from ${inputDir}`);
    process.exit(1);
  }
  const sources = summarizeStore(store);
  const totalRows = Object.values(sources).reduce((sum, s) => sum + s.rows, 0);
  ingestSpinner.succeed(chalk.green(`Loaded ${store.size} source(s), ${totalRows} row(s)`));

  // --- Analyze ---
  const analysisSpinner = ora('Analyzing...').start();
  let result;
  try {
    result = await analyzeCase(store, {
      analyst,
      indicators,
      caseType,
      threatActor: options.threatActor,
      rules: resolveSuspicionRules(config.rules),
      matcher: { partialMatchScope, exactMatchMode: config.exactMatchMode },
      client,
      model,
      assess: aiEnabled,
      onStage: (stage, detail) => {
        analysisSpinner.text = `${STAGE_LABELS[stage]}: ${detail}`;
      },
    });
    analysisSpinner.succeed(
      chalk.green(
        `${result.anomalies.length} anomalies, ${result.matches.length} matches, ${result.timeline.length} timeline findings`,
      ),
    );
  } catch (err) {
    analysisSpinner.fail(chalk.red('Analysis failed'));
    printError('Analysis error', errorMessage(err));
    process.exit(1);
  }

  // --- Write output ---
  const stamp = fileStamp();
  const caseTitle = caseType ? `${caseType}: ${inputDir}` : inputDir;
  const durationMs = Date.now() - startTime;
  const cost = client?.getCostSummary();

  try {
    if (config.output.formats.includes('csv')) {
      const timelinePath = join(outputDir, `timeline_${stamp}.csv`);
      writeTimelineCsv(result.timeline, timelinePath);
      printSuccess(`Timeline written to ${timelinePath}`);
    }

    if (config.output.formats.includes('json')) {
      const report: CaseReport = {
        metadata: {
          generatedAt: new Date().toISOString(),
          casetraceVersion: VERSION,
          inputDir,
          analyst,
          caseType,
          threatActor: options.threatActor,
          processingTimeMs: durationMs,
        },
        sources,
        indicators: {
          provided: result.providedIndicators,
          fromIntel: result.intelIndicators,
          searched: [...result.searchedIndicators],
        },
        intel: result.intel,
        anomalies: result.anomalies,
        anomalySummary: result.anomalySummary,
        matches: result.matches,
        matchSummary: result.matchSummary,
        assessments: result.assessments,
        threats: result.threats,
        timeline: result.timeline,
        cost: {
          totalUsd: cost?.totalCostUsd ?? 0,
          totalTokens: cost?.totalTokens ?? 0,
          requestCount: cost?.requestCount ?? 0,
          byOperation: cost?.byOperation ?? {},
        },
      };
      const reportPath = join(outputDir, `report_${stamp}.json`);
      writeCaseReport(report, reportPath);
      printSuccess(`Report written to ${reportPath}`);
    }

    if (config.output.formats.includes('text')) {
      const textPath = join(outputDir, `report_${stamp}.txt`);
      writeTextReport(
        {
          generatedAt: new Date().toISOString(),
          caseTitle,
          assessments: result.assessments,
          anomalies: result.anomalies,
          matchSummary: result.matchSummary,
        },
        textPath,
      );
      printSuccess(`Text report written to ${textPath}`);
    }
  } catch (err) {
    printError('Failed to write output', errorMessage(err));
    process.exit(1);
  }

  // --- Summary ---
  console.log('');
  printThreatTable(sourcedThreats(result.assessments));
  console.log('');
  printSummary({
    caseTitle,
    processingTimeMs: durationMs,
    sources: { count: store.size, rows: totalRows },
    anomalies: result.anomalySummary,
    matches: result.matchSummary,
    threats: result.threats.length,
    timeline: {
      total: result.timeline.length,
      dated: result.timeline.filter(f => f.timestamp !== null).length,
      malicious: result.timeline.filter(f => f.level === 'Malicious').length,
    },
    cost: cost ? { totalUsd: cost.totalCostUsd, totalTokens: cost.totalTokens } : undefined,
  });
  console.log('');
}
