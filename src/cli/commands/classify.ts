/**
 * Classify command — show the kind each indicator is treated as.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { classifyIndicators } from '../../correlation/indicator-classifier.js';
import { parseIndicatorList } from '../../correlation/indicators.js';
import type { ClassifiedIndicator, IndicatorKind } from '../../types/findings.js';

const KIND_COLORS: Record<IndicatorKind, (s: string) => string> = {
  ip_address: chalk.magenta,
  hash: chalk.blue,
  domain: chalk.cyan,
  email: chalk.green,
  executable: chalk.red,
  unknown: chalk.gray,
};

export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Classify indicators as ip_address, hash, domain, email, executable or unknown')
    .argument('<indicators...>', 'Indicators (defanged forms are accepted)')
    .action((values: string[]) => {
      console.log(formatClassification(classifyIndicators(parseIndicatorList(values.join('\n')))));
    });
}

export function formatClassification(classified: readonly ClassifiedIndicator[]): string {
  const width = Math.max(10, ...classified.map(c => c.value.length));
  return classified
    .map(c => `  ${c.value.padEnd(width)}  ${KIND_COLORS[c.kind](c.kind)}`)
    .join('\n');
}
