/**
 * Prompt template for per-source threat assessment.
 *
 * The model sees a dataset summary, the first rows of the source and the
 * case context (case type, threat actor, indicators, known TTPs) and
 * returns a list of threats.
 */

import { cellToText } from '../../ingestion/record-store.js';
import type { Dataset } from '../../types/records.js';

export const SAMPLE_ROW_LIMIT = 20;
const SAMPLE_COLUMN_LIMIT = 10;
const CONTEXT_IOC_LIMIT = 20;
const CONTEXT_TTP_LIMIT = 5;

export interface KnownTtp {
  tactic: string;
  technique: string;
  description: string;
}

export interface CaseContext {
  caseType?: string;
  threatActor?: string;
  indicators?: readonly string[];
  ttps?: readonly KnownTtp[];
}

/**
 * Render the case context block. Long indicator and TTP lists are capped.
 */
export function formatCaseContext(context: CaseContext): string {
  const parts: string[] = [];

  if (context.caseType) parts.push(`Case Type: ${context.caseType}`);
  if (context.threatActor) parts.push(`Threat Actor Group: ${context.threatActor}`);

  const indicators = context.indicators ?? [];
  if (indicators.length > 0) {
    parts.push(`Known IOCs to search for: ${indicators.slice(0, CONTEXT_IOC_LIMIT).join(', ')}`);
    if (indicators.length > CONTEXT_IOC_LIMIT) {
      parts.push(`... and ${indicators.length - CONTEXT_IOC_LIMIT} more IOCs`);
    }
  }

  const ttps = context.ttps ?? [];
  if (ttps.length > 0) {
    parts.push(`Known TTPs: ${ttps.length} TTP(s) associated with threat actor`);
    for (const ttp of ttps.slice(0, CONTEXT_TTP_LIMIT)) {
      parts.push(`  - ${ttp.technique}: ${ttp.description}`);
    }
  }

  return parts.length > 0 ? parts.join('\n') : 'No specific case context provided.';
}

/**
 * Render the first rows of a dataset as a pipe-separated table.
 */
export function formatSampleRows(dataset: Dataset, limit: number = SAMPLE_ROW_LIMIT): string {
  const columns = dataset.columns.slice(0, SAMPLE_COLUMN_LIMIT);
  const lines = [columns.join(' | ')];
  for (const row of dataset.rows.slice(0, limit)) {
    lines.push(columns.map(column => cellToText(row[column] ?? null) ?? '').join(' | '));
  }
  return lines.join('\n');
}

export function formatDatasetSummary(dataset: Dataset): string {
  return [
    `Rows: ${dataset.rows.length.toLocaleString('en-US')}`,
    `Columns: ${dataset.columns.length}`,
    `Column names: ${dataset.columns.join(', ')}`,
  ].join('\n');
}

export function buildThreatAssessmentPrompt(
  dataset: Dataset,
  context: CaseContext,
): { system: string; user: string } {
  const system = `You are a cybersecurity forensic analyst. You review exports of forensic artifacts and identify suspicious, malicious or anomalous activity. Always respond with valid JSON.`;

  const user = `Analyze the following forensic data and identify any suspicious, malicious, or anomalous activities.

Case Context:
${formatCaseContext(context)}

Data Source: ${dataset.name}

Data Summary:
${formatDatasetSummary(dataset)}

Sample Data (first ${SAMPLE_ROW_LIMIT} rows):
${formatSampleRows(dataset)}

Focus on:
1. Indicators matching the provided IOCs
2. Activities consistent with the case type (${context.caseType ?? 'general'})
3. TTPs associated with the threat actor group
4. Suspicious files, processes, or network activity
5. Potential malware indicators
6. Unusual patterns or anomalies

Respond in this JSON format:
{
  "threats": [
    {
      "type": "malware|suspicious_process|network_anomaly|file_anomaly|other",
      "severity": "critical|high|medium|low",
      "description": "Detailed description",
      "indicators": ["indicator1", "indicator2"],
      "recommendation": "What should be done"
    }
  ],
  "summary": "Overall assessment",
  "confidence": "high|medium|low"
}`;

  return { system, user };
}
