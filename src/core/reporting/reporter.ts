/**
 * Report Generator
 *
 * Generates JSON and Markdown reports of a forecasting run
 */

import fs from 'node:fs';
import path from 'node:path';
import { getConfig } from '../config/loader.js';
import { logger } from '../logging/logger.js';
import type { BatchSummary, QuestionOutcome } from '../../forecasting/pipeline.js';
import type { ForecastSummary } from '../../forecasting/summary.js';

export interface ReportData {
  runId: string;
  command: string;
  timestamp: number;
  outcomes: QuestionOutcome[];
  summary?: BatchSummary;
  settings?: Record<string, unknown>;
}

export interface GeneratedReport {
  json: string;
  markdown: string;
  paths: string[];
}

export function generateReport(
  data: ReportData,
  outDir: string = getConfig().reporting.out_dir
): GeneratedReport {
  fs.mkdirSync(outDir, { recursive: true });

  const timestamp = new Date(data.timestamp).toISOString().replace(/[:.]/g, '-');
  const baseName = `${data.command}-${timestamp}`;

  const jsonContent = JSON.stringify(data, null, 2);
  const jsonPath = path.join(outDir, `${baseName}.json`);

  const markdownContent = generateMarkdown(data);
  const mdPath = path.join(outDir, `${baseName}.md`);

  fs.writeFileSync(jsonPath, jsonContent);
  fs.writeFileSync(mdPath, markdownContent);

  logger.info('Reports generated', { jsonPath, mdPath });

  return {
    json: jsonContent,
    markdown: markdownContent,
    paths: [jsonPath, mdPath],
  };
}

export function generateMarkdown(data: ReportData): string {
  const lines: string[] = [
    '# Forecast Run Report',
    '',
    `**Run ID:** ${data.runId}`,
    `**Command:** ${data.command}`,
    `**Generated:** ${new Date(data.timestamp).toISOString()}`,
    '',
  ];

  if (data.settings) {
    lines.push('## Settings', '');
    for (const [key, value] of Object.entries(data.settings)) {
      lines.push(`- **${formatKey(key)}:** ${formatValue(value)}`);
    }
    lines.push('');
  }

  if (data.summary) {
    lines.push('## Summary', '');
    for (const [key, value] of Object.entries(data.summary)) {
      lines.push(`- **${formatKey(key)}:** ${formatValue(value)}`);
    }
    lines.push('');
  }

  if (data.outcomes.length > 0) {
    lines.push('## Questions', '');
    lines.push('| Question | Type | Outcome | Samples | Forecast | Error |');
    lines.push('|----------|------|---------|---------|----------|-------|');
    for (const outcome of data.outcomes) {
      const label = outcome.title ? `${outcome.questionId} ${escapeCell(outcome.title)}` : String(outcome.questionId);
      const samples = outcome.sampleCount !== undefined ? String(outcome.sampleCount) : '-';
      const forecast = outcome.forecast ? formatForecast(outcome.forecast) : '-';
      const error = outcome.rule ?? (outcome.error ? escapeCell(outcome.error) : '-');
      lines.push(`| ${label} | ${outcome.type} | ${outcome.status} | ${samples} | ${forecast} | ${error} |`);
    }
    lines.push('');
  }

  lines.push('---');
  lines.push('');
  lines.push('*Generated by worldcast*');

  return lines.join('\n');
}

export function formatForecast(summary: ForecastSummary): string {
  if (summary.probability !== undefined) {
    return `P(yes) ${(summary.probability * 100).toFixed(1)}%`;
  }
  if (summary.topOption) {
    return `${escapeCell(summary.topOption.name)} ${(summary.topOption.probability * 100).toFixed(1)}%`;
  }
  if (summary.median !== undefined && summary.median !== null) {
    return `median ${formatNumber(summary.median)} (p10 ${formatNumber(summary.p10)}, p90 ${formatNumber(summary.p90)})`;
  }
  return '-';
}

function formatNumber(value: number | null | undefined): string {
  if (value === null || value === undefined) return 'n/a';
  return Number(value.toPrecision(4)).toString();
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

function formatKey(key: string): string {
  return key.replace(/_/g, ' ').replace(/\b\w/g, c => c.toUpperCase());
}

function formatValue(value: unknown): string {
  if (typeof value === 'number') {
    return value.toLocaleString();
  }
  if (typeof value === 'boolean') {
    return value ? 'Yes' : 'No';
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return String(value);
}
