// Comparative Reporter
// Cross-company comparison tables, rankings and outliers from batch outcomes.

import type { CompanyOutcome } from '../orchestrator/batch-evaluator.js';
import type { PipelineResult } from '../orchestrator/pipeline.js';

export interface ComparisonMetric {
  name: string;
  values: Map<string, number>;
  ascending?: boolean;             // lower is better
}

export interface RankedEntry {
  company: string;
  value: number;
  rank: number;
}

export interface Outlier {
  metric: string;
  company: string;
  value: number;
  direction: 'high' | 'low';
}

const METRICS: Array<{ name: string; read: (r: PipelineResult) => number | null; ascending?: boolean }> = [
  { name: 'total', read: r => r.breakdown.total },
  { name: 'E', read: r => r.breakdown.E },
  { name: 'S', read: r => r.breakdown.S },
  { name: 'G', read: r => r.breakdown.G },
  { name: 'discountPct', read: r => r.breakdown.discountPct },
  { name: 'compliance', read: r => r.breakdown.compliance.overall },
  { name: 'gapToNextGrade', read: r => r.improvementPlan.gap, ascending: true },
  { name: 'scope3Emissions', read: r => r.supplyChain.scope3Emissions, ascending: true },
  { name: 'supplyChainPenalty', read: r => r.supplyChain.riskPropagation, ascending: true },
  { name: 'forecastConfidence', read: r => r.confidence?.score ?? null },
];

function succeeded(outcomes: readonly CompanyOutcome[]): Array<{ company: string; result: PipelineResult }> {
  const ok: Array<{ company: string; result: PipelineResult }> = [];
  for (const o of outcomes) {
    if (o.result !== undefined) ok.push({ company: o.company, result: o.result });
  }
  return ok;
}

/**
 * Extract comparable metrics from successful outcomes.
 */
export function extractMetrics(outcomes: readonly CompanyOutcome[]): ComparisonMetric[] {
  const ok = succeeded(outcomes);
  const metrics: ComparisonMetric[] = [];

  for (const spec of METRICS) {
    const values = new Map<string, number>();
    for (const { company, result } of ok) {
      const value = spec.read(result);
      if (value !== null) values.set(company, value);
    }
    // Only metrics with values for 2+ companies are comparable
    if (values.size >= 2) metrics.push({ name: spec.name, values, ascending: spec.ascending });
  }

  return metrics;
}

/**
 * Format comparison metrics into a markdown table.
 */
export function formatComparisonTable(metrics: readonly ComparisonMetric[], companies: readonly string[]): string {
  if (metrics.length === 0) return '';

  const lines: string[] = [];
  lines.push(`| Metric | ${companies.join(' | ')} |`);
  lines.push(`|--------|${companies.map(() => '--------').join('|')}|`);

  for (const metric of metrics) {
    const values = companies.map(c => {
      const val = metric.values.get(c);
      return val === undefined ? '-' : formatNumber(val);
    });
    lines.push(`| ${metric.name} | ${values.join(' | ')} |`);
  }

  return lines.join('\n');
}

/**
 * Rank companies by a metric, best first. Ties keep name order.
 */
export function rankByMetric(metrics: readonly ComparisonMetric[], metricName: string): RankedEntry[] {
  const metric = metrics.find(m => m.name === metricName);
  if (!metric) return [];

  const entries = [...metric.values].map(([company, value]) => ({ company, value }));
  entries.sort((a, b) => {
    const diff = metric.ascending ? a.value - b.value : b.value - a.value;
    return diff || a.company.localeCompare(b.company);
  });

  return entries.map((e, i) => ({ ...e, rank: i + 1 }));
}

/**
 * Values more than 2 standard deviations from the peer mean (3+ companies).
 */
export function findOutliers(metrics: readonly ComparisonMetric[]): Outlier[] {
  const outliers: Outlier[] = [];

  for (const metric of metrics) {
    const values = [...metric.values];
    if (values.length < 3) continue;

    const mean = values.reduce((s, [, v]) => s + v, 0) / values.length;
    const variance = values.reduce((s, [, v]) => s + (v - mean) ** 2, 0) / values.length;
    const stdDev = Math.sqrt(variance);
    if (stdDev === 0) continue;

    for (const [company, value] of values) {
      const zScore = (value - mean) / stdDev;
      if (Math.abs(zScore) > 2) {
        outliers.push({ metric: metric.name, company, value, direction: zScore > 0 ? 'high' : 'low' });
      }
    }
  }

  return outliers;
}

/**
 * Build the markdown portfolio summary for a batch.
 */
export function buildComparativeReport(outcomes: readonly CompanyOutcome[]): string {
  const ok = succeeded(outcomes);
  const failed = outcomes.filter(o => o.error !== undefined);

  if (ok.length === 0) {
    return '## Portfolio ESG Comparison\n\nNo companies were successfully evaluated.';
  }

  const lines: string[] = [
    '## Portfolio ESG Comparison',
    '',
    `**Companies evaluated:** ${ok.length}/${outcomes.length}`,
    '',
    '### Ranking',
    '',
    '| Rank | Company | Grade | Total | Discount | Eligible | Best Rate |',
    '|------|---------|-------|-------|----------|----------|-----------|',
  ];

  const ranked = [...ok].sort((a, b) =>
    b.result.breakdown.total - a.result.breakdown.total || a.company.localeCompare(b.company));
  for (const [i, { company, result }] of ranked.entries()) {
    const eligible = result.matches.filter(m => m.eligible);
    const best = eligible.length > 0 ? `${formatNumber(Math.min(...eligible.map(m => m.effectiveRate)))}%` : '-';
    lines.push(
      `| ${i + 1} | ${company} | ${result.breakdown.grade} | ${formatNumber(result.breakdown.total)} | ` +
      `${formatNumber(result.breakdown.discountPct)}%p | ${eligible.length}/${result.matches.length} | ${best} |`,
    );
  }
  lines.push('');

  const metrics = extractMetrics(outcomes);
  const table = formatComparisonTable(metrics, ok.map(o => o.company));
  if (table) {
    lines.push('### Key Metrics', '', table, '');
  }

  const outliers = findOutliers(metrics);
  if (outliers.length > 0) {
    lines.push('### Notable Outliers', '');
    for (const o of outliers) {
      const direction = o.direction === 'high' ? 'above' : 'below';
      lines.push(`- **${o.company}**: ${o.metric} = ${formatNumber(o.value)} (significantly ${direction} peer average)`);
    }
    lines.push('');
  }

  if (failed.length > 0) {
    lines.push('### Failed Evaluations', '');
    for (const o of failed) {
      lines.push(`- **${o.company}**: ${o.error}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatNumber(n: number): string {
  if (Number.isInteger(n)) return n.toString();
  return n.toFixed(2);
}
