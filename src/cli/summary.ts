import type { ValidationResult } from '../types';
import type { MetricsTracker } from '../engine/metrics';
import type { PresetReport } from '../presets/library';

export type Row = [label: string, value: string];

export const percent = (v: number) => `${(v * 100).toFixed(1)}%`;

export function metricsRows(metrics: MetricsTracker): Row[] {
  const rows: Row[] = [
    ['Tier', metrics.tier.toUpperCase()],
    ['Time to Create', `${metrics.timeToCreate.toFixed(1)} seconds`],
    ['Components Filled', `${metrics.componentsFilled}/${metrics.totalComponents}`],
    ['Estimated Success Rate', percent(metrics.successRate)]
  ];
  if (metrics.suggestionsOffered > 0) {
    rows.push(['AI Suggestions Used', `${metrics.suggestionsUsed}/${metrics.suggestionsOffered}`]);
  }
  return rows;
}

export function validationRows(result: ValidationResult): Row[] {
  return [
    ['Clarity', `${result.clarityScore.toFixed(1)}/10`],
    ['Completeness', percent(result.completenessScore)],
    ['Overall Quality', percent(result.overallScore)],
    ['Status', result.isValid ? 'Valid' : 'Has Issues']
  ];
}

export function formatRows(rows: Row[]): string {
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`).join('\n');
}

export function formatFindings(result: ValidationResult): string {
  const lines: string[] = [];
  if (result.issues.length) {
    lines.push('Issues Found:', ...result.issues.map(i => `  - ${i}`));
  }
  if (result.suggestions.length) {
    lines.push('Suggestions:', ...result.suggestions.map(s => `  - ${s}`));
  }
  return lines.join('\n');
}

export function formatPresetTable(reports: PresetReport[]): string {
  const header = `${'Preset'.padEnd(20)} ${'Tier'.padEnd(8)} ${'Quality'.padEnd(8)} ${'Success'.padEnd(8)} Length`;
  const lines = reports.map(r =>
    `${r.name.padEnd(20)} ${r.tier.padEnd(8)} ${percent(r.quality).padEnd(8)} ${percent(r.successRate).padEnd(8)} ${r.length}`
  );
  return [header, '-'.repeat(header.length), ...lines].join('\n');
}

export function ratingMessage(rating: number): string {
  if (rating >= 8) return 'Thank you for the great rating!';
  if (rating >= 6) return 'Thanks for your feedback!';
  return 'Thank you for the honest feedback!';
}
