import chalk from 'chalk';
import { summarizePlan } from '@pyscope/parser';
import type { MigrationPlan } from '@pyscope/parser';
import type { OutputFormat } from './types.js';

function section(title: string, entries: string[]): string[] {
  if (entries.length === 0) return [];
  return [chalk.bold(`${title}:`), ...entries, ''];
}

/**
 * Format a migration plan as human-readable text with colors
 */
export function formatPlanText(plan: MigrationPlan): string {
  const summary = summarizePlan(plan);
  const lines = [
    chalk.bold('📦 Migration Plan\n'),
    chalk.bold('Summary:'),
    chalk.dim('  Moves: ') + summary.totalMoves.toString(),
    chalk.dim('  Directories: ') + summary.totalCreates.toString(),
    chalk.dim('  Ignored: ') + summary.totalIgnores.toString(),
    chalk.dim('  Warnings: ') + summary.totalWarnings.toString(),
    chalk.dim('  Errors: ') + summary.totalErrors.toString(),
    '',
    ...section('Create', plan.creates.map(dir => `  ${dir}/`)),
    ...section(
      'Move',
      plan.moves.map(move => `  ${move.source} → ${move.target}` + chalk.dim(` (${move.pattern})`)),
    ),
    ...section('Ignore', plan.ignores.map(file => `  ${file.path}` + chalk.dim(` - ${file.reason}`))),
    ...section('Warnings', plan.warnings.map(warning => chalk.yellow(`  ⚠ ${warning}`))),
    ...section('Errors', plan.errors.map(error => chalk.red(`  ✗ ${error}`))),
  ];

  lines.push(summary.hasErrors ? chalk.red('✗ Plan has errors') : chalk.green('✓ Plan is ready'));
  return lines.join('\n');
}

/**
 * Format a migration plan as JSON, with its summary
 */
export function formatPlanJson(plan: MigrationPlan): string {
  return JSON.stringify({ summary: summarizePlan(plan), ...plan }, null, 2);
}

export function formatPlan(plan: MigrationPlan, format: OutputFormat): string {
  return format === 'json' ? formatPlanJson(plan) : formatPlanText(plan);
}
