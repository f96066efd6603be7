import chalk from 'chalk';
import { renderDiagram } from '@pyscope/parser';
import type { ClassComplexity, ClassInfo, FailureKind, FileAnalysis, ProjectStats } from '@pyscope/parser';
import type { AnalysisReport, FormatOptions } from './types.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

function formatStats(stats: ProjectStats): string[] {
  const types = Object.entries(stats.byType)
    .filter(([, count]) => count > 0)
    .map(([type, count]) => `${type} ${count}`)
    .join(', ');

  return [
    chalk.dim('  Files: ') +
      `${stats.totalFiles} in ${stats.totalDirs} ${stats.totalDirs === 1 ? 'directory' : 'directories'}`,
    chalk.dim('  By type: ') + (types || 'none'),
    chalk.dim('  By size: ') + `small ${stats.bySize.small}, medium ${stats.bySize.medium}, large ${stats.bySize.large}`,
  ];
}

/**
 * One line per class: bases, method count, span and coupling
 */
function formatClass(info: ClassInfo | undefined, cls: ClassComplexity): string[] {
  const bases = info && info.bases.length > 0 ? `(${info.bases.join(', ')})` : '';
  const lines = [
    `    ${chalk.bold(cls.name + bases)}` +
      chalk.dim(` - ${plural(cls.methodCount, 'method')}, ${plural(cls.totalLineCount, 'line')}, coupling ${cls.couplingScore.toFixed(2)}`),
  ];

  for (const method of cls.methods.values()) {
    lines.push(
      chalk.dim(
        `      ${method.name}() cyclomatic ${method.cyclomaticComplexity}, nesting ${method.nestedDepth}, ` +
          `${plural(method.parameterCount, 'param')}, ${plural(method.lineCount, 'line')}`,
      ),
    );
  }
  return lines;
}

function formatFailure(result: { failureKind: FailureKind; message: string }): string {
  const label = result.failureKind === 'parse' ? 'Parse failed' : 'Analysis failed';
  return chalk.red(`  ✗ ${label}: ${result.message}`);
}

function formatFile(analysis: FileAnalysis, options: FormatOptions): string[] {
  const lines = [chalk.bold(`📄 ${analysis.path}`)];
  const { structure, complexity, config } = analysis;

  if (!structure.success) return [...lines, formatFailure(structure), ''];
  if (!complexity.success) return [...lines, formatFailure(complexity), ''];

  lines.push(
    chalk.dim('  Complexity: ') +
      `${complexity.totalComplexity.toFixed(2)} (global ${complexity.globalScopeComplexity})`,
  );

  if (complexity.classes.size > 0) {
    lines.push(chalk.dim('  Classes:'));
    for (const cls of complexity.classes.values()) {
      lines.push(...formatClass(structure.classes.get(cls.name), cls));
    }
  }

  if (complexity.riskAreas.length > 0) {
    lines.push(chalk.yellow('  ⚠️  Risks:'));
    complexity.riskAreas.forEach((risk, i) => {
      lines.push(chalk.yellow(`    ${risk.location}: ${risk.issue} (${risk.value} > ${risk.threshold})`));
      lines.push(chalk.dim(`      → ${complexity.suggestions[i]}`));
    });
  }

  if (complexity.visitFaults.length > 0) {
    lines.push(chalk.dim(`  Skipped ${plural(complexity.visitFaults.length, 'node')} during scoring`));
  }

  if (config.success && config.totalItems > 0) {
    lines.push(chalk.dim(`  Configuration (${config.totalItems}):`));
    for (const item of config.configItems) {
      lines.push(chalk.dim(`    line ${item.lineNumber} ${item.name} [${item.context}]: ${item.suggestion}`));
    }
  }

  if (options.diagram) {
    lines.push(chalk.dim('  Diagram:'));
    lines.push(renderDiagram(structure));
  }

  lines.push('');
  return lines;
}

/**
 * Format an analysis report as human-readable text with colors
 */
export function formatTextReport(report: AnalysisReport, options: FormatOptions = {}): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(chalk.bold('🔍 Python Analysis\n'));

  lines.push(chalk.bold('Summary:'));
  lines.push(chalk.dim('  Target: ') + report.target);
  if (report.stats) lines.push(...formatStats(report.stats));
  lines.push(chalk.dim('  Python files: ') + `${summary.pythonFiles} (${summary.analyzedFiles} analyzed, ${summary.failedFiles} failed)`);
  lines.push(chalk.dim('  Classes: ') + summary.classCount.toString());
  lines.push(chalk.dim('  Risk areas: ') + summary.riskCount.toString());
  lines.push(chalk.dim('  Total complexity: ') + summary.totalComplexity.toFixed(2));
  lines.push('');

  for (const analysis of report.analyses) {
    lines.push(...formatFile(analysis, options));
  }

  if (summary.riskCount === 0 && summary.failedFiles === 0) {
    lines.push(chalk.green('✓ No risk areas found!'));
  }

  return lines.join('\n');
}
