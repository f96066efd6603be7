import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import {
  analyzeFile,
  createAnalyzers,
  createStderrLogger,
  isPyscopeError,
  loadConfig,
  scanProject,
  summarize,
} from '@pyscope/parser';
import { OUTPUT_FORMATS, formatReport } from '../formatters/index.js';
import type { AnalysisReport, OutputFormat } from '../formatters/index.js';

interface AnalyzeOptions {
  format: string;
  diagram?: boolean;
  failOnRisk?: boolean;
  verbose?: boolean;
}

function isOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some(known => known === format);
}

async function buildReport(target: string, verbose: boolean): Promise<AnalysisReport> {
  const logger = createStderrLogger({ verbose });
  const resolved = path.resolve(target);

  if (fs.statSync(resolved).isDirectory()) {
    const config = loadConfig(resolved);
    const project = await scanProject(resolved, { config, logger });
    return { target, analyses: project.analyses, summary: project.summary, stats: project.stats };
  }

  const config = loadConfig(path.dirname(resolved));
  const analysis = await analyzeFile(resolved, createAnalyzers(config, logger), logger, target);
  return { target, analyses: [analysis], summary: summarize([analysis]) };
}

/**
 * Analyze a Python file or directory and print the report
 */
export async function analyzeCommand(target: string, options: AnalyzeOptions): Promise<void> {
  const { format } = options;
  if (!isOutputFormat(format)) {
    console.error(chalk.red(`Error: Invalid --format value "${format}". Must be one of: ${OUTPUT_FORMATS.join(', ')}`));
    process.exit(1);
    return;
  }

  if (!fs.existsSync(target)) {
    console.error(chalk.red(`Error: Path not found: ${target}`));
    process.exit(1);
    return;
  }

  try {
    const report = await buildReport(target, options.verbose ?? false);
    console.log(formatReport(report, format, { diagram: options.diagram }));

    // Exit code for CI integration
    if (options.failOnRisk && report.summary.riskCount > 0) {
      process.exit(1);
    }
  } catch (error) {
    if (isPyscopeError(error)) {
      console.error(chalk.red(`Error: ${error.message}`));
    } else {
      console.error(chalk.red('Error analyzing target:'), error);
    }
    process.exit(1);
  }
}
