import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { createMigrationPlan, createStderrLogger, isPyscopeError, loadConfig, loadMapping, scanProject } from '@pyscope/parser';
import { OUTPUT_FORMATS, formatPlan } from '../formatters/index.js';
import type { OutputFormat } from '../formatters/index.js';

interface PlanOptions {
  mapping: string;
  format: string;
  verbose?: boolean;
}

function isOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some(known => known === format);
}

/**
 * Scan a project and print where each file would move under a mapping.
 * Nothing is moved. Exits 1 when the plan has errors.
 */
export async function planCommand(directory: string, options: PlanOptions): Promise<void> {
  const { format } = options;
  if (!isOutputFormat(format)) {
    console.error(chalk.red(`Error: Invalid --format value "${format}". Must be one of: ${OUTPUT_FORMATS.join(', ')}`));
    process.exit(1);
    return;
  }

  if (!fs.existsSync(directory)) {
    console.error(chalk.red(`Error: Path not found: ${directory}`));
    process.exit(1);
    return;
  }

  try {
    const logger = createStderrLogger({ verbose: options.verbose ?? false });
    const mapping = loadMapping(options.mapping);
    const root = path.resolve(directory);
    const project = await scanProject(root, { config: loadConfig(root), logger });
    const plan = createMigrationPlan(project.files, mapping, { logger });

    console.log(formatPlan(plan, format));

    if (plan.errors.length > 0) {
      process.exit(1);
    }
  } catch (error) {
    if (isPyscopeError(error)) {
      console.error(chalk.red(`Error: ${error.message}`));
    } else {
      console.error(chalk.red('Error planning migration:'), error);
    }
    process.exit(1);
  }
}
