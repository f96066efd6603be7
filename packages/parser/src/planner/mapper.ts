import * as fs from 'fs';
import path from 'path';
import ignore, { type Ignore } from 'ignore';
import { minimatch } from 'minimatch';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { FILE_TYPES, type FileType, type ProjectFile } from '../scanner.js';
import { migrationMappingSchema, type MappingRule, type MigrationMapping } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PlannedMove {
  source: string;
  target: string;
  /** The rule pattern that won */
  pattern: string;
}

export interface IgnoredFile {
  path: string;
  reason: string;
}

export interface MigrationPlan {
  moves: PlannedMove[];
  /** Directories to create, in first-seen order */
  creates: string[];
  ignores: IgnoredFile[];
  warnings: string[];
  /** Blocking problems; a plan with errors should not be applied */
  errors: string[];
}

export interface PlanSummary {
  totalMoves: number;
  totalCreates: number;
  totalIgnores: number;
  totalWarnings: number;
  totalErrors: number;
  hasErrors: boolean;
}

export interface PlanOptions {
  logger?: Logger;
}

// =============================================================================
// LOADING
// =============================================================================

/**
 * Load and validate a migration mapping file.
 *
 * @throws ConfigError when the file is missing, not YAML, or fails validation
 */
export function loadMapping(mappingPath: string): MigrationMapping {
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(mappingPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read mapping ${mappingPath}: ${getErrorMessage(error)}`, {
      path: mappingPath,
    });
  }

  const result = migrationMappingSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid mapping ${mappingPath}:\n  ${issues.join('\n  ')}`, {
      path: mappingPath,
      issues,
    });
  }

  return result.data;
}

// =============================================================================
// TARGET PATHS
// =============================================================================

/**
 * Fill `{name}`, `{stem}`, `{parent}` and `{ext}` in a target template.
 *
 * @throws ConfigError when a brace is left over after substitution
 */
export function resolveTargetPath(source: string, template: string): string {
  const name = path.posix.basename(source);
  const ext = path.posix.extname(name);
  const dir = path.posix.dirname(source);
  const replacements: Record<string, string> = {
    name,
    stem: ext ? name.slice(0, -ext.length) : name,
    parent: dir === '.' ? '' : path.posix.basename(dir),
    ext: ext.slice(1),
  };

  let result = template;
  for (const [key, value] of Object.entries(replacements)) {
    result = result.replaceAll(`{${key}}`, value);
  }

  if (result.includes('{') || result.includes('}')) {
    throw new ConfigError(`Unresolved placeholders in target path: ${result}`, { source, template });
  }
  return result;
}

// =============================================================================
// PLANNING
// =============================================================================

/** Directories named by `requiredDirs` and by each target's prefix before its first placeholder */
function plannedDirectories(mapping: MigrationMapping): string[] {
  const creates = [...mapping.validation.requiredDirs];
  for (const rules of Object.values(mapping.patterns)) {
    for (const rule of rules) {
      const brace = rule.target.indexOf('{');
      if (brace < 0) continue;
      const dir = rule.target.slice(0, brace).replace(/\/+$/, '');
      if (dir && !creates.includes(dir)) creates.push(dir);
    }
  }
  return creates;
}

function matchRule(filePath: string, rules: MappingRule[]): MappingRule | null {
  let matched: MappingRule | null = null;
  let highestPriority = -1;
  for (const rule of rules) {
    // Earlier rules win ties
    if (rule.priority > highestPriority && minimatch(filePath, rule.pattern, { matchBase: true, dot: true })) {
      matched = rule;
      highestPriority = rule.priority;
    }
  }
  return matched;
}

function checkDuplicateTargets(plan: MigrationPlan): void {
  const seen = new Map<string, string>();
  for (const move of plan.moves) {
    const previous = seen.get(move.target);
    if (previous !== undefined) {
      plan.errors.push(`Duplicate target path ${move.target} for files: ${previous} and ${move.source}`);
    }
    seen.set(move.target, move.source);
  }
}

function checkFileSizes(plan: MigrationPlan, mapping: MigrationMapping, sizes: Map<string, number>): void {
  for (const check of mapping.validation.fileChecks) {
    if (check.maxSize === undefined) continue;
    for (const move of plan.moves) {
      if (path.posix.extname(move.source).slice(1) !== check.type) continue;
      const size = sizes.get(move.source) ?? 0;
      if (size > check.maxSize) {
        plan.warnings.push(
          `File ${move.source} exceeds maximum size for ${check.type}: ${size} > ${check.maxSize} bytes`,
        );
      }
    }
  }
}

/**
 * Plan where each scanned file moves under a mapping.
 *
 * Files are visited by type, then in scan order. A file matching an ignore
 * rule is not moved; otherwise the highest-priority matching rule for its
 * type decides the target. Nothing on disk is touched.
 */
export function createMigrationPlan(
  files: Record<FileType, ProjectFile[]>,
  mapping: MigrationMapping,
  options: PlanOptions = {},
): MigrationPlan {
  const logger = options.logger ?? silentLogger;
  const plan: MigrationPlan = {
    moves: [],
    creates: plannedDirectories(mapping),
    ignores: [],
    warnings: [],
    errors: [],
  };

  const ignoreRules = mapping.special.ignore.map((pattern): [string, Ignore] => [pattern, ignore().add(pattern)]);
  const rulesByType = new Map(Object.entries(mapping.patterns));
  const sizes = new Map<string, number>();

  for (const type of FILE_TYPES) {
    const typeFiles = files[type];
    if (typeFiles.length === 0) continue;

    const rules = rulesByType.get(type);
    if (!rules) {
      plan.warnings.push(`No mapping rules for file type: ${type}`);
      continue;
    }

    for (const file of typeFiles) {
      sizes.set(file.path, file.size);

      const ignoredBy = ignoreRules.find(([, ig]) => ig.ignores(file.path));
      if (ignoredBy) {
        plan.ignores.push({ path: file.path, reason: `Matched ignore pattern: ${ignoredBy[0]}` });
        continue;
      }

      const rule = matchRule(file.path, rules);
      if (!rule) {
        plan.warnings.push(`No matching pattern for file: ${file.path}`);
        continue;
      }

      try {
        plan.moves.push({
          source: file.path,
          target: resolveTargetPath(file.path, rule.target),
          pattern: rule.pattern,
        });
      } catch (error) {
        plan.errors.push(`Error planning move for ${file.path}: ${getErrorMessage(error)}`);
      }
    }
  }

  checkDuplicateTargets(plan);
  checkFileSizes(plan, mapping, sizes);

  logger.info(
    `Migration plan: ${plan.moves.length} moves, ${plan.ignores.length} ignored, ` +
      `${plan.warnings.length} warnings, ${plan.errors.length} errors`,
  );
  return plan;
}

export function summarizePlan(plan: MigrationPlan): PlanSummary {
  return {
    totalMoves: plan.moves.length,
    totalCreates: plan.creates.length,
    totalIgnores: plan.ignores.length,
    totalWarnings: plan.warnings.length,
    totalErrors: plan.errors.length,
    hasErrors: plan.errors.length > 0,
  };
}
