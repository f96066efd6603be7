import { glob } from 'glob';
import ignore from 'ignore';
import fs from 'fs/promises';
import path from 'path';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { defaultConfig, type PyscopeConfig } from './config/schema.js';
import { ParseError, PyscopeError, PyscopeErrorCode, getErrorMessage } from './errors/index.js';
import { failure } from './analyzers/base.js';
import { StructureAnalyzer, emptyStructureTables } from './analyzers/class-analyzer.js';
import { ComplexityAnalyzer, emptyComplexityTables } from './analyzers/complexity-analyzer.js';
import { ConfigAnalyzer, emptyConfigTables } from './analyzers/config-analyzer.js';
import type { ComplexityAnalysis, ConfigAnalysis, StructureAnalysis } from './analyzers/types.js';

// =============================================================================
// TYPES
// =============================================================================

export type FileType = 'python' | 'config' | 'docs' | 'git' | 'compiled' | 'other';

export const FILE_TYPES: readonly FileType[] = ['python', 'config', 'docs', 'git', 'compiled', 'other'];

export type SizeBucket = 'small' | 'medium' | 'large';

export interface ProjectFile {
  /** Path relative to the scanned root, `/`-separated */
  path: string;
  size: number;
  type: FileType;
}

export interface ProjectStats {
  totalDirs: number;
  totalFiles: number;
  byType: Record<FileType, number>;
  bySize: Record<SizeBucket, number>;
}

export interface FileAnalysis {
  path: string;
  structure: StructureAnalysis;
  complexity: ComplexityAnalysis;
  config: ConfigAnalysis;
}

export interface ProjectSummary {
  pythonFiles: number;
  /** Files whose structure and complexity analyses both succeeded */
  analyzedFiles: number;
  failedFiles: number;
  classCount: number;
  riskCount: number;
  totalComplexity: number;
}

export interface ProjectAnalysis {
  rootDir: string;
  stats: ProjectStats;
  files: Record<FileType, ProjectFile[]>;
  analyses: FileAnalysis[];
  summary: ProjectSummary;
}

export interface ScanOptions {
  config?: PyscopeConfig;
  logger?: Logger;
  /** Directory (absolute or relative to rootDir) left out of the scan */
  utilityDir?: string;
}

/** Always skipped, whatever the configuration says */
export const ALWAYS_IGNORE_PATTERNS = ['.git/**', '**/.git/**', '**/node_modules/**'];

const SMALL_FILE_LIMIT = 10 * 1024;
const MEDIUM_FILE_LIMIT = 100 * 1024;

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classify a file by extension and name.
 */
export function detectFileType(filepath: string): FileType {
  const ext = path.extname(filepath).toLowerCase();
  const name = path.basename(filepath).toLowerCase();

  if (ext === '.py') return 'python';
  if (['.yml', '.yaml', '.json', '.cfg', '.conf'].includes(ext)) return 'config';
  if (['.md', '.txt', '.rst'].includes(ext)) return 'docs';
  if (name.startsWith('.git')) return 'git';
  if (ext === '.pyc' || ext === '.pyo' || filepath.split(/[\\/]/).includes('__pycache__')) {
    return 'compiled';
  }
  return 'other';
}

export function sizeBucket(size: number): SizeBucket {
  if (size < SMALL_FILE_LIMIT) return 'small';
  if (size < MEDIUM_FILE_LIMIT) return 'medium';
  return 'large';
}

// =============================================================================
// FILE ANALYSIS
// =============================================================================

export interface FileAnalyzers {
  structure: StructureAnalyzer;
  complexity: ComplexityAnalyzer;
  config: ConfigAnalyzer;
}

export function createAnalyzers(config: PyscopeConfig, logger: Logger): FileAnalyzers {
  return {
    structure: new StructureAnalyzer({ logger }),
    complexity: new ComplexityAnalyzer({ thresholds: config.thresholds, logger }),
    config: new ConfigAnalyzer({ logger }),
  };
}

/**
 * Read one file and run every analyzer on it. A file that cannot be read
 * yields parse failures instead of throwing.
 */
export async function analyzeFile(
  filePath: string,
  analyzers: FileAnalyzers,
  logger: Logger = silentLogger,
  displayPath: string = filePath,
): Promise<FileAnalysis> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = `Failed to read ${displayPath}: ${getErrorMessage(error)}`;
    logger.error(message);
    const readError = new ParseError(message, displayPath);
    return {
      path: displayPath,
      structure: failure(emptyStructureTables(), readError, displayPath),
      complexity: failure(emptyComplexityTables(), readError, displayPath),
      config: failure(emptyConfigTables(), readError, displayPath),
    };
  }

  return {
    path: displayPath,
    structure: analyzers.structure.analyze(source, displayPath),
    complexity: analyzers.complexity.analyze(source, displayPath),
    config: analyzers.config.analyze(source, displayPath),
  };
}

/**
 * Roll per-file results up into project totals
 */
export function summarize(analyses: FileAnalysis[]): ProjectSummary {
  const summary: ProjectSummary = {
    pythonFiles: analyses.length,
    analyzedFiles: 0,
    failedFiles: 0,
    classCount: 0,
    riskCount: 0,
    totalComplexity: 0,
  };

  for (const analysis of analyses) {
    if (!analysis.structure.success || !analysis.complexity.success) {
      summary.failedFiles++;
      continue;
    }
    summary.analyzedFiles++;
    summary.classCount += analysis.structure.classes.size;
    summary.riskCount += analysis.complexity.riskAreas.length;
    summary.totalComplexity += analysis.complexity.totalComplexity;
  }

  return summary;
}

// =============================================================================
// PROJECT SCAN
// =============================================================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the root .gitignore into an ignore instance (empty when absent).
 */
async function loadGitignore(rootDir: string): Promise<ReturnType<typeof ignore>> {
  try {
    const content = await fs.readFile(path.join(rootDir, '.gitignore'), 'utf-8');
    return ignore().add(content);
  } catch (error) {
    if (isMissingFile(error)) return ignore();
    throw error;
  }
}

function isInside(dir: string, target: string): boolean {
  const relative = path.relative(dir, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

function emptyFileIndex(): Record<FileType, ProjectFile[]> {
  return { python: [], config: [], docs: [], git: [], compiled: [], other: [] };
}

/**
 * Walk a project directory, classify every file and analyze each Python
 * file. Results are kept per file.
 */
export async function scanProject(rootDir: string, options: ScanOptions = {}): Promise<ProjectAnalysis> {
  const config = options.config ?? defaultConfig;
  const logger = options.logger ?? silentLogger;
  const root = path.resolve(rootDir);
  const utilityDir = options.utilityDir ? path.resolve(root, options.utilityDir) : null;

  const rootStat = await fs.stat(root).catch((error: unknown) => {
    throw new PyscopeError(
      `Cannot scan ${rootDir}: ${getErrorMessage(error)}`,
      PyscopeErrorCode.FILE_NOT_READABLE,
      { rootDir },
    );
  });
  if (!rootStat.isDirectory()) {
    throw new PyscopeError(`Not a directory: ${rootDir}`, PyscopeErrorCode.INVALID_INPUT, { rootDir });
  }

  logger.info(`Scanning directory: ${root}`);

  const ig = config.scan.respectGitignore ? await loadGitignore(root) : ignore();
  ig.add(['.git/', 'node_modules/', ...config.scan.exclude]);

  const entries = await glob('**', {
    cwd: root,
    dot: true,
    withFileTypes: true,
    stat: true,
    ignore: [...ALWAYS_IGNORE_PATTERNS, ...config.scan.exclude],
  });

  const stats: ProjectStats = {
    totalDirs: 0,
    totalFiles: 0,
    byType: { python: 0, config: 0, docs: 0, git: 0, compiled: 0, other: 0 },
    bySize: { small: 0, medium: 0, large: 0 },
  };
  const files = emptyFileIndex();

  const sorted = entries
    .map(entry => ({ entry, relative: entry.relativePosix() }))
    .filter(({ relative }) => relative !== '' && relative !== '.')
    .sort((a, b) => (a.relative < b.relative ? -1 : a.relative > b.relative ? 1 : 0));

  for (const { entry, relative } of sorted) {
    const absolute = entry.fullpath();
    if (utilityDir && (absolute === utilityDir || isInside(utilityDir, absolute))) continue;

    if (entry.isDirectory()) {
      if (ig.ignores(`${relative}/`)) continue;
      if (entry.name !== '__pycache__') stats.totalDirs++;
      continue;
    }

    if (!entry.isFile() || ig.ignores(relative)) continue;

    const { size } = await fs.stat(absolute);
    const type = detectFileType(relative);

    stats.totalFiles++;
    stats.byType[type]++;
    stats.bySize[sizeBucket(size)]++;
    files[type].push({ path: relative, size, type });
  }

  const analyzers = createAnalyzers(config, logger);
  const analyses: FileAnalysis[] = [];
  for (const file of files.python) {
    analyses.push(await analyzeFile(path.join(root, file.path), analyzers, logger, file.path));
  }

  const summary = summarize(analyses);
  logger.info(
    `Scanned ${stats.totalFiles} files: ${summary.analyzedFiles} analyzed, ${summary.failedFiles} failed`,
  );

  return { rootDir: root, stats, files, analyses, summary };
}
