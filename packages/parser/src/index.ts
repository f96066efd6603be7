// @pyscope/parser - Python structure and complexity analysis

// =============================================================================
// TYPES
// =============================================================================

export type {
  Analyzer,
  AnalysisResult,
  FailureKind,
  ClassInfo,
  StructureTables,
  StructureAnalysis,
  MethodComplexity,
  ClassComplexity,
  RiskKind,
  RiskMetric,
  RiskArea,
  ComplexityTables,
  ComplexityAnalysis,
  ConfigLocation,
  ConfigItem,
  ConfigTables,
  ConfigAnalysis,
} from './analyzers/types.js';

// =============================================================================
// AST
// =============================================================================

export { parsePython, clearParserCache } from './ast/parser.js';
export type { ASTParseResult } from './ast/parser.js';
export { ParentLinks, annotateParents } from './ast/parent-links.js';
export { walkSafely } from './ast/traversal.js';
export type { NodeFault, NodeVisitor, TraversalResult } from './ast/traversal.js';
export { decodeLiteral, literalToValue } from './ast/literal.js';
export type { Literal, LiteralKind } from './ast/literal.js';
export {
  calculateComplexity,
  calculateNestingDepth,
  calculateScopeComplexity,
} from './ast/complexity/index.js';

// =============================================================================
// ANALYZERS
// =============================================================================

export { StructureAnalyzer, buildInheritanceTree } from './analyzers/class-analyzer.js';
export { ComplexityAnalyzer, calculateTotalComplexity } from './analyzers/complexity-analyzer.js';
export { ConfigAnalyzer } from './analyzers/config-analyzer.js';
export { classifyRisks } from './analyzers/risk.js';
export type { RiskReport } from './analyzers/risk.js';
export { renderDiagram } from './analyzers/diagram.js';
export { extractImports } from './analyzers/imports.js';

// =============================================================================
// SCANNING
// =============================================================================

export {
  scanProject,
  analyzeFile,
  createAnalyzers,
  summarize,
  detectFileType,
  sizeBucket,
  FILE_TYPES,
} from './scanner.js';
export type {
  FileType,
  SizeBucket,
  ProjectFile,
  ProjectStats,
  FileAnalysis,
  FileAnalyzers,
  ProjectSummary,
  ProjectAnalysis,
  ScanOptions,
} from './scanner.js';

// =============================================================================
// MIGRATION PLANNING
// =============================================================================

export { loadMapping, createMigrationPlan, resolveTargetPath, summarizePlan } from './planner/mapper.js';
export type { PlannedMove, IgnoredFile, MigrationPlan, PlanSummary, PlanOptions } from './planner/mapper.js';
export { migrationMappingSchema, mappingRuleSchema } from './planner/schema.js';
export type { MappingRule, MigrationMapping } from './planner/schema.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export { loadConfig, resolveConfigPath, CONFIG_FILENAME } from './config/loader.js';
export {
  DEFAULT_THRESHOLDS,
  defaultConfig,
  resolveThresholds,
  pyscopeConfigSchema,
  thresholdsSchema,
} from './config/schema.js';
export type { PyscopeConfig, Thresholds, ThresholdOverrides } from './config/schema.js';

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export {
  PyscopeError,
  PyscopeErrorCode,
  ConfigError,
  ParseError,
  AnalysisError,
  isPyscopeError,
  getErrorMessage,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';
export { consoleLogger, silentLogger, createStderrLogger } from './logger.js';
export type { Logger } from './logger.js';
