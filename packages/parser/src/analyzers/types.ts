import type { Literal, LiteralKind } from '../ast/literal.js';
import type { NodeFault } from '../ast/traversal.js';
import type { AnalysisError, ParseError } from '../errors/index.js';

/**
 * Capability shared by every per-file analyzer.
 *
 * Implementations keep no state between calls beyond their injected
 * thresholds and logger, so one instance may analyze any number of files.
 */
export interface Analyzer<R> {
  readonly name: string;
  analyze(source: string, filePath?: string): R;
}

/**
 * Why a file produced no tables.
 * - parse: unreadable or not valid Python
 * - analysis: unexpected failure while extracting or measuring
 */
export type FailureKind = 'parse' | 'analysis';

/**
 * All-or-nothing outcome for one file. A failure carries the typed error,
 * its message and the same tables, empty.
 */
export type AnalysisResult<Tables> =
  | (Tables & { success: true; filePath?: string })
  | (Tables & {
      success: false;
      filePath?: string;
      failureKind: FailureKind;
      message: string;
      error: ParseError | AnalysisError;
    });

// =============================================================================
// STRUCTURE
// =============================================================================

export interface ClassInfo {
  name: string;
  /** Dotted base names in declaration order */
  bases: string[];
  /** Direct method names in declaration order (duplicates kept) */
  methods: string[];
  instanceVars: ReadonlySet<string>;
  /** Bases plus classes whose name occurs inside one of this class's method names */
  dependencies: ReadonlySet<string>;
  lineCount: number;
  startLine: number;
  endLine: number;
  docstring: string | null;
  /** Name of the class this one is nested in */
  enclosingClass: string | null;
}

export interface StructureTables {
  classes: ReadonlyMap<string, ClassInfo>;
  /** Class name → dependency names */
  relationships: ReadonlyMap<string, ReadonlySet<string>>;
  /** Class or base name → local direct subclasses */
  inheritanceTree: ReadonlyMap<string, string[]>;
  /** Local alias → imported qualified name */
  imports: ReadonlyMap<string, string>;
}

export type StructureAnalysis = AnalysisResult<StructureTables>;

// =============================================================================
// COMPLEXITY
// =============================================================================

export interface MethodComplexity {
  name: string;
  cyclomaticComplexity: number;
  lineCount: number;
  parameterCount: number;
  localVarCount: number;
  returnCount: number;
  nestedDepth: number;
}

export interface ClassComplexity {
  name: string;
  methodCount: number;
  totalLineCount: number;
  instanceVarCount: number;
  methods: ReadonlyMap<string, MethodComplexity>;
  couplingScore: number;
  /** Number of declared bases (not the depth of the ancestor chain) */
  inheritanceDepth: number;
}

export type RiskKind = 'class' | 'method';

export type RiskMetric = 'methodCount' | 'totalLineCount' | 'cyclomaticComplexity' | 'nestedDepth';

export interface RiskArea {
  kind: RiskKind;
  /** `Class` or `Class.method` */
  location: string;
  issue: string;
  metric: RiskMetric;
  value: number;
  threshold: number;
}

export interface ComplexityTables {
  totalComplexity: number;
  globalScopeComplexity: number;
  classes: ReadonlyMap<string, ClassComplexity>;
  /** Paired 1:1 with suggestions */
  riskAreas: RiskArea[];
  suggestions: string[];
  /** Nodes the global-scope walk could not score */
  visitFaults: NodeFault[];
}

export type ComplexityAnalysis = AnalysisResult<ComplexityTables>;

// =============================================================================
// CONFIGURATION ITEMS
// =============================================================================

export type ConfigLocation = 'module' | 'class' | 'function';

export interface ConfigItem {
  name: string;
  value: Literal;
  location: ConfigLocation;
  /** `module`, `class Name` or `function name` */
  context: string;
  lineNumber: number;
  suggestion: string;
}

export interface ConfigTables {
  configItems: ConfigItem[];
  totalItems: number;
  byLocation: ReadonlyMap<ConfigLocation, ConfigItem[]>;
  byType: ReadonlyMap<LiteralKind, ConfigItem[]>;
}

export type ConfigAnalysis = AnalysisResult<ConfigTables>;
