import type Parser from 'tree-sitter';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ParentLinks } from '../ast/parent-links.js';
import {
  calculateComplexity,
  calculateNestingDepth,
  calculateScopeComplexity,
} from '../ast/complexity/index.js';
import {
  CLASS_DEFINITION,
  FUNCTION_DEFINITION,
  countLines,
  getAllParameterNames,
  getBodyStatements,
  getClassBases,
  getDefinitionName,
  getPositionalParameters,
  resolveDottedName,
} from '../ast/python.js';
import { resolveThresholds, type ThresholdOverrides, type Thresholds } from '../config/schema.js';
import { runAnalysis } from './base.js';
import { getClassVariables } from './class-analyzer.js';
import { classifyRisks } from './risk.js';
import type {
  Analyzer,
  ClassComplexity,
  ComplexityAnalysis,
  ComplexityTables,
  MethodComplexity,
} from './types.js';

// =============================================================================
// WEIGHTS
// =============================================================================

const CLASS_METHOD_WEIGHT = 0.2;
const CLASS_INHERITANCE_WEIGHT = 0.5;
const METHOD_CYCLOMATIC_WEIGHT = 0.3;
const METHOD_NESTING_WEIGHT = 0.2;
const PARAMETER_PENALTY = 0.5;
const COUPLING_PER_NAME = 0.1;

export function emptyComplexityTables(): ComplexityTables {
  return {
    totalComplexity: 0,
    globalScopeComplexity: 0,
    classes: new Map(),
    riskAreas: [],
    suggestions: [],
    visitFaults: [],
  };
}

// =============================================================================
// METHOD METRICS
// =============================================================================

/** Node types whose identifiers are all bound by a destructuring target */
const TARGET_PATTERN_TYPES: ReadonlySet<string> = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'parenthesized_expression',
  'list_splat_pattern',
]);

function collectTargetNames(target: Parser.SyntaxNode | null, into: Set<string>): void {
  if (!target) return;
  if (target.type === 'identifier') {
    into.add(target.text);
    return;
  }
  if (TARGET_PATTERN_TYPES.has(target.type)) {
    for (const child of target.namedChildren) collectTargetNames(child, into);
  }
}

/**
 * Names bound anywhere under a function: assignment and augmented
 * assignment targets, for / comprehension targets, walrus names and
 * `with ... as` aliases.
 */
export function collectBoundNames(fn: Parser.SyntaxNode): Set<string> {
  const names = new Set<string>();
  const body = fn.childForFieldName('body');
  if (!body) return names;

  const bindings = body.descendantsOfType([
    'assignment',
    'augmented_assignment',
    'for_statement',
    'for_in_clause',
    'named_expression',
    'with_item',
  ]);

  for (const node of bindings) {
    switch (node.type) {
      case 'named_expression':
        collectTargetNames(node.childForFieldName('name'), names);
        break;
      case 'with_item': {
        const value = node.childForFieldName('value');
        if (value?.type !== 'as_pattern') break;
        const alias = value.childForFieldName('alias');
        for (const child of alias?.namedChildren ?? []) collectTargetNames(child, names);
        break;
      }
      default:
        collectTargetNames(node.childForFieldName('left'), names);
    }
  }

  return names;
}

export function analyzeMethod(fn: Parser.SyntaxNode): MethodComplexity {
  const parameters = getAllParameterNames(fn);
  const locals = [...collectBoundNames(fn)].filter(name => !parameters.has(name));
  const body = fn.childForFieldName('body');

  return {
    name: getDefinitionName(fn) ?? '',
    cyclomaticComplexity: calculateComplexity(fn),
    lineCount: countLines(fn),
    parameterCount: getPositionalParameters(fn).length,
    localVarCount: locals.length,
    returnCount: body ? body.descendantsOfType('return_statement').length : 0,
    nestedDepth: calculateNestingDepth(fn),
  };
}

// =============================================================================
// CLASS METRICS
// =============================================================================

const PARAMETER_CONTAINERS: ReadonlySet<string> = new Set(['parameters', 'lambda_parameters']);

function isFieldOf(node: Parser.SyntaxNode, parent: Parser.SyntaxNode, field: string): boolean {
  return parent.childForFieldName(field)?.id === node.id;
}

/**
 * Whether an identifier is a reference rather than a declaration site
 * (parameter, keyword-argument name, attribute member or import path).
 */
function isReference(identifier: Parser.SyntaxNode, links: ParentLinks): boolean {
  const parent = links.parentOf(identifier);
  if (!parent) return true;

  switch (parent.type) {
    case 'attribute':
      return !isFieldOf(identifier, parent, 'attribute');
    case 'keyword_argument':
      return !isFieldOf(identifier, parent, 'name');
    case 'default_parameter':
    case 'typed_default_parameter':
      return !isFieldOf(identifier, parent, 'name');
    case 'typed_parameter':
      return parent.firstNamedChild?.id !== identifier.id;
    case 'list_splat_pattern':
    case 'dictionary_splat_pattern': {
      const owner = links.parentOf(parent);
      return !owner || !(PARAMETER_CONTAINERS.has(owner.type) || owner.type === 'typed_parameter');
    }
    case 'dotted_name':
    case 'aliased_import':
      return false;
    default:
      return !PARAMETER_CONTAINERS.has(parent.type);
  }
}

/**
 * 0.1 per distinct name referenced in the class subtree. Attribute chains
 * count once per prefix (`a.b.c` adds `a`, `a.b` and `a.b.c`).
 */
export function calculateCouplingScore(classNode: Parser.SyntaxNode, links: ParentLinks): number {
  const names = new Set<string>();

  for (const node of classNode.descendantsOfType(['identifier', 'attribute'])) {
    if (node.type === 'identifier' && !isReference(node, links)) continue;
    const name = resolveDottedName(node);
    if (name) names.add(name);
  }

  return names.size * COUPLING_PER_NAME;
}

function analyzeClass(classNode: Parser.SyntaxNode, links: ParentLinks): ClassComplexity {
  const methods = new Map<string, MethodComplexity>();
  for (const statement of getBodyStatements(classNode)) {
    if (statement.type !== FUNCTION_DEFINITION) continue;
    const method = analyzeMethod(statement);
    methods.set(method.name, method);
  }

  return {
    name: getDefinitionName(classNode) ?? '',
    methodCount: methods.size,
    totalLineCount: countLines(classNode),
    instanceVarCount: getClassVariables(classNode).size,
    methods,
    couplingScore: calculateCouplingScore(classNode, links),
    inheritanceDepth: getClassBases(classNode).length,
  };
}

/**
 * Weighted file score: global branching plus per-class and per-method terms
 */
export function calculateTotalComplexity(
  globalScopeComplexity: number,
  classes: Iterable<ClassComplexity>,
  thresholds: Thresholds,
): number {
  let total = globalScopeComplexity;

  for (const cls of classes) {
    total +=
      cls.methodCount * CLASS_METHOD_WEIGHT +
      cls.couplingScore +
      cls.inheritanceDepth * CLASS_INHERITANCE_WEIGHT;

    for (const method of cls.methods.values()) {
      total +=
        method.cyclomaticComplexity * METHOD_CYCLOMATIC_WEIGHT +
        method.nestedDepth ** 2 * METHOD_NESTING_WEIGHT +
        (method.parameterCount > thresholds.method.parameters ? PARAMETER_PENALTY : 0);
    }
  }

  return total;
}

// =============================================================================
// ANALYZER
// =============================================================================

/**
 * Per-method, per-class and per-file complexity metrics with risk areas.
 */
export class ComplexityAnalyzer implements Analyzer<ComplexityAnalysis> {
  readonly name = 'ComplexityAnalyzer';
  readonly thresholds: Thresholds;
  private readonly logger: Logger;

  constructor(options: { thresholds?: ThresholdOverrides; logger?: Logger } = {}) {
    this.thresholds = resolveThresholds(options.thresholds);
    this.logger = options.logger ?? silentLogger;
  }

  analyze(source: string, filePath?: string): ComplexityAnalysis {
    return runAnalysis({
      analyzerName: this.name,
      source,
      filePath,
      logger: this.logger,
      empty: emptyComplexityTables,
      body: ({ root, links }) => {
        const global = calculateScopeComplexity(root, this.logger);

        const classes = new Map<string, ClassComplexity>();
        for (const node of root.descendantsOfType(CLASS_DEFINITION)) {
          const cls = analyzeClass(node, links);
          classes.set(cls.name, cls);
        }

        const { riskAreas, suggestions } = classifyRisks(classes.values(), this.thresholds);

        return {
          totalComplexity: calculateTotalComplexity(global.score, classes.values(), this.thresholds),
          globalScopeComplexity: global.score,
          classes,
          riskAreas,
          suggestions,
          visitFaults: global.faults,
        };
      },
    });
  }
}
