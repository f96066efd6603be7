/**
 * Hand-built analysis results for formatter and command tests.
 */

import { AnalysisError, ParseError } from '@pyscope/parser';
import type {
  ConfigItem,
  ConfigLocation,
  FailureKind,
  FileAnalysis,
  LiteralKind,
  ProjectSummary,
} from '@pyscope/parser';

/**
 * Two classes, one cyclomatic risk on `Square.area` and one module-level
 * configuration item.
 */
export function createShapesAnalysis(): FileAnalysis {
  const maxSides: ConfigItem = {
    name: 'MAX_SIDES',
    value: { kind: 'integer', value: 4 },
    location: 'module',
    context: 'module',
    lineNumber: 1,
    suggestion: "Consider making 'MAX_SIDES' configurable",
  };

  return {
    path: 'shapes.py',
    structure: {
      success: true,
      classes: new Map([
        ['Shape', {
          name: 'Shape', bases: [], methods: ['area'], instanceVars: new Set(['sides']),
          dependencies: new Set<string>(), lineCount: 4, startLine: 3, endLine: 6,
          docstring: null, enclosingClass: null,
        }],
        ['Square', {
          name: 'Square', bases: ['Shape'], methods: ['area'], instanceVars: new Set<string>(),
          dependencies: new Set(['Shape']), lineCount: 16, startLine: 8, endLine: 23,
          docstring: 'A square.', enclosingClass: null,
        }],
      ]),
      relationships: new Map([['Shape', new Set<string>()], ['Square', new Set(['Shape'])]]),
      inheritanceTree: new Map([['Shape', ['Square']]]),
      imports: new Map([['math', 'math']]),
    },
    complexity: {
      success: true,
      totalComplexity: 3.4,
      globalScopeComplexity: 0,
      classes: new Map([
        ['Shape', {
          name: 'Shape', methodCount: 1, totalLineCount: 4, instanceVarCount: 1, couplingScore: 0.3, inheritanceDepth: 0,
          methods: new Map([['area', {
            name: 'area', cyclomaticComplexity: 1, lineCount: 2, parameterCount: 1,
            localVarCount: 0, returnCount: 1, nestedDepth: 0,
          }]]),
        }],
        ['Square', {
          name: 'Square', methodCount: 1, totalLineCount: 16, instanceVarCount: 0, couplingScore: 0.5, inheritanceDepth: 1,
          methods: new Map([['area', {
            name: 'area', cyclomaticComplexity: 12, lineCount: 15, parameterCount: 1,
            localVarCount: 2, returnCount: 12, nestedDepth: 1,
          }]]),
        }],
      ]),
      riskAreas: [{
        kind: 'method', location: 'Square.area', issue: 'high cyclomatic complexity',
        metric: 'cyclomaticComplexity', value: 12, threshold: 10,
      }],
      suggestions: ['Square.area: Simplify method logic'],
      visitFaults: [],
    },
    config: {
      success: true,
      configItems: [maxSides],
      totalItems: 1,
      byLocation: new Map<ConfigLocation, ConfigItem[]>([['module', [maxSides]]]),
      byType: new Map<LiteralKind, ConfigItem[]>([['integer', [maxSides]]]),
    },
  };
}

/** Every analyzer failed with the same message */
export function createFailedAnalysis(failureKind: FailureKind = 'parse', message = 'invalid syntax at line 1'): FileAnalysis {
  const error = failureKind === 'parse' ? new ParseError(message, 'broken.py') : new AnalysisError(message, 'broken.py');
  const failure = { success: false as const, failureKind, message, error };
  return {
    path: 'broken.py',
    structure: {
      ...failure,
      classes: new Map(),
      relationships: new Map(),
      inheritanceTree: new Map(),
      imports: new Map(),
    },
    complexity: {
      ...failure,
      totalComplexity: 0,
      globalScopeComplexity: 0,
      classes: new Map(),
      riskAreas: [],
      suggestions: [],
      visitFaults: [],
    },
    config: { ...failure, configItems: [], totalItems: 0, byLocation: new Map(), byType: new Map() },
  };
}

export function createTestSummary(overrides?: Partial<ProjectSummary>): ProjectSummary {
  return {
    pythonFiles: 2,
    analyzedFiles: 1,
    failedFiles: 1,
    classCount: 2,
    riskCount: 1,
    totalComplexity: 3.4,
    ...overrides,
  };
}
