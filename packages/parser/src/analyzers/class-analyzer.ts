import type Parser from 'tree-sitter';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ParentLinks } from '../ast/parent-links.js';
import {
  CLASS_DEFINITION,
  FUNCTION_DEFINITION,
  countLines,
  extractDocstring,
  getBodyStatements,
  getClassBases,
  getDefinitionName,
  getLineRange,
  getSimpleAssignmentTargets,
  getStatementAssignment,
} from '../ast/python.js';
import { runAnalysis } from './base.js';
import { extractImports } from './imports.js';
import type { Analyzer, ClassInfo, StructureAnalysis, StructureTables } from './types.js';

export function emptyStructureTables(): StructureTables {
  return {
    classes: new Map(),
    relationships: new Map(),
    inheritanceTree: new Map(),
    imports: new Map(),
  };
}

/** Names of functions defined directly in a class body, in order */
export function getDirectMethods(classNode: Parser.SyntaxNode): string[] {
  const methods: string[] = [];
  for (const statement of getBodyStatements(classNode)) {
    if (statement.type !== FUNCTION_DEFINITION) continue;
    const name = getDefinitionName(statement);
    if (name) methods.push(name);
  }
  return methods;
}

/** Plain assignment targets among the direct statements of a class body */
export function getClassVariables(classNode: Parser.SyntaxNode): Set<string> {
  const vars = new Set<string>();
  for (const statement of getBodyStatements(classNode)) {
    const assignment = getStatementAssignment(statement);
    if (!assignment) continue;
    for (const target of getSimpleAssignmentTargets(assignment)) {
      vars.add(target);
    }
  }
  return vars;
}

/**
 * Bases plus every other known class whose name occurs inside one of this
 * class's method names. Matches method identifiers only, never bodies.
 */
function inferDependencies(
  name: string,
  bases: string[],
  methods: string[],
  knownClasses: ReadonlySet<string>,
): Set<string> {
  const dependencies = new Set(bases);

  for (const candidate of knownClasses) {
    if (candidate === name) continue;
    if (methods.some(method => method.includes(candidate))) {
      dependencies.add(candidate);
    }
  }

  dependencies.delete(name);
  return dependencies;
}

function collectClasses(root: Parser.SyntaxNode, links: ParentLinks): Map<string, ClassInfo> {
  const classNodes = root.descendantsOfType(CLASS_DEFINITION);
  const knownClasses = new Set<string>();
  for (const node of classNodes) {
    const name = getDefinitionName(node);
    if (name) knownClasses.add(name);
  }

  const classes = new Map<string, ClassInfo>();
  for (const node of classNodes) {
    const name = getDefinitionName(node);
    if (!name) continue;

    const bases = getClassBases(node);
    const methods = getDirectMethods(node);
    const enclosing = links.findEnclosingClass(node);

    classes.set(name, {
      name,
      bases,
      methods,
      instanceVars: getClassVariables(node),
      dependencies: inferDependencies(name, bases, methods, knownClasses),
      lineCount: countLines(node),
      ...getLineRange(node),
      docstring: extractDocstring(node),
      enclosingClass: enclosing ? getDefinitionName(enclosing) : null,
    });
  }

  return classes;
}

/**
 * Class name → local direct subclasses. Bases that are never defined in
 * the file still get an entry.
 */
export function buildInheritanceTree(classes: ReadonlyMap<string, ClassInfo>): Map<string, string[]> {
  const tree = new Map<string, string[]>();
  const entry = (name: string): string[] => {
    let children = tree.get(name);
    if (!children) {
      children = [];
      tree.set(name, children);
    }
    return children;
  };

  for (const info of classes.values()) {
    entry(info.name);
    for (const base of info.bases) {
      entry(base).push(info.name);
    }
  }

  return tree;
}

/**
 * Extracts classes, their inheritance and a heuristic dependency model
 * from one Python file.
 */
export class StructureAnalyzer implements Analyzer<StructureAnalysis> {
  readonly name = 'StructureAnalyzer';
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  analyze(source: string, filePath?: string): StructureAnalysis {
    return runAnalysis({
      analyzerName: this.name,
      source,
      filePath,
      logger: this.logger,
      empty: emptyStructureTables,
      body: ({ root, links }) => {
        const classes = collectClasses(root, links);
        const relationships = new Map<string, ReadonlySet<string>>();
        for (const info of classes.values()) {
          relationships.set(info.name, info.dependencies);
        }

        return {
          classes,
          relationships,
          inheritanceTree: buildInheritanceTree(classes),
          imports: extractImports(root),
        };
      },
    });
  }
}
