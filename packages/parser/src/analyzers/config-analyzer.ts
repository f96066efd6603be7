import type Parser from 'tree-sitter';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ParentLinks } from '../ast/parent-links.js';
import { decodeLiteral, type Literal, type LiteralKind } from '../ast/literal.js';
import {
  CLASS_DEFINITION,
  FUNCTION_DEFINITION,
  getAssignedValue,
  getDefinitionName,
  getPositionalParameters,
  getSimpleAssignmentTargets,
} from '../ast/python.js';
import { runAnalysis } from './base.js';
import type {
  Analyzer,
  ConfigAnalysis,
  ConfigItem,
  ConfigLocation,
  ConfigTables,
} from './types.js';

// =============================================================================
// PATTERNS
// =============================================================================

const NAME_PREFIXES = ['CONFIG_', 'DEFAULT_', 'SETTINGS_', 'PARAM_'];
const NAME_SUFFIXES = ['_CONFIG', '_SETTINGS', '_OPTIONS', '_DEFAULTS', '_PARAMS'];
const NAME_WORDS = ['CONFIGURATION', 'SETTINGS', 'OPTIONS', 'PARAMETERS'];

const PATH_PATTERN = /^(?:\/|[A-Za-z]:\\)|^.*\.(?:txt|json|yml|yaml|cfg|conf)$/;
const URL_PATTERN = /^(?:http|https|ftp):\/\//;
const MAGIC_NUMBERS: ReadonlySet<number> = new Set([0, 1, 100, 1000, 60, 24, 365]);

/**
 * Whether a variable name looks like configuration: a known prefix, suffix
 * or word (case-insensitive), or CONSTANT_CASE containing an underscore.
 */
export function isConfigName(name: string): boolean {
  const upper = name.toUpperCase();
  if (NAME_PREFIXES.some(prefix => upper.startsWith(prefix))) return true;
  if (NAME_SUFFIXES.some(suffix => upper.endsWith(suffix))) return true;
  if (NAME_WORDS.some(word => upper.includes(word))) return true;

  return name.includes('_') && /[A-Z]/.test(name) && name === upper;
}

/** Numeric reading of a literal; booleans count as 0 and 1 */
function numericValue(literal: Literal): number | null {
  switch (literal.kind) {
    case 'integer':
    case 'float':
      return literal.value;
    case 'boolean':
      return literal.value ? 1 : 0;
    default:
      return null;
  }
}

function isMagicNumber(literal: Literal): boolean {
  const value = numericValue(literal);
  return value !== null && MAGIC_NUMBERS.has(value);
}

/**
 * Whether a default argument value looks like configuration: a path, a
 * URL, a magic number or any collection.
 */
export function isConfigValue(literal: Literal): boolean {
  switch (literal.kind) {
    case 'text':
      return PATH_PATTERN.test(literal.value) || URL_PATTERN.test(literal.value);
    case 'sequence':
    case 'mapping':
      return true;
    default:
      return isMagicNumber(literal);
  }
}

function formatNumber(literal: Literal): string {
  switch (literal.kind) {
    case 'boolean':
      return literal.value ? 'True' : 'False';
    case 'float':
      return Number.isInteger(literal.value) ? literal.value.toFixed(1) : String(literal.value);
    case 'integer':
      return String(literal.value);
    default:
      return '';
  }
}

export function suggestFor(name: string, literal: Literal): string {
  if (literal.kind === 'text') {
    if (PATH_PATTERN.test(literal.value)) return `Move path '${name}' to configuration file`;
    if (URL_PATTERN.test(literal.value)) return `Move URL '${name}' to configuration file`;
  } else if (literal.kind === 'sequence' || literal.kind === 'mapping') {
    return `Move collection '${name}' to configuration file`;
  } else if (isMagicNumber(literal)) {
    return `Replace magic number '${formatNumber(literal)}' with configured value`;
  }
  return `Consider making '${name}' configurable`;
}

// =============================================================================
// DETECTION
// =============================================================================

interface ScopeContext {
  location: ConfigLocation;
  context: string;
}

const SCOPE_TYPES: ReadonlySet<string> = new Set([CLASS_DEFINITION, FUNCTION_DEFINITION]);

function resolveScope(node: Parser.SyntaxNode, links: ParentLinks): ScopeContext {
  const scope = links.findEnclosing(node, SCOPE_TYPES);
  if (!scope) return { location: 'module', context: 'module' };

  const name = getDefinitionName(scope) ?? '';
  return scope.type === CLASS_DEFINITION
    ? { location: 'class', context: `class ${name}` }
    : { location: 'function', context: `function ${name}` };
}

function assignmentItems(node: Parser.SyntaxNode, links: ParentLinks): ConfigItem[] {
  // Inner links of a chained assignment are handled with the outermost one
  if (links.parentOf(node)?.type !== 'expression_statement') return [];

  const valueNode = getAssignedValue(node);
  if (!valueNode) return [];

  const value = decodeLiteral(valueNode);
  if (value.kind === 'none' || value.kind === 'unknown') return [];

  const scope = resolveScope(node, links);
  return getSimpleAssignmentTargets(node)
    .filter(isConfigName)
    .map(name => ({
      name,
      value,
      ...scope,
      lineNumber: node.startPosition.row + 1,
      suggestion: suggestFor(name, value),
    }));
}

function defaultArgumentItems(fn: Parser.SyntaxNode): ConfigItem[] {
  const fnName = getDefinitionName(fn) ?? '';
  const items: ConfigItem[] = [];

  for (const param of getPositionalParameters(fn)) {
    if (!param.defaultValue) continue;
    const value = decodeLiteral(param.defaultValue);
    if (!isConfigValue(value)) continue;

    items.push({
      name: `${fnName}_${param.name}_default`,
      value,
      location: 'function',
      context: `function ${fnName}`,
      lineNumber: fn.startPosition.row + 1,
      suggestion: `Consider making '${param.name}' configurable`,
    });
  }

  return items;
}

function groupBy<K, T>(items: T[], key: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

export function emptyConfigTables(): ConfigTables {
  return {
    configItems: [],
    totalItems: 0,
    byLocation: new Map(),
    byType: new Map(),
  };
}

/**
 * Finds hard-coded configuration: config-like constants and suspicious
 * default argument values.
 */
export class ConfigAnalyzer implements Analyzer<ConfigAnalysis> {
  readonly name = 'ConfigAnalyzer';
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  analyze(source: string, filePath?: string): ConfigAnalysis {
    return runAnalysis({
      analyzerName: this.name,
      source,
      filePath,
      logger: this.logger,
      empty: emptyConfigTables,
      body: ({ root, links }) => {
        const configItems: ConfigItem[] = [];

        for (const node of root.descendantsOfType(['assignment', FUNCTION_DEFINITION])) {
          if (node.type === FUNCTION_DEFINITION) {
            configItems.push(...defaultArgumentItems(node));
          } else {
            configItems.push(...assignmentItems(node, links));
          }
        }

        return {
          configItems,
          totalItems: configItems.length,
          byLocation: groupBy<ConfigLocation, ConfigItem>(configItems, item => item.location),
          byType: groupBy<LiteralKind, ConfigItem>(configItems, item => item.value.kind),
        };
      },
    });
  }
}
