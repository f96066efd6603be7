import type Parser from 'tree-sitter';

// =============================================================================
// NODE TYPES
// =============================================================================

export const CLASS_DEFINITION = 'class_definition';
export const FUNCTION_DEFINITION = 'function_definition';
export const DECORATED_DEFINITION = 'decorated_definition';

/** Branching and looping statements. `elif` is its own node in tree-sitter */
export const CONDITIONAL_TYPES: ReadonlySet<string> = new Set([
  'if_statement',
  'elif_clause',
  'for_statement',
  'while_statement',
]);

export const IF_STATEMENT = 'if_statement';
export const ELIF_CLAUSE = 'elif_clause';
export const ELSE_CLAUSE = 'else_clause';

export const TRY_STATEMENT = 'try_statement';
export const EXCEPT_HANDLER_TYPES: ReadonlySet<string> = new Set([
  'except_clause',
  'except_group_clause',
]);

/** `a and b`, `a or b`. A chain of n operands parses as n - 1 nested nodes */
export const BOOLEAN_OPERATOR = 'boolean_operator';

/** Constructs that open a nesting level */
export const NESTING_TYPES: ReadonlySet<string> = new Set([
  ...CONDITIONAL_TYPES,
  TRY_STATEMENT,
]);

// =============================================================================
// POSITION
// =============================================================================

/** 1-based inclusive line range of a node */
export function getLineRange(node: Parser.SyntaxNode): { startLine: number; endLine: number } {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

/**
 * Count lines spanned by a node (0 when the range is unknown)
 */
export function countLines(node: Parser.SyntaxNode): number {
  const { startLine, endLine } = getLineRange(node);
  return startLine > 0 && endLine > 0 ? endLine - startLine + 1 : 0;
}

// =============================================================================
// NAMES
// =============================================================================

/**
 * Resolve an expression to a dotted identifier.
 *
 * `Base` → "Base", `pkg.mod.Base` → "pkg.mod.Base". Anything else (calls,
 * subscripts, literals) is unresolvable and yields null.
 */
export function resolveDottedName(node: Parser.SyntaxNode): string | null {
  if (node.type === 'identifier') {
    return node.text;
  }

  if (node.type === 'attribute') {
    const object = node.childForFieldName('object');
    const attribute = node.childForFieldName('attribute');
    if (!object || !attribute) return null;

    const prefix = resolveDottedName(object);
    return prefix ? `${prefix}.${attribute.text}` : null;
  }

  return null;
}

/** Name of a class or function definition */
export function getDefinitionName(node: Parser.SyntaxNode): string | null {
  return node.childForFieldName('name')?.text ?? null;
}

/**
 * Unwrap a decorated definition to the class/function it decorates.
 * Other nodes are returned unchanged.
 */
export function unwrapDefinition(node: Parser.SyntaxNode): Parser.SyntaxNode {
  if (node.type === DECORATED_DEFINITION) {
    return node.childForFieldName('definition') ?? node;
  }
  return node;
}

/**
 * Statements directly inside a class or function body, with decorated
 * definitions unwrapped.
 */
export function getBodyStatements(definition: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const body = definition.childForFieldName('body');
  if (!body) return [];
  return body.namedChildren.filter(child => child.type !== 'comment').map(unwrapDefinition);
}

/**
 * Base class names of a class definition, in declaration order.
 * Keyword arguments (`metaclass=Meta`) and unresolvable expressions are skipped.
 */
export function getClassBases(classNode: Parser.SyntaxNode): string[] {
  const superclasses = classNode.childForFieldName('superclasses');
  if (!superclasses) return [];

  const bases: string[] = [];
  for (const argument of superclasses.namedChildren) {
    const name = resolveDottedName(argument);
    if (name) bases.push(name);
  }
  return bases;
}

// =============================================================================
// ASSIGNMENTS
// =============================================================================

/**
 * The assignment node inside an expression statement, if any
 */
export function getStatementAssignment(statement: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (statement.type !== 'expression_statement') return null;
  const expression = statement.firstNamedChild;
  return expression?.type === 'assignment' ? expression : null;
}

/**
 * Identifier targets of a plain assignment statement.
 *
 * `a = b = 1` yields ["a", "b"]. Annotated assignments (`x: int = 1`),
 * tuple targets and attribute targets yield nothing.
 */
export function getSimpleAssignmentTargets(assignment: Parser.SyntaxNode): string[] {
  const targets: string[] = [];
  let current: Parser.SyntaxNode | null = assignment;

  while (current?.type === 'assignment') {
    if (current.childForFieldName('type')) break;

    const left = current.childForFieldName('left');
    if (left?.type === 'identifier') {
      targets.push(left.text);
    }
    current = current.childForFieldName('right');
  }

  return targets;
}

/** The value assigned by a (possibly chained) assignment */
export function getAssignedValue(assignment: Parser.SyntaxNode): Parser.SyntaxNode | null {
  let current: Parser.SyntaxNode | null = assignment.childForFieldName('right');
  while (current?.type === 'assignment') {
    current = current.childForFieldName('right');
  }
  return current;
}

// =============================================================================
// PARAMETERS
// =============================================================================

export interface PositionalParameter {
  name: string;
  defaultValue: Parser.SyntaxNode | null;
}

/** Parameter name of a plain, typed or defaulted parameter node */
function getParameterName(param: Parser.SyntaxNode): string | null {
  switch (param.type) {
    case 'identifier':
      return param.text;
    case 'default_parameter':
    case 'typed_default_parameter':
      return param.childForFieldName('name')?.text ?? null;
    case 'typed_parameter': {
      const inner = param.firstNamedChild;
      return inner?.type === 'identifier' ? inner.text : null;
    }
    default:
      return null;
  }
}

/**
 * Positional parameters of a function: everything before a bare `*`,
 * `*args` or `**kwargs`. Includes `self`/`cls` and positional-only ones.
 */
export function getPositionalParameters(fn: Parser.SyntaxNode): PositionalParameter[] {
  const parameters = fn.childForFieldName('parameters');
  if (!parameters) return [];

  const result: PositionalParameter[] = [];
  for (const param of parameters.namedChildren) {
    if (
      param.type === 'keyword_separator' ||
      param.type === 'list_splat_pattern' ||
      param.type === 'dictionary_splat_pattern'
    ) {
      break;
    }

    const name = getParameterName(param);
    if (name === null) {
      // typed `*args: int` / `**kw: str`
      if (param.type === 'typed_parameter') break;
      continue;
    }

    result.push({ name, defaultValue: param.childForFieldName('value') });
  }
  return result;
}

/** Every parameter name of a function, including `*args` and keyword-only ones */
export function getAllParameterNames(fn: Parser.SyntaxNode): Set<string> {
  const names = new Set<string>();
  const parameters = fn.childForFieldName('parameters');
  if (!parameters) return names;

  for (const param of parameters.namedChildren) {
    const direct = getParameterName(param);
    if (direct) {
      names.add(direct);
      continue;
    }
    const splat = param.type === 'typed_parameter' ? param.firstNamedChild : param;
    const inner = splat?.firstNamedChild;
    if (inner?.type === 'identifier') names.add(inner.text);
  }
  return names;
}

// =============================================================================
// STRINGS & DOCSTRINGS
// =============================================================================

const STRING_LITERAL = /^([rRuUbBfF]*)('''|"""|'|")([\s\S]*)\2$/;

export interface StringLiteralParts {
  prefix: string;
  body: string;
}

/**
 * Split a `string` node's source into prefix and body (quotes removed).
 * Escape sequences are left as written.
 */
export function splitStringLiteral(node: Parser.SyntaxNode): StringLiteralParts | null {
  const match = STRING_LITERAL.exec(node.text);
  if (!match) return null;
  return { prefix: match[1].toLowerCase(), body: match[3] };
}

/**
 * Text value of a plain string literal, or null for bytes, f-strings and
 * non-string nodes. Implicitly concatenated literals are joined.
 */
export function getPlainStringValue(node: Parser.SyntaxNode): string | null {
  if (node.type === 'concatenated_string') {
    const parts = node.namedChildren.map(getPlainStringValue);
    return parts.every((part): part is string => part !== null) ? parts.join('') : null;
  }

  if (node.type !== 'string') return null;

  const parts = splitStringLiteral(node);
  if (!parts || parts.prefix.includes('b') || parts.prefix.includes('f')) return null;
  return parts.body;
}

/**
 * Normalize docstring indentation: tabs expanded, the common indent of
 * every line after the first removed, leading and trailing blank lines dropped.
 */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, '        ').split('\n');

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = [lines[0].trimStart()];
  for (const line of lines.slice(1)) {
    cleaned.push(margin === Infinity ? line : line.slice(margin));
  }

  while (cleaned.length > 0 && cleaned[0].trim() === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1].trim() === '') cleaned.pop();

  return cleaned.join('\n');
}

/**
 * Docstring of a class or function: the first body statement when it is a
 * plain string expression.
 */
export function extractDocstring(definition: Parser.SyntaxNode): string | null {
  const first = getBodyStatements(definition)[0];
  if (first?.type !== 'expression_statement') return null;

  const expression = first.firstNamedChild;
  if (!expression) return null;

  const value = getPlainStringValue(expression);
  return value === null ? null : cleanDocstring(value);
}
