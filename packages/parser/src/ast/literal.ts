import type Parser from 'tree-sitter';
import { getPlainStringValue } from './python.js';

/**
 * A constant value read from source without evaluating it.
 */
export type Literal =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'none' }
  | { kind: 'sequence'; items: Literal[] }
  | { kind: 'mapping'; entries: Array<{ key: Literal; value: Literal }> }
  | { kind: 'unknown' };

export type LiteralKind = Literal['kind'];

const UNKNOWN: Literal = { kind: 'unknown' };

function parseInteger(text: string): number | null {
  const digits = text.replace(/_/g, '').toLowerCase();
  let value: number;
  if (digits.startsWith('0x')) value = parseInt(digits.slice(2), 16);
  else if (digits.startsWith('0o')) value = parseInt(digits.slice(2), 8);
  else if (digits.startsWith('0b')) value = parseInt(digits.slice(2), 2);
  else if (/^\d+$/.test(digits)) value = parseInt(digits, 10);
  else return null;

  // Beyond 2^53 a number no longer holds the exact value
  return Number.isSafeInteger(value) ? value : null;
}

function parseFloatLiteral(text: string): number | null {
  const cleaned = text.replace(/_/g, '');
  // Complex literals (`1j`) have no numeric counterpart
  if (/[jJ]$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isNaN(value) ? null : value;
}

/**
 * Decode a literal expression. Total: any shape it does not model
 * (names, calls, f-strings, unary minus, ...) decodes to `unknown`.
 */
export function decodeLiteral(node: Parser.SyntaxNode): Literal {
  switch (node.type) {
    case 'integer': {
      const value = parseInteger(node.text);
      if (value !== null) return { kind: 'integer', value };
      // `1j` is an imaginary integer literal; huge integers are not exact
      return UNKNOWN;
    }

    case 'float': {
      const value = parseFloatLiteral(node.text);
      return value === null ? UNKNOWN : { kind: 'float', value };
    }

    case 'string':
    case 'concatenated_string': {
      const value = getPlainStringValue(node);
      return value === null ? UNKNOWN : { kind: 'text', value };
    }

    case 'true':
      return { kind: 'boolean', value: true };
    case 'false':
      return { kind: 'boolean', value: false };
    case 'none':
      return { kind: 'none' };

    case 'list':
    case 'tuple':
      return { kind: 'sequence', items: node.namedChildren.filter(isValueNode).map(decodeLiteral) };

    case 'parenthesized_expression': {
      const inner = node.firstNamedChild;
      return inner ? decodeLiteral(inner) : UNKNOWN;
    }

    case 'dictionary': {
      const entries: Array<{ key: Literal; value: Literal }> = [];
      for (const child of node.namedChildren) {
        if (child.type !== 'pair') continue;
        const key = child.childForFieldName('key');
        const value = child.childForFieldName('value');
        if (key && value) {
          entries.push({ key: decodeLiteral(key), value: decodeLiteral(value) });
        }
      }
      return { kind: 'mapping', entries };
    }

    default:
      return UNKNOWN;
  }
}

function isValueNode(node: Parser.SyntaxNode): boolean {
  return node.type !== 'comment';
}

/**
 * Plain JavaScript value of a literal, for reports. `none` and `unknown`
 * become null; mapping keys are stringified.
 */
export function literalToValue(literal: Literal): unknown {
  switch (literal.kind) {
    case 'integer':
    case 'float':
    case 'text':
    case 'boolean':
      return literal.value;
    case 'sequence':
      return literal.items.map(literalToValue);
    case 'mapping': {
      const result: Record<string, unknown> = {};
      for (const entry of literal.entries) {
        result[String(literalToValue(entry.key))] = literalToValue(entry.value);
      }
      return result;
    }
    case 'none':
    case 'unknown':
      return null;
  }
}
