import type Parser from 'tree-sitter';
import {
  BOOLEAN_OPERATOR,
  CONDITIONAL_TYPES,
  EXCEPT_HANDLER_TYPES,
  TRY_STATEMENT,
} from '../python.js';

/**
 * Number of `except` handlers attached to a try statement
 */
export function countExceptHandlers(tryNode: Parser.SyntaxNode): number {
  let handlers = 0;
  for (const child of tryNode.namedChildren) {
    if (EXCEPT_HANDLER_TYPES.has(child.type)) handlers++;
  }
  return handlers;
}

/**
 * Calculate cyclomatic complexity of a scope (method, class or module)
 *
 * Complexity = 1 (base) + decision points anywhere in the subtree:
 * - +1 per if / elif / for / while
 * - +(operands - 1) per and/or chain
 * - +1 per except handler of each try
 *
 * @param node - AST node to analyze (typically a function definition)
 * @returns Cyclomatic complexity score (minimum 1)
 */
export function calculateComplexity(node: Parser.SyntaxNode): number {
  let complexity = 1; // Base complexity

  function traverse(n: Parser.SyntaxNode) {
    if (CONDITIONAL_TYPES.has(n.type)) {
      complexity++;
    } else if (n.type === BOOLEAN_OPERATOR) {
      // `a and b and c` is two nested binary nodes: one per extra operand
      complexity++;
    } else if (n.type === TRY_STATEMENT) {
      complexity += countExceptHandlers(n);
    }

    // Traverse children
    for (let i = 0; i < n.namedChildCount; i++) {
      const child = n.namedChild(i);
      if (child) traverse(child);
    }
  }

  traverse(node);
  return complexity;
}
