import type Parser from 'tree-sitter';
import { ELIF_CLAUSE, ELSE_CLAUSE, IF_STATEMENT, NESTING_TYPES } from '../python.js';

/**
 * Depth of each child of `node`, given the depth of `node` itself.
 *
 * tree-sitter keeps an if's `elif` and `else` clauses as siblings under the
 * `if_statement`. Each `elif` opens a level below the previous one, and the
 * `else` shares the level of the last `elif`.
 */
function childDepths(node: Parser.SyntaxNode, depth: number): Array<{ node: Parser.SyntaxNode; depth: number }> {
  let chainDepth = depth;

  return node.namedChildren.map(child => {
    if (node.type === IF_STATEMENT && child.type === ELIF_CLAUSE) {
      chainDepth++;
      return { node: child, depth: chainDepth };
    }
    if (node.type === IF_STATEMENT && child.type === ELSE_CLAUSE) {
      return { node: child, depth: chainDepth };
    }
    return { node: child, depth: NESTING_TYPES.has(child.type) ? depth + 1 : depth };
  });
}

/**
 * Maximum nesting depth of control structures under a node.
 *
 * Each if / for / while / try on a path from `node` down adds one level,
 * and the n-th `elif` of an if sits n levels below it. The node itself is
 * not counted, so a function with a single `if` has depth 1.
 */
export function calculateNestingDepth(node: Parser.SyntaxNode): number {
  let maxDepth = 0;
  const stack: Array<{ node: Parser.SyntaxNode; depth: number }> = [{ node, depth: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    maxDepth = Math.max(maxDepth, entry.depth);
    stack.push(...childDepths(entry.node, entry.depth));
  }

  return maxDepth;
}
