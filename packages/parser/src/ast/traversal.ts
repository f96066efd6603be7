import type Parser from 'tree-sitter';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

/**
 * A failure raised while visiting one node. The walk goes on without it.
 */
export interface NodeFault {
  /** Valid while its tree is alive */
  node: Parser.SyntaxNode;
  nodeType: string;
  /** 1-based line where the node starts */
  line: number;
  message: string;
}

export interface TraversalResult<T> {
  results: T[];
  faults: NodeFault[];
}

/**
 * Visitor for walkSafely. Return undefined to contribute nothing.
 */
export type NodeVisitor<T> = (node: Parser.SyntaxNode) => T | undefined;

/**
 * Depth-first pre-order walk over every named node under (and including) root.
 *
 * A visitor that throws for a node produces a NodeFault; the walk still
 * descends into that node's children and finishes the tree. Faults are
 * returned alongside the results rather than thrown.
 */
export function walkSafely<T>(
  root: Parser.SyntaxNode,
  visit: NodeVisitor<T>,
  logger: Logger = silentLogger,
): TraversalResult<T> {
  const results: T[] = [];
  const faults: NodeFault[] = [];
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    try {
      const value = visit(node);
      if (value !== undefined) results.push(value);
    } catch (error) {
      const fault: NodeFault = {
        node,
        nodeType: node.type,
        line: node.startPosition.row + 1,
        message: error instanceof Error ? error.message : String(error),
      };
      logger.warning(`Error visiting ${fault.nodeType} at line ${fault.line}: ${fault.message}`);
      faults.push(fault);
    }

    // Push in reverse so children are visited in source order
    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return { results, faults };
}
