import type Parser from 'tree-sitter';
import type { Logger } from '../../logger.js';
import { walkSafely, type NodeFault } from '../traversal.js';
import { BOOLEAN_OPERATOR, CONDITIONAL_TYPES, TRY_STATEMENT } from '../python.js';

export interface ScopeComplexity {
  score: number;
  faults: NodeFault[];
}

/**
 * Branching score of a whole scope, without the cyclomatic baseline:
 * +1 per if / elif / for / while / try, +1 per extra and/or operand.
 *
 * Runs on the fault-isolating walk, so a node that cannot be scored is
 * reported in `faults` and the rest of the scope still counts.
 */
export function calculateScopeComplexity(
  node: Parser.SyntaxNode,
  logger?: Logger,
): ScopeComplexity {
  const { results, faults } = walkSafely<number>(
    node,
    child => {
      if (CONDITIONAL_TYPES.has(child.type) || child.type === TRY_STATEMENT) return 1;
      if (child.type === BOOLEAN_OPERATOR) return 1;
      return undefined;
    },
    logger,
  );

  return {
    score: results.reduce((sum, value) => sum + value, 0),
    faults,
  };
}
