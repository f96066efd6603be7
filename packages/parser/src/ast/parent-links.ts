import type Parser from 'tree-sitter';
import { CLASS_DEFINITION, FUNCTION_DEFINITION } from './python.js';

/**
 * Upward links for one parsed tree.
 *
 * tree-sitter hands out a fresh wrapper object every time a node is
 * accessed, so links are keyed by `node.id` (stable for the lifetime of the
 * tree) rather than by object identity. The table belongs to a single
 * analysis call and is dropped with it.
 */
export class ParentLinks {
  private readonly parents = new Map<number, Parser.SyntaxNode>();

  /** @internal populated by annotateParents */
  link(child: Parser.SyntaxNode, parent: Parser.SyntaxNode): void {
    this.parents.set(child.id, parent);
  }

  /** Number of linked (non-root) nodes */
  get size(): number {
    return this.parents.size;
  }

  parentOf(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
    return this.parents.get(node.id) ?? null;
  }

  /**
   * Nearest ancestor whose type is in `types`, or null
   */
  findEnclosing(node: Parser.SyntaxNode, types: ReadonlySet<string>): Parser.SyntaxNode | null {
    let current = this.parentOf(node);
    while (current) {
      if (types.has(current.type)) return current;
      current = this.parentOf(current);
    }
    return null;
  }

  findEnclosingClass(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
    return this.findEnclosing(node, CLASS_TYPES);
  }

  /** Nearest enclosing class or function definition */
  findEnclosingScope(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
    return this.findEnclosing(node, SCOPE_TYPES);
  }
}

const CLASS_TYPES: ReadonlySet<string> = new Set([CLASS_DEFINITION]);
const SCOPE_TYPES: ReadonlySet<string> = new Set([CLASS_DEFINITION, FUNCTION_DEFINITION]);

/**
 * Record the immediate parent of every named node in one top-down pass.
 */
export function annotateParents(root: Parser.SyntaxNode): ParentLinks {
  const links = new ParentLinks();
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    for (const child of node.namedChildren) {
      links.link(child, node);
      stack.push(child);
    }
  }

  return links;
}
