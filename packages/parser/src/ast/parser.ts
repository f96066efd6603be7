import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

/**
 * Result of parsing one file: either a tree or a terminal error message.
 */
export type ASTParseResult =
  | { tree: Parser.Tree; error?: undefined }
  | { tree: null; error: string };

/**
 * Cached parser instance. Parsing is synchronous, so one instance per
 * process is never observed mid-parse by another caller.
 */
let parserCache: Parser | null = null;

function getParser(): Parser {
  if (!parserCache) {
    const parser = new Parser();
    parser.setLanguage(Python);
    parserCache = parser;
  }
  return parserCache;
}

/** tree-sitter's string input path rejects long strings; feed it in slices instead */
const INPUT_CHUNK_SIZE = 16 * 1024;

/**
 * Locate the first ERROR node, depth-first. A MISSING token is a childless
 * node that still reports hasError, so it is returned by the final fallthrough.
 */
function findFirstError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === 'ERROR') return node;
  if (!node.hasError) return null;

  for (const child of node.children) {
    const found = findFirstError(child);
    if (found) return found;
  }
  return node;
}

function describeSyntaxError(root: Parser.SyntaxNode): string {
  const errorNode = findFirstError(root) ?? root;
  const { row, column } = errorNode.startPosition;
  return `Syntax error at line ${row + 1}, column ${column + 1}`;
}

/** Python 2 statements the grammar still accepts but Python 3 rejects */
const PYTHON2_STATEMENTS = ['print_statement', 'exec_statement'];

function describePython2Statement(root: Parser.SyntaxNode): string | null {
  const [statement] = root.descendantsOfType(PYTHON2_STATEMENTS);
  if (!statement) return null;

  const { row, column } = statement.startPosition;
  const keyword = statement.type === 'print_statement' ? 'print' : 'exec';
  return `Syntax error at line ${row + 1}, column ${column + 1}: Python 2 ${keyword} statement`;
}

/**
 * Parse Python source code into a tree-sitter tree.
 *
 * A syntax error anywhere in the file is terminal. tree-sitter recovers
 * and still returns a tree with ERROR nodes; that tree is discarded.
 * Python 2 `print x` and `exec code` statements count as syntax errors.
 *
 * @param content - Python source text
 * @returns Parse result with tree or error
 */
export function parsePython(content: string): ASTParseResult {
  try {
    const parser = getParser();
    const tree = parser.parse((index: number) => content.slice(index, index + INPUT_CHUNK_SIZE));

    // hasError is a property, not a method
    if (tree.rootNode.hasError) {
      return { tree: null, error: describeSyntaxError(tree.rootNode) };
    }

    const python2Error = describePython2Statement(tree.rootNode);
    if (python2Error) {
      return { tree: null, error: python2Error };
    }

    return { tree };
  } catch (error) {
    return {
      tree: null,
      error: error instanceof Error ? error.message : 'Unknown parse error',
    };
  }
}

/**
 * Clear parser cache (useful for testing)
 */
export function clearParserCache(): void {
  parserCache = null;
}
