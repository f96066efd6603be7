import type Parser from 'tree-sitter';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { parsePython } from '../ast/parser.js';
import { annotateParents, type ParentLinks } from '../ast/parent-links.js';
import { AnalysisError, ParseError, getErrorMessage } from '../errors/index.js';
import type { AnalysisResult, FailureKind } from './types.js';

/**
 * What an analyzer body receives once the file has parsed
 */
export interface ParsedSource {
  root: Parser.SyntaxNode;
  links: ParentLinks;
  source: string;
}

export function describeFile(filePath?: string): string {
  return filePath ?? '<source>';
}

/**
 * Build a failure result with the analyzer's empty tables
 */
export function failure<Tables>(
  empty: Tables,
  error: ParseError | AnalysisError,
  filePath?: string,
): AnalysisResult<Tables> {
  const failureKind: FailureKind = error instanceof ParseError ? 'parse' : 'analysis';
  return { ...empty, success: false as const, failureKind, message: error.message, error, filePath };
}

/**
 * Shared analyze pipeline: parse, annotate parents, run the analyzer body.
 *
 * A parse error and any exception thrown by `body` both collapse the result
 * to a failure with empty tables; nothing partial is returned.
 */
export function runAnalysis<Tables>(options: {
  analyzerName: string;
  source: string;
  filePath?: string;
  logger?: Logger;
  empty: () => Tables;
  body: (parsed: ParsedSource) => Tables;
}): AnalysisResult<Tables> {
  const { analyzerName, source, filePath, empty, body } = options;
  const logger = options.logger ?? silentLogger;
  const label = describeFile(filePath);
  const parsed = parsePython(source);

  if (parsed.tree === null) {
    logger.error(`${analyzerName}: error parsing ${label}: ${parsed.error}`);
    return failure(empty(), new ParseError(parsed.error, filePath), filePath);
  }

  try {
    const root = parsed.tree.rootNode;
    const links = annotateParents(root);
    const tables = body({ root, links, source });
    logger.debug(`${analyzerName}: analyzed ${label}`);
    return { ...tables, success: true as const, filePath };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error(`${analyzerName}: error analyzing ${label}: ${message}`);
    return failure(empty(), new AnalysisError(message, filePath, { analyzer: analyzerName }), filePath);
  }
}
