import {
  COMPOUND_CLOSERS,
  ERROR_TYPE,
  type CloserType,
  type NodeType,
  type OpenerType,
  type SourceRange,
  type SyntaxNode,
} from './types.js';

export interface ErrorInfo {
  /** Source text covered by the error node. */
  text: string;
  range: SourceRange;
}

export type Classification =
  | { state: 'complete' }
  | { state: 'incomplete'; opener: OpenerType | 'unknown'; expecting: CloserType | 'unknown' }
  | { state: 'syntax_error'; error: ErrorInfo };

const STATEMENT_OPENERS: Partial<Record<NodeType, OpenerType>> = {
  if_statement: 'if',
  for_statement: 'for',
  while_statement: 'while',
  until_statement: 'until',
  case_statement: 'case',
};

/**
 * Decide whether a parsed buffer can run, needs more input, or is wrong.
 *
 * The engine reports one error flag for both unfinished input and real
 * errors. An ERROR node only appears for a prefix no continuation could
 * repair, so it always wins; otherwise a raised flag means "not finished yet".
 */
export function classify(tree: SyntaxNode, hasError: boolean): Classification {
  if (hasErrorNodes(tree)) {
    return { state: 'syntax_error', error: extractErrorInfo(findErrorNode(tree)) };
  }

  if (hasError) {
    const structure = identifyIncompleteStructure(tree);
    if (structure) {
      return { state: 'incomplete', ...structure };
    }
    return { state: 'incomplete', opener: 'unknown', expecting: 'unknown' };
  }

  return { state: 'complete' };
}

export function hasErrorNodes(node: SyntaxNode): boolean {
  if (node.type === ERROR_TYPE) return true;
  return node.children.some(hasErrorNodes);
}

/** The deepest ERROR node, first in source order; null when there is none. */
export function findErrorNode(node: SyntaxNode): SyntaxNode | null {
  for (const child of node.children) {
    const found = findErrorNode(child);
    if (found) return found;
  }
  return node.type === ERROR_TYPE ? node : null;
}

export function extractErrorInfo(node: SyntaxNode | null): ErrorInfo {
  if (!node) {
    const origin = { row: 0, column: 0 };
    return { text: 'unknown', range: { startIndex: 0, endIndex: 0, start: origin, end: origin } };
  }
  return { text: node.text, range: node.range };
}

/** The last top-level compound statement, with the closer it is waiting for. */
export function identifyIncompleteStructure(
  tree: SyntaxNode,
): { opener: OpenerType; expecting: CloserType } | null {
  for (let i = tree.children.length - 1; i >= 0; i--) {
    const opener = STATEMENT_OPENERS[tree.children[i].type];
    if (opener) {
      return { opener, expecting: COMPOUND_CLOSERS[opener] };
    }
  }
  return null;
}
