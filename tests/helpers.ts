import { lex } from '../src/parser/lexer.js';
import { parse } from '../src/parser/parser.js';
import { IncrementalParser } from '../src/parser/IncrementalParser.js';
import { toSyntaxTree } from '../src/parser/convert.js';
import type { RawNode, SyntaxNode } from '../src/parser/types.js';
import { ParseSession, type ParseSessionOptions } from '../src/session/ParseSession.js';
import type { AppendOutcome, ExecutableStatement } from '../src/session/types.js';
import type { LogFn } from '../src/utils/log.js';

/** Parse a complete text in one go and return its top-level statements. */
export function statementsOf(text: string): RawNode[] {
  let id = 0;
  return parse(lex(text), text, { nextId: () => ++id }).statements;
}

/** One-shot engine parse plus conversion. */
export function treeOf(text: string): { tree: SyntaxNode; hasError: boolean } {
  const result = new IncrementalParser().parse(text, null);
  return { tree: toSyntaxTree(result.tree), hasError: result.hasError };
}

/**
 * Feed fragments to a fresh session and collect what it produced: one
 * outcome per fragment and every emitted statement.
 */
export function parseFragments(fragments: string[], options: ParseSessionOptions = {}): {
  session: ParseSession;
  outcomes: AppendOutcome[];
  statements: ExecutableStatement[];
} {
  const session = new ParseSession({ logger: silentLog, ...options });
  const statements: ExecutableStatement[] = [];
  session.on('statement:executable', ({ statement, sequence }) => {
    statements.push({ statement, sequence });
  });
  const outcomes = fragments.map((fragment) => session.append(fragment));
  return { session, outcomes, statements };
}

export interface ShapeNode {
  type: string;
  text: string;
  start: [number, number];
  end: [number, number];
  missing: string[];
  children: ShapeNode[];
}

/** Structure of a tree without node ids, for comparing separate parses. */
export function shapeOf(node: SyntaxNode): ShapeNode {
  return {
    type: node.type,
    text: node.text,
    start: [node.range.start.row, node.range.start.column],
    end: [node.range.end.row, node.range.end.column],
    missing: node.missing,
    children: node.children.map(shapeOf),
  };
}

export const silentLog: LogFn = () => {};

export interface CapturedLog {
  entries: string[];
  sink: LogFn;
}

export function captureLog(): CapturedLog {
  const entries: string[] = [];
  return {
    entries,
    sink: (level, source, message) => {
      entries.push(`${level} [${source}] ${message}`);
    },
  };
}
