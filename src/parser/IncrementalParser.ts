import { LineIndex } from '../utils/position.js';
import { lex } from './lexer.js';
import { parse } from './parser.js';
import { ERROR_TYPE, type EngineResult, type ParsingEngine, type RawNode, type RawTree } from './types.js';

/**
 * The shipped {@link ParsingEngine}. Re-parses the whole text on every call
 * except for one shortcut: when the new text extends the previous one, every
 * finished top-level statement before the last is carried over as-is (same
 * node objects, same ids) and lexing restarts where the last one began.
 *
 * One instance per session; node ids are unique within an instance.
 */
export class IncrementalParser implements ParsingEngine {
  private idCounter = 0;

  parse(text: string, previous: RawTree | null): EngineResult {
    const lines = new LineIndex(text);
    const reused = previous ? reusableStatements(previous, text) : [];
    const reparseFrom = reused.length > 0 && previous ? previous.root.children[reused.length].startIndex : 0;

    const tokens = lex(text, reparseFrom);
    const output = parse(tokens, text, { nextId: () => this.nextId(), lines });

    const children = [...reused, ...output.statements];
    const root: RawNode = {
      id: this.nextId(),
      type: 'program',
      startIndex: 0,
      endIndex: text.length,
      startPosition: lines.pointAt(0),
      endPosition: lines.pointAt(text.length),
      field: null,
      children,
      missing: output.danglingEscape ? ['line_continuation'] : [],
    };

    return {
      tree: { root, text },
      hasError: containsError(root),
      changedRanges: [lines.rangeOf(reparseFrom, text.length)],
    };
  }

  private nextId(): number {
    return ++this.idCounter;
  }
}

/**
 * Leading statements of `previous` that appending to its text cannot change:
 * all but the last, stopping at the first one that is still waiting for
 * something (a heredoc body, a closing word) or that overlaps the next one.
 * Nothing is reused once the previous tree holds an ERROR node.
 */
function reusableStatements(previous: RawTree, text: string): RawNode[] {
  if (!text.startsWith(previous.text) || containsType(previous.root, ERROR_TYPE)) {
    return [];
  }

  const statements = previous.root.children;
  const reused: RawNode[] = [];
  for (let i = 0; i < statements.length - 1; i++) {
    const statement = statements[i];
    if (hasMissing(statement)) break;
    // a heredoc body stretches a statement past the ones that follow it on its line
    if (statement.endIndex > statements[i + 1].startIndex) break;
    reused.push(statement);
  }
  return reused;
}

function containsType(node: RawNode, type: string): boolean {
  if (node.type === type) return true;
  return node.children.some((child) => containsType(child, type));
}

function hasMissing(node: RawNode): boolean {
  if (node.missing.length > 0) return true;
  return node.children.some(hasMissing);
}

function containsError(node: RawNode): boolean {
  return containsType(node, ERROR_TYPE) || hasMissing(node);
}
