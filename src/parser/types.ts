// ─── Token types ───

export enum TokenKind {
  Word,
  Pipe,              // |
  And,               // &&
  Or,                // ||
  Semi,              // ;
  Amp,               // &
  RedirectOut,       // >
  RedirectAppend,    // >>
  RedirectIn,        // <
  RedirectErr,       // 2>
  RedirectErrAppend, // 2>>
  RedirectAll,       // &>
  RedirectAllAppend, // &>>
  RedirectDup,       // >&
  RedirectErrDup,    // 2>&
  HeredocStart,      // << or <<-
  HereString,        // <<<
  HeredocBody,
  DoubleSemi,        // ;;
  LParen,            // (
  RParen,            // )
  Newline,           // \n
  EOF,
}

export interface WordPart {
  text: string;
  quoted: 'none' | 'single' | 'double';
}

export interface Token {
  kind: TokenKind;
  value: string;
  pos: number;
  /** Offset just past the last character of the token. */
  end: number;
  parts?: WordPart[];  // only for Word tokens
  /**
   * The token runs into end of input while still open: an unclosed quote or
   * substitution, a heredoc body without its terminator, or (on EOF) a
   * dangling backslash continuation.
   */
  unterminated?: boolean;
  /** HeredocStart only: `<<-` strips leading whitespace from body lines. */
  stripIndent?: boolean;
}

// ─── Positions ───

/** Zero-based row and column (UTF-16 code units). */
export interface Point {
  row: number;
  column: number;
}

export interface SourceRange {
  startIndex: number;
  endIndex: number;
  start: Point;
  end: Point;
}

// ─── Node vocabulary ───

export const ERROR_TYPE = 'ERROR';

export const NODE_TYPES = [
  'program',
  'command',
  'command_name',
  'word',
  'string',
  'raw_string',
  'concatenation',
  'variable_name',
  'variable_assignment',
  'declaration_command',
  'unset_command',
  'test_command',
  'pipeline',
  'list',
  'negated_command',
  'subshell',
  'compound_statement',
  'if_statement',
  'elif_clause',
  'else_clause',
  'for_statement',
  'while_statement',
  'until_statement',
  'case_statement',
  'case_item',
  'do_group',
  'function_definition',
  'file_redirect',
  'heredoc_redirect',
  'heredoc_body',
  'herestring_redirect',
  ERROR_TYPE,
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

export type FieldName =
  | 'name'
  | 'argument'
  | 'redirect'
  | 'condition'
  | 'body'
  | 'alternative'
  | 'variable'
  | 'value'
  | 'item'
  | 'pattern'
  | 'descriptor'
  | 'assignment';

export type OpenerType = 'if' | 'for' | 'while' | 'until' | 'case';
export type CloserType = 'fi' | 'done' | 'esac';

export const COMPOUND_CLOSERS: Record<OpenerType, CloserType> = {
  if: 'fi',
  for: 'done',
  while: 'done',
  until: 'done',
  case: 'esac',
};

// ─── Engine-side (raw) tree ───

/**
 * Node as produced by a parsing engine. `type` is an open string here; the
 * conversion step narrows it to {@link NodeType}.
 */
export interface RawNode {
  id: number;
  type: string;
  startIndex: number;
  endIndex: number;
  startPosition: Point;
  endPosition: Point;
  /** Field name under which the parent holds this node. */
  field: string | null;
  children: RawNode[];
  /** Tokens the parser expected but reached end of input instead. */
  missing: string[];
}

export interface RawTree {
  root: RawNode;
  /** The full text the tree was parsed from. */
  text: string;
}

export interface EngineResult {
  tree: RawTree;
  /** Set for both syntax errors and unfinished constructs. */
  hasError: boolean;
  /** Regions of the text the engine had to re-parse. */
  changedRanges: SourceRange[];
}

export interface ParsingEngine {
  parse(text: string, previous: RawTree | null): EngineResult;
}

// ─── Converted tree ───

export interface SyntaxNode {
  id: number;
  type: NodeType;
  range: SourceRange;
  text: string;
  /** Named children in textual order. */
  children: SyntaxNode[];
  fields: Partial<Record<FieldName, SyntaxNode[]>>;
  missing: string[];
}
