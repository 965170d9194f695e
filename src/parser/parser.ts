import { LineIndex } from '../utils/position.js';
import {
  ERROR_TYPE,
  TokenKind,
  type FieldName,
  type RawNode,
  type Token,
} from './types.js';

export class ParseError extends Error {
  constructor(message: string, public pos: number) {
    super(message);
    this.name = 'ParseError';
  }
}

export interface ParseOptions {
  /** Id allocator; ids stay unique across re-parses of one session. */
  nextId: () => number;
  lines?: LineIndex;
}

export interface ParseOutput {
  statements: RawNode[];
  /** Input ends in a backslash that escapes the final newline. */
  danglingEscape: boolean;
}

/**
 * Parse a token stream into top-level statement nodes.
 *
 * The grammar is tolerant in two different ways. Running out of input in the
 * middle of a construct is not an error: the construct's node is kept and the
 * tokens it still needs are listed in `missing`. A token that cannot appear
 * where it does is an error no further input could fix: the statement is
 * wrapped in an ERROR node and parsing resumes on the next line.
 */
export function parse(tokens: Token[], text: string, options: ParseOptions): ParseOutput {
  const parser = new Parser(tokens, text, options);
  return parser.parseProgram();
}

const RESERVED_AT_COMMAND = new Set([
  'then', 'else', 'elif', 'fi',
  'do', 'done',
  'esac', '}',
]);

const KEYWORDS = new Set([
  'if', 'then', 'else', 'elif', 'fi',
  'for', 'in', 'do', 'done',
  'while', 'until',
  'case', 'esac',
  'function', '{', '}', '[[', ']]',
]);

const DECLARATION_COMMANDS = new Set(['export', 'declare', 'local', 'readonly', 'typeset']);

const ASSIGNMENT_RE = /^([a-zA-Z_][a-zA-Z0-9_]*)(\[[^\]]*\])?\+?=/;

interface PendingHeredoc {
  node: RawNode;
  delimiter: string;
}

class Parser {
  private pos = 0;
  private lastEnd = 0;
  private pendingHeredocs: PendingHeredoc[] = [];
  private lines: LineIndex;

  constructor(
    private tokens: Token[],
    private text: string,
    private options: ParseOptions,
  ) {
    this.lines = options.lines ?? new LineIndex(text);
  }

  // ─── Token cursor ───

  private peek(): Token {
    return this.tokens[this.pos] ?? this.eof();
  }

  private peekAt(offset: number): Token {
    return this.tokens[this.pos + offset] ?? this.eof();
  }

  private eof(): Token {
    return { kind: TokenKind.EOF, value: '', pos: this.text.length, end: this.text.length };
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== TokenKind.EOF) {
      this.pos++;
      if (token.kind !== TokenKind.Newline && token.kind !== TokenKind.HeredocBody) {
        this.lastEnd = token.end;
      }
    }
    return token;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  private isWord(value: string): boolean {
    return this.peek().kind === TokenKind.Word && this.peek().value === value;
  }

  private unexpected(token: Token = this.peek()): ParseError {
    const shown = token.kind === TokenKind.Newline ? 'newline' : token.value;
    return new ParseError(`syntax error near unexpected token '${shown}'`, token.pos);
  }

  /**
   * Consume the reserved word `value`. At end of input the word is recorded
   * as missing instead; any other token is a syntax error.
   */
  private expectWord(value: string, missing: string[]): boolean {
    const token = this.peek();
    if (token.kind === TokenKind.Word && token.value === value) {
      this.advance();
      return true;
    }
    if (token.kind === TokenKind.EOF) {
      missing.push(value);
      return false;
    }
    throw this.unexpected(token);
  }

  private expectKind(kind: TokenKind, label: string, missing: string[]): Token | null {
    const token = this.peek();
    if (token.kind === kind) {
      return this.advance();
    }
    if (token.kind === TokenKind.EOF) {
      missing.push(label);
      return null;
    }
    throw this.unexpected(token);
  }

  private consumeNewline(): void {
    this.advance();
    while (this.pendingHeredocs.length > 0 && this.peek().kind === TokenKind.HeredocBody) {
      const pending = this.pendingHeredocs.shift();
      const body = this.advance();
      if (!pending) break;
      const bodyNode = this.node('heredoc_body', body.pos, body.end);
      this.addChild(pending.node, bodyNode, null);
      if (body.unterminated) {
        pending.node.missing.push(pending.delimiter);
      }
    }
  }

  private skipNewlines(): void {
    while (this.peek().kind === TokenKind.Newline) {
      this.consumeNewline();
    }
  }

  private skipSeparators(): void {
    for (;;) {
      const kind = this.peek().kind;
      if (kind === TokenKind.Semi) {
        this.advance();
      } else if (kind === TokenKind.Newline) {
        this.consumeNewline();
      } else {
        return;
      }
    }
  }

  // ─── Node construction ───

  private node(type: string, start: number, end: number, children: RawNode[] = [], missing: string[] = []): RawNode {
    const zero = { row: 0, column: 0 };
    return {
      id: this.options.nextId(),
      type,
      startIndex: start,
      endIndex: Math.max(start, end),
      startPosition: zero,
      endPosition: zero,
      field: null,
      children,
      missing,
    };
  }

  private addChild(parent: RawNode, child: RawNode, field: FieldName | null): void {
    child.field = field;
    parent.children.push(child);
  }

  private withField(child: RawNode, field: FieldName | null): RawNode {
    child.field = field;
    return child;
  }

  private wordNode(token: Token, field: FieldName | null, type?: string): RawNode {
    const parts = token.parts ?? [];
    let inferred = 'word';
    if (parts.length > 1) inferred = 'concatenation';
    else if (parts.length === 1 && parts[0].quoted === 'single') inferred = 'raw_string';
    else if (parts.length === 1 && parts[0].quoted === 'double') inferred = 'string';

    const n = this.node(type ?? inferred, token.pos, token.end);
    n.field = field;
    if (token.unterminated) n.missing.push('word_end');
    return n;
  }

  // ─── Program ───

  parseProgram(): ParseOutput {
    const statements: RawNode[] = [];

    this.skipSeparators();

    while (!this.isAtEnd()) {
      const start = this.peek();
      try {
        const statement = this.parseList();
        this.ensureListEnd([], []);
        statements.push(statement);
        if (this.peek().kind === TokenKind.Amp) this.advance();
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        statements.push(this.recover(start));
      }
      this.skipSeparators();
    }

    for (const pending of this.pendingHeredocs) {
      pending.node.missing.push(pending.delimiter);
    }
    this.pendingHeredocs = [];

    for (const statement of statements) {
      fixEnds(statement);
      assignPositions(statement, this.lines);
    }

    const eofToken = this.tokens[this.tokens.length - 1];
    return {
      statements,
      danglingEscape: eofToken?.kind === TokenKind.EOF && eofToken.unterminated === true,
    };
  }

  /** Skip to the end of the offending line and cover what was skipped with an ERROR node. */
  private recover(start: Token): RawNode {
    while (!this.isAtEnd() && this.peek().kind !== TokenKind.Newline) {
      this.advance();
    }
    this.pendingHeredocs = [];
    if (this.peek().kind === TokenKind.Newline && this.peekAt(1).kind === TokenKind.HeredocBody) {
      this.advance();
      while (this.peek().kind === TokenKind.HeredocBody) this.advance();
    }
    return this.node(ERROR_TYPE, start.pos, Math.max(this.lastEnd, start.end));
  }

  /** After a list, only a separator, a closing keyword or a closing operator may follow. */
  private ensureListEnd(terminators: string[], closers: TokenKind[]): void {
    const t = this.peek();
    switch (t.kind) {
      case TokenKind.Semi:
      case TokenKind.Newline:
      case TokenKind.Amp:
      case TokenKind.EOF:
        return;
    }
    if (closers.includes(t.kind)) return;
    if (t.kind === TokenKind.Word && terminators.includes(t.value)) return;
    throw this.unexpected(t);
  }

  private parseCompoundList(terminators: string[], closers: TokenKind[] = []): RawNode[] {
    const lists: RawNode[] = [];

    this.skipSeparators();

    while (!this.isAtEnd()) {
      const t = this.peek();
      if (t.kind === TokenKind.Word && terminators.includes(t.value)) break;
      if (closers.includes(t.kind)) break;

      lists.push(this.parseList());
      this.ensureListEnd(terminators, closers);
      if (this.peek().kind === TokenKind.Amp) this.advance();
      this.skipSeparators();
    }

    return lists;
  }

  /** A condition or body may not be empty once its closing word has arrived. */
  private requireNonEmpty(lists: RawNode[]): void {
    if (lists.length === 0 && !this.isAtEnd()) {
      throw this.unexpected();
    }
  }

  // ─── Lists and pipelines ───

  private parseList(): RawNode {
    const start = this.peek().pos;
    const items: RawNode[] = [this.parsePipeline()];
    const missing: string[] = [];

    while (this.peek().kind === TokenKind.And || this.peek().kind === TokenKind.Or) {
      this.advance();
      this.skipNewlines();
      if (this.isAtEnd()) {
        missing.push('command');
        break;
      }
      items.push(this.parsePipeline());
    }

    if (items.length === 1 && missing.length === 0) {
      return items[0];
    }
    return this.node('list', start, this.lastEnd, items, missing);
  }

  private parsePipeline(): RawNode {
    const start = this.peek().pos;
    let negated = false;

    if (this.isWord('!')) {
      negated = true;
      this.advance();
    }

    const missing: string[] = [];
    const commands: RawNode[] = [];

    if (this.isAtEnd()) {
      missing.push('command');
    } else {
      commands.push(this.parseCommand());
      while (this.peek().kind === TokenKind.Pipe) {
        this.advance();
        this.skipNewlines();
        if (this.isAtEnd()) {
          missing.push('command');
          break;
        }
        commands.push(this.parseCommand());
      }
    }

    if (negated) {
      const inner: RawNode[] = [];
      if (commands.length === 1 && missing.length === 0) {
        inner.push(commands[0]);
      } else if (commands.length > 0) {
        inner.push(this.node('pipeline', commands[0].startIndex, this.lastEnd, commands, missing));
      }
      return this.node('negated_command', start, this.lastEnd, inner, commands.length === 0 ? missing : []);
    }

    if (commands.length === 1 && missing.length === 0) {
      return commands[0];
    }
    return this.node('pipeline', start, this.lastEnd, commands, missing);
  }

  // ─── Commands ───

  private parseCommand(): RawNode {
    const token = this.peek();

    if (token.kind === TokenKind.Word) {
      switch (token.value) {
        case 'if': return this.parseIf();
        case 'for': return this.parseFor();
        case 'while': return this.parseLoop('while_statement');
        case 'until': return this.parseLoop('until_statement');
        case 'case': return this.parseCase();
        case 'function': return this.parseFunctionKeyword();
        case '{': return this.parseGroup();
        case '[[': return this.parseTestCommand();
      }

      if (RESERVED_AT_COMMAND.has(token.value)) {
        throw this.unexpected(token);
      }

      // name () compound-command
      if (this.peekAt(1).kind === TokenKind.LParen && this.peekAt(2).kind === TokenKind.RParen
        && !KEYWORDS.has(token.value)) {
        return this.parseFunctionDef();
      }

      if (DECLARATION_COMMANDS.has(token.value)) {
        return this.parseDeclaration('declaration_command');
      }
      if (token.value === 'unset') {
        return this.parseDeclaration('unset_command');
      }
    }

    if (token.kind === TokenKind.LParen) {
      return this.parseSubshell();
    }

    if (token.kind === TokenKind.Word || this.isRedirectOperator(token.kind)) {
      return this.parseSimpleCommand();
    }

    throw this.unexpected(token);
  }

  private parseIf(): RawNode {
    const start = this.advance().pos; // if
    const n = this.node('if_statement', start, start);

    const condition = this.parseCompoundList(['then']);
    this.requireNonEmpty(condition);
    for (const c of condition) this.addChild(n, c, 'condition');
    this.expectWord('then', n.missing);

    const body = this.parseCompoundList(['elif', 'else', 'fi']);
    this.requireNonEmpty(body);
    for (const b of body) this.addChild(n, b, 'body');

    while (this.isWord('elif')) {
      const elifStart = this.advance().pos;
      const clause = this.node('elif_clause', elifStart, elifStart);
      const elifCondition = this.parseCompoundList(['then']);
      this.requireNonEmpty(elifCondition);
      for (const c of elifCondition) this.addChild(clause, c, 'condition');
      this.expectWord('then', clause.missing);
      const elifBody = this.parseCompoundList(['elif', 'else', 'fi']);
      this.requireNonEmpty(elifBody);
      for (const b of elifBody) this.addChild(clause, b, 'body');
      clause.endIndex = this.lastEnd;
      this.addChild(n, clause, 'alternative');
    }

    if (this.isWord('else')) {
      const elseStart = this.advance().pos;
      const clause = this.node('else_clause', elseStart, elseStart);
      const elseBody = this.parseCompoundList(['fi']);
      this.requireNonEmpty(elseBody);
      for (const b of elseBody) this.addChild(clause, b, 'body');
      clause.endIndex = this.lastEnd;
      this.addChild(n, clause, 'alternative');
    }

    this.expectWord('fi', n.missing);
    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseFor(): RawNode {
    const start = this.advance().pos; // for
    const n = this.node('for_statement', start, start);

    const varToken = this.expectKind(TokenKind.Word, 'variable', n.missing);
    if (varToken) {
      this.addChild(n, this.wordNode(varToken, 'variable', 'variable_name'), 'variable');
    }

    this.skipNewlines();

    // Optional 'in word...'
    if (this.isWord('in')) {
      this.advance();
      while (!this.isAtEnd()) {
        const t = this.peek();
        if (t.kind === TokenKind.Semi || t.kind === TokenKind.Newline) break;
        if (t.kind === TokenKind.Word && t.value === 'do') break;
        if (t.kind !== TokenKind.Word) throw this.unexpected(t);
        this.advance();
        this.addChild(n, this.wordNode(t, 'value'), 'value');
      }
    }

    // Consume separator before 'do'
    this.skipSeparators();

    this.parseDoGroup(n);
    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseLoop(type: 'while_statement' | 'until_statement'): RawNode {
    const start = this.advance().pos; // while / until
    const n = this.node(type, start, start);

    const condition = this.parseCompoundList(['do']);
    this.requireNonEmpty(condition);
    for (const c of condition) this.addChild(n, c, 'condition');

    this.parseDoGroup(n);
    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseDoGroup(owner: RawNode): void {
    if (this.isAtEnd()) {
      owner.missing.push('do', 'done');
      return;
    }

    const start = this.peek().pos;
    const group = this.node('do_group', start, start);
    this.expectWord('do', group.missing);

    const body = this.parseCompoundList(['done']);
    this.requireNonEmpty(body);
    for (const b of body) this.addChild(group, b, null);

    this.expectWord('done', group.missing);
    group.endIndex = this.lastEnd;
    this.addChild(owner, group, 'body');
  }

  private parseCase(): RawNode {
    const start = this.advance().pos; // case
    const n = this.node('case_statement', start, start);

    const subject = this.expectKind(TokenKind.Word, 'word', n.missing);
    if (subject) {
      this.addChild(n, this.wordNode(subject, 'value'), 'value');
    }

    this.skipNewlines();
    this.expectWord('in', n.missing);
    this.skipSeparators();

    while (!this.isAtEnd() && !this.isWord('esac')) {
      const itemStart = this.peek().pos;
      const item = this.node('case_item', itemStart, itemStart);

      // Optional leading (
      if (this.peek().kind === TokenKind.LParen) {
        this.advance();
      }

      // Parse patterns separated by |
      const first = this.expectKind(TokenKind.Word, 'pattern', item.missing);
      if (first) this.addChild(item, this.wordNode(first, 'pattern'), 'pattern');

      while (first && this.peek().kind === TokenKind.Pipe) {
        this.advance();
        const next = this.expectKind(TokenKind.Word, 'pattern', item.missing);
        if (!next) break;
        this.addChild(item, this.wordNode(next, 'pattern'), 'pattern');
      }

      this.expectKind(TokenKind.RParen, ')', item.missing);

      const body = this.parseCompoundList(['esac'], [TokenKind.DoubleSemi]);
      for (const b of body) this.addChild(item, b, 'body');

      if (this.peek().kind === TokenKind.DoubleSemi) {
        this.advance();
      }
      item.endIndex = this.lastEnd;
      this.addChild(n, item, 'item');
      this.skipSeparators();
    }

    this.expectWord('esac', n.missing);
    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseFunctionKeyword(): RawNode {
    const start = this.advance().pos; // function
    const n = this.node('function_definition', start, start);

    const name = this.expectKind(TokenKind.Word, 'name', n.missing);
    if (name) {
      this.addChild(n, this.wordNode(name, 'name', 'word'), 'name');
      if (this.peek().kind === TokenKind.LParen) {
        this.advance();
        this.expectKind(TokenKind.RParen, ')', n.missing);
      }
    }

    this.parseFunctionBody(n);
    return n;
  }

  private parseFunctionDef(): RawNode {
    const nameToken = this.advance(); // consume name
    const n = this.node('function_definition', nameToken.pos, nameToken.end);
    this.addChild(n, this.wordNode(nameToken, 'name', 'word'), 'name');
    this.advance(); // (
    this.advance(); // )
    this.parseFunctionBody(n);
    return n;
  }

  private parseFunctionBody(n: RawNode): void {
    this.skipNewlines();

    if (this.isAtEnd()) {
      n.missing.push('body');
      n.endIndex = this.lastEnd;
      return;
    }

    const t = this.peek();
    const compound = t.kind === TokenKind.LParen
      || (t.kind === TokenKind.Word && ['{', 'if', 'for', 'while', 'until', 'case', '[['].includes(t.value));
    if (!compound) {
      throw this.unexpected(t);
    }

    this.addChild(n, this.parseCommand(), 'body');
    n.endIndex = this.lastEnd;
  }

  private parseGroup(): RawNode {
    const start = this.advance().pos; // {
    const n = this.node('compound_statement', start, start);

    const body = this.parseCompoundList(['}']);
    this.requireNonEmpty(body);
    for (const b of body) this.addChild(n, b, null);

    this.expectWord('}', n.missing);
    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseSubshell(): RawNode {
    const start = this.advance().pos; // (
    const n = this.node('subshell', start, start);

    const body = this.parseCompoundList([], [TokenKind.RParen]);
    this.requireNonEmpty(body);
    for (const b of body) this.addChild(n, b, null);

    this.expectKind(TokenKind.RParen, ')', n.missing);
    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseTestCommand(): RawNode {
    const start = this.advance().pos; // [[
    const n = this.node('test_command', start, start);

    for (;;) {
      const t = this.peek();
      if (t.kind === TokenKind.EOF) {
        n.missing.push(']]');
        break;
      }
      if (t.kind === TokenKind.Newline) {
        throw this.unexpected(t);
      }
      this.advance();
      if (t.kind === TokenKind.Word) {
        if (t.value === ']]') break;
        this.addChild(n, this.wordNode(t, 'argument'), 'argument');
      }
    }

    this.parseTrailingRedirections(n);
    n.endIndex = this.lastEnd;
    return n;
  }

  private parseDeclaration(type: 'declaration_command' | 'unset_command'): RawNode {
    const start = this.advance().pos; // export / declare / unset ...
    const n = this.node(type, start, this.lastEnd);

    for (;;) {
      const token = this.peek();
      if (this.isRedirectOperator(token.kind)) {
        this.addChild(n, this.parseRedirect(), 'redirect');
        continue;
      }
      if (token.kind !== TokenKind.Word) break;
      this.advance();
      const assignment = type === 'declaration_command' ? this.assignmentNode(token) : null;
      if (assignment) {
        this.addChild(n, assignment, 'argument');
      } else {
        this.addChild(n, this.wordNode(token, 'argument'), 'argument');
      }
    }

    n.endIndex = this.lastEnd;
    return n;
  }

  private parseTrailingRedirections(n: RawNode): void {
    while (this.isRedirectOperator(this.peek().kind)) {
      this.addChild(n, this.parseRedirect(), 'redirect');
    }
  }

  private parseRedirect(): RawNode {
    const opToken = this.advance();

    if (opToken.kind === TokenKind.HeredocStart) {
      const n = this.node('heredoc_redirect', opToken.pos, opToken.end);
      const delimiter = this.expectKind(TokenKind.Word, 'heredoc_delimiter', n.missing);
      if (delimiter) {
        this.addChild(n, this.wordNode(delimiter, 'value', 'word'), 'value');
        n.endIndex = delimiter.end;
        this.pendingHeredocs.push({ node: n, delimiter: delimiter.value });
      }
      return n;
    }

    const type = opToken.kind === TokenKind.HereString ? 'herestring_redirect' : 'file_redirect';
    const n = this.node(type, opToken.pos, opToken.end);
    const target = this.expectKind(TokenKind.Word, 'word', n.missing);
    if (target) {
      this.addChild(n, this.wordNode(target, 'value'), 'value');
      n.endIndex = target.end;
    }
    return n;
  }

  private assignmentNode(token: Token): RawNode | null {
    const first = token.parts?.[0];
    if (!first || first.quoted !== 'none') return null;

    const raw = this.text.slice(token.pos, token.end);
    const match = ASSIGNMENT_RE.exec(raw);
    if (!match) return null;

    const eq = match[0].length;
    const n = this.node('variable_assignment', token.pos, token.end);
    this.addChild(n, this.node('variable_name', token.pos, token.pos + match[1].length), 'name');
    if (eq < raw.length) {
      this.addChild(n, this.node('word', token.pos + eq, token.end), 'value');
    }
    if (token.unterminated) n.missing.push('word_end');
    return n;
  }

  private parseSimpleCommand(): RawNode {
    const start = this.peek().pos;
    const n = this.node('command', start, start);
    let hasName = false;
    let redirects = 0;
    const assignments: RawNode[] = [];

    while (!this.isAtEnd()) {
      const token = this.peek();

      if (this.isRedirectOperator(token.kind)) {
        this.addChild(n, this.parseRedirect(), 'redirect');
        redirects++;
        continue;
      }

      if (token.kind === TokenKind.Word) {
        this.advance();

        if (!hasName) {
          const assignment = this.assignmentNode(token);
          if (assignment) {
            assignments.push(assignment);
            this.addChild(n, assignment, 'assignment');
            continue;
          }
          const name = this.node('command_name', token.pos, token.end, [this.wordNode(token, null)]);
          if (token.unterminated) name.missing.push('word_end');
          this.addChild(n, name, 'name');
          hasName = true;
          continue;
        }

        this.addChild(n, this.wordNode(token, 'argument'), 'argument');
        continue;
      }

      // Anything else (operator) ends this command
      break;
    }

    if (!hasName && redirects === 0 && assignments.length === 1) {
      return this.withField(assignments[0], null);
    }

    n.endIndex = this.lastEnd;
    return n;
  }

  private isRedirectOperator(kind: TokenKind): boolean {
    return kind === TokenKind.RedirectOut
      || kind === TokenKind.RedirectAppend
      || kind === TokenKind.RedirectIn
      || kind === TokenKind.RedirectErr
      || kind === TokenKind.RedirectErrAppend
      || kind === TokenKind.RedirectAll
      || kind === TokenKind.RedirectAllAppend
      || kind === TokenKind.RedirectDup
      || kind === TokenKind.RedirectErrDup
      || kind === TokenKind.HeredocStart
      || kind === TokenKind.HereString;
  }
}

/** Heredoc bodies arrive after a node is built; stretch ancestors over them. */
function fixEnds(node: RawNode): number {
  for (const child of node.children) {
    const end = fixEnds(child);
    if (end > node.endIndex) node.endIndex = end;
  }
  return node.endIndex;
}

function assignPositions(node: RawNode, lines: LineIndex): void {
  node.startPosition = lines.pointAt(node.startIndex);
  node.endPosition = lines.pointAt(node.endIndex);
  for (const child of node.children) {
    assignPositions(child, lines);
  }
}
